import { loadConfig } from "../src/config";
import { createContext } from "../src/context";
import { PlaceRecordUtil } from "../src/services/place-record-util";
import { RequestThrottle } from "../src/services/request-throttle";
import { FakeProvider, MemoryCacheStore, place } from "./utils/fakes";

describe("createContext", () => {
  it("should load the cache and wire the resolver to the provider", async () => {
    const store = new MemoryCacheStore({
      "45.764000,4.835700": PlaceRecordUtil.toStored(place()),
    });
    const provider = new FakeProvider();
    const context = await createContext(loadConfig({}), {
      store,
      provider,
      throttle: new RequestThrottle(0),
    });

    expect(context.cache.size()).toBe(1);

    const results = await context.batch.resolveBatch([
      { index: 0, lat: 45.77, lon: 4.84 },
      { index: 1, lat: 48.8566, lon: 2.3522 },
    ]);
    expect(results.size).toBe(2);
    expect(provider.reverseCalls).toHaveLength(1);

    await expect(context.close()).resolves.toBeUndefined();
  });
});
