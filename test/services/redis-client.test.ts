import { RedisClient } from "../../src/services/redis-client";

// In-memory stand-in for the node-redis client
const mockClient = {
  on: jest.fn(),
  connect: jest.fn().mockResolvedValue(undefined),
  quit: jest.fn().mockResolvedValue("OK"),
  disconnect: jest.fn().mockResolvedValue(undefined),
  hGetAll: jest.fn().mockResolvedValue({ "1.000000,2.000000": "{}" }),
  hSet: jest.fn().mockResolvedValue(1),
  set: jest.fn(),
  get: jest.fn().mockResolvedValue("token"),
  del: jest.fn().mockResolvedValue(1),
};

jest.mock("redis", () => ({
  createClient: jest.fn(() => mockClient),
}));

describe("RedisClient", () => {
  let redis: RedisClient;

  beforeEach(() => {
    jest.clearAllMocks();
    redis = new RedisClient({ host: "localhost", port: 6379 });
  });

  it("should connect once for several commands", async () => {
    await redis.hGetAll("geocache:entries");
    await redis.get("geocache:entries:lock");

    expect(mockClient.connect).toHaveBeenCalledTimes(1);
    expect(redis.isConnected()).toBe(true);
  });

  it("should read a whole hash", async () => {
    await expect(redis.hGetAll("geocache:entries")).resolves.toEqual({
      "1.000000,2.000000": "{}",
    });
  });

  it("should write several hash fields at once", async () => {
    await redis.hSetMany("geocache:entries", { a: "1", b: "2" });

    expect(mockClient.hSet).toHaveBeenCalledWith("geocache:entries", {
      a: "1",
      b: "2",
    });
  });

  it("should skip writing an empty set of fields", async () => {
    await expect(redis.hSetMany("geocache:entries", {})).resolves.toBe(0);
    expect(mockClient.hSet).not.toHaveBeenCalled();
  });

  it("should set a key only when absent, with an expiry", async () => {
    mockClient.set.mockResolvedValueOnce("OK").mockResolvedValueOnce(null);

    await expect(redis.setIfAbsent("lock", "token", 5000)).resolves.toBe(true);
    await expect(redis.setIfAbsent("lock", "token", 5000)).resolves.toBe(false);
    expect(mockClient.set).toHaveBeenCalledWith("lock", "token", {
      NX: true,
      PX: 5000,
    });
  });

  it("should quit only when connected", async () => {
    await redis.disconnect();
    expect(mockClient.quit).not.toHaveBeenCalled();

    await redis.ensureConnection();
    await redis.disconnect();
    expect(mockClient.quit).toHaveBeenCalledTimes(1);
    expect(redis.isConnected()).toBe(false);
  });
});
