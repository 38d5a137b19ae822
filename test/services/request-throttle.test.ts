import { RequestThrottle } from "../../src/services/request-throttle";

describe("RequestThrottle", () => {
  let clock: number;
  let sleeps: number[];
  let throttle: RequestThrottle;

  beforeEach(() => {
    clock = 0;
    sleeps = [];
    throttle = new RequestThrottle(
      1000,
      () => clock,
      async (ms) => {
        sleeps.push(ms);
        clock += ms;
      }
    );
  });

  it("should let the first request through at once", async () => {
    await throttle.wait();
    expect(sleeps).toEqual([]);
  });

  it("should wait out the rest of the interval", async () => {
    await throttle.wait();
    clock += 300;
    await throttle.wait();

    expect(sleeps).toEqual([700]);
  });

  it("should not wait when the interval has already passed", async () => {
    await throttle.wait();
    clock += 1500;
    await throttle.wait();

    expect(sleeps).toEqual([]);
  });

  it("should space consecutive requests by the interval", async () => {
    await throttle.wait();
    await throttle.wait();
    await throttle.wait();

    expect(sleeps).toEqual([1000, 1000]);
    expect(clock).toBe(2000);
  });

  it("should space concurrent callers by the interval", async () => {
    await Promise.all([throttle.wait(), throttle.wait(), throttle.wait()]);

    expect(sleeps).toEqual([1000, 1000]);
    expect(clock).toBe(2000);
  });

  it("should keep granting slots after a failed wait", async () => {
    const failing = new RequestThrottle(
      1000,
      () => clock,
      async (ms) => {
        sleeps.push(ms);
        if (sleeps.length === 1) throw new Error("timer failed");
        clock += ms;
      }
    );

    const results = await Promise.allSettled([
      failing.wait(),
      failing.wait(),
      failing.wait(),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "fulfilled"]);
    expect(sleeps).toEqual([1000, 1000]);
    expect(clock).toBe(1000);
  });
});
