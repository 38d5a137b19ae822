export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Enforces a minimum delay between consecutive outbound requests.
 * One instance is shared by every request sent to the same provider.
 */
export class RequestThrottle {
  private lastRequestAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  /**
   * Wait until the next request may be sent, then record it as sent.
   * Concurrent callers are granted slots one after another.
   */
  public wait(): Promise<void> {
    const turn = this.queue.then(() => this.takeSlot());
    // The caller gets the rejection; later callers still get their turn
    this.queue = turn.catch((error: unknown) => {
      console.warn("Request throttle wait failed:", error);
    });
    return turn;
  }

  private async takeSlot(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const elapsed = this.now() - this.lastRequestAt;
      if (elapsed < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastRequestAt = this.now();
  }
}
