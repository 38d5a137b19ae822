import { randomUUID } from "crypto";
import lockfile from "proper-lockfile";
import { RedisCommands } from "./redis-client";

const POLL_INTERVAL_MS = 100;

/**
 * Exclusive lock guarding the persisted cache across processes.
 *
 * `acquire` resolves false when the lock is still held elsewhere after
 * `timeoutMs`; it never waits longer. `release` is safe to call on every
 * exit path, including when nothing was acquired.
 */
export interface ScopedLock {
  acquire(timeoutMs: number): Promise<boolean>;
  release(): Promise<void>;
}

/**
 * Advisory lock on `<target>.lock`, shared by every process that uses the
 * same cache file. Locks left behind by killed processes go stale and are
 * reclaimed.
 */
export class FileLock implements ScopedLock {
  private releaseFn: (() => Promise<void>) | null = null;

  constructor(
    private readonly target: string,
    private readonly staleMs: number = 10000
  ) {}

  public async acquire(timeoutMs: number): Promise<boolean> {
    if (this.releaseFn) {
      return true;
    }

    try {
      this.releaseFn = await lockfile.lock(this.target, {
        realpath: false,
        stale: this.staleMs,
        retries: {
          retries: Math.ceil(timeoutMs / POLL_INTERVAL_MS),
          factor: 1,
          minTimeout: POLL_INTERVAL_MS,
          maxTimeout: POLL_INTERVAL_MS,
        },
      });
      return true;
    } catch (error) {
      console.warn(
        `Lock timeout after ${timeoutMs}ms on ${this.target}:`,
        error instanceof Error ? error.message : error
      );
      return false;
    }
  }

  public async release(): Promise<void> {
    const release = this.releaseFn;
    this.releaseFn = null;
    if (!release) {
      return;
    }

    try {
      await release();
    } catch (error) {
      console.warn(`Failed to release lock on ${this.target}:`, error);
    }
  }
}

/**
 * Lock held as a Redis key with an expiry, so a crashed holder cannot block
 * other processes for longer than `ttlMs`.
 */
export class RedisLock implements ScopedLock {
  private token: string | null = null;

  constructor(
    private readonly redis: RedisCommands,
    private readonly key: string,
    private readonly ttlMs: number = 120000,
    private readonly pollIntervalMs: number = POLL_INTERVAL_MS
  ) {}

  public async acquire(timeoutMs: number): Promise<boolean> {
    if (this.token) {
      return true;
    }

    const token = randomUUID();
    const deadline = Date.now() + timeoutMs;

    while (true) {
      if (await this.redis.setIfAbsent(this.key, token, this.ttlMs)) {
        this.token = token;
        return true;
      }

      if (Date.now() >= deadline) {
        console.warn(`Lock timeout after ${timeoutMs}ms on ${this.key}`);
        return false;
      }
      await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
    }
  }

  public async release(): Promise<void> {
    const token = this.token;
    this.token = null;
    if (!token) {
      return;
    }

    try {
      // Only delete the key if it still belongs to us (it may have expired)
      if ((await this.redis.get(this.key)) === token) {
        await this.redis.del(this.key);
      }
    } catch (error) {
      console.warn(`Failed to release lock ${this.key}:`, error);
    }
  }
}
