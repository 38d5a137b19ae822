import { createClient } from "redis";

export interface RedisClientOptions {
  host: string;
  port: number;
}

/**
 * Redis client wrapper used by the Redis cache backend.
 */
export class RedisClient {
  public client: ReturnType<typeof createClient>;
  private connected: boolean = false;
  private connecting: boolean = false;

  constructor(options: RedisClientOptions) {
    this.client = createClient({
      url: `redis://${options.host}:${options.port}`,
      socket: {
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            return new Error("Max reconnection attempts reached");
          }
          return Math.min(Math.pow(2, retries) * 100, 3000);
        },
      },
    });

    // Set up event handlers
    this.client.on("connect", () => {
      this.connected = true;
    });

    this.client.on("error", (err) => {
      console.error("Redis error:", err);
      this.connected = false;
    });

    this.client.on("end", () => {
      this.connected = false;
    });
  }

  /**
   * Check if client is connected
   */
  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Ensure Redis connection is established
   */
  public async ensureConnection(): Promise<void> {
    if (this.connected) {
      return;
    }

    if (this.connecting) {
      while (this.connecting) {
        await new Promise((resolve) => setTimeout(resolve, 100));
      }
      return;
    }

    try {
      this.connecting = true;
      await this.client.connect();
      this.connected = true;
    } catch (error) {
      console.error("Failed to connect to Redis:", error);
      throw error;
    } finally {
      this.connecting = false;
    }
  }

  /**
   * Disconnect from Redis
   */
  public async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }

    try {
      await this.client.quit();
    } catch (error) {
      console.warn("Redis quit failed, forcing disconnect:", error);
      await this.client.disconnect();
    } finally {
      this.connected = false;
    }
  }

  // Helper methods
  public async hGetAll(key: string): Promise<Record<string, string>> {
    await this.ensureConnection();
    return this.client.hGetAll(key);
  }

  public async hSetMany(
    key: string,
    fields: Record<string, string>
  ): Promise<number> {
    await this.ensureConnection();
    if (Object.keys(fields).length === 0) {
      return 0;
    }
    return this.client.hSet(key, fields);
  }

  /**
   * SET key value NX PX ttl; resolves true when the key was created
   */
  public async setIfAbsent(
    key: string,
    value: string,
    ttlMs: number
  ): Promise<boolean> {
    await this.ensureConnection();
    const reply = await this.client.set(key, value, { NX: true, PX: ttlMs });
    return reply === "OK";
  }

  public async get(key: string): Promise<string | null> {
    await this.ensureConnection();
    return this.client.get(key);
  }

  public async del(key: string): Promise<number> {
    await this.ensureConnection();
    return this.client.del(key);
  }
}

/**
 * The subset of Redis commands the cache backend relies on
 */
export type RedisCommands = Pick<
  RedisClient,
  "hGetAll" | "hSetMany" | "setIfAbsent" | "get" | "del"
>;
