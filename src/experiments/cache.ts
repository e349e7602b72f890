import * as fs from "fs/promises";
import * as path from "path";
import { ErrorCodes, ProviderError } from "../types";

export const DEFAULT_CACHE_TTL = 60;

/**
 * On-disk cache of raw experiment data responses, one file per experiment.
 * Loads for the same key share a single in-flight request.
 */
export class FileResponseCache {
  private readonly dir: string;
  private readonly ttlSeconds: number;
  private readonly clock: () => number;
  private readonly debug: boolean;
  private pending = new Map<string, Promise<string>>();

  constructor(
    dir: string,
    options: { ttl?: number; clock?: () => number; debug?: boolean } = {}
  ) {
    this.dir = dir.replace(/[\\/]+$/, "") || dir;
    this.ttlSeconds = options.ttl ?? DEFAULT_CACHE_TTL;
    this.clock = options.clock ?? Date.now;
    this.debug = options.debug ?? false;
  }

  pathFor(key: string): string {
    return path.join(this.dir, `cx-${encodeURIComponent(key)}.cache`);
  }

  /**
   * Fresh cached body for `key`, or null
   */
  async read(key: string): Promise<string | null> {
    const file = this.pathFor(key);
    try {
      const stat = await fs.stat(file);
      const nowSeconds = Math.floor(this.clock() / 1000);
      if (nowSeconds > Math.floor(stat.mtimeMs / 1000) + this.ttlSeconds) {
        return null;
      }
      const body = await fs.readFile(file, "utf-8");
      return body || null;
    } catch {
      // Missing or unreadable entries are misses
      return null;
    }
  }

  async write(key: string, body: string): Promise<void> {
    try {
      await fs.writeFile(this.pathFor(key), body, "utf-8");
    } catch (error) {
      throw new ProviderError(
        `Cache directory "${this.dir}" is not writable`,
        ErrorCodes.CACHE_ERROR,
        { cause: error }
      );
    }
  }

  /**
   * Cached body for `key`, loading and storing it when missing or stale
   */
  getOrLoad(key: string, load: () => Promise<string>): Promise<string> {
    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const promise = this.resolve(key, load).finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, promise);
    return promise;
  }

  private async resolve(key: string, load: () => Promise<string>): Promise<string> {
    const cached = await this.read(key);
    if (cached !== null) {
      this.log(`Cache hit for ${key}`);
      return cached;
    }

    this.log(`Cache miss for ${key}`);
    const body = await load();
    if (body) {
      await this.write(key, body);
    }
    return body;
  }

  private log(...args: unknown[]): void {
    if (this.debug) {
      console.log("[server-cx]", ...args);
    }
  }
}
