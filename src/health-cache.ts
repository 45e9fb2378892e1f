// Labor Law Assistant - Health check cache
// Short-lived memo for status probes so a burst of /api/status polls does not
// fan out to every backing service each time.

import { createLogger, type Logger } from "./logger.js";

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export class HealthCheckCache<T> {
  private readonly entries: Map<string, CacheEntry<T>> = new Map();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(ttlMs: number = 5000, now: () => number = Date.now, logger?: Logger) {
    this.ttlMs = ttlMs;
    this.now = now;
    this.logger = logger ?? createLogger("HealthCache");
  }

  /** Cached value, or undefined when missing or expired. Expired entries are evicted. */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    const age = this.now() - entry.storedAt;
    if (age > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    this.logger.debug(`Cache hit for '${key}' (age: ${age}ms)`);
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  /** Returns the cached value for `key`, computing and storing it on a miss. */
  async getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const value = await compute();
    this.set(key, value);
    return value;
  }

  clear(key?: string): void {
    if (key === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(key);
    }
  }

  stats(): { total_entries: number; active_entries: number; ttl_ms: number; cache_keys: string[] } {
    const current = this.now();
    let active = 0;
    for (const entry of this.entries.values()) {
      if (current - entry.storedAt <= this.ttlMs) active++;
    }
    return {
      total_entries: this.entries.size,
      active_entries: active,
      ttl_ms: this.ttlMs,
      cache_keys: [...this.entries.keys()],
    };
  }
}
