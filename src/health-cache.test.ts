import { describe, it, expect, vi } from "vitest";
import { HealthCheckCache } from "./health-cache.js";

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

function createCache(ttlMs: number) {
  let now = 1_000;
  const cache = new HealthCheckCache<{ status: string }>(ttlMs, () => now, createSilentLogger());
  return {
    cache,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("HealthCheckCache", () => {
  it("returns a stored value within the TTL", () => {
    const { cache, advance } = createCache(5000);
    cache.set("qdrant", { status: "connected" });
    advance(5000);
    expect(cache.get("qdrant")).toEqual({ status: "connected" });
  });

  it("evicts a value once it is older than the TTL", () => {
    const { cache, advance } = createCache(5000);
    cache.set("qdrant", { status: "connected" });
    advance(5001);
    expect(cache.get("qdrant")).toBeUndefined();
    expect(cache.stats().total_entries).toBe(0);
  });

  it("computes once and serves the cached value afterwards", async () => {
    const { cache, advance } = createCache(5000);
    const probe = vi.fn(async () => ({ status: "healthy" }));

    await cache.getOrCompute("rag", probe);
    advance(1000);
    await expect(cache.getOrCompute("rag", probe)).resolves.toEqual({ status: "healthy" });
    expect(probe).toHaveBeenCalledTimes(1);

    advance(5000);
    await cache.getOrCompute("rag", probe);
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it("does not store a failed computation", async () => {
    const { cache } = createCache(5000);
    await expect(
      cache.getOrCompute("qdrant", async () => {
        throw new Error("connection refused");
      }),
    ).rejects.toThrow("connection refused");
    expect(cache.get("qdrant")).toBeUndefined();
  });

  it("clears one key or everything", () => {
    const { cache } = createCache(5000);
    cache.set("a", { status: "healthy" });
    cache.set("b", { status: "healthy" });

    cache.clear("a");
    expect(cache.stats().cache_keys).toEqual(["b"]);
    cache.clear();
    expect(cache.stats().cache_keys).toEqual([]);
  });

  it("reports active and expired entries separately", () => {
    const { cache, advance } = createCache(100);
    cache.set("old", { status: "healthy" });
    advance(150);
    cache.set("fresh", { status: "healthy" });

    expect(cache.stats()).toEqual({
      total_entries: 2,
      active_entries: 1,
      ttl_ms: 100,
      cache_keys: ["old", "fresh"],
    });
  });
});
