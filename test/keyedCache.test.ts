import { describe, expect, it, vi } from "vitest";
import { KeyedCache } from "../src/lib/keyedCache";

describe("KeyedCache", () => {
  it("shares one in-flight load between concurrent callers", async () => {
    const cache = new KeyedCache<string>();
    const load = vi.fn(async () => "Main Account");

    const [a, b] = await Promise.all([cache.getOrLoad("1", load), cache.getOrLoad("1", load)]);

    expect(a).toBe("Main Account");
    expect(b).toBe("Main Account");
    expect(load).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  it("evicts a failed load so the next call retries", async () => {
    const cache = new KeyedCache<number>();
    await expect(cache.getOrLoad("k", async () => Promise.reject(new Error("down")))).rejects.toThrow("down");
    expect(cache.has("k")).toBe(false);

    await expect(cache.getOrLoad("k", async () => 7)).resolves.toBe(7);
    expect(cache.has("k")).toBe(true);
  });

  it("clears every entry", async () => {
    const cache = new KeyedCache<number>();
    await cache.getOrLoad("a", async () => 1);
    await cache.getOrLoad("b", async () => 2);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
