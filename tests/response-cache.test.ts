import { describe, it, expect } from "vitest";
import { getCacheKey, normalizeQuery, ResponseCache } from "../src/cache/response-cache.js";
import { fakeClock } from "./helpers/fakes.js";

describe("cache keys", () => {
  it("ignores case and surrounding whitespace", () => {
    expect(getCacheKey("Hello")).toBe(getCacheKey("  hello  "));
  });

  it("collapses inner whitespace", () => {
    expect(normalizeQuery("  What   are\tyour\nhours? ")).toBe("what are your hours?");
  });

  it("produces a sha-256 hex digest", () => {
    expect(getCacheKey("hello")).toMatch(/^[0-9a-f]{64}$/);
    expect(getCacheKey("hello")).not.toBe(getCacheKey("hello!"));
  });
});

describe("ResponseCache", () => {
  it("returns a stored answer for an equivalent query", () => {
    const cache = new ResponseCache({ ttlMs: 1000 });
    cache.put("What are your hours?", "Mon-Fri");
    expect(cache.get("  what are your HOURS?")).toBe("Mon-Fri");
    expect(cache.get("Where are you?")).toBeUndefined();
  });

  it("keeps confidence and sources with the entry", () => {
    const clock = fakeClock();
    const cache = new ResponseCache({ ttlMs: 1000, now: clock.now });
    cache.put("hours", "Mon-Fri", { confidence: "high", sources: ["contact_info"] });

    expect(cache.lookup("hours")).toEqual({
      key: getCacheKey("hours"),
      response: "Mon-Fri",
      confidence: "high",
      sources: ["contact_info"],
      createdAt: 1_000_000,
      expiresAt: 1_001_000,
    });
  });

  it("treats an entry as absent once its expiry is reached", () => {
    const clock = fakeClock();
    const cache = new ResponseCache({ ttlMs: 1000, now: clock.now });
    cache.put("hours", "Mon-Fri");

    clock.advance(999);
    expect(cache.get("hours")).toBe("Mon-Fri");
    clock.advance(1);
    expect(cache.get("hours")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("never serves an entry written with a zero TTL", () => {
    const cache = new ResponseCache({ ttlMs: 1000, now: fakeClock().now });
    cache.put("hours", "Mon-Fri", {}, 0);
    expect(cache.get("hours")).toBeUndefined();
  });

  it("prunes expired entries on the next write", () => {
    const clock = fakeClock();
    const cache = new ResponseCache({ ttlMs: 1000, now: clock.now });
    cache.put("a", "1");
    cache.put("b", "2");
    clock.advance(500);
    cache.put("c", "3");
    clock.advance(500);

    cache.put("d", "4");
    expect(cache.size).toBe(2);
    expect(cache.get("c")).toBe("3");
    expect(cache.get("d")).toBe("4");
  });

  it("overwrites the entry for the same key", () => {
    const cache = new ResponseCache({ ttlMs: 1000 });
    cache.put("hours", "old");
    cache.put("HOURS", "new");
    expect(cache.get("hours")).toBe("new");
    expect(cache.size).toBe(1);
  });

  it("clears everything and reports how much was removed", () => {
    const cache = new ResponseCache({ ttlMs: 1000 });
    cache.put("a", "1");
    cache.put("b", "2");
    expect(cache.clear()).toBe(2);
    expect(cache.clear()).toBe(0);
    expect(cache.get("a")).toBeUndefined();
  });
});
