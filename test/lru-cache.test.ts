import { describe, expect, test } from "vitest";
import { LRUCache } from "../src/lib/LRUCache.ts";
import { ParseCache } from "../src/lib/math/cache.ts";
import { GradingSession } from "../src/lib/grading/session.ts";
import { ConfigError, ParseError } from "../src/lib/errors.ts";

describe("LRUCache", () => {
  test("evicts the least recently used entry at capacity", () => {
    const evicted: string[] = [];
    const cache = new LRUCache<string, string>({
      maxSize: 3,
      onEvict: (key) => evicted.push(key),
    });

    cache.set("a", "1");
    cache.set("b", "2");
    cache.set("c", "3");
    // Touch "a" so "b" becomes the oldest
    expect(cache.get("a")).toBe("1");
    cache.set("d", "4");

    expect(evicted).toEqual(["b"]);
    expect(cache.keys()).toEqual(["c", "a", "d"]);
    expect(cache.getStats()).toEqual({ size: 3, maxSize: 3, hits: 1, misses: 0, evictions: 1 });
  });

  test("set on an existing key updates it without eviction", () => {
    const cache = new LRUCache<string, number>({ maxSize: 2 });
    cache.set("a", 1);
    cache.set("b", 2);
    cache.set("a", 10);

    expect(cache.get("a")).toBe(10);
    expect(cache.keys()).toEqual(["b", "a"]);
    expect(cache.getStats().evictions).toBe(0);
  });

  test("counts misses and supports delete and clear", () => {
    const cache = new LRUCache<string, number>({ maxSize: 5 });
    cache.set("x", 1);

    expect(cache.get("missing")).toBeUndefined();
    expect(cache.delete("x")).toBe(true);
    expect(cache.delete("x")).toBe(false);
    expect(cache.has("x")).toBe(false);

    cache.set("y", 2);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.keys()).toEqual([]);
    expect(cache.getStats().misses).toBe(1);
  });

  test("rejects a non-positive maxSize", () => {
    expect(() => new LRUCache({ maxSize: 0 })).toThrow("LRUCache maxSize must be a positive integer, got 0");
  });
});

describe("ParseCache", () => {
  test("keys entries by whitespace-stripped source", () => {
    const cache = new ParseCache(10);
    const first = cache.parse("x + 1");
    const second = cache.parse("x+1");

    expect(second).toBe(first);
    expect(cache.size).toBe(1);
    expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1 });
  });

  test("does not cache failures", () => {
    const cache = new ParseCache(10);
    expect(() => cache.parse("(1+2")).toThrow(ParseError);
    expect(cache.size).toBe(0);
  });
});

describe("GradingSession", () => {
  test("shares parsed expressions and can be cleared", () => {
    const session = new GradingSession({ parse_cache_size: 2 });
    const parsed = session.parse("sin(x)");

    expect(session.parse(" sin( x ) ")).toBe(parsed);
    expect(session.getStats().size).toBe(1);

    session.clear();
    expect(session.getStats().size).toBe(0);
  });

  test("reports instructor parse failures as configuration errors", () => {
    const session = new GradingSession();
    expect(() => session.parseInstructor("x^")).toThrow(ConfigError);
    expect(() => session.parseInstructor("x^")).toThrow(
      "Invalid instructor expression 'x^': Invalid Input: the expression ends unexpectedly after '^'; an operand is missing",
    );
  });
});
