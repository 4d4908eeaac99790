import { describe, expect, it } from "vitest";
import { FixedWindowRateLimiter } from "../src/rate-limit.js";

describe("FixedWindowRateLimiter", () => {
  it("allows up to max in same window", () => {
    const limiter = new FixedWindowRateLimiter({ maxPerWindow: 2, windowMs: 60_000 });
    const now = 1000;

    expect(limiter.allow("k", now)).toBe(true);
    expect(limiter.allow("k", now + 1)).toBe(true);
    expect(limiter.allow("k", now + 2)).toBe(false);
    expect(limiter.allow("other", now + 2)).toBe(true);
  });

  it("resets after window", () => {
    const limiter = new FixedWindowRateLimiter({ maxPerWindow: 1, windowMs: 100 });
    const now = 1000;

    expect(limiter.allow("k", now)).toBe(true);
    expect(limiter.allow("k", now + 50)).toBe(false);
    expect(limiter.allow("k", now + 101)).toBe(true);
  });

  it("tells a limited key how long to wait", () => {
    const limiter = new FixedWindowRateLimiter({ maxPerWindow: 1, windowMs: 60_000 });
    expect(limiter.retryAfterSec("k", 0)).toBe(0);

    limiter.allow("k", 0);
    expect(limiter.retryAfterSec("k", 1_500)).toBe(59);
    expect(limiter.retryAfterSec("k", 59_999)).toBe(1);
    expect(limiter.retryAfterSec("k", 60_000)).toBe(0);
  });

  it("prunes windows that have ended", () => {
    const limiter = new FixedWindowRateLimiter({ maxPerWindow: 1, windowMs: 100 });
    limiter.allow("old", 0);
    limiter.allow("new", 80);

    expect(limiter.prune(120)).toBe(1);
    expect(limiter.size).toBe(1);
    expect(limiter.allow("new", 121)).toBe(false);
  });
});
