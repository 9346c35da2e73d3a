import { describe, it, expect } from "vitest";
import { backoffDelay } from "../backoff.js";

describe("backoffDelay", () => {
  const schedule = { initialIntervalMs: 1_000, maxIntervalMs: 5_000, multiplier: 2 };

  it("grows geometrically from the initial interval", () => {
    expect([0, 1, 2].map(retry => backoffDelay(schedule, retry))).toEqual([1_000, 2_000, 4_000]);
  });

  it("is capped at the maximum interval", () => {
    expect(backoffDelay(schedule, 3)).toBe(5_000);
    expect(backoffDelay(schedule, 20)).toBe(5_000);
  });

  it("stays flat with a multiplier of 1", () => {
    expect(backoffDelay({ ...schedule, multiplier: 1 }, 7)).toBe(1_000);
  });

  it("rounds fractional delays", () => {
    expect(backoffDelay({ initialIntervalMs: 100, maxIntervalMs: 1_000, multiplier: 1.5 }, 1)).toBe(150);
    expect(backoffDelay({ initialIntervalMs: 100, maxIntervalMs: 1_000, multiplier: 1.25 }, 1)).toBe(125);
  });
});
