import { describe, it, expect } from "vitest";
import { backoffDelay, DEFAULT_RETRY_POLICY } from "../retry-policy.js";

describe("backoffDelay", () => {
  it("doubles from one second", () => {
    expect([0, 1, 2, 3].map((retries) => backoffDelay(DEFAULT_RETRY_POLICY, retries))).toEqual([
      1000, 2000, 4000, 8000,
    ]);
  });

  it("caps at maxDelayMs", () => {
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 5)).toBe(30_000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 50)).toBe(30_000);
  });

  it("stays fixed with multiplier 1", () => {
    const policy = { initialDelayMs: 250, multiplier: 1, maxDelayMs: 30_000 };
    expect(backoffDelay(policy, 0)).toBe(250);
    expect(backoffDelay(policy, 4)).toBe(250);
  });
});
