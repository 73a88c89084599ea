import { describe, expect, it } from "vitest";
import { BudgetExhaustedError } from "../lib/errors";
import { decideBudget, usableBudget } from "./budget";

describe("usableBudget", () => {
  it("keeps back the reserve fraction and any reserved tokens", () => {
    expect(usableBudget(128000)).toBe(96000);
    expect(usableBudget(1000, { reservedTokens: 100 })).toBe(650);
    expect(usableBudget(1000, { reserveFraction: 0.5 })).toBe(500);
  });
});

describe("decideBudget", () => {
  it("does not sample when every candidate fits", () => {
    expect(decideBudget(100, 128000)).toEqual({
      needsSampling: false,
      targetCount: 100,
      usableTokens: 96000,
    });
  });

  it("does not sample at exactly the usable budget", () => {
    // 4800 * 20 = 96000 = usable
    expect(decideBudget(4800, 128000).needsSampling).toBe(false);
  });

  it("samples an oversized filtered set down to what fits", () => {
    const decision = decideBudget(40000, 128000, 20);
    expect(decision).toEqual({ needsSampling: true, targetCount: 4800, usableTokens: 96000 });
  });

  it("applies a track cap below the context window", () => {
    expect(decideBudget(1000, 128000, 20, { maxTracks: 500 })).toEqual({
      needsSampling: true,
      targetCount: 500,
      usableTokens: 96000,
    });
    expect(decideBudget(1000, 128000, 20, { maxTracks: 0 }).targetCount).toBe(1000);
  });

  it("still sends one track when only one fits", () => {
    // floor(100 * 0.75) - 50 = 25 usable, one 20-token line
    expect(decideBudget(5, 100, 20, { reservedTokens: 50 })).toEqual({
      needsSampling: true,
      targetCount: 1,
      usableTokens: 25,
    });
  });

  it("throws BudgetExhaustedError when not even one track fits", () => {
    expect(() => decideBudget(10, 100, 20, { reservedTokens: 70 })).toThrow(
      BudgetExhaustedError
    );
    expect(() => decideBudget(10, 1000, 20, { reservedTokens: 2000 })).toThrow(
      /1000 token limit leaves -1250 usable tokens/
    );
  });

  it("reports nothing to send for an empty candidate set", () => {
    expect(decideBudget(0, 128000)).toEqual({
      needsSampling: false,
      targetCount: 0,
      usableTokens: 96000,
    });
  });
});
