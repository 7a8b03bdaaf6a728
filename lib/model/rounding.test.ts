import { describe, it, expect } from "vitest";
import { roundHalfEven } from "./rounding";

describe("roundHalfEven", () => {
  it("rounds exact halves to the even neighbour", () => {
    expect(roundHalfEven(20.5)).toBe(20);
    expect(roundHalfEven(21.5)).toBe(22);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it("rounds everything else to the nearest value", () => {
    expect(roundHalfEven(20.51)).toBe(21);
    expect(roundHalfEven(-80.4)).toBe(-80);
    expect(roundHalfEven(0.0833333, 4)).toBe(0.0833);
  });

  it("decides fractional ties from the stored value, not the scaled product", () => {
    // 0.87 × 5 is stored just below 4.35
    expect(roundHalfEven(0.87 * 5, 1)).toBe(4.3);
    // 0.01 × 6.5 − 0.99 is stored just beyond −0.925
    expect(roundHalfEven(0.01 * 6.5 - 0.99, 2)).toBe(-0.93);
    // 0.15 − 0.85 / 8 is stored just below 0.04375
    expect(roundHalfEven(0.15 - 0.85 / 8, 4)).toBe(0.0437);
  });

  it("rounds true fractional ties to the even neighbour", () => {
    expect(roundHalfEven(0.125, 2)).toBe(0.12);
    expect(roundHalfEven(0.375, 2)).toBe(0.38);
    expect(roundHalfEven(-0.625, 2)).toBe(-0.62);
  });

  it("does not produce negative zero", () => {
    expect(roundHalfEven(-0.001, 2)).toBe(0);
  });
});
