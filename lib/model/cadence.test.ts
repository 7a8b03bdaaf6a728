import { describe, it, expect } from "vitest";
import { resolveCadence, gatedAmount, shouldResizeRisk } from "./cadence";

describe("resolveCadence", () => {
  it("Period fires every period", () => {
    expect([1, 2, 3].map((p) => resolveCadence("Period", p, 3))).toEqual([true, true, true]);
  });

  it("Cycle fires on the last period by default", () => {
    expect([1, 2, 3].map((p) => resolveCadence("Cycle", p, 3))).toEqual([false, false, true]);
  });

  it("Cycle fires on the first period at the START boundary", () => {
    expect([1, 2, 3].map((p) => resolveCadence("Cycle", p, 3, "START"))).toEqual([true, false, false]);
  });

  it("None never fires", () => {
    expect([1, 2, 3].map((p) => resolveCadence("None", p, 3))).toEqual([false, false, false]);
  });

  it("a one-period cycle fires Cycle at both boundaries", () => {
    expect(resolveCadence("Cycle", 1, 1, "START")).toBe(true);
    expect(resolveCadence("Cycle", 1, 1, "END")).toBe(true);
  });
});

describe("gatedAmount", () => {
  it("returns the amount only when the cadence fires", () => {
    expect(gatedAmount(250, "Cycle", 11, 12)).toBe(0);
    expect(gatedAmount(250, "Cycle", 12, 12)).toBe(250);
    expect(gatedAmount(250, "Period", 5, 12)).toBe(250);
    expect(gatedAmount(250, "None", 12, 12)).toBe(0);
  });
});

describe("shouldResizeRisk", () => {
  it("re-sizes at the start of a cycle for Cycle cadence", () => {
    expect(shouldResizeRisk("Cycle", 1, 12)).toBe(true);
    expect(shouldResizeRisk("Cycle", 12, 12)).toBe(false);
    expect(shouldResizeRisk("Period", 7, 12)).toBe(true);
    expect(shouldResizeRisk("None", 1, 12)).toBe(false);
  });
});
