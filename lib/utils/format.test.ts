import { describe, it, expect } from "vitest";
import {
  formatCurrency,
  formatCompactCurrency,
  formatR,
  formatKellyPercent,
} from "./format";

describe("format", () => {
  it("formats whole-dollar currency", () => {
    expect(formatCurrency(1040)).toBe("$1,040");
    expect(formatCurrency(1_034_032)).toBe("$1,034,032");
  });

  it("formats compact axis labels", () => {
    expect(formatCompactCurrency(1_234_567)).toBe("$1.2M");
    expect(formatCompactCurrency(40_000)).toBe("$40k");
    expect(formatCompactCurrency(950)).toBe("$950");
  });

  it("puts the sign before the symbol for negative balances", () => {
    expect(formatCompactCurrency(-40)).toBe("-$40");
    expect(formatCompactCurrency(-12_500)).toBe("-$13k");
    expect(formatCompactCurrency(-2_000_000)).toBe("-$2.0M");
    expect(formatCompactCurrency(-0.2)).toBe("$0");
  });

  it("formats R multiples and percentages", () => {
    expect(formatR(0.2)).toBe("0.2R");
    expect(formatR(-0.4)).toBe("-0.4R");
    expect(formatKellyPercent(10)).toBe("10.00%");
  });
});
