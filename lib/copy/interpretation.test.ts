import { describe, it, expect } from "vitest";
import { buildInterpretation, COMPOUNDING_FORMULA } from "./interpretation";
import { runProjection } from "@/lib/model/engine";
import { getBaseScenario, getCompoundingScenario } from "@/fixtures/golden-scenarios";

describe("buildInterpretation", () => {
  it("fills formula terms from the parameters and projection", () => {
    const params = getBaseScenario();
    const { formula, terms } = buildInterpretation(params, runProjection(params));
    expect(formula).toBe(COMPOUNDING_FORMULA);
    expect(terms).toEqual([
      { symbol: "A", label: "Ending balance", value: "15,400" },
      { symbol: "P", label: "Starting balance", value: "1,000" },
      { symbol: "r", label: "Expected return per period", value: "2.0R" },
      { symbol: "n", label: "Opportunities per period", value: "10" },
      { symbol: "t", label: "Total periods", value: "360" },
    ]);
  });

  it("summarizes edge, Kelly and the outcome", () => {
    const params = getCompoundingScenario();
    const { insights } = buildInterpretation(params, runProjection(params));
    expect(insights).toEqual([
      "Expectancy: 0.20R per trade",
      "Kelly Criterion: Risk 10.00% per trade (half-Kelly: 5.00%)",
      "Your risk of 2% is below Kelly",
      "Ending Balance: 1,034,032",
      "Target reached in cycle 15, period 9",
      "Risk Management: Adjust risk per period for balance.",
    ]);
  });

  it("explains a horizon outcome with fixed risk", () => {
    const params = getBaseScenario();
    const { insights } = buildInterpretation(params, runProjection(params));
    expect(insights[4]).toBe("Target not reached within the simulated cycles");
    expect(insights[5]).toBe(
      "Risk Management: Risk stays at the starting amount (never adjusted)."
    );
  });
});
