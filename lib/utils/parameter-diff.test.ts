import { describe, it, expect } from "vitest";
import { diffParameters } from "./parameter-diff";
import { getBaseScenario } from "@/fixtures/golden-scenarios";

describe("diffParameters", () => {
  it("returns nothing for identical parameters", () => {
    expect(diffParameters(getBaseScenario(), getBaseScenario())).toEqual([]);
  });

  it("labels and formats changed fields in display order", () => {
    const prev = getBaseScenario();
    const next = {
      ...prev,
      riskPct: 1.5,
      winProbabilityPct: 45,
      targetBalance: 250_000,
      riskAdjustCadence: "Cycle" as const,
      rewardToRiskRatio: 2.5,
    };
    expect(diffParameters(prev, next)).toEqual([
      { key: "winProbabilityPct", label: "Win probability", from: "40%", to: "45%" },
      { key: "rewardToRiskRatio", label: "Reward to risk ratio", from: "2:1", to: "2.5:1" },
      { key: "targetBalance", label: "Target balance", from: "$1,000,000", to: "$250,000" },
      { key: "riskPct", label: "Risk per trade", from: "2%", to: "1.5%" },
      { key: "riskAdjustCadence", label: "Risk adjustment frequency", from: "Never", to: "Every cycle" },
    ]);
  });
});
