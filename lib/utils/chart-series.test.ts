import { describe, it, expect } from "vitest";
import { buildBalanceSeries, formatPointLabel } from "./chart-series";
import { runProjection } from "@/lib/model/engine";
import { formatCurrency } from "./format";
import { getCycleCadenceScenario } from "@/fixtures/golden-scenarios";

describe("buildBalanceSeries", () => {
  const params = getCycleCadenceScenario();
  const series = buildBalanceSeries(runProjection(params), params.targetBalance);

  it("maps each record to a 0-based sequence point", () => {
    expect(series.points).toHaveLength(12);
    expect(series.points[0]).toEqual({
      sequence: 0,
      cycleIndex: 1,
      periodIndex: 1,
      endingBalance: 10_500,
    });
    expect(series.points[11]).toEqual({
      sequence: 11,
      cycleIndex: 3,
      periodIndex: 4,
      endingBalance: 13_714,
    });
  });

  it("keeps the target line within the axis range", () => {
    expect(series.targetBalance).toBe(100_000);
    expect(series.maxValue).toBe(100_000);
  });

  it("formats hover labels", () => {
    expect(formatPointLabel(series.points[4]!, formatCurrency)).toBe(
      "Cycle: 2 · Period: 1 · Balance: $11,644"
    );
  });
});
