/**
 * Golden scenario tests: exact tables for the fixture parameter sets.
 */

import { describe, it, expect } from "vitest";
import { runProjection } from "./engine";
import { projectionToCsv } from "@/lib/export/projectionToCsv";
import { DerivedStatsSchema, PeriodRecordSchema } from "@/lib/types/zod";
import {
  getBaseScenario,
  getCompoundingScenario,
  getCycleCadenceScenario,
  getLosingScenario,
} from "@/fixtures/golden-scenarios";

describe("Golden scenarios", () => {
  it("base: fixed 20 risk, +40 per period for 360 periods", () => {
    const result = runProjection(getBaseScenario());
    const csv = projectionToCsv(result).split("\n");
    expect(csv.slice(1, 4)).toEqual([
      "1,1,1000,20,40,0,0,0,1040",
      "1,2,1040,20,40,0,0,0,1080",
      "1,3,1080,20,40,0,0,0,1120",
    ]);
    expect(csv[csv.length - 1]).toBe("30,12,15360,20,40,0,0,0,15400");
  });

  it("compounding: target reached in cycle 15", () => {
    const result = runProjection(getCompoundingScenario());
    const csv = projectionToCsv(result).split("\n");
    expect(csv.slice(-3)).toEqual([
      "15,7,919252,18385,36770,0,0,0,956022",
      "15,8,956022,19120,38240,0,0,0,994262",
      "15,9,994262,19885,39770,0,0,0,1034032",
    ]);
    expect(result.outcome).toBe("TARGET_REACHED");
  });

  it("emits records and stats that satisfy their schemas", () => {
    const result = runProjection(getCycleCadenceScenario());
    expect(PeriodRecordSchema.array().safeParse(result.records).success).toBe(true);
    expect(DerivedStatsSchema.safeParse(result.stats).success).toBe(true);
  });

  it("cycle cadence: tax and withdrawal settle each cycle", () => {
    const result = runProjection(getCycleCadenceScenario());
    expect(result.totalTax).toBe(400 + 444 + 494);
    expect(result.totalWithdrawals).toBe(1500);
    expect(result.totalContributions).toBe(1200);
    expect(result.finalBalance).toBe(13_714);
    expect(result.outcome).toBe("HORIZON_REACHED");
  });

  it("losing: declines every period and stops at the first non-positive balance", () => {
    const result = runProjection(getLosingScenario());
    const balances = result.records.map((r) => r.endingBalance);
    for (let i = 1; i < balances.length; i++) {
      expect(balances[i]).toBeLessThan(balances[i - 1] ?? Infinity);
    }
    expect(balances.filter((b) => b <= 0)).toEqual([-40]);
    expect(result.outcome).toBe("DEPLETED");
  });
});
