/**
 * Export the period-by-period projection to CSV.
 * Columns mirror the projection table: cycle, period, balances, risk and flows.
 */

import type { ProjectionResult } from "@/lib/model/engine";
import type { PeriodRecord } from "@/lib/types/zod";

export const CSV_HEADERS = [
  "Cycle",
  "Period",
  "Starting Balance",
  "Risk",
  "Return",
  "Added",
  "Withdrawn",
  "Tax",
  "Ending Balance",
] as const;

/**
 * Convert a PeriodRecord to CSV row cells.
 * Use raw numbers for spreadsheet compatibility.
 */
function recordToCells(record: PeriodRecord): number[] {
  return [
    record.cycleIndex,
    record.periodIndex,
    record.startingBalance,
    record.riskAmount,
    record.returnAmount,
    record.contributionApplied,
    record.withdrawalApplied,
    record.taxWithheld,
    record.endingBalance,
  ];
}

/** Serialize projection to CSV string (no trailing newline). */
export function projectionToCsv(projection: ProjectionResult): string {
  const rows: string[] = [CSV_HEADERS.join(",")];
  for (const record of projection.records) {
    rows.push(recordToCells(record).map(String).join(","));
  }
  return rows.join("\n");
}

/** Default download name, e.g. compounding-projection-2025-01-31.csv. */
export function projectionCsvFilename(date: Date = new Date()): string {
  return `compounding-projection-${date.toISOString().slice(0, 10)}.csv`;
}
