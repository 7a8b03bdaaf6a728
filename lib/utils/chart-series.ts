/**
 * Chart-ready balance series: ending balance over period sequence, plus the target line.
 */

import type { ProjectionResult } from "@/lib/model/engine";

export interface BalancePoint {
  /** 0-based position in the projection; the chart's x axis. */
  sequence: number;
  cycleIndex: number;
  periodIndex: number;
  endingBalance: number;
}

export interface BalanceSeries {
  points: BalancePoint[];
  targetBalance: number;
  /** Largest value the y axis must show (balances or the target line). */
  maxValue: number;
}

export function buildBalanceSeries(
  projection: ProjectionResult,
  targetBalance: number
): BalanceSeries {
  const points = projection.records.map((r, i) => ({
    sequence: i,
    cycleIndex: r.cycleIndex,
    periodIndex: r.periodIndex,
    endingBalance: r.endingBalance,
  }));
  const maxValue = points.reduce(
    (max, p) => Math.max(max, p.endingBalance),
    targetBalance
  );
  return { points, targetBalance, maxValue };
}

/** Hover label for a point, e.g. "Cycle: 2 · Period: 3 · Balance: $1,234". */
export function formatPointLabel(
  point: BalancePoint,
  formatBalance: (value: number) => string
): string {
  return `Cycle: ${point.cycleIndex} · Period: ${point.periodIndex} · Balance: ${formatBalance(point.endingBalance)}`;
}
