/**
 * Cadence gate shared by contributions, withdrawals, tax and risk re-sizing.
 * One switch over {Period, Cycle, None}; callers differ only in which end of
 * the cycle a Cycle cadence fires on.
 */

import type { Cadence } from "@/lib/types/zod";

/** Where in a cycle a Cycle-cadence event fires. Cash flows and tax settle at the end; risk resizes at the start. */
export type CycleBoundary = "START" | "END";

/** Whether an event with this cadence fires in the given period (1-based). */
export function resolveCadence(
  cadence: Cadence,
  periodIndex: number,
  periodsPerCycle: number,
  boundary: CycleBoundary = "END"
): boolean {
  switch (cadence) {
    case "Period":
      return true;
    case "Cycle":
      return boundary === "START"
        ? periodIndex === 1
        : periodIndex === periodsPerCycle;
    case "None":
      return false;
  }
}

/** Amount applied this period: the full amount when the cadence fires, else 0. */
export function gatedAmount(
  amount: number,
  cadence: Cadence,
  periodIndex: number,
  periodsPerCycle: number
): number {
  return resolveCadence(cadence, periodIndex, periodsPerCycle, "END")
    ? amount
    : 0;
}

/** Risk is re-sized every period (Period), on the first period of each cycle (Cycle), or never (None). */
export function shouldResizeRisk(
  cadence: Cadence,
  periodIndex: number,
  periodsPerCycle: number
): boolean {
  return resolveCadence(cadence, periodIndex, periodsPerCycle, "START");
}
