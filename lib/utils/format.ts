/**
 * Format currency and strategy metrics for display.
 */
const CURRENCY_FORMAT = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatCurrency(amount: number): string {
  return CURRENCY_FORMAT.format(amount);
}

/** Short axis labels: $1.2M, $40k, $950, -$40. */
export function formatCompactCurrency(value: number): string {
  const sign = value < 0 ? "-" : "";
  const magnitude = Math.abs(value);
  if (magnitude >= 1_000_000) {
    return `${sign}$${(magnitude / 1_000_000).toFixed(1)}M`;
  }
  if (magnitude >= 1_000) {
    return `${sign}$${(magnitude / 1_000).toFixed(0)}k`;
  }
  const whole = Math.round(magnitude);
  return `${whole === 0 ? "" : sign}$${whole.toLocaleString("en-US")}`;
}

/** Multiple of risk, e.g. 0.2R or -0.1R. */
export function formatR(value: number): string {
  return `${value}R`;
}

/** Kelly and risk percentages are already in percent units: 10 → "10.00%". */
export function formatKellyPercent(pct: number): string {
  return `${pct.toFixed(2)}%`;
}
