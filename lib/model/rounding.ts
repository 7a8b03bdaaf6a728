/**
 * Round half to even ("banker's rounding") at the given number of decimals.
 * Monetary steps round to whole units this way so projected tables line up
 * with the reference calculator's figures.
 *
 * Fractional rounding decides from the exact stored value: 0.87 × 5 is held
 * as 4.34999… and rounds to 4.3, where scaling by 10 first would yield the
 * tie 43.5.
 */
export function roundHalfEven(value: number, decimals: number = 0): number {
  if (decimals === 0) {
    const floor = Math.floor(value);
    const diff = value - floor;
    if (diff > 0.5) return floor + 1;
    if (diff < 0.5) return floor;
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return roundDecimalDigits(value, decimals);
}

// toFixed expands the exact binary value; 30 guard digits are enough to
// tell a true tie from a near one at the magnitudes used here.
const GUARD_DIGITS = 30;

function roundDecimalDigits(value: number, decimals: number): number {
  const magnitude = Math.abs(value);
  // Doubles this large have no fractional part.
  if (!Number.isFinite(value) || magnitude >= 1e21) return value;

  const digits = magnitude.toFixed(decimals + GUARD_DIGITS);
  const cut = digits.indexOf(".") + 1 + decimals;
  const kept = digits.slice(0, cut).replace(".", "");
  const next = digits.charAt(cut);
  const rest = digits.slice(cut + 1);

  let units = Number(kept);
  if (next > "5" || (next === "5" && /[1-9]/.test(rest))) {
    units += 1;
  } else if (next === "5" && units % 2 === 1) {
    units += 1;
  }

  const rounded = units / Math.pow(10, decimals);
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}
