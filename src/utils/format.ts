/**
 * Display formatting for amounts shown to the household.
 */

/**
 * Formats a rupiah amount with dot thousands separators and no decimals.
 *
 * @example
 * ```ts
 * formatRupiah(1250000) // "Rp 1.250.000"
 * formatRupiah(-5000)   // "Rp -5.000"
 * ```
 */
export function formatRupiah(amount: number): string {
  if (!Number.isFinite(amount)) {
    return "Rp 0";
  }
  const rounded = Math.round(amount);
  const sign = rounded < 0 ? "-" : "";
  const digits = String(Math.abs(rounded)).replace(/\B(?=(\d{3})+(?!\d))/g, ".");
  return `Rp ${sign}${digits}`;
}

/**
 * Formats grams with comma thousands separators and two decimals, e.g. "1,234.50".
 */
export function formatGrams(grams: number): string {
  if (!Number.isFinite(grams)) {
    return "0.00";
  }
  const fixed = Math.abs(grams).toFixed(2);
  const [whole, fraction] = fixed.split(".");
  const sign = grams < 0 && fixed !== "0.00" ? "-" : "";
  return `${sign}${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",")}.${fraction}`;
}
