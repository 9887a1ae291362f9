/**
 * Money helpers. Amounts inside the ledger are integer cents.
 */

/** Convert a decimal amount (e.g. 9.99) to integer cents, rounding half away from zero. */
export function toCents(amount: number): number {
  const sign = amount < 0 ? -1 : 1;
  // toFixed(6) absorbs binary error such as 1.005 * 100 = 100.49999999999999
  return sign * Math.round(Number((Math.abs(amount) * 100).toFixed(6)));
}

/** Format cents as a plain decimal string, e.g. 1050 -> "10.50". */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/** True when `amount` has no more than two decimal places. */
export function hasCentPrecision(amount: number): boolean {
  return Math.abs(amount * 100 - Math.round(amount * 100)) < 1e-6;
}

export function lineTotalCents(line: { unitPriceCents: number; qty: number }): number {
  return line.unitPriceCents * line.qty;
}

export function sumLinesCents(lines: ReadonlyArray<{ unitPriceCents: number; qty: number }>): number {
  return lines.reduce((sum, line) => sum + lineTotalCents(line), 0);
}
