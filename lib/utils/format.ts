/**
 * Format currency for display. Amounts are whole yen.
 */
const CURRENCY_FORMAT = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "JPY",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatCurrency(amount: number): string {
  return CURRENCY_FORMAT.format(amount);
}

/** Decimal rate as a percent without trailing zeros: 0.5 → "50%", 0.0125 → "1.25%". */
export function formatPercent(rate: number): string {
  return `${Number((rate * 100).toFixed(4))}%`;
}
