/**
 * Render an amount: integral values without decimals, fractional ones with two
 */
export function formatAmount(value: number): string {
  return Number.isInteger(value) ? value.toString() : value.toFixed(2);
}

export function formatWithUnit(value: number, unit: string): string {
  return unit ? `${formatAmount(value)} ${unit}` : formatAmount(value);
}
