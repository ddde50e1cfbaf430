export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

/**
 * Currency amounts are carried to 2 decimal places
 */
export function roundCurrency(value: number): number {
  return roundTo(value, 2);
}
