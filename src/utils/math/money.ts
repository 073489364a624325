/**
 * Rounds an amount to cents
 */
export function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function sumAmounts(amounts: Record<string, number>): number {
  return Object.values(amounts).reduce((sum, amount) => sum + amount, 0);
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
