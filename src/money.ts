import type { Money } from './types.js';

/** Accepts a non-negative integer amount of minor units, as a number or a digit string. */
export function parseMinorUnits(value: unknown): Money | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value.trim(), 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

export function formatMoney(amount: Money): string {
  const units = Math.trunc(amount / 100);
  const cents = amount % 100;
  return `${units}.${String(cents).padStart(2, '0')}`;
}

/** Value for a numeric spreadsheet cell; parsed from the fixed-point text so no arithmetic rounding creeps in. */
export function toCellNumber(amount: Money): number {
  return Number(formatMoney(amount));
}
