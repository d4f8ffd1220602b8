// Unit-aware normalization of raw indicator values onto a 0-100 scale.

import { isPercentUnit } from '../units';

export type NormalizationRule = 'percentage' | 'intensity' | 'count' | 'days' | 'neutral';

export const NEUTRAL_SCORE = 50;

// Supplier payment terms beyond a quarter score zero
const PAYMENT_DAYS_HORIZON = 90;

export function normalizationRule(unit: string | null): NormalizationRule {
  if (isPercentUnit(unit)) return 'percentage';
  const u = (unit ?? '').trim().toLowerCase();
  if (u.includes('per') || u.includes('/')) return 'intensity';
  if (u === 'count') return 'count';
  if (u === 'days' || u === 'day') return 'days';
  return 'neutral';
}

function clamp(value: number): number {
  return Math.min(100, Math.max(0, value));
}

/**
 * - percentage: the value itself, capped at 100
 * - intensity (per unit / per revenue): 100 / (1 + v), lower is better
 * - count (incidents, fatalities): 100 - v
 * - days: 100 - v/90·100
 * - anything else: neutral 50
 */
export function normalizeValue(value: number, unit: string | null): number {
  switch (normalizationRule(unit)) {
    case 'percentage':
      return clamp(value);
    case 'intensity':
      return value <= 0 ? 100 : clamp(100 / (1 + value));
    case 'count':
      return clamp(100 - value);
    case 'days':
      return clamp(100 - (value / PAYMENT_DAYS_HORIZON) * 100);
    case 'neutral':
      return NEUTRAL_SCORE;
  }
}
