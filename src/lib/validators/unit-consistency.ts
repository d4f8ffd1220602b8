// Unit Consistency Check
// Advisory only: a missing unit in the raw text is a warning, never an error.

import { isPercentUnit } from '../units';
import { checkResult, isQualitativeUnit, type IndicatorCheck } from './types';

/** Spellings of a unit as it may appear in report text, lower-cased. */
export function unitVariations(unit: string): string[] {
  const u = unit.toLowerCase();
  const variations = [u];

  if (isPercentUnit(u)) {
    variations.push('%', 'percent', 'percentage', 'pct');
  }
  if (u.includes('mt')) {
    variations.push('mt', 'metric ton', 'metric tons', 'tonne', 'tonnes');
  }
  if (u.includes('kl')) {
    variations.push('kl', 'kiloliter', 'kilolitre', 'kiloliters', 'kilolitres');
  }
  if (u.includes('joule')) {
    variations.push('joule', 'joules', 'gj', 'tj', 'mwh', 'kwh', 'gwh');
  }
  if (u.includes('co2')) {
    variations.push('co2', 'co2e', 'co2eq', 'carbon dioxide');
  }
  if (u.includes('count')) {
    variations.push('count', 'number', 'total', '#');
  }
  if (u.includes('day')) {
    variations.push('day', 'days');
  }
  if (u.includes('per million')) {
    variations.push('per million', 'per 1000000', '/million', '/1000000');
  }

  return variations;
}

export const checkUnitConsistency: IndicatorCheck = (extracted, definition) => {
  const unit = definition.unit;
  if (unit === null || isQualitativeUnit(unit)) return checkResult();

  const text = extracted.extractedValue.toLowerCase();
  const found = unitVariations(unit.trim()).some(v => text.includes(v));
  if (found) return checkResult();

  return checkResult([], [
    `Expected unit '${unit}' not found in extracted value '${extracted.extractedValue}'. Verify unit consistency.`,
  ]);
};
