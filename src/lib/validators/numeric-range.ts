// Numeric Range Check
// Plausibility bounds per indicator code. The table is data (data/numeric-ranges.json)
// so new exceptions need no code change.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { IndicatorDefinition } from '../types';
import { isPercentUnit } from '../units';
import { checkResult, type IndicatorCheck } from './types';

export interface NumericRange {
  min: number | null;
  max: number | null;
  allowZero: boolean;
}

export type NumericRangeTable = Readonly<Record<string, NumericRange>>;

const rangeTableSchema = z.record(
  z.object({
    min: z.number().nullable(),
    max: z.number().nullable(),
    allowZero: z.boolean(),
  })
);

export const DEFAULT_RANGES_PATH = new URL('../../../data/numeric-ranges.json', import.meta.url);

export function loadRangeTable(path: string | URL = DEFAULT_RANGES_PATH): NumericRangeTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return rangeTableSchema.parse(raw);
}

const PERCENT_RANGE: NumericRange = { min: 0, max: 100, allowZero: true };
const NON_NEGATIVE_RANGE: NumericRange = { min: 0, max: null, allowZero: true };

const EXTREME_MAGNITUDE = 1e15;

/** Listed codes use the table; unlisted percentages are [0, 100], everything else non-negative. */
export function rangeFor(table: NumericRangeTable, definition: Readonly<IndicatorDefinition>): NumericRange {
  const listed = table[definition.code];
  if (listed) return listed;
  return isPercentUnit(definition.unit) ? PERCENT_RANGE : NON_NEGATIVE_RANGE;
}

export function createRangeCheck(table: NumericRangeTable): IndicatorCheck {
  return (extracted, definition) => {
    const value = extracted.numericValue;
    if (value === null || !Number.isFinite(value)) return checkResult();

    const errors: string[] = [];
    const warnings: string[] = [];
    const code = definition.code;
    const { min, max, allowZero } = rangeFor(table, definition);

    if (min !== null && value < min) {
      errors.push(`Value ${value} is below minimum ${min} for ${code}`);
    }
    if (max !== null && value > max) {
      errors.push(`Value ${value} exceeds maximum ${max} for ${code}`);
    }
    if (value === 0 && !allowZero) {
      errors.push(`Value 0 for ${code}: zero not allowed`);
    }
    if (max === null && code.endsWith('_PERCENT') && value > 100) {
      errors.push(`Percentage value ${value} exceeds 100% for ${code}`);
    }
    if (Math.abs(value) > EXTREME_MAGNITUDE) {
      warnings.push(`Value ${value} is extremely large for ${code}. Verify this is not an extraction error.`);
    }

    return checkResult(errors, warnings);
  };
}
