import type { ExtractedIndicator, IndicatorDefinition } from '../types';

export interface CheckResult {
  passed: boolean;
  errors: string[];
  warnings: string[];
}

export type IndicatorCheck = (
  extracted: Readonly<ExtractedIndicator>,
  definition: Readonly<IndicatorDefinition>
) => CheckResult;

export function checkResult(errors: string[] = [], warnings: string[] = []): CheckResult {
  return { passed: errors.length === 0, errors, warnings };
}

// Units that mark an indicator as qualitative
export const NON_NUMERIC_UNITS: readonly string[] = ['n/a', 'na', 'text', 'qualitative'];

export function isQualitativeUnit(unit: string | null): boolean {
  if (unit === null || unit.trim() === '') return true;
  return NON_NUMERIC_UNITS.includes(unit.trim().toLowerCase());
}
