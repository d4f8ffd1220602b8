// Validator Orchestrator
// Runs the five indicator checks, aggregates errors and warnings, and returns a verdict.
// Pure: the input record is never modified, and applying the status is the caller's job.

import type { ExtractedIndicator, IndicatorDefinition } from '../types';
import { checkConfidence } from './confidence';
import { checkDataType } from './data-type';
import { createRangeCheck, type NumericRangeTable } from './numeric-range';
import { checkRequiredFields } from './required-fields';
import type { CheckResult, IndicatorCheck } from './types';
import { checkUnitConsistency } from './unit-consistency';

export interface NamedCheckResult extends CheckResult {
  check: string;
}

export interface ValidationVerdict {
  isValid: boolean;
  status: 'valid' | 'invalid';
  errors: string[];
  warnings: string[];
  results: NamedCheckResult[];
}

export class IndicatorValidator {
  private readonly checks: ReadonlyArray<[string, IndicatorCheck]>;

  constructor(rangeTable: NumericRangeTable, private readonly verbose = false) {
    this.checks = [
      ['Confidence Bound', checkConfidence],
      ['Required Fields', checkRequiredFields],
      ['Type Consistency', checkDataType],
      ['Numeric Range', createRangeCheck(rangeTable)],
      ['Unit Consistency', checkUnitConsistency],
    ];
  }

  validate(
    extracted: Readonly<ExtractedIndicator>,
    definition: Readonly<IndicatorDefinition>
  ): ValidationVerdict {
    const results: NamedCheckResult[] = this.checks.map(([check, run]) => ({
      check,
      ...run(extracted, definition),
    }));

    if (this.verbose) {
      for (const r of results) {
        console.log(`[Validators] ${extracted.indicatorCode} ${r.check}: ${r.passed ? '✓ PASS' : '✗ FAIL'}`);
      }
    }

    const errors = results.flatMap(r => r.errors);
    const warnings = results.flatMap(r => r.warnings);
    const isValid = errors.length === 0;

    if (!isValid) {
      console.warn(`[Validators] ${extracted.indicatorCode} invalid: ${errors.join('; ')}`);
    } else if (warnings.length > 0) {
      console.log(`[Validators] ${extracted.indicatorCode} valid with ${warnings.length} warning(s)`);
    }

    return { isValid, status: isValid ? 'valid' : 'invalid', errors, warnings, results };
  }
}
