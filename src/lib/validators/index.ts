// Validators index - single-purpose indicator checks plus the orchestrator that runs them

export { checkConfidence } from './confidence';
export { checkRequiredFields } from './required-fields';
export { checkDataType, extractNumberFromText } from './data-type';
export { createRangeCheck, loadRangeTable, rangeFor, DEFAULT_RANGES_PATH } from './numeric-range';
export type { NumericRange, NumericRangeTable } from './numeric-range';
export { checkUnitConsistency, unitVariations } from './unit-consistency';

export { IndicatorValidator } from './orchestrator';
export type { ValidationVerdict, NamedCheckResult } from './orchestrator';
export type { CheckResult, IndicatorCheck } from './types';
