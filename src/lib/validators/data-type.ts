// Type Consistency Check
// Quantitative units expect a numeric value; qualitative ones expect none.

import { checkResult, isQualitativeUnit, type IndicatorCheck } from './types';

/** First number in free text, thousands separators ignored: "1,250.5 MT" → 1250.5 */
export function extractNumberFromText(text: string): number | null {
  const match = text.replace(/,/g, '').match(/-?\d+\.?\d*/);
  if (!match) return null;
  const value = Number.parseFloat(match[0]);
  return Number.isFinite(value) ? value : null;
}

export const checkDataType: IndicatorCheck = (extracted, definition) => {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { numericValue, extractedValue } = extracted;
  const unit = definition.unit ?? '';

  if (numericValue !== null && !Number.isFinite(numericValue)) {
    errors.push(`numeric_value must be a finite number, got ${numericValue}`);
    return checkResult(errors, warnings);
  }

  const expectsNumber = !isQualitativeUnit(definition.unit);

  if (expectsNumber && numericValue === null) {
    const inText = extractNumberFromText(extractedValue);
    if (inText === null) {
      warnings.push(
        `Expected numeric value for unit '${unit}' but numeric_value is missing. ` +
        `Could not extract number from '${extractedValue}'`
      );
    } else {
      warnings.push(
        `numeric_value is missing but found numeric value ${inText} in text. ` +
        `Consider updating numeric_value field.`
      );
    }
  } else if (!expectsNumber && numericValue !== null) {
    warnings.push(
      `numeric_value provided for qualitative indicator (unit: '${unit || 'none'}')`
    );
  }

  return checkResult(errors, warnings);
};
