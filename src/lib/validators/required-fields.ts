// Required Fields Check

import { checkResult, type IndicatorCheck } from './types';

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export const checkRequiredFields: IndicatorCheck = extracted => {
  const errors: string[] = [];

  if (extracted.extractedValue.trim() === '') {
    errors.push('extracted_value is required and cannot be empty');
  }
  if (extracted.indicatorCode.trim() === '') {
    errors.push('indicator_code is required and cannot be empty');
  }
  if (!isPositiveInteger(extracted.companyId)) {
    errors.push('company_id is required and must be positive');
  }
  if (!isPositiveInteger(extracted.reportYear)) {
    errors.push('report_year is required and must be positive');
  }
  if (extracted.documentKey.trim() === '') {
    errors.push('document_key is required and cannot be empty');
  }

  return checkResult(errors);
};
