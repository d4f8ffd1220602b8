// Confidence Bound Check
// The model's self-reported confidence must be a real number in [0.0, 1.0]

import { checkResult, type IndicatorCheck } from './types';

export const checkConfidence: IndicatorCheck = extracted => {
  const { confidence } = extracted;
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    return checkResult([`Confidence score ${confidence} is outside valid range [0.0, 1.0]`]);
  }
  return checkResult();
};
