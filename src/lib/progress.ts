// Progress event system for document runs
// Uses AsyncLocalStorage for run-scoped callbacks (no global state)

import { AsyncLocalStorage } from 'async_hooks';

export type ProgressEvent = {
  type: 'status' | 'complete' | 'error';
  message: string;
  phase?: 'extraction' | 'validation' | 'scoring';
  step?: number;
  totalSteps?: number;
  detail?: string;
};

const progressStore = new AsyncLocalStorage<(event: ProgressEvent) => void>();

/**
 * Run a function with a run-scoped progress callback.
 * All calls to emitProgress() within this context will use this callback.
 */
export function withProgressCallback<T>(
  callback: (event: ProgressEvent) => void,
  fn: () => T
): T {
  return progressStore.run(callback, fn);
}

export function emitProgress(event: ProgressEvent) {
  const callback = progressStore.getStore();
  if (callback) {
    callback(event);
  }
  const prefix = event.phase ? `[${event.phase.toUpperCase()}]` : '[Progress]';
  if (event.message) {
    console.log(`${prefix} ${event.message}`);
  }
}

export const STATUS = {
  documentStarted: (documentKey: string) => emitProgress({
    type: 'status',
    message: `Processing ${documentKey}...`
  }),
  documentSkipped: (documentKey: string) => emitProgress({
    type: 'complete',
    message: `${documentKey} already processed, skipping`
  }),

  // Extraction
  attributeStarted: (attribute: number, step: number, totalSteps: number, count: number) => emitProgress({
    type: 'status',
    phase: 'extraction',
    step,
    totalSteps,
    message: `Attribute ${attribute}: extracting ${count} indicator${count === 1 ? '' : 's'}...`
  }),
  indicatorExtracted: (code: string, confidence: number) => emitProgress({
    type: 'status',
    phase: 'extraction',
    message: `✓ ${code} (confidence ${confidence.toFixed(2)})`
  }),
  indicatorFailed: (code: string, attribute: number, error: string) => emitProgress({
    type: 'status',
    phase: 'extraction',
    message: `⚠ ${code} (attribute ${attribute}) failed, continuing...`,
    detail: error
  }),
  extractionComplete: (succeeded: number, total: number) => emitProgress({
    type: 'status',
    phase: 'extraction',
    message: `✓ Extracted ${succeeded}/${total} indicators`
  }),

  // Validation
  validationComplete: (valid: number, invalid: number) => emitProgress({
    type: 'status',
    phase: 'validation',
    message: `✓ Validation: ${valid} valid, ${invalid} invalid`
  }),

  // Scoring
  scoresCalculated: (overall: number) => emitProgress({
    type: 'status',
    phase: 'scoring',
    message: `✓ Overall ESG score ${overall.toFixed(2)}`
  }),

  documentComplete: (documentKey: string) => emitProgress({
    type: 'complete',
    message: `✓ ${documentKey} complete`
  }),
  documentFailed: (documentKey: string, error: string) => emitProgress({
    type: 'error',
    message: `Error processing ${documentKey}: ${error}`
  })
};
