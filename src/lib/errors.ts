// Error taxonomy for the extraction pipeline.
// `retryable` tells the retry loop and the task handler whether another attempt can help.

export class PipelineError extends Error {
  readonly retryable: boolean;

  constructor(message: string, options: { retryable: boolean; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.retryable = options.retryable;
  }
}

// ── Preconditions (never retried) ───────────────────────────────────

export class InvalidDocumentKeyError extends PipelineError {
  constructor(readonly documentKey: string) {
    super(
      `Invalid document key "${documentKey}". Expected {company}/{year}_{type}.pdf`,
      { retryable: false }
    );
  }
}

export class CompanyNotFoundError extends PipelineError {
  constructor(readonly companyName: string) {
    super(`Company not found in catalog: ${companyName}`, { retryable: false });
  }
}

export class EmptyCatalogError extends PipelineError {
  constructor() {
    super('No BRSR indicators loaded from database', { retryable: false });
  }
}

// ── Retrieval / model ───────────────────────────────────────────────

export class NoResultsError extends PipelineError {
  constructor(
    readonly companyName: string,
    readonly reportYear: number,
    readonly distanceThreshold?: number
  ) {
    const suffix = distanceThreshold === undefined ? '' : ` within distance ${distanceThreshold}`;
    super(
      `No relevant chunks found for ${companyName} ${reportYear}${suffix}`,
      { retryable: false }
    );
  }
}

export class ModelOutputError extends PipelineError {
  constructor(message: string, readonly rawOutput: string, cause?: unknown) {
    super(message, { retryable: true, cause });
  }
}

export class RetryExhaustedError extends PipelineError {
  constructor(
    readonly label: string,
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(
      `${label} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${errorMessage(lastError)}`,
      { retryable: false, cause: lastError }
    );
  }
}

// ── Classification helpers ──────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' ? status : undefined;
}

/** Client errors other than 408/409/429 won't succeed on a second try. */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof PipelineError) return err.retryable;
  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    return status === 408 || status === 409 || status === 429;
  }
  return true;
}

export function isRateLimitError(err: unknown): boolean {
  if (statusOf(err) === 429) return true;
  const message = errorMessage(err).toLowerCase();
  return message.includes('rate') || message.includes('quota');
}
