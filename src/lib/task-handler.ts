// Delivery decision for one extraction task.
// Transport-agnostic: the caller maps the decision onto its broker's ack/nack/dead-letter calls.

import { parseDocumentKey } from './document-key';
import { errorMessage, isRetryableError } from './errors';
import type { ExtractionRepository } from './repository';

export type DeliveryDecision = 'ack' | 'requeue' | 'park';

export interface Delivery {
  /** Failed processing attempts so far (x-retry-count). */
  retryCount: number;
  /** Times this key was requeued because its embeddings were not ready. */
  embeddingChecks: number;
}

export interface TaskHandlerDeps {
  repository: Pick<ExtractionRepository, 'hasEmbeddings'>;
  process: (documentKey: string) => Promise<unknown>;
  maxDeliveryAttempts: number;
  maxEmbeddingChecks: number;
}

export interface TaskOutcome {
  decision: DeliveryDecision;
  documentKey: string;
  reason: string;
}

/** Body is either the bare key or JSON {"object_key": "..."}. */
export function parseTaskMessage(body: string): string {
  const text = body.trim();
  if (!text.startsWith('{')) return text;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    console.warn(`[TaskHandler] Message looks like JSON but does not parse (${errorMessage(err)}); using raw body`);
    return text;
  }
  if (typeof parsed === 'object' && parsed !== null && 'object_key' in parsed) {
    const { object_key: key } = parsed;
    if (typeof key === 'string') return key.trim();
  }
  return text;
}

function decide(outcome: TaskOutcome): TaskOutcome {
  const line = `[TaskHandler] ${outcome.decision.toUpperCase()} ${outcome.documentKey || '(empty)'}: ${outcome.reason}`;
  if (outcome.decision === 'park') {
    console.error(line);
  } else {
    console.log(line);
  }
  return outcome;
}

function onFailure(err: unknown, documentKey: string, delivery: Delivery, deps: TaskHandlerDeps): TaskOutcome {
  const message = errorMessage(err);
  if (!isRetryableError(err)) {
    return decide({ decision: 'park', documentKey, reason: `non-retryable: ${message}` });
  }
  if (delivery.retryCount < deps.maxDeliveryAttempts) {
    return decide({
      decision: 'requeue',
      documentKey,
      reason: `retry ${delivery.retryCount + 1}/${deps.maxDeliveryAttempts}: ${message}`,
    });
  }
  return decide({
    decision: 'park',
    documentKey,
    reason: `retries exhausted (${deps.maxDeliveryAttempts}): ${message}`,
  });
}

/** Always resolves to a decision; failures are classified, never rethrown. */
export async function handleTask(body: string, delivery: Delivery, deps: TaskHandlerDeps): Promise<TaskOutcome> {
  const documentKey = parseTaskMessage(body);
  if (!documentKey) {
    return decide({ decision: 'park', documentKey, reason: 'empty message' });
  }

  try {
    parseDocumentKey(documentKey);

    if (!(await deps.repository.hasEmbeddings(documentKey))) {
      if (delivery.embeddingChecks < deps.maxEmbeddingChecks) {
        return decide({
          decision: 'requeue',
          documentKey,
          reason: `embeddings not ready (check ${delivery.embeddingChecks + 1}/${deps.maxEmbeddingChecks})`,
        });
      }
      return decide({
        decision: 'park',
        documentKey,
        reason: `embeddings still missing after ${deps.maxEmbeddingChecks} checks`,
      });
    }

    await deps.process(documentKey);
    return decide({ decision: 'ack', documentKey, reason: 'processed' });
  } catch (err) {
    return onFailure(err, documentKey, delivery, deps);
  }
}
