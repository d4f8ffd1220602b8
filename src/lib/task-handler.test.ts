import { describe, expect, it } from 'vitest';
import { CompanyNotFoundError } from './errors';
import { handleTask, parseTaskMessage, type TaskHandlerDeps } from './task-handler';
import { InMemoryRepository } from './testing/fakes';

const KEY = 'RELIANCE/2024_BRSR.pdf';

function deps(
  run: (key: string) => Promise<unknown>,
  repository: TaskHandlerDeps['repository'] = new InMemoryRepository()
): TaskHandlerDeps {
  return { repository, process: run, maxDeliveryAttempts: 3, maxEmbeddingChecks: 10 };
}

const fresh = { retryCount: 0, embeddingChecks: 0 };

describe('parseTaskMessage', () => {
  it('accepts a bare key or an object_key payload', () => {
    expect(parseTaskMessage(` ${KEY}\n`)).toBe(KEY);
    expect(parseTaskMessage(JSON.stringify({ object_key: KEY }))).toBe(KEY);
  });

  it('falls back to the raw body for other JSON', () => {
    expect(parseTaskMessage('{"key": "x"}')).toBe('{"key": "x"}');
    expect(parseTaskMessage('{broken')).toBe('{broken');
  });
});

describe('handleTask', () => {
  it('acks a processed document', async () => {
    const processed: string[] = [];
    const outcome = await handleTask(JSON.stringify({ object_key: KEY }), fresh, deps(async key => {
      processed.push(key);
    }));

    expect(outcome).toEqual({ decision: 'ack', documentKey: KEY, reason: 'processed' });
    expect(processed).toEqual([KEY]);
  });

  it('requeues while embeddings are not ready, then parks', async () => {
    const repository = new InMemoryRepository();
    repository.embedded.clear();
    let calls = 0;
    const handler = deps(async () => { calls++; }, repository);

    expect((await handleTask(KEY, { retryCount: 0, embeddingChecks: 9 }, handler)).decision).toBe('requeue');
    expect((await handleTask(KEY, { retryCount: 0, embeddingChecks: 10 }, handler)).decision).toBe('park');
    expect(calls).toBe(0);
  });

  it('parks a malformed key before checking embeddings', async () => {
    let checks = 0;
    let calls = 0;
    const repository = {
      hasEmbeddings: async () => {
        checks++;
        return false;
      },
    };

    const outcome = await handleTask('RELIANCE.pdf', fresh, deps(async () => { calls++; }, repository));

    expect(outcome).toEqual({
      decision: 'park',
      documentKey: 'RELIANCE.pdf',
      reason: 'non-retryable: Invalid document key "RELIANCE.pdf". Expected {company}/{year}_{type}.pdf',
    });
    expect(checks).toBe(0);
    expect(calls).toBe(0);
  });

  it('turns a failing embeddings check into a delivery decision', async () => {
    let calls = 0;
    const repository = {
      hasEmbeddings: async (): Promise<boolean> => {
        throw new Error('connection terminated');
      },
    };
    const handler = deps(async () => { calls++; }, repository);

    await expect(handleTask(KEY, fresh, handler)).resolves.toEqual({
      decision: 'requeue',
      documentKey: KEY,
      reason: 'retry 1/3: connection terminated',
    });
    await expect(handleTask(KEY, { retryCount: 3, embeddingChecks: 0 }, handler)).resolves.toEqual({
      decision: 'park',
      documentKey: KEY,
      reason: 'retries exhausted (3): connection terminated',
    });
    expect(calls).toBe(0);
  });

  it('parks precondition failures without retrying', async () => {
    const outcome = await handleTask(KEY, fresh, deps(async () => {
      throw new CompanyNotFoundError('RELIANCE');
    }));

    expect(outcome.decision).toBe('park');
    expect(outcome.reason).toBe('non-retryable: Company not found in catalog: RELIANCE');
  });

  it('requeues transient failures until the retry ceiling', async () => {
    const failing = deps(async () => {
      throw new Error('connection reset');
    });

    expect((await handleTask(KEY, { retryCount: 2, embeddingChecks: 0 }, failing)).decision).toBe('requeue');
    const parked = await handleTask(KEY, { retryCount: 3, embeddingChecks: 0 }, failing);
    expect(parked).toEqual({
      decision: 'park',
      documentKey: KEY,
      reason: 'retries exhausted (3): connection reset',
    });
  });

  it('parks an empty message', async () => {
    let calls = 0;
    const outcome = await handleTask('   ', fresh, deps(async () => { calls++; }));

    expect(outcome.decision).toBe('park');
    expect(calls).toBe(0);
  });
});
