import { describe, expect, it } from 'vitest';
import { DocumentStatusStore } from './document-status';
import type { DocumentStatus } from './types';

class RecordingStatusRepository {
  readonly writes: Array<[string, DocumentStatus, string | undefined]> = [];
  fail = false;

  async updateDocumentStatus(documentKey: string, status: DocumentStatus, error?: string): Promise<boolean> {
    if (this.fail) throw new Error('database is down');
    this.writes.push([documentKey, status, error]);
    return true;
  }
}

const HOUR = 60 * 60 * 1000;

describe('DocumentStatusStore', () => {
  it('records transitions in memory and in the repository', async () => {
    const repository = new RecordingStatusRepository();
    const store = new DocumentStatusStore(repository, () => 1_000);

    await store.markProcessing('A/2024_BRSR.pdf');
    await store.markFailed('A/2024_BRSR.pdf', 'Company not found in catalog: A');

    expect(repository.writes).toEqual([
      ['A/2024_BRSR.pdf', 'PROCESSING', undefined],
      ['A/2024_BRSR.pdf', 'FAILED', 'Company not found in catalog: A'],
    ]);
    expect(store.get('A/2024_BRSR.pdf')).toEqual({
      documentKey: 'A/2024_BRSR.pdf',
      status: 'FAILED',
      error: 'Company not found in catalog: A',
      startedAt: 1_000,
      updatedAt: 1_000,
    });
  });

  it('does not fail when the status write fails', async () => {
    const repository = new RecordingStatusRepository();
    repository.fail = true;
    const store = new DocumentStatusStore(repository);

    await expect(store.markSuccess('A/2024_BRSR.pdf')).resolves.toBeUndefined();
    expect(store.get('A/2024_BRSR.pdf')?.status).toBe('SUCCESS');
  });

  it('prunes finished runs after two hours but keeps running ones', async () => {
    let now = 0;
    const store = new DocumentStatusStore(new RecordingStatusRepository(), () => now);

    await store.markProcessing('RUNNING/2024_BRSR.pdf');
    await store.markProcessing('OLD/2024_BRSR.pdf');
    await store.markSuccess('OLD/2024_BRSR.pdf');

    now = 3 * HOUR;
    await store.markSuccess('NEW/2024_BRSR.pdf');

    expect(store.get('OLD/2024_BRSR.pdf')).toBeUndefined();
    expect(store.get('RUNNING/2024_BRSR.pdf')?.status).toBe('PROCESSING');
    expect(store.get('NEW/2024_BRSR.pdf')?.status).toBe('SUCCESS');
  });
});
