// Document status store with Postgres persistence and an in-memory view of recent runs.
// The Map serves status reads during a run; ingestion_metadata is the durable record.

import type { ExtractionRepository } from './repository';
import type { DocumentStatus } from './types';
import { errorMessage } from './errors';

export interface DocumentRun {
  documentKey: string;
  status: DocumentStatus;
  error?: string;
  startedAt: number;
  updatedAt: number;
}

// Finished runs leave memory after 2 hours. Running documents are never pruned.
const CACHE_TTL = 2 * 60 * 60 * 1000;

export class DocumentStatusStore {
  private readonly runs = new Map<string, DocumentRun>();

  constructor(
    private readonly repository: Pick<ExtractionRepository, 'updateDocumentStatus'>,
    private readonly clock: () => number = Date.now
  ) {}

  get(documentKey: string): DocumentRun | undefined {
    return this.runs.get(documentKey);
  }

  markProcessing(documentKey: string): Promise<void> {
    const now = this.clock();
    this.runs.set(documentKey, { documentKey, status: 'PROCESSING', startedAt: now, updatedAt: now });
    return this.persist(documentKey, 'PROCESSING');
  }

  markSuccess(documentKey: string): Promise<void> {
    this.transition(documentKey, 'SUCCESS');
    return this.persist(documentKey, 'SUCCESS');
  }

  markFailed(documentKey: string, error: string): Promise<void> {
    this.transition(documentKey, 'FAILED', error);
    return this.persist(documentKey, 'FAILED', error);
  }

  private transition(documentKey: string, status: DocumentStatus, error?: string): void {
    const now = this.clock();
    const existing = this.runs.get(documentKey);
    this.runs.set(documentKey, {
      documentKey,
      status,
      error,
      startedAt: existing?.startedAt ?? now,
      updatedAt: now,
    });
    this.prune(now);
  }

  private prune(now: number): void {
    this.runs.forEach((run, key) => {
      if (run.status === 'PROCESSING') return;
      if (now - run.updatedAt > CACHE_TTL) {
        this.runs.delete(key);
      }
    });
  }

  // A status write that fails must not fail the document; the in-memory record still has it.
  private async persist(documentKey: string, status: DocumentStatus, error?: string): Promise<void> {
    try {
      const updated = await this.repository.updateDocumentStatus(documentKey, status, error);
      if (!updated) {
        console.warn(`[DocumentStatus] No ingestion record for ${documentKey}; ${status} kept in memory only`);
      }
    } catch (err) {
      console.warn(`[DocumentStatus] Failed to persist ${status} for ${documentKey}: ${errorMessage(err)}`);
    }
  }
}
