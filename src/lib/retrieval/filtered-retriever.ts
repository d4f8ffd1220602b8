// Filtered vector retrieval
// Narrows the corpus to one company/year before similarity ranking, so an
// indicator query never pulls evidence from another company's report.

import type { Embedder } from '../embeddings';
import { NoResultsError } from '../errors';
import type { RetrievedChunk } from '../types';
import type { VectorStore } from './vector-store';

export const MIN_K = 5;
export const MAX_K = 10;

export function clampK(k: number): number {
  if (k < MIN_K || k > MAX_K) {
    const clamped = Math.min(MAX_K, Math.max(MIN_K, Math.round(k)));
    console.warn(`[Retriever] k=${k} outside [${MIN_K}, ${MAX_K}], using ${clamped}`);
    return clamped;
  }
  return Math.round(k);
}

export interface RetrieveOptions {
  distanceThreshold?: number;
}

export class FilteredRetriever {
  constructor(
    private readonly embed: Embedder,
    private readonly store: VectorStore
  ) {}

  async retrieve(
    companyName: string,
    reportYear: number,
    query: string,
    k: number,
    options: RetrieveOptions = {}
  ): Promise<RetrievedChunk[]> {
    const limit = clampK(k);
    const embedding = await this.embed(query);

    const ranked = await this.store.similaritySearch({ companyName, reportYear, embedding, k: limit });
    const { distanceThreshold } = options;
    const chunks = distanceThreshold === undefined
      ? ranked
      : ranked.filter(c => c.distance <= distanceThreshold);

    if (chunks.length === 0) {
      throw new NoResultsError(companyName, reportYear, distanceThreshold);
    }

    const first = chunks[0].distance;
    const last = chunks[chunks.length - 1].distance;
    console.log(
      `[Retriever] ${chunks.length} chunks for ${companyName} ${reportYear} ` +
      `(distance ${first.toFixed(3)}–${last.toFixed(3)})`
    );
    return chunks;
  }
}
