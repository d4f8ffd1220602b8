import type { Pool } from 'pg';
import { getPool } from '../db';
import { toVectorLiteral } from '../embeddings';
import type { RetrievedChunk } from '../types';

export interface SimilaritySearchParams {
  companyName: string;
  reportYear: number;
  embedding: readonly number[];
  k: number;
}

export interface VectorStore {
  /** Nearest chunks of one company/year, ascending cosine distance. */
  similaritySearch(params: SimilaritySearchParams): Promise<RetrievedChunk[]>;
}

type ChunkRow = {
  id: number;
  page_number: number;
  chunk_index: number;
  chunk_text: string;
  distance: number;
};

// The company/year predicate sits in the WHERE clause so the planner narrows
// to one document's chunks (idx_doc_emb_company_year) before ranking by distance.
const SIMILARITY_SQL = `
  SELECT id, page_number, chunk_index, chunk_text,
         (embedding <=> $1::vector)::float8 AS distance
  FROM document_embeddings
  WHERE company_name = $2 AND report_year = $3
  ORDER BY embedding <=> $1::vector
  LIMIT $4`;

export class PgVectorStore implements VectorStore {
  constructor(private readonly pool: Pool = getPool()) {}

  async similaritySearch({ companyName, reportYear, embedding, k }: SimilaritySearchParams): Promise<RetrievedChunk[]> {
    const { rows } = await this.pool.query<ChunkRow>(SIMILARITY_SQL, [
      toVectorLiteral(embedding),
      companyName,
      reportYear,
      k,
    ]);
    return rows.map(row => ({
      chunkId: row.id,
      text: row.chunk_text,
      pageNumber: row.page_number,
      chunkIndex: row.chunk_index,
      distance: row.distance,
    }));
  }
}
