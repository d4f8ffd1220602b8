// Persistence for the extraction pipeline.
// The pipeline depends on the ExtractionRepository interface; PgRepository is the
// Postgres implementation used by workers and scripts.

import type { Pool, PoolClient } from 'pg';
import { IndicatorCatalog } from './catalog';
import { getPool, inTransaction } from './db';
import type {
  DocumentStatus,
  ExtractedIndicator,
  IndicatorDefinition,
  Pillar,
  ScoreRecord,
} from './types';

export interface ExtractionRepository {
  resolveCompanyId(companyName: string): Promise<number | null>;
  loadIndicatorCatalog(): Promise<IndicatorCatalog>;
  isAlreadyProcessed(documentKey: string): Promise<boolean>;
  hasEmbeddings(documentKey: string): Promise<boolean>;
  /** Chunk ids for the given pages, ordered by page then chunk index. */
  findChunkIdsForPages(companyName: string, reportYear: number, pages: readonly number[]): Promise<number[]>;
  /** All-or-nothing upsert. Returns the number of rows written. */
  persistExtractedIndicators(indicators: readonly ExtractedIndicator[]): Promise<number>;
  /** Full replace on (company, year). Returns the score row id. */
  persistScoreRecord(record: ScoreRecord): Promise<number>;
  updateDocumentStatus(documentKey: string, status: DocumentStatus, error?: string): Promise<boolean>;
}

// ── Row shapes (DECIMAL columns arrive as strings) ──────────────────

type IndicatorRow = {
  indicator_code: string;
  attribute_number: number;
  parameter_name: string;
  measurement_unit: string | null;
  description: string | null;
  pillar: Pillar;
  weight: string;
  brsr_reference: string | null;
  data_assurance_approach: string | null;
};

function toDefinition(row: IndicatorRow): IndicatorDefinition {
  return {
    code: row.indicator_code,
    attributeNumber: row.attribute_number,
    name: row.parameter_name,
    description: row.description ?? '',
    unit: row.measurement_unit,
    pillar: row.pillar,
    weight: Number(row.weight),
    brsrReference: row.brsr_reference ?? undefined,
    dataAssuranceApproach: row.data_assurance_approach ?? undefined,
  };
}

const UPSERT_INDICATOR_SQL = `
  INSERT INTO extracted_indicators (
    object_key, company_id, report_year, indicator_id, extracted_value,
    numeric_value, confidence_score, validation_status, source_pages,
    source_chunk_ids, extracted_at
  )
  SELECT $1, $2, $3, bi.id, $4, $5, $6, $7, $8, $9, $10
  FROM brsr_indicators bi
  WHERE bi.indicator_code = $11
  ON CONFLICT (object_key, indicator_id) DO UPDATE SET
    extracted_value = EXCLUDED.extracted_value,
    numeric_value = EXCLUDED.numeric_value,
    confidence_score = EXCLUDED.confidence_score,
    validation_status = EXCLUDED.validation_status,
    source_pages = EXCLUDED.source_pages,
    source_chunk_ids = EXCLUDED.source_chunk_ids,
    extracted_at = NOW()`;

const UPSERT_SCORE_SQL = `
  INSERT INTO esg_scores (
    company_id, report_year, environmental_score, social_score,
    governance_score, overall_score, calculation_metadata
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb)
  ON CONFLICT (company_id, report_year) DO UPDATE SET
    environmental_score = EXCLUDED.environmental_score,
    social_score = EXCLUDED.social_score,
    governance_score = EXCLUDED.governance_score,
    overall_score = EXCLUDED.overall_score,
    calculation_metadata = EXCLUDED.calculation_metadata,
    calculated_at = NOW()
  RETURNING id`;

export class PgRepository implements ExtractionRepository {
  constructor(private readonly pool: Pool = getPool()) {}

  async resolveCompanyId(companyName: string): Promise<number | null> {
    const { rows } = await this.pool.query<{ id: number }>(
      'SELECT id FROM company_catalog WHERE company_name = $1 OR symbol = $1 LIMIT 1',
      [companyName]
    );
    return rows[0]?.id ?? null;
  }

  async loadIndicatorCatalog(): Promise<IndicatorCatalog> {
    const { rows } = await this.pool.query<IndicatorRow>(
      `SELECT indicator_code, attribute_number, parameter_name, measurement_unit,
              description, pillar, weight, brsr_reference, data_assurance_approach
       FROM brsr_indicators
       ORDER BY attribute_number, id`
    );
    console.log(`[Repository] Loaded ${rows.length} BRSR indicators`);
    return new IndicatorCatalog(rows.map(toDefinition));
  }

  async isAlreadyProcessed(documentKey: string): Promise<boolean> {
    const { rows } = await this.pool.query<{ exists: boolean }>(
      'SELECT EXISTS(SELECT 1 FROM extracted_indicators WHERE object_key = $1) AS exists',
      [documentKey]
    );
    return rows[0]?.exists ?? false;
  }

  async hasEmbeddings(documentKey: string): Promise<boolean> {
    const { rows } = await this.pool.query<{ exists: boolean }>(
      'SELECT EXISTS(SELECT 1 FROM document_embeddings WHERE object_key = $1) AS exists',
      [documentKey]
    );
    return rows[0]?.exists ?? false;
  }

  async findChunkIdsForPages(
    companyName: string,
    reportYear: number,
    pages: readonly number[]
  ): Promise<number[]> {
    if (pages.length === 0) return [];
    const { rows } = await this.pool.query<{ id: number }>(
      `SELECT id FROM document_embeddings
       WHERE company_name = $1 AND report_year = $2 AND page_number = ANY($3::int[])
       ORDER BY page_number, chunk_index`,
      [companyName, reportYear, [...pages]]
    );
    return rows.map(r => r.id);
  }

  async persistExtractedIndicators(indicators: readonly ExtractedIndicator[]): Promise<number> {
    if (indicators.length === 0) return 0;

    return this.transaction(async client => {
      let written = 0;
      for (const ind of indicators) {
        const result = await client.query(UPSERT_INDICATOR_SQL, [
          ind.documentKey,
          ind.companyId,
          ind.reportYear,
          ind.extractedValue,
          ind.numericValue,
          ind.confidence,
          ind.validationStatus,
          ind.sourcePages,
          ind.sourceChunkIds,
          ind.extractedAt,
          ind.indicatorCode,
        ]);
        if (result.rowCount !== 1) {
          throw new Error(`Unknown indicator code ${ind.indicatorCode}; nothing was stored`);
        }
        written++;
      }
      console.log(`[Repository] Stored ${written} indicators for ${indicators[0].documentKey}`);
      return written;
    });
  }

  async persistScoreRecord(record: ScoreRecord): Promise<number> {
    const { rows } = await this.pool.query<{ id: number }>(UPSERT_SCORE_SQL, [
      record.companyId,
      record.reportYear,
      record.environmentalScore,
      record.socialScore,
      record.governanceScore,
      record.overallScore,
      JSON.stringify(record.calculationMetadata),
    ]);
    const id = rows[0]?.id;
    if (id === undefined) {
      throw new Error(`Score upsert returned no id for company ${record.companyId} ${record.reportYear}`);
    }
    return id;
  }

  async updateDocumentStatus(documentKey: string, status: DocumentStatus, error?: string): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE ingestion_metadata
       SET status = $1, error_message = $2, updated_at = NOW()
       WHERE file_path = $3
       RETURNING id`,
      [status, error ?? null, documentKey]
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return inTransaction(await this.pool.connect(), fn);
  }
}
