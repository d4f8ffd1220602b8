// Document pipeline: extraction → validation → persistence → scoring for one BRSR report.

import type { IndicatorCatalog } from './catalog';
import type { DocumentStatusStore } from './document-status';
import { EmptyCatalogError, errorMessage } from './errors';
import { BatchExtractor, type ChainFactory, type ExtractionFailure } from './extraction/batch-extractor';
import { STATUS } from './progress';
import type { ExtractionRepository } from './repository';
import { calculateScores } from './scoring/score-calculator';
import type { ExtractedIndicator, PillarWeights, ScoreRecord } from './types';
import type { IndicatorValidator } from './validators';

export interface PipelineDeps {
  repository: ExtractionRepository;
  statusStore: DocumentStatusStore;
  createChain: ChainFactory;
  validator: IndicatorValidator;
  /** Loaded once per worker; read from the repository when absent. */
  catalog?: IndicatorCatalog;
  pillarWeights?: PillarWeights;
  now?: () => Date;
}

export interface ValidationStats {
  valid: number;
  invalid: number;
  withWarnings: number;
  averageConfidence: number;
}

export interface DocumentRunSummary {
  documentKey: string;
  skipped: boolean;
  attempted: number;
  indicators: ExtractedIndicator[];
  failures: ExtractionFailure[];
  validation: ValidationStats;
  stored: number;
  score: ScoreRecord | null;
  scoreId: number | null;
  durationMs: number;
}

const EMPTY_STATS: ValidationStats = { valid: 0, invalid: 0, withWarnings: 0, averageConfidence: 0 };

export async function processDocument(documentKey: string, deps: PipelineDeps): Promise<DocumentRunSummary> {
  const { repository, statusStore, validator } = deps;
  const now = deps.now ?? (() => new Date());
  const startTime = Date.now();

  STATUS.documentStarted(documentKey);
  await statusStore.markProcessing(documentKey);

  try {
    if (await repository.isAlreadyProcessed(documentKey)) {
      STATUS.documentSkipped(documentKey);
      await statusStore.markSuccess(documentKey);
      return {
        documentKey,
        skipped: true,
        attempted: 0,
        indicators: [],
        failures: [],
        validation: EMPTY_STATS,
        stored: 0,
        score: null,
        scoreId: null,
        durationMs: Date.now() - startTime,
      };
    }

    const catalog = deps.catalog ?? await repository.loadIndicatorCatalog();
    if (catalog.size === 0) {
      throw new EmptyCatalogError();
    }

    // ── Extraction ──────────────────────────────────────────────────
    const extractor = new BatchExtractor(catalog, repository, deps.createChain, now);
    const batch = await extractor.run(documentKey);

    // ── Validation ──────────────────────────────────────────────────
    let withWarnings = 0;
    const validated = batch.indicators.map(ind => {
      const definition = catalog.get(ind.indicatorCode);
      if (!definition) {
        console.warn(`[Pipeline] ${ind.indicatorCode} has no catalog definition; marking invalid`);
        return { ...ind, validationStatus: 'invalid' as const };
      }
      const verdict = validator.validate(ind, definition);
      if (verdict.warnings.length > 0) {
        withWarnings++;
        for (const w of verdict.warnings) {
          console.log(`[Pipeline]   ${ind.indicatorCode} warning: ${w}`);
        }
      }
      return { ...ind, validationStatus: verdict.status };
    });

    const valid = validated.filter(i => i.validationStatus === 'valid').length;
    const stats: ValidationStats = {
      valid,
      invalid: validated.length - valid,
      withWarnings,
      averageConfidence: validated.length === 0
        ? 0
        : validated.reduce((sum, i) => sum + i.confidence, 0) / validated.length,
    };
    STATUS.validationComplete(stats.valid, stats.invalid);

    // ── Persistence ─────────────────────────────────────────────────
    const stored = validated.length > 0
      ? await repository.persistExtractedIndicators(validated)
      : 0;
    if (validated.length === 0) {
      console.warn(`[Pipeline] No indicators extracted from ${documentKey}; pillar scores will be 0`);
    }

    // ── Scoring ─────────────────────────────────────────────────────
    const score = calculateScores(validated, catalog.all(), {
      companyId: batch.companyId,
      reportYear: batch.reportYear,
      pillarWeights: deps.pillarWeights,
      now,
    });
    const scoreId = await repository.persistScoreRecord(score);
    STATUS.scoresCalculated(score.overallScore);

    await statusStore.markSuccess(documentKey);
    STATUS.documentComplete(documentKey);

    const durationMs = Date.now() - startTime;
    console.log(
      `[Pipeline] ${documentKey}: ${batch.indicators.length}/${batch.attempted} extracted, ` +
      `${stats.valid} valid, overall ${score.overallScore.toFixed(2)} in ${(durationMs / 1000).toFixed(1)}s`
    );

    return {
      documentKey,
      skipped: false,
      attempted: batch.attempted,
      indicators: validated,
      failures: batch.failures,
      validation: stats,
      stored,
      score,
      scoreId,
      durationMs,
    };
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[Pipeline] ${documentKey} failed: ${message}`);
    await statusStore.markFailed(documentKey, message);
    STATUS.documentFailed(documentKey, message);
    throw err;
  }
}
