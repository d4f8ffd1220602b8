// Core types for the BRSR extraction → validation → scoring pipeline

// ── Reference data ──────────────────────────────────────────────────

export type Pillar = 'E' | 'S' | 'G';

export const PILLARS: readonly Pillar[] = ['E', 'S', 'G'];

export interface IndicatorDefinition {
  code: string;
  attributeNumber: number;         // BRSR Core attribute group, 1-9
  name: string;
  description: string;
  unit: string | null;
  pillar: Pillar;
  weight: number;
  brsrReference?: string;
  dataAssuranceApproach?: string;
}

// ── Extraction ──────────────────────────────────────────────────────

export type ValidationStatus = 'pending' | 'valid' | 'invalid';

export interface RetrievedChunk {
  chunkId: number;
  text: string;
  pageNumber: number;
  chunkIndex: number;
  distance: number;
}

export interface ExtractionResult {
  indicatorCode: string;
  value: string;
  numericValue: number | null;
  unit: string;
  confidence: number;
  sourcePages: number[];
  retrievedChunks: RetrievedChunk[];
}

export interface ExtractedIndicator {
  documentKey: string;
  companyId: number;
  reportYear: number;
  indicatorCode: string;
  extractedValue: string;
  numericValue: number | null;
  confidence: number;
  validationStatus: ValidationStatus;
  sourcePages: number[];
  sourceChunkIds: number[];
  extractedAt: Date;
}

// ── Scoring ─────────────────────────────────────────────────────────

export interface Citation {
  documentKey: string;
  sourcePages: number[];
  sourceChunkIds: number[];
  confidence: number;
}

export interface IndicatorContribution {
  indicatorCode: string;
  name: string;
  value: number;
  unit: string | null;
  normalizedValue: number;
  weight: number;
  contribution: number;
  citation: Citation;
}

export interface PillarBreakdown {
  score: number;
  indicatorCodes: string[];
  weights: Record<string, number>;
  totalWeight: number;
  weightedSum: number;
  contributions: IndicatorContribution[];
}

export type PillarWeights = Record<Pillar, number>;

export interface CalculationMetadata {
  environmental: PillarBreakdown;
  social: PillarBreakdown;
  governance: PillarBreakdown;
  pillarWeights: PillarWeights;
  indicatorsConsidered: number;
  method: string;
  calculatedAt: string;
}

export interface ScoreRecord {
  companyId: number;
  reportYear: number;
  environmentalScore: number;
  socialScore: number;
  governanceScore: number;
  overallScore: number;
  calculationMetadata: CalculationMetadata;
}

// ── Document lifecycle ──────────────────────────────────────────────

export type DocumentStatus = 'PROCESSING' | 'SUCCESS' | 'FAILED';

export interface DocumentKeyParts {
  companyName: string;
  reportYear: number;
}
