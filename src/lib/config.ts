// Environment-driven configuration.
// Entry points load .env via `import 'dotenv/config'`; this module only reads process.env.

import { z } from 'zod';
import type { PillarWeights } from './types';

const optionalNumber = z
  .string()
  .trim()
  .optional()
  .transform(v => (v === undefined || v === '' ? undefined : Number(v)))
  .pipe(z.number().finite().optional());

const numberWithDefault = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform(v => (v === undefined || v === '' ? fallback : Number(v)))
    .pipe(z.number().finite());

const envSchema = z.object({
  EXTRACTION_MODEL: z.string().default('claude-sonnet-4-20250514'),
  EXTRACTION_TEMPERATURE: numberWithDefault(0.1).pipe(z.number().min(0).max(1)),
  EXTRACTION_MAX_TOKENS: numberWithDefault(2048).pipe(z.number().int().positive()),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-large'),
  EMBEDDING_DIMENSIONS: numberWithDefault(3072).pipe(z.number().int().positive()),
  RETRIEVAL_K: numberWithDefault(10).pipe(z.number().int()),
  RETRIEVAL_DISTANCE_THRESHOLD: optionalNumber,
  MAX_RETRIES: numberWithDefault(3).pipe(z.number().int().min(1)),
  INITIAL_RETRY_DELAY_MS: numberWithDefault(1000).pipe(z.number().min(0)),
  RETRY_BACKOFF_MULTIPLIER: numberWithDefault(2).pipe(z.number().min(1)),
  RETRY_JITTER: numberWithDefault(0).pipe(z.number().min(0).lt(1)),
  MAX_DELIVERY_ATTEMPTS: numberWithDefault(3).pipe(z.number().int().min(1)),
  MAX_EMBEDDING_CHECKS: numberWithDefault(10).pipe(z.number().int().min(1)),
  PILLAR_WEIGHT_E: numberWithDefault(1).pipe(z.number().min(0)),
  PILLAR_WEIGHT_S: numberWithDefault(1).pipe(z.number().min(0)),
  PILLAR_WEIGHT_G: numberWithDefault(1).pipe(z.number().min(0)),
  NUMERIC_RANGES_PATH: z.string().optional(),
});

export interface ExtractionConfig {
  model: {
    name: string;
    temperature: number;
    maxTokens: number;
  };
  embedding: {
    model: string;
    dimensions: number;
  };
  retrieval: {
    k: number;
    distanceThreshold?: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    multiplier: number;
    jitter: number;
  };
  delivery: {
    maxDeliveryAttempts: number;
    maxEmbeddingChecks: number;
  };
  pillarWeights: PillarWeights;
  numericRangesPath?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid extraction configuration: ${issues}`);
  }
  const e = parsed.data;

  if (e.PILLAR_WEIGHT_E + e.PILLAR_WEIGHT_S + e.PILLAR_WEIGHT_G <= 0) {
    throw new Error('Invalid extraction configuration: pillar weights must sum to a positive number');
  }

  return {
    model: {
      name: e.EXTRACTION_MODEL,
      temperature: e.EXTRACTION_TEMPERATURE,
      maxTokens: e.EXTRACTION_MAX_TOKENS,
    },
    embedding: {
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
    },
    retrieval: {
      k: e.RETRIEVAL_K,
      distanceThreshold: e.RETRIEVAL_DISTANCE_THRESHOLD,
    },
    retry: {
      maxAttempts: e.MAX_RETRIES,
      baseDelayMs: e.INITIAL_RETRY_DELAY_MS,
      multiplier: e.RETRY_BACKOFF_MULTIPLIER,
      jitter: e.RETRY_JITTER,
    },
    delivery: {
      maxDeliveryAttempts: e.MAX_DELIVERY_ATTEMPTS,
      maxEmbeddingChecks: e.MAX_EMBEDDING_CHECKS,
    },
    pillarWeights: {
      E: e.PILLAR_WEIGHT_E,
      S: e.PILLAR_WEIGHT_S,
      G: e.PILLAR_WEIGHT_G,
    },
    numericRangesPath: e.NUMERIC_RANGES_PATH,
  };
}
