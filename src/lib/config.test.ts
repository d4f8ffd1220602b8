import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.model).toEqual({ name: 'claude-sonnet-4-20250514', temperature: 0.1, maxTokens: 2048 });
    expect(config.embedding).toEqual({ model: 'text-embedding-3-large', dimensions: 3072 });
    expect(config.retrieval).toEqual({ k: 10, distanceThreshold: undefined });
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1000, multiplier: 2, jitter: 0 });
    expect(config.delivery).toEqual({ maxDeliveryAttempts: 3, maxEmbeddingChecks: 10 });
    expect(config.pillarWeights).toEqual({ E: 1, S: 1, G: 1 });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      RETRIEVAL_DISTANCE_THRESHOLD: '0.6',
      MAX_RETRIES: '5',
      PILLAR_WEIGHT_G: '2',
      NUMERIC_RANGES_PATH: '/etc/esg/ranges.json',
    });

    expect(config.retrieval.distanceThreshold).toBe(0.6);
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.pillarWeights.G).toBe(2);
    expect(config.numericRangesPath).toBe('/etc/esg/ranges.json');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ MAX_RETRIES: 'three' })).toThrow('Invalid extraction configuration');
    expect(() => loadConfig({ EXTRACTION_TEMPERATURE: '1.5' })).toThrow('Invalid extraction configuration');
  });

  it('rejects pillar weights that sum to zero', () => {
    expect(() => loadConfig({ PILLAR_WEIGHT_E: '0', PILLAR_WEIGHT_S: '0', PILLAR_WEIGHT_G: '0' }))
      .toThrow('pillar weights must sum to a positive number');
  });
});
