import { describe, expect, it } from 'vitest';
import {
  ENERGY_RENEWABLE,
  extracted,
  GHG_SCOPE1,
  SAFETY_FATALITIES,
  SUPPLIER_PAYMENT_DAYS,
} from '../testing/fakes';
import type { ExtractedIndicator } from '../types';
import { calculateScores, normalizePillarWeights } from './score-calculator';

const DEFINITIONS = [GHG_SCOPE1, ENERGY_RENEWABLE, SAFETY_FATALITIES, SUPPLIER_PAYMENT_DAYS];
const CALCULATED_AT = new Date('2024-07-01T00:00:00Z');
const options = { companyId: 101, reportYear: 2024, now: () => CALCULATED_AT };

const ghg = extracted({ validationStatus: 'valid' });
const renewable = extracted({
  indicatorCode: ENERGY_RENEWABLE.code,
  extractedValue: '40%',
  numericValue: 40,
  validationStatus: 'valid',
  sourcePages: [51],
  sourceChunkIds: [9010],
});
const fatalities = extracted({
  indicatorCode: SAFETY_FATALITIES.code,
  extractedValue: '2',
  numericValue: 2,
  validationStatus: 'valid',
  sourcePages: [88],
  sourceChunkIds: [9020],
});

describe('calculateScores', () => {
  it('averages normalized values by indicator weight within each pillar', () => {
    const record = calculateScores([ghg, renewable, fatalities], DEFINITIONS, options);

    // E: (50 × 1.0 + 40 × 0.9) / 1.9
    expect(record.environmentalScore).toBe(45.26);
    expect(record.socialScore).toBe(98);
    expect(record.calculationMetadata.environmental.weights).toEqual({
      GHG_SCOPE1_TOTAL: 1,
      ENERGY_RENEWABLE_PERCENT: 0.9,
    });
    expect(record.calculationMetadata.environmental.totalWeight).toBe(1.9);
  });

  it('scores an empty governance pillar as 0 and still records it', () => {
    const record = calculateScores([ghg, renewable, fatalities], DEFINITIONS, options);

    expect(record.governanceScore).toBe(0);
    expect(record.calculationMetadata.governance).toEqual({
      score: 0,
      indicatorCodes: [],
      weights: {},
      totalWeight: 0,
      weightedSum: 0,
      contributions: [],
    });
  });

  it('makes the overall score the weighted average of the pillar scores', () => {
    const record = calculateScores([ghg, renewable, fatalities], DEFINITIONS, options);
    const { pillarWeights } = record.calculationMetadata;

    expect(pillarWeights.E).toBeCloseTo(1 / 3);
    expect(record.overallScore).toBe(47.75);
    expect(record.overallScore).toBeCloseTo(
      pillarWeights.E * record.environmentalScore +
      pillarWeights.S * record.socialScore +
      pillarWeights.G * record.governanceScore,
      2
    );
  });

  it('applies configured pillar weights', () => {
    const record = calculateScores([ghg, renewable, fatalities], DEFINITIONS, {
      ...options,
      pillarWeights: { E: 2, S: 1, G: 1 },
    });

    expect(record.calculationMetadata.pillarWeights).toEqual({ E: 0.5, S: 0.25, G: 0.25 });
    // 0.5 × 45.26 + 0.25 × 98
    expect(record.overallScore).toBe(47.13);
  });

  it('keeps a citation trail for each contribution', () => {
    const record = calculateScores([ghg], DEFINITIONS, options);

    expect(record.calculationMetadata.environmental.contributions).toEqual([
      {
        indicatorCode: 'GHG_SCOPE1_TOTAL',
        name: 'Total Scope 1 emissions',
        value: 1250,
        unit: 'MT CO2e',
        normalizedValue: 50,
        weight: 1,
        contribution: 50,
        citation: {
          documentKey: 'RELIANCE/2024_BRSR.pdf',
          sourcePages: [45],
          sourceChunkIds: [9001],
          confidence: 0.95,
        },
      },
    ]);
    expect(record.calculationMetadata.calculatedAt).toBe('2024-07-01T00:00:00.000Z');
    expect(record.calculationMetadata.indicatorsConsidered).toBe(1);
  });

  it('ignores invalid, pending and non-numeric indicators', () => {
    const ignored: ExtractedIndicator[] = [
      extracted({ indicatorCode: ENERGY_RENEWABLE.code, numericValue: 150, validationStatus: 'invalid' }),
      extracted({ indicatorCode: SAFETY_FATALITIES.code, numericValue: 1, validationStatus: 'pending' }),
      extracted({ indicatorCode: SUPPLIER_PAYMENT_DAYS.code, numericValue: null, validationStatus: 'valid' }),
      extracted({ indicatorCode: 'UNKNOWN_CODE', numericValue: 10, validationStatus: 'valid' }),
    ];

    const record = calculateScores(ignored, DEFINITIONS, options);

    expect([record.environmentalScore, record.socialScore, record.governanceScore, record.overallScore])
      .toEqual([0, 0, 0, 0]);
    expect(record.calculationMetadata.indicatorsConsidered).toBe(0);
  });

  it('keeps pillar scores within 0-100 for extreme values', () => {
    const record = calculateScores([
      extracted({ indicatorCode: ENERGY_RENEWABLE.code, numericValue: 400, validationStatus: 'valid' }),
      extracted({ indicatorCode: SAFETY_FATALITIES.code, numericValue: 10_000, validationStatus: 'valid' }),
      extracted({ indicatorCode: SUPPLIER_PAYMENT_DAYS.code, numericValue: 1, validationStatus: 'valid' }),
    ], DEFINITIONS, options);

    for (const score of [record.environmentalScore, record.socialScore, record.governanceScore]) {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(100);
    }
  });
});

describe('normalizePillarWeights', () => {
  it('rejects negative weights and a zero sum', () => {
    expect(() => normalizePillarWeights({ E: -1, S: 1, G: 1 })).toThrow('non-negative');
    expect(() => normalizePillarWeights({ E: 0, S: 0, G: 0 })).toThrow('positive');
  });
});
