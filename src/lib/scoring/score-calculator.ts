// ESG score aggregation
// Pillar score = weighted mean of normalized indicator values.
// Overall score = weighted mean of the three pillar scores.
// A pillar without qualifying indicators scores 0 and still appears in the metadata.

import {
  PILLARS,
  type ExtractedIndicator,
  type IndicatorContribution,
  type IndicatorDefinition,
  type Pillar,
  type PillarBreakdown,
  type PillarWeights,
  type ScoreRecord,
} from '../types';
import { normalizeValue } from './normalize';

export const EQUAL_PILLAR_WEIGHTS: PillarWeights = { E: 1 / 3, S: 1 / 3, G: 1 / 3 };

export const CALCULATION_METHOD =
  'Indicator values are normalized to 0-100 by unit (percentages as-is, intensities as 100/(1+v), ' +
  'counts as 100-v, payment days against a 90-day horizon, other units neutral at 50). ' +
  'Each pillar score is the weight-averaged normalized value of its valid numeric indicators; ' +
  'a pillar without such indicators scores 0. The overall score is the weighted average of the ' +
  'three pillar scores.';

const PILLAR_KEYS = { E: 'environmental', S: 'social', G: 'governance' } as const;

export interface ScoreOptions {
  companyId: number;
  reportYear: number;
  pillarWeights?: PillarWeights;
  now?: () => Date;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Weights must be non-negative with a positive sum; returned normalized to sum 1. */
export function normalizePillarWeights(weights: PillarWeights): PillarWeights {
  for (const pillar of PILLARS) {
    const w = weights[pillar];
    if (!Number.isFinite(w) || w < 0) {
      throw new Error(`Pillar weight for ${pillar} must be a non-negative number, got ${w}`);
    }
  }
  const total = weights.E + weights.S + weights.G;
  if (total <= 0) {
    throw new Error('Pillar weights must sum to a positive number');
  }
  return { E: weights.E / total, S: weights.S / total, G: weights.G / total };
}

function isScorable(ind: ExtractedIndicator): ind is ExtractedIndicator & { numericValue: number } {
  return ind.validationStatus === 'valid' && ind.numericValue !== null && Number.isFinite(ind.numericValue);
}

export function calculatePillarBreakdown(
  pillar: Pillar,
  indicators: readonly ExtractedIndicator[],
  definitions: ReadonlyMap<string, IndicatorDefinition>
): PillarBreakdown {
  const contributions: IndicatorContribution[] = [];
  const weights: Record<string, number> = {};
  let totalWeight = 0;
  let weightedSum = 0;

  for (const ind of indicators) {
    const def = definitions.get(ind.indicatorCode);
    if (!def || def.pillar !== pillar || !isScorable(ind)) continue;

    const normalized = normalizeValue(ind.numericValue, def.unit);
    const contribution = normalized * def.weight;
    totalWeight += def.weight;
    weightedSum += contribution;
    weights[def.code] = def.weight;

    contributions.push({
      indicatorCode: def.code,
      name: def.name,
      value: ind.numericValue,
      unit: def.unit,
      normalizedValue: round2(normalized),
      weight: def.weight,
      contribution: round2(contribution),
      citation: {
        documentKey: ind.documentKey,
        sourcePages: [...ind.sourcePages],
        sourceChunkIds: [...ind.sourceChunkIds],
        confidence: ind.confidence,
      },
    });
  }

  const score = totalWeight > 0 ? round2(weightedSum / totalWeight) : 0;

  return {
    score,
    indicatorCodes: contributions.map(c => c.indicatorCode),
    weights,
    totalWeight: round2(totalWeight),
    weightedSum: round2(weightedSum),
    contributions,
  };
}

export function calculateScores(
  indicators: readonly ExtractedIndicator[],
  definitions: readonly IndicatorDefinition[],
  options: ScoreOptions
): ScoreRecord {
  const pillarWeights = normalizePillarWeights(options.pillarWeights ?? EQUAL_PILLAR_WEIGHTS);
  const byCode = new Map(definitions.map(d => [d.code, d]));
  const now = options.now ?? (() => new Date());

  const breakdown = {
    E: calculatePillarBreakdown('E', indicators, byCode),
    S: calculatePillarBreakdown('S', indicators, byCode),
    G: calculatePillarBreakdown('G', indicators, byCode),
  };

  const overall = round2(PILLARS.reduce((sum, p) => sum + pillarWeights[p] * breakdown[p].score, 0));
  const considered = PILLARS.reduce((n, p) => n + breakdown[p].indicatorCodes.length, 0);

  for (const p of PILLARS) {
    const b = breakdown[p];
    console.log(
      `[Scoring] ${PILLAR_KEYS[p]}: ${b.score.toFixed(2)} from ${b.indicatorCodes.length} indicator(s)`
    );
  }
  console.log(`[Scoring] overall: ${overall.toFixed(2)} (${considered} indicators considered)`);

  return {
    companyId: options.companyId,
    reportYear: options.reportYear,
    environmentalScore: breakdown.E.score,
    socialScore: breakdown.S.score,
    governanceScore: breakdown.G.score,
    overallScore: overall,
    calculationMetadata: {
      environmental: breakdown.E,
      social: breakdown.S,
      governance: breakdown.G,
      pillarWeights,
      indicatorsConsidered: considered,
      method: CALCULATION_METHOD,
      calculatedAt: now().toISOString(),
    },
  };
}
