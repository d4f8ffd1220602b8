import { describe, expect, it } from 'vitest';
import { normalizationRule, normalizeValue, type NormalizationRule } from './normalize';

const RULES: Array<[string | null, NormalizationRule]> = [
  ['%', 'percentage'],
  ['% of revenue', 'percentage'],
  ['Percentage', 'percentage'],
  ['percent of employees', 'percentage'],
  ['MT CO2e per Rupee', 'intensity'],
  ['Rate per million hours', 'intensity'],
  ['KL/unit', 'intensity'],
  ['Count', 'count'],
  ['Days', 'days'],
  ['MT CO2e', 'neutral'],
  [null, 'neutral'],
];

describe('normalizationRule', () => {
  it.each(RULES)('%s → %s', (unit, rule) => {
    expect(normalizationRule(unit)).toBe(rule);
  });
});

describe('normalizeValue', () => {
  it('keeps percentages and caps them at 100', () => {
    expect(normalizeValue(45, '%')).toBe(45);
    expect(normalizeValue(150, '%')).toBe(100);
  });

  it('scores intensities inversely', () => {
    expect(normalizeValue(1, 'MT CO2e per Rupee')).toBe(50);
    expect(normalizeValue(0, 'KL per Unit')).toBe(100);
  });

  it('subtracts counts from 100 and floors at 0', () => {
    expect(normalizeValue(3, 'Count')).toBe(97);
    expect(normalizeValue(500, 'Count')).toBe(0);
  });

  it('measures days against a 90-day horizon', () => {
    expect(normalizeValue(45, 'Days')).toBe(50);
    expect(normalizeValue(120, 'Days')).toBe(0);
  });

  it('gives absolute quantities the neutral score', () => {
    expect(normalizeValue(1250, 'MT CO2e')).toBe(50);
  });
});
