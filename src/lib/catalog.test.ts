import { describe, expect, it } from 'vitest';
import { IndicatorCatalog, loadCatalogFile } from './catalog';
import { GHG_SCOPE1 } from './testing/fakes';
import { loadRangeTable } from './validators';

describe('BRSR indicator catalog data', () => {
  const catalog = loadCatalogFile();

  it('covers the nine BRSR Core attributes', () => {
    expect(catalog.size).toBe(54);
    expect(catalog.groupByAttribute().map(([attribute]) => attribute)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('assigns pillars by attribute', () => {
    const pillarOf = (attribute: number) =>
      new Set(catalog.all().filter(d => d.attributeNumber === attribute).map(d => d.pillar));

    for (const attribute of [1, 2, 3, 4]) expect(pillarOf(attribute)).toEqual(new Set(['E']));
    for (const attribute of [5, 6, 7]) expect(pillarOf(attribute)).toEqual(new Set(['S']));
    for (const attribute of [8, 9]) expect(pillarOf(attribute)).toEqual(new Set(['G']));
  });

  it('carries the reference definitions used in scoring', () => {
    expect(catalog.get('GHG_SCOPE1_TOTAL')).toMatchObject({ unit: 'MT CO2e', pillar: 'E', weight: 1 });
    expect(catalog.get('SUPPLIER_PAYMENT_DAYS')).toMatchObject({ unit: 'Days', pillar: 'G', weight: 0.8 });
  });

  it('has a range entry for every indicator, bounded at 100 for percentages', () => {
    const ranges = loadRangeTable();
    for (const def of catalog.all()) {
      expect(ranges[def.code], def.code).toBeDefined();
      if (def.unit === '%') expect(ranges[def.code].max, def.code).toBe(100);
    }
    expect(ranges.SUPPLIER_PAYMENT_DAYS.allowZero).toBe(false);
  });
});

describe('IndicatorCatalog', () => {
  it('rejects duplicate codes', () => {
    expect(() => new IndicatorCatalog([GHG_SCOPE1, GHG_SCOPE1])).toThrow(
      'Duplicate indicator code in catalog: GHG_SCOPE1_TOTAL'
    );
  });
});
