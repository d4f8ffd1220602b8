// BRSR Core indicator catalog — immutable reference data, loaded once per worker.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { IndicatorDefinition } from './types';

const indicatorSchema = z.object({
  code: z.string().min(1),
  attributeNumber: z.number().int().min(1).max(9),
  name: z.string().min(1),
  description: z.string(),
  unit: z.string().nullable(),
  pillar: z.enum(['E', 'S', 'G']),
  weight: z.number().positive(),
  brsrReference: z.string().optional(),
  dataAssuranceApproach: z.string().optional(),
});

export const indicatorListSchema = z.array(indicatorSchema);

export const DEFAULT_CATALOG_PATH = new URL('../../data/brsr-indicators.json', import.meta.url);

export class IndicatorCatalog {
  private readonly byCode: ReadonlyMap<string, IndicatorDefinition>;

  constructor(definitions: readonly IndicatorDefinition[]) {
    const map = new Map<string, IndicatorDefinition>();
    for (const def of definitions) {
      if (map.has(def.code)) {
        throw new Error(`Duplicate indicator code in catalog: ${def.code}`);
      }
      map.set(def.code, Object.freeze({ ...def }));
    }
    this.byCode = map;
  }

  get size(): number {
    return this.byCode.size;
  }

  all(): IndicatorDefinition[] {
    return [...this.byCode.values()];
  }

  get(code: string): IndicatorDefinition | undefined {
    return this.byCode.get(code);
  }

  /** Attribute groups in ascending order, catalog order preserved inside each group. */
  groupByAttribute(subset?: readonly IndicatorDefinition[]): Array<[number, IndicatorDefinition[]]> {
    const groups = new Map<number, IndicatorDefinition[]>();
    for (const def of subset ?? this.all()) {
      const group = groups.get(def.attributeNumber);
      if (group) {
        group.push(def);
      } else {
        groups.set(def.attributeNumber, [def]);
      }
    }
    return [...groups.entries()].sort(([a], [b]) => a - b);
  }
}

export function loadCatalogFile(path: string | URL = DEFAULT_CATALOG_PATH): IndicatorCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return new IndicatorCatalog(indicatorListSchema.parse(raw));
}
