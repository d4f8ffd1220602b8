// scripts/seed-indicators.ts
//
// Upserts the BRSR Core indicator catalog (data/brsr-indicators.json) into brsr_indicators.
//
// Usage:  npx tsx scripts/seed-indicators.ts
//         npx tsx scripts/seed-indicators.ts --dry-run

import 'dotenv/config';
import { loadCatalogFile } from '@/lib/catalog';
import { closePool, getPool, inTransaction } from '@/lib/db';

const dryRun = process.argv.includes('--dry-run');

const UPSERT_SQL = `
  INSERT INTO brsr_indicators (
    indicator_code, attribute_number, parameter_name, measurement_unit, description,
    pillar, weight, data_assurance_approach, brsr_reference
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
  ON CONFLICT (indicator_code) DO UPDATE SET
    attribute_number = EXCLUDED.attribute_number,
    parameter_name = EXCLUDED.parameter_name,
    measurement_unit = EXCLUDED.measurement_unit,
    description = EXCLUDED.description,
    pillar = EXCLUDED.pillar,
    weight = EXCLUDED.weight,
    data_assurance_approach = EXCLUDED.data_assurance_approach,
    brsr_reference = EXCLUDED.brsr_reference,
    updated_at = NOW()`;

async function main() {
  const catalog = loadCatalogFile();
  console.log(`Loaded ${catalog.size} indicators${dryRun ? ' (dry run)' : ''}`);

  for (const [attribute, defs] of catalog.groupByAttribute()) {
    console.log(`  Attribute ${attribute}: ${defs.map(d => d.code).join(', ')}`);
  }
  if (dryRun) return;

  await inTransaction(await getPool().connect(), async client => {
    for (const def of catalog.all()) {
      await client.query(UPSERT_SQL, [
        def.code,
        def.attributeNumber,
        def.name,
        def.unit,
        def.description,
        def.pillar,
        def.weight,
        def.dataAssuranceApproach ?? null,
        def.brsrReference ?? null,
      ]);
    }
  });
  console.log(`Seeded ${catalog.size} indicators`);
}

main()
  .catch((e) => {
    console.error(e);
    process.exitCode = 1;
  })
  .finally(() => closePool());
