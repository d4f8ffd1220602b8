// scripts/run-extraction.ts
//
// Runs the extraction pipeline over one or more BRSR documents, one at a time.
//
// Usage:  npx tsx scripts/run-extraction.ts RELIANCE/2024_BRSR.pdf TCS/2024_BRSR.pdf
//         DOCUMENTS=RELIANCE/2024_BRSR.pdf,TCS/2024_BRSR.pdf npx tsx scripts/run-extraction.ts

import 'dotenv/config';
import { loadConfig } from '@/lib/config';
import { closePool } from '@/lib/db';
import { errorMessage } from '@/lib/errors';
import { createExtractionWorker } from '@/lib/worker';

function documentKeys(): string[] {
  const fromArgs = process.argv.slice(2).filter(arg => !arg.startsWith('--'));
  const source = fromArgs.length > 0 ? fromArgs : (process.env.DOCUMENTS ?? '').split(',');
  return source.map(k => k.trim()).filter(Boolean);
}

async function main(): Promise<number> {
  const keys = documentKeys();
  if (keys.length === 0) {
    console.error('No documents given. Pass keys as arguments or set DOCUMENTS=key1,key2');
    return 1;
  }

  const worker = await createExtractionWorker(loadConfig());
  console.log(`Processing ${keys.length} document${keys.length === 1 ? '' : 's'}`);

  let succeeded = 0;
  let failed = 0;

  for (const key of keys) {
    console.log(`\n[${key}]`);
    try {
      const summary = await worker.process(key);
      if (summary.skipped) {
        console.log('  -> Already processed, skipped');
      } else {
        console.log(
          `  -> ${summary.indicators.length}/${summary.attempted} extracted, ` +
          `${summary.validation.valid} valid, overall ${summary.score?.overallScore.toFixed(2) ?? 'n/a'}`
        );
      }
      succeeded++;
    } catch (err) {
      console.error(`  -> Failed: ${errorMessage(err)}`);
      failed++;
    }
  }

  console.log(`\nDone: ${succeeded} succeeded, ${failed} failed`);
  return failed > 0 ? 1 : 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error('Fatal:', err);
    process.exitCode = 1;
  })
  .finally(() => closePool());
