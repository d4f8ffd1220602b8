// scripts/handle-task.ts
//
// Handles one extraction task message the way a queue consumer would and prints the
// delivery decision (ack / requeue / park). Useful for replaying a parked message.
//
// Usage:  npx tsx scripts/handle-task.ts RELIANCE/2024_BRSR.pdf
//         npx tsx scripts/handle-task.ts '{"object_key": "RELIANCE/2024_BRSR.pdf"}' --retry-count=2
//         npx tsx scripts/handle-task.ts TCS/2024_BRSR.pdf --embedding-checks=4

import 'dotenv/config';
import { loadConfig } from '@/lib/config';
import { closePool } from '@/lib/db';
import { createExtractionWorker } from '@/lib/worker';

function flag(name: string): number {
  const prefix = `--${name}=`;
  const arg = process.argv.find(a => a.startsWith(prefix));
  if (!arg) return 0;
  const value = Number.parseInt(arg.slice(prefix.length), 10);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--${name} must be a non-negative integer, got "${arg.slice(prefix.length)}"`);
  }
  return value;
}

async function main(): Promise<number> {
  const body = process.argv.slice(2).find(arg => !arg.startsWith('--'));
  if (!body) {
    console.error('No message given. Pass the document key or {"object_key": "..."} as the first argument');
    return 1;
  }

  const delivery = { retryCount: flag('retry-count'), embeddingChecks: flag('embedding-checks') };
  const worker = await createExtractionWorker(loadConfig());
  const outcome = await worker.handle(body, delivery);

  console.log(`\n${outcome.decision.toUpperCase()} ${outcome.documentKey}: ${outcome.reason}`);
  return outcome.decision === 'ack' ? 0 : 1;
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
