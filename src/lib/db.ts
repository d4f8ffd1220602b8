import { Pool } from 'pg';
import { errorMessage } from './errors';

const globalForPg = globalThis as unknown as {
  pgPool: Pool | undefined;
};

function createPool(): Pool {
  if (!process.env.DATABASE_URL) {
    throw new Error(
      'DATABASE_URL environment variable is not set. ' +
      'Add it to .env or the worker environment.'
    );
  }
  const pool = new Pool({ connectionString: process.env.DATABASE_URL, max: 5 });
  pool.on('error', err => {
    console.error('[DB] Idle client error:', err.message);
  });
  return pool;
}

// Lazy singleton — the pool is only created when first used,
// so importing the repository never requires DATABASE_URL.
export function getPool(): Pool {
  if (!globalForPg.pgPool) {
    globalForPg.pgPool = createPool();
  }
  return globalForPg.pgPool;
}

export async function closePool(): Promise<void> {
  const pool = globalForPg.pgPool;
  globalForPg.pgPool = undefined;
  if (pool) {
    await pool.end();
  }
}

export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(destroy?: boolean): void;
}

/**
 * Runs `fn` between BEGIN and COMMIT on a checked-out client and always releases it.
 * On failure the original error is rethrown; a client whose ROLLBACK also fails is destroyed.
 */
export async function inTransaction<C extends TransactionClient, T>(
  client: C,
  fn: (client: C) => Promise<T>
): Promise<T> {
  let broken = false;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      broken = true;
      console.error(`[DB] Rollback failed: ${errorMessage(rollbackErr)}`);
    }
    throw err;
  } finally {
    client.release(broken);
  }
}
