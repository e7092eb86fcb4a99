import pg from 'pg';
import { env } from '../config/env.js';
import { PgStore } from './pgStore.js';

const { Pool } = pg;

export const pool = new Pool({
  connectionString: env.DATABASE_URL,
});

pool.on('error', (err) => {
  console.error('[db] Idle client error:', err.message);
});

export const store = new PgStore(pool);

/** Fail fast at startup when the database is unreachable. */
export async function checkConnection(): Promise<void> {
  await pool.query('SELECT NOW()');
  console.log('[db] Connected to PostgreSQL');
}
