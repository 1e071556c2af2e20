import pg from 'pg';
import dotenv from 'dotenv';

dotenv.config();

const { Pool } = pg;

// Creating the pool does not connect, so modules that import it load fine
// without DATABASE_URL; the first query is what fails.
export const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('error', (err) => {
  console.error('Unexpected database error:', err);
});

/** Round-trip a trivial query; used by the health check. */
export async function pingDatabase(): Promise<void> {
  await pool.query('SELECT 1');
}
