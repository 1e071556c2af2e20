import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { pool } from './pool.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

async function listMigrations(): Promise<Migration[]> {
  const files = await readdir(MIGRATIONS_DIR);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return { filename, version: parseInt(match[1], 10) };
    })
    .sort((a, b) => a.version - b.version);
}

async function appliedVersions(): Promise<Set<number>> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  const result = await pool.query<{ version: number }>('SELECT version FROM schema_migrations');
  return new Set(result.rows.map((row) => row.version));
}

async function apply(migration: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
    await client.query('COMMIT');
    console.log(`Applied migration ${migration.version}: ${migration.filename}`);
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

async function migrate(): Promise<void> {
  try {
    const applied = await appliedVersions();
    const pending = (await listMigrations()).filter((m) => !applied.has(m.version));

    if (pending.length === 0) {
      console.log('Database is up to date.');
      return;
    }

    console.log(`Applying ${pending.length} migration(s)...`);
    for (const migration of pending) {
      await apply(migration);
    }
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
