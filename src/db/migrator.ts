import { getPool, withTransaction } from './index.js';
import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

export const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), 'migrations');

const MIGRATION_FILENAME = /^(\d+)_(.+)\.sql$/;

export interface Migration {
  version: number;
  name: string;
  filename: string;
}

export interface AppliedMigration {
  version: number;
  name: string;
  applied_at: Date;
}

async function ensureMigrationsTable(): Promise<void> {
  await getPool().query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      applied_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(): Promise<AppliedMigration[]> {
  const result = await getPool().query<AppliedMigration>(
    'SELECT version, name, applied_at FROM schema_migrations ORDER BY version'
  );
  return result.rows;
}

/**
 * Migration files in version order, e.g. 001_initial_schema.sql -> { version: 1, name: 'initial_schema' }
 */
export async function getMigrationFiles(dir: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = await readdir(dir);
  const migrations: Migration[] = [];

  for (const filename of files) {
    if (!filename.endsWith('.sql')) continue;

    const match = MIGRATION_FILENAME.exec(filename);
    if (!match) {
      console.warn(`Skipping invalid migration filename: ${filename}`);
      continue;
    }
    migrations.push({ version: parseInt(match[1], 10), name: match[2], filename });
  }

  return migrations.sort((a, b) => a.version - b.version);
}

export async function readMigrationSql(migration: Migration, dir: string = MIGRATIONS_DIR): Promise<string> {
  return readFile(join(dir, migration.filename), 'utf-8');
}

async function getPendingMigrations(applied: AppliedMigration[]): Promise<Migration[]> {
  const appliedVersions = new Set(applied.map(m => m.version));
  const all = await getMigrationFiles();
  return all.filter(m => !appliedVersions.has(m.version));
}

export async function runMigrations(): Promise<void> {
  await ensureMigrationsTable();
  const pending = await getPendingMigrations(await getAppliedMigrations());

  if (pending.length === 0) {
    console.log('Database schema is up to date');
    return;
  }

  for (const migration of pending) {
    const sql = await readMigrationSql(migration);
    // Schema change and its bookkeeping row commit together
    await withTransaction(async (client) => {
      await client.query(sql);
      await client.query(
        'INSERT INTO schema_migrations (version, name) VALUES ($1, $2)',
        [migration.version, migration.name]
      );
    });
    console.log(`Applied migration ${migration.filename}`);
  }
}

export async function getMigrationStatus(): Promise<{
  applied: AppliedMigration[];
  pending: Pick<Migration, 'version' | 'name'>[];
}> {
  await ensureMigrationsTable();

  const applied = await getAppliedMigrations();
  const pending = (await getPendingMigrations(applied)).map(({ version, name }) => ({ version, name }));

  return { applied, pending };
}
