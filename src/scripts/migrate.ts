/**
 * Usage:
 *   npm run migrate            apply pending migrations
 *   npm run migrate:status     list applied and pending migrations
 */
import { runMigrations, getMigrationStatus } from '../db/migrator.js';
import { getPool } from '../db/index.js';

function label(version: number, name: string): string {
  return `${String(version).padStart(3, '0')}_${name}`;
}

async function printStatus(): Promise<void> {
  const { applied, pending } = await getMigrationStatus();

  console.log(`Applied (${applied.length}):`);
  for (const m of applied) {
    console.log(`  ${label(m.version, m.name)}  ${new Date(m.applied_at).toISOString()}`);
  }

  console.log(`Pending (${pending.length}):`);
  for (const m of pending) {
    console.log(`  ${label(m.version, m.name)}`);
  }
}

async function main() {
  try {
    if (process.argv.includes('--status')) {
      await printStatus();
    } else {
      await runMigrations();
    }
  } catch (error) {
    console.error('Migration error:', error);
    process.exitCode = 1;
  } finally {
    await getPool().end();
  }
}

void main();
