#!/usr/bin/env tsx
/**
 * Prepares the conversation store selected by STORE_DRIVER.
 *
 *   sqlite    open the database file, which creates the tables
 *   supabase  apply migrations/*.sql in name order through the exec_sql RPC,
 *             recording each applied file in `_migrations`
 *
 * Run: npm run setup-db. Exits 1 when any migration fails.
 */
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { env } from '../src/config.js';

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN   = '\x1b[36m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const migrationsDir = fileURLToPath(new URL('../migrations/', import.meta.url));

console.log(`\n${BOLD}=== Reelwright: database setup (${env.STORE_DRIVER}) ===${RESET}\n`);

if (env.STORE_DRIVER === 'sqlite') {
  const { SqliteConversationStore } = await import('../src/db/sqlite.js');
  const store = SqliteConversationStore.open(env.SQLITE_PATH);
  await store.close();
  console.log(`  ${GREEN}✓${RESET} tables ready in ${CYAN}${env.SQLITE_PATH}${RESET}\n`);
  process.exit(0);
}

const { getSupabase } = await import('../src/db/supabase.js');
const db = getSupabase();

const TRACKING_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    name       TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;

async function execSql(sql: string): Promise<void> {
  const { error } = await db.rpc('exec_sql', { sql });
  if (error) throw new Error(error.message);
}

async function appliedMigrations(): Promise<Set<string>> {
  const { data, error } = await db.from('_migrations').select('name');
  if (error) throw new Error(`could not read _migrations: ${error.message}`);
  return new Set((data ?? []).map((row: { name: string }) => row.name));
}

try {
  await execSql(TRACKING_TABLE);
} catch (err) {
  console.error(`${RED}Could not create _migrations: ${err instanceof Error ? err.message : String(err)}${RESET}`);
  console.error(`The exec_sql RPC must exist. Apply ${CYAN}migrations/${RESET} with the Supabase CLI instead.`);
  process.exit(1);
}

const files = readdirSync(migrationsDir).filter(f => f.endsWith('.sql')).sort();
const applied = await appliedMigrations();
const pending = files.filter(f => !applied.has(f));

console.log(`${files.length} migration file(s), ${pending.length} to apply\n`);

let failed = 0;
for (const file of pending) {
  process.stdout.write(`  ${file}… `);
  try {
    await execSql(readFileSync(join(migrationsDir, file), 'utf8'));
    const { error } = await db.from('_migrations').insert({ name: file });
    if (error) throw new Error(`applied but not recorded: ${error.message}`);
    console.log(`${GREEN}✓${RESET}`);
  } catch (err) {
    failed++;
    console.log(`${RED}✗${RESET} ${err instanceof Error ? err.message : String(err)}`);
    break;
  }
}

if (failed > 0) {
  console.error(`\n${RED}${BOLD}Setup stopped at the failed migration. Fix it and re-run.${RESET}\n`);
  process.exit(1);
}

console.log(pending.length === 0
  ? `${YELLOW}Nothing to apply.${RESET}\n`
  : `\n${GREEN}${BOLD}Schema is up to date.${RESET}\n`);
