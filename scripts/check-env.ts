#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for Reelwright.
 * Checks provider keys, store configuration and the Telegram bot.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { accessSync, constants, existsSync } from 'fs';
import { dirname } from 'path';
import { createClient } from '@supabase/supabase-js';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, note: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${note})`);

let anyRequiredFailed = false;

function mask(value: string): string {
  return value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
}

// ── Section: Provider keys ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Reelwright — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Generation providers (at least one)${RESET}`);

const providers: Array<[string, string]> = [
  ['ANTHROPIC_API_KEY', 'Get from https://console.anthropic.com'],
  ['OPENAI_API_KEY',    'Get from https://platform.openai.com/api-keys'],
  ['DEEPSEEK_API_KEY',  'Get from https://platform.deepseek.com'],
  ['GEMINI_API_KEY',    'Get from https://aistudio.google.com/apikey'],
];

let providerCount = 0;
for (const [key, hint] of providers) {
  const value = process.env[key];
  if (value && value.trim()) {
    pass(key, mask(value));
    providerCount++;
  } else {
    skip(key, `not set — ${hint}`);
  }
}
if (providerCount === 0) {
  fail('No provider key set', 'Set at least one of the keys above in .env');
  anyRequiredFailed = true;
}

// ── Section: Optional / configuration variables ──────────────────────────────

console.log(`\n${BOLD}[ 2 ] Configuration variables${RESET}`);

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  const effective = value ?? defaultVal;
  console.log(`  ${YELLOW}○${RESET} ${label}  ${effective}${value ? '' : '  (default)'}`);
}

checkOptional('STORE_DRIVER',          process.env['STORE_DRIVER'],          'sqlite');
checkOptional('DEFAULT_PLATFORM',      process.env['DEFAULT_PLATFORM'],      'generic');
checkOptional('GENERATION_TIMEOUT_MS', process.env['GENERATION_TIMEOUT_MS'], '60000');
checkOptional('OPTIONS_PER_STEP',      process.env['OPTIONS_PER_STEP'],      '3');
checkOptional('LOG_LEVEL',             process.env['LOG_LEVEL'],             'info');
checkOptional('LOG_FORMAT',            process.env['LOG_FORMAT'],            'text');

// ── Section: Store ────────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Conversation store${RESET}`);

const driver = process.env['STORE_DRIVER'] ?? 'sqlite';

if (driver === 'supabase') {
  const supabaseUrl = process.env['SUPABASE_URL'];
  const supabaseKey = process.env['SUPABASE_SERVICE_KEY'];
  if (!supabaseUrl || !supabaseKey) {
    fail('SUPABASE_URL / SUPABASE_SERVICE_KEY', 'Required when STORE_DRIVER=supabase');
    anyRequiredFailed = true;
  } else {
    process.stdout.write(`  Testing Supabase connection… `);
    try {
      const sb = createClient(supabaseUrl, supabaseKey);
      const { error } = await sb.from('conversations').select('id').limit(1);
      if (error && !error.message.includes('does not exist') && !error.message.includes('relation')) {
        throw new Error(error.message);
      }
      console.log(`${GREEN}✓${RESET}  connected${error ? `  ${YELLOW}(tables missing — run npm run setup-db)${RESET}` : ''}`);
    } catch (err) {
      console.log(`${RED}✗${RESET}`);
      fail('Supabase connection failed', err instanceof Error ? err.message : String(err));
      anyRequiredFailed = true;
    }
  }
} else if (driver === 'sqlite') {
  const path = process.env['SQLITE_PATH'] ?? `${process.env['HOME'] ?? '/tmp'}/.reelwright/conversations.db`;
  if (path === ':memory:') {
    pass('SQLite', 'in-memory (nothing is kept between runs)');
  } else {
    const dir = dirname(path);
    try {
      if (existsSync(dir)) accessSync(dir, constants.W_OK);
      pass('SQLite path', path);
    } catch {
      fail('SQLite path', `${dir} is not writable`);
      anyRequiredFailed = true;
    }
  }
} else {
  fail(`STORE_DRIVER=${driver}`, 'Use sqlite or supabase');
  anyRequiredFailed = true;
}

// ── Section: Telegram bot ─────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Telegram alerts (optional)${RESET}`);

const tgToken  = process.env['TELEGRAM_BOT_TOKEN'];
const tgChatId = process.env['TELEGRAM_CHAT_ID'];

if (tgToken && tgChatId) {
  process.stdout.write(`  Sending Telegram test message… `);
  try {
    const res = await fetch(`https://api.telegram.org/bot${tgToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: tgChatId, text: '[Reelwright] check-env: pre-flight test — OK' }),
    });
    const json: unknown = await res.json();
    const ok = typeof json === 'object' && json !== null && 'ok' in json && json.ok === true;
    if (!ok) throw new Error(`Telegram API returned HTTP ${res.status}`);
    console.log(`${GREEN}✓${RESET}  message sent — check your chat`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Telegram test message failed', err instanceof Error ? err.message : String(err));
  }
} else {
  skip('Telegram test', 'TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID not set, alerts disabled');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run setup-db${RESET}\n`);
}
