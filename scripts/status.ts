#!/usr/bin/env tsx
/**
 * Operational status for Reelwright: store driver, conversation counts,
 * recent conversations and the provider route each domain will use.
 * Run: npm run status
 */
import { PROVIDER_ROUTES, env, providerEnabled, type ProviderRoute } from '../src/config.js';
import { DOMAINS } from '../src/core/types.js';
import { createStore } from '../src/db/store.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN   = '\x1b[36m';
const BOLD   = '\x1b[1m';
const DIM    = '\x1b[2m';
const RESET  = '\x1b[0m';

function green(s: string)  { return `${GREEN}${s}${RESET}`; }
function red(s: string)    { return `${RED}${s}${RESET}`; }
function yellow(s: string) { return `${YELLOW}${s}${RESET}`; }
function cyan(s: string)   { return `${CYAN}${s}${RESET}`; }
function bold(s: string)   { return `${BOLD}${s}${RESET}`; }
function dim(s: string)    { return `${DIM}${s}${RESET}`; }

function timeAgo(dateStr: string): string {
  const diff = Date.now() - new Date(dateStr).getTime();
  const minutes = Math.floor(diff / 60_000);
  const hours   = Math.floor(diff / 3_600_000);
  const days    = Math.floor(diff / 86_400_000);
  if (days > 0)    return `${days}d ago`;
  if (hours > 0)   return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return 'just now';
}

// ── Main ──────────────────────────────────────────────────────────────────────

console.log(`\n${bold('=== Reelwright — Status ===')}\n`);
console.log(`${bold('Store')}      ${cyan(env.STORE_DRIVER)}${env.STORE_DRIVER === 'sqlite' ? dim(`  ${env.SQLITE_PATH}`) : ''}`);
console.log(`${bold('Telegram')}   ${env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID ? green('enabled') : yellow('disabled')}`);

console.log(`\n${bold('Provider routes')}`);
for (const domain of DOMAINS) {
  const routes: readonly ProviderRoute[] = PROVIDER_ROUTES[domain];
  const active = routes.find(r => providerEnabled(r.provider));
  const chain = routes
    .map(r => (providerEnabled(r.provider) ? r.provider : dim(r.provider)))
    .join(' → ');
  const head = active ? green(`${active.provider}/${active.model}`) : red('no provider');
  console.log(`  ${domain.padEnd(9)} ${head}  ${dim('chain:')} ${chain}`);
}

try {
  const store = await createStore();
  const [inProgress, complete] = await Promise.all([
    store.list({ status: 'in_progress', limit: 1000 }),
    store.list({ status: 'complete', limit: 1000 }),
  ]);
  const recent = await store.list({ limit: 5 });
  await store.close();

  console.log(`\n${bold('Conversations')}`);
  console.log(`  In progress  ${yellow(String(inProgress.length))}`);
  console.log(`  Complete     ${green(String(complete.length))}`);

  if (recent.length > 0) {
    console.log(`\n${bold('Recent')}`);
    for (const c of recent) {
      const icon = c.status === 'complete' ? green('✓') : yellow('…');
      console.log(`  ${icon} ${c.title} ${dim(`(${c.platform}, ${timeAgo(c.updated_at)})`)}`);
    }
  }
  console.log('');
} catch (err) {
  console.error(`\n${red('Store unavailable:')} ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
}
