#!/usr/bin/env node
/**
 * Reelwright: command-line entry point.
 *
 *   chat [id]                          interactive session (new or resumed)
 *   list [--status in_progress|complete]
 *   show <id>                          progress and message history
 *   export <id> [--json] [--out file]  assembled script
 *   delete <id>
 */
import { writeFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { createApp, type App } from './app.js';
import { runChatSession } from './cli/session.js';
import { exportText, statusText } from './core/render.js';
import type { ScriptStatus } from './core/types.js';
import { logger } from './utils/logger.js';

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const DIM    = '\x1b[2m';
const RESET  = '\x1b[0m';

const USAGE = `Usage: reelwright <command>

  chat [id]                            start or resume a conversation
  list [--status in_progress|complete] list conversations
  show <id>                            show progress and history
  export <id> [--json] [--out file]    export the script
  delete <id>                          delete a conversation`;

const { values: flags, positionals } = parseArgs({
  args: process.argv.slice(2),
  allowPositionals: true,
  options: {
    status: { type: 'string' },
    json:   { type: 'boolean', default: false },
    out:    { type: 'string' },
  },
});

const [command, target] = positionals;

function requireId(): string {
  if (!target) {
    console.error(`${RED}${command} needs a conversation id${RESET}\n\n${USAGE}`);
    process.exit(1);
  }
  return target;
}

function parseStatus(value: string | undefined): ScriptStatus | undefined {
  if (value === undefined) return undefined;
  if (value === 'in_progress' || value === 'complete') return value;
  console.error(`${RED}--status must be in_progress or complete${RESET}`);
  process.exit(1);
}

// ── Commands ──────────────────────────────────────────────────────────────────

async function list(app: App): Promise<void> {
  const rows = await app.store.list({ status: parseStatus(flags.status) });
  if (rows.length === 0) {
    console.log(`${YELLOW}No conversations found${RESET}`);
    return;
  }
  console.log(`\n${BOLD}Conversations${RESET}`);
  for (const row of rows) {
    const icon = row.status === 'complete' ? `${GREEN}✓${RESET}` : `${YELLOW}…${RESET}`;
    console.log(`  ${icon} ${row.title} ${DIM}(${row.platform}, ${row.updated_at})${RESET}`);
    console.log(`    ${DIM}${row.id}${RESET}`);
  }
}

async function show(app: App, id: string): Promise<void> {
  const record = await app.store.load(id);
  if (!record) {
    console.error(`${RED}Conversation ${id} not found${RESET}`);
    process.exitCode = 1;
    return;
  }
  console.log(statusText(record.state));
  const history = await app.store.messages(id);
  console.log(`\n${BOLD}History (${history.length} messages)${RESET}`);
  for (const m of history) {
    console.log(`${DIM}[${m.timestamp}] ${m.role}${RESET}\n${m.content}\n`);
  }
}

async function exportScript(app: App, id: string): Promise<void> {
  const record = await app.store.load(id);
  if (!record) {
    console.error(`${RED}Conversation ${id} not found${RESET}`);
    process.exitCode = 1;
    return;
  }

  let body: string;
  if (flags.json) {
    body = JSON.stringify({ ...record, messages: await app.store.messages(id) }, null, 2);
  } else {
    const text = exportText(record.state);
    if (text === null) {
      console.error(`${YELLOW}Nothing to export yet${RESET}`);
      process.exitCode = 1;
      return;
    }
    body = text;
  }

  if (flags.out) {
    writeFileSync(flags.out, `${body}\n`, 'utf8');
    console.log(`${GREEN}✓${RESET} Exported to ${flags.out}`);
  } else {
    console.log(body);
  }
}

async function remove(app: App, id: string): Promise<void> {
  const deleted = await app.store.delete(id);
  if (deleted) {
    console.log(`${GREEN}✓${RESET} Deleted ${id}`);
  } else {
    console.error(`${RED}Conversation ${id} not found${RESET}`);
    process.exitCode = 1;
  }
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  logger.debug('Reelwright: starting', { command: command ?? 'chat' });

  if (command === 'help' || command === '--help') {
    console.log(USAGE);
    return;
  }

  const app = await createApp();
  try {
    switch (command) {
      case undefined:
      case 'chat':
        await runChatSession(app.orchestrator, app.store, target ?? null);
        break;
      case 'list':
        await list(app);
        break;
      case 'show':
        await show(app, requireId());
        break;
      case 'export':
        await exportScript(app, requireId());
        break;
      case 'delete':
        await remove(app, requireId());
        break;
      default:
        console.error(`${RED}Unknown command: ${command}${RESET}\n\n${USAGE}`);
        process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
}

main().catch((err) => {
  logger.error('Fatal error', { err });
  process.exit(1);
});
