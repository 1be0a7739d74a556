/**
 * Interactive chat session over the orchestrator. Each input line is one
 * chat turn; `exit` or end of input ends the session.
 */
import { createInterface } from 'node:readline';
import type { Orchestrator } from '../core/orchestrator.js';
import { optionsText, statusText } from '../core/render.js';
import type { ConversationStore } from '../db/store.js';

const CYAN  = '\x1b[36m';
const RED   = '\x1b[31m';
const DIM   = '\x1b[2m';
const RESET = '\x1b[0m';

export interface SessionIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export async function runChatSession(
  orchestrator: Orchestrator,
  store: ConversationStore,
  conversationId: string | null,
  io: SessionIO = { input: process.stdin, output: process.stdout },
): Promise<string | null> {
  const write = (text: string) => io.output.write(`${text}\n`);
  let id = conversationId;

  if (id) {
    const record = await store.load(id);
    if (!record) {
      write(`${RED}Conversation ${id} not found${RESET}`);
      return null;
    }
    write(statusText(record.state));
    if (record.pending) write(`\n${optionsText(record.pending, 'new')}`);
  } else {
    const res = await orchestrator.handleChat({ message: '' });
    if ('error' in res) {
      write(`${RED}${res.error}${RESET}`);
      return null;
    }
    id = res.conversation_id;
    write(res.response);
  }
  write(`${DIM}conversation ${id} · type exit to leave${RESET}`);

  const rl = createInterface({ input: io.input, output: io.output, terminal: false });
  io.output.write(`${CYAN}> ${RESET}`);

  for await (const line of rl) {
    const text = line.trim();
    if (text === 'exit' || text === 'quit') break;

    const res = await orchestrator.handleChat({ message: text, conversation_id: id });
    if ('error' in res) {
      write(`${RED}${res.error}${RESET}`);
    } else {
      id = res.conversation_id;
      write(`\n${res.response}\n`);
    }
    io.output.write(`${CYAN}> ${RESET}`);
  }

  rl.close();
  return id;
}
