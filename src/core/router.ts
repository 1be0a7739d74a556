/**
 * CommandRouter: raw user input to a typed Intent. Pure; no I/O.
 */
import { isDomain } from './state.js';
import { BRIEF_FIELDS, type BriefField, type Intent, type PendingOptions } from './types.js';

export interface RouteContext {
  conversationExists: boolean;
  /** Size of the pending option set, 0 when nothing is pending. */
  pendingCount: number;
}

const READ_ONLY = {
  status: { kind: 'status' },
  export: { kind: 'export' },
  help:   { kind: 'help' },
} as const satisfies Record<string, Intent>;

function isBriefField(word: string): word is BriefField {
  return (BRIEF_FIELDS as readonly string[]).includes(word);
}

function isReadOnly(word: string): word is keyof typeof READ_ONLY {
  return Object.prototype.hasOwnProperty.call(READ_ONLY, word);
}

function splitHead(text: string): [string, string] {
  const match = /^(\S+)\s*([\s\S]*)$/.exec(text);
  if (!match) return ['', ''];
  return [(match[1] ?? '').toLowerCase().replace(/^\//, ''), (match[2] ?? '').trim()];
}

/** Strict integer parse: "2" yes, "2.5", "2a" and "+2" no. */
export function parseIndex(text: string): number | null {
  return /^\d+$/.test(text) ? Number.parseInt(text, 10) : null;
}

export function route(raw: string, ctx: RouteContext): Intent {
  const text = raw.trim();

  if (text === '') return ctx.conversationExists ? { kind: 'help' } : { kind: 'start' };

  if (ctx.pendingCount > 0) {
    const index = parseIndex(text);
    if (index !== null && index >= 1 && index <= ctx.pendingCount) return { kind: 'select', index };
    if (text.toLowerCase() === 'more') return { kind: 'more' };
  }

  const [head, rest] = splitHead(text);

  if (isDomain(head)) return { kind: 'command', domain: head, rest };
  if (isReadOnly(head)) return READ_ONLY[head];

  if (head === 'edit') {
    const [target, instruction] = splitHead(rest);
    return { kind: 'edit', target: isDomain(target) ? target : null, raw: target, rest: instruction };
  }

  if (isBriefField(head) && rest !== '') return { kind: 'setup', field: head, value: rest };

  return { kind: 'free_text', text };
}

/**
 * Route the explicit `option_selected` field of a request. A number or a
 * pending option id always becomes a selection so the registry can answer a
 * stale or out-of-range pick with a corrective reply.
 */
export function routeSelection(selected: string, pending: PendingOptions | null, ctx: RouteContext): Intent {
  const value = selected.trim();
  if (value.toLowerCase() === 'more') return { kind: 'more' };

  const index = parseIndex(value);
  if (index !== null) return { kind: 'select', index };

  if (pending?.options.some((o) => o.id === value)) {
    const position = pending.options.findIndex((o) => o.id === value);
    return { kind: 'select', index: position + 1, optionId: value };
  }

  // Option ids from a set that has since been consumed or replaced
  const stale = /^([a-z]+)-\d+-(\d+)$/.exec(value);
  if (stale?.[1] && stale[2] && isDomain(stale[1])) {
    return { kind: 'select', index: Number.parseInt(stale[2], 10), optionId: value };
  }

  return route(value, ctx);
}
