/**
 * Orchestrator: the conversation state machine.
 *
 * One request is one turn: load the record, restore the option registry,
 * route the input to an Intent, run the matching transition, then commit the
 * record and both messages in one store call before replying. Turns of the
 * same conversation are serialised; different conversations run in parallel.
 *
 * Recoverable errors (no pending options, bad index, empty generation) become
 * corrective replies and are committed like any other turn. Generation and
 * persistence failures escape as `{ error }` and leave the store untouched.
 */
import { z } from 'zod';
import { CONVERSATION, env } from '../config.js';
import type { ConversationStore } from '../db/store.js';
import { telegram } from '../monitoring/telegram.js';
import { logger, type Logger } from '../utils/logger.js';
import { KeyedMutex } from '../utils/mutex.js';
import {
  ConversationNotFoundError, EmptyGenerationError, IndexOutOfRangeError, NoPendingOptionsError,
  describeError, isRecoverable,
} from './errors.js';
import { OptionRegistry } from './options.js';
import {
  confirmationText, emptyGenerationText, exportReply, helpText, invalidPlatformText, noPendingText,
  noteText, nothingToEditText, optionsText, outOfRangeText, prerequisiteText, setupText, statusText,
  toneSampleText, unknownEditTargetText, welcomeText,
} from './render.js';
import { route, routeSelection } from './router.js';
import {
  DOMAIN_RULES, createScriptState, emptySession, hasContent, missingPrerequisite, nextSuggestion,
  suggestedStep, titleForTopic,
} from './state.js';
import type { StepEngine } from './steps.js';
import {
  PLATFORMS,
  type BriefField, type ChatRequest, type ChatResponse, type ConversationRecord, type Domain, type Intent,
  type Message, type Platform, type ScriptState, type SessionContext,
} from './types.js';

const ChatRequestSchema = z.object({
  message:         z.string().default(''),
  option_selected: z.string().nullish(),
  conversation_id: z.string().nullish(),
});

type ParsedRequest = z.output<typeof ChatRequestSchema>;

export interface OrchestratorDeps {
  store: ConversationStore;
  engine: StepEngine;
  mutex?: KeyedMutex;
  clock?: () => Date;
  defaultPlatform?: Platform;
}

/** Mutable working copy of a record for the duration of one turn. */
interface Turn {
  state: ScriptState;
  registry: OptionRegistry;
  session: SessionContext;
  log: Logger;
}

function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

function joinInstructions(...parts: Array<string | null | undefined>): string | null {
  const kept = parts.map((p) => p?.trim() ?? '').filter((p) => p.length > 0);
  return kept.length > 0 ? kept.join('\n') : null;
}

export class Orchestrator {
  private readonly store: ConversationStore;
  private readonly engine: StepEngine;
  private readonly mutex: KeyedMutex;
  private readonly clock: () => Date;
  private readonly defaultPlatform: Platform;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.engine = deps.engine;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.clock = deps.clock ?? (() => new Date());
    this.defaultPlatform = deps.defaultPlatform ?? env.DEFAULT_PLATFORM;
  }

  async handleChat(input: ChatRequest): Promise<ChatResponse> {
    const parsed = ChatRequestSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      logger.warn('rejected chat request', { issues });
      return { error: `Invalid chat request (${issues}).` };
    }
    const request = parsed.data;
    const id = request.conversation_id?.trim() || null;
    if (!id) return this.guarded(null, () => this.runTurn(null, request));
    return this.mutex.runExclusive(id, () => this.guarded(id, () => this.runTurn(id, request)));
  }

  private async guarded(id: string | null, fn: () => Promise<ChatResponse>): Promise<ChatResponse> {
    try {
      return await fn();
    } catch (err) {
      const log = id ? logger.child({ conversationId: id }) : logger;
      log.error('chat turn failed', { err });
      if (!(err instanceof ConversationNotFoundError)) {
        void telegram.error(`Chat turn failed${id ? ` (${id})` : ''}: ${err instanceof Error ? err.message : String(err)}`);
      }
      return id ? { error: describeError(err), conversation_id: id } : { error: describeError(err) };
    }
  }

  private async runTurn(id: string | null, request: ParsedRequest): Promise<ChatResponse> {
    const now = this.clock();
    const record = id ? await this.store.load(id) : null;
    if (id && !record) throw new ConversationNotFoundError(id);

    const base: ConversationRecord = record ?? {
      state: createScriptState(this.defaultPlatform, now),
      pending: null,
      session: emptySession(),
      option_sets: 0,
    };

    const turn: Turn = {
      state: base.state,
      registry: OptionRegistry.restore(base.pending, base.option_sets),
      session: { focus: base.session.focus, notes: [...base.session.notes] },
      log: logger.child({ conversationId: base.state.id }),
    };

    const routeCtx = { conversationExists: record !== null, pendingCount: turn.registry.size };
    const selected = request.option_selected?.trim();
    const intent: Intent = selected
      ? routeSelection(selected, turn.registry.current(), routeCtx)
      : route(request.message, routeCtx);

    turn.log.info('chat turn', { intent: intent.kind, pending: turn.registry.size });

    const reply = await this.dispatch(turn, intent, now);

    const next: ConversationRecord = {
      state: turn.state,
      pending: turn.registry.snapshot(),
      session: turn.session,
      option_sets: turn.registry.setsPresented,
    };
    const userText = request.message.trim() || selected || '';
    const timestamp = now.toISOString();
    const messages: Message[] = [
      { role: 'user', content: userText, timestamp },
      { role: 'assistant', content: reply, timestamp },
    ];
    await this.store.commit(next, messages);

    return {
      conversation_id: turn.state.id,
      response: reply,
      options: next.pending?.options ?? [],
    };
  }

  private async dispatch(turn: Turn, intent: Intent, now: Date): Promise<string> {
    // Selection-bearing intents manage the pending set themselves
    if (intent.kind !== 'select' && intent.kind !== 'more' && intent.kind !== 'free_text') {
      turn.registry.invalidate();
    }

    try {
      switch (intent.kind) {
        case 'start':     return this.start(turn);
        case 'command':   return await this.command(turn, intent.domain, intent.rest, now);
        case 'select':    return this.select(turn, intent.index, intent.optionId, now);
        case 'more':      return await this.more(turn, now);
        case 'edit':      return await this.edit(turn, intent.target, intent.raw, intent.rest, now);
        case 'setup':     return this.setup(turn, intent.field, intent.value, now);
        case 'status':    return statusText(turn.state);
        case 'export':    return exportReply(turn.state);
        case 'help':      return helpText();
        case 'free_text': return await this.freeText(turn, intent.text, now);
      }
    } catch (err) {
      if (!isRecoverable(err)) throw err;
      turn.log.warn('recovered', { intent: intent.kind, err });
      return this.recover(turn, err);
    }
  }

  private recover(turn: Turn, err: unknown): string {
    if (err instanceof IndexOutOfRangeError) {
      const pending = turn.registry.current();
      return pending ? outOfRangeText(pending) : noPendingText();
    }
    if (err instanceof EmptyGenerationError) return emptyGenerationText(err.domain);
    if (err instanceof NoPendingOptionsError) return noPendingText();
    return helpText();
  }

  // ─── Transitions ────────────────────────────────────────────────────────────

  private start(turn: Turn): string {
    turn.session = { focus: 'hook', notes: [] };
    return welcomeText(turn.state);
  }

  private async command(turn: Turn, domain: Domain, rest: string, now: Date): Promise<string> {
    const missing = missingPrerequisite(domain, turn.state);
    if (missing) {
      turn.session = { focus: missing, notes: turn.session.focus === missing ? turn.session.notes : [] };
      return prerequisiteText(domain, missing);
    }

    const notes = turn.session.focus === domain ? turn.session.notes : [];
    const instruction = joinInstructions(...notes, rest);
    const candidates = await this.engine.generate(domain, turn.state, instruction, { mode: 'create' });
    const pending = turn.registry.present(domain, candidates, { mode: 'create', instruction, now });

    turn.session = { focus: domain, notes: [] };
    return optionsText(pending, 'new');
  }

  private select(turn: Turn, index: number, optionId: string | undefined, now: Date): string {
    const selected = optionId ? turn.registry.resolveId(optionId) : turn.registry.resolve(index);
    const domain = selected.origin_step;

    turn.state = this.engine.merge(turn.state, {
      domain,
      mode: selected.mode,
      candidate: {
        label: selected.option.label,
        value: selected.option.value,
        description: selected.option.description || undefined,
        provider: selected.provider ?? undefined,
        model: selected.model ?? undefined,
      },
      instruction: selected.instruction,
      now,
    });

    const next = nextSuggestion(domain, turn.state);
    turn.session = { focus: next === 'export' ? null : next, notes: [] };
    turn.log.info('option merged', { domain, index: selected.index, mode: selected.mode, phase: turn.state.phase });
    return confirmationText(domain, selected.option, next);
  }

  private async more(turn: Turn, now: Date): Promise<string> {
    const pending = turn.registry.current();
    if (!pending) throw new NoPendingOptionsError();

    const candidates = await this.engine.generate(pending.origin_step, turn.state, pending.instruction, {
      mode: pending.mode,
      exclude: pending.shown,
    });
    const next = turn.registry.present(pending.origin_step, candidates, {
      mode: pending.mode,
      instruction: pending.instruction,
      previouslyShown: pending.shown,
      now,
    });
    return optionsText(next, 'more');
  }

  private async edit(turn: Turn, target: Domain | null, raw: string, rest: string, now: Date): Promise<string> {
    if (!target) return unknownEditTargetText(raw);
    if (!hasContent(turn.state[DOMAIN_RULES[target].field])) {
      turn.session = { focus: target, notes: [] };
      return nothingToEditText(target);
    }

    const instruction = joinInstructions(rest);
    const candidates = await this.engine.generate(target, turn.state, instruction, { mode: 'edit' });
    const pending = turn.registry.present(target, candidates, { mode: 'edit', instruction, now });
    turn.session = { focus: target, notes: [] };
    return optionsText(pending, 'edit');
  }

  private setup(turn: Turn, field: BriefField, value: string, now: Date): string {
    const ts = now.toISOString();
    switch (field) {
      case 'platform': {
        const platform = value.toLowerCase();
        if (!isPlatform(platform)) return invalidPlatformText(value);
        turn.state = { ...turn.state, platform, updated_at: ts };
        return setupText(field, platform);
      }
      case 'topic':
        turn.state = { ...turn.state, topic: value, title: titleForTopic(value), updated_at: ts };
        return setupText(field, value);
      case 'audience':
        turn.state = { ...turn.state, audience: value, updated_at: ts };
        return setupText(field, value);
      case 'duration':
        turn.state = { ...turn.state, duration: value, updated_at: ts };
        return setupText(field, value);
      case 'tone': {
        const max = CONVERSATION.maxToneSamples;
        const tone_samples = [...turn.state.tone_samples, value].slice(-max);
        turn.state = { ...turn.state, tone_samples, updated_at: ts };
        return toneSampleText(tone_samples.length, max);
      }
    }
  }

  private async freeText(turn: Turn, text: string, now: Date): Promise<string> {
    const pending = turn.registry.current();
    if (pending) {
      turn.registry.invalidate();
      const instruction = joinInstructions(pending.instruction, text);
      const candidates = await this.engine.generate(pending.origin_step, turn.state, instruction, { mode: pending.mode });
      const next = turn.registry.present(pending.origin_step, candidates, {
        mode: pending.mode,
        instruction,
        previouslyShown: pending.shown,
        now,
      });
      return optionsText(next, 'refined');
    }

    const suggested = suggestedStep(turn.state);
    const focus: Domain = turn.session.focus ?? (suggested === 'export' ? 'style' : suggested);
    const notes = turn.session.focus === focus ? [...turn.session.notes, text] : [text];
    turn.session = { focus, notes };
    return noteText(focus, notes.length);
  }
}
