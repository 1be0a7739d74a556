/**
 * StepEngine: one generic engine driven by DOMAIN_RULES.
 *
 * `generate` turns state into a provider context and returns candidates;
 * `merge` writes an accepted candidate into a new state. Neither persists.
 */
import { CONVERSATION } from '../config.js';
import { logger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { EmptyGenerationError, GenerationError } from './errors.js';
import { DOMAIN_RULES, VOICE_DOMAINS, hasContent, laterPhase, statusFor } from './state.js';
import type {
  Candidate, Domain, GenerationContext, GenerationProvider, MergeMode, PartField, ScriptState,
} from './types.js';

export interface GenerateOptions {
  mode?: MergeMode;
  exclude?: string[];
  count?: number;
}

export interface MergeInput {
  domain: Domain;
  mode: MergeMode;
  candidate: Candidate;
  instruction: string | null;
  now?: Date;
}

export interface StepEngineOptions {
  timeoutMs?: number;
  optionsPerStep?: number;
}

export class StepEngine {
  private readonly timeoutMs: number;
  private readonly optionsPerStep: number;

  constructor(private readonly provider: GenerationProvider, options: StepEngineOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? CONVERSATION.generationTimeout;
    this.optionsPerStep = options.optionsPerStep ?? CONVERSATION.optionsPerStep;
  }

  buildContext(domain: Domain, state: ScriptState, instruction: string | null, opts: GenerateOptions = {}): GenerationContext {
    const rule = DOMAIN_RULES[domain];
    const mode = opts.mode ?? 'create';
    const script: Partial<Record<PartField, string>> = {};
    for (const field of rule.reads) {
      const part = state[field];
      if (hasContent(part)) script[field] = part.content;
    }
    const target = state[rule.field];

    return {
      domain,
      platform: state.platform,
      topic: state.topic,
      audience: state.audience,
      duration: state.duration,
      count: opts.count ?? this.optionsPerStep,
      mode,
      script,
      current: mode === 'edit' && hasContent(target) ? target.content : null,
      instruction: instruction && instruction.trim() ? instruction.trim() : null,
      exclude: opts.exclude ?? [],
      tone_samples: VOICE_DOMAINS.includes(domain) ? [...state.tone_samples] : [],
    };
  }

  async generate(domain: Domain, state: ScriptState, instruction: string | null, opts: GenerateOptions = {}): Promise<Candidate[]> {
    const context = this.buildContext(domain, state, instruction, opts);

    let raw: Candidate[];
    try {
      raw = await withTimeout(this.timeoutMs, (signal) => this.provider.generate(domain, context, signal));
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new GenerationError(domain, 'timeout', `Generation for ${domain} exceeded ${err.timeoutMs}ms`, err);
      }
      if (err instanceof GenerationError) throw err;
      throw new GenerationError(domain, 'provider', err instanceof Error ? err.message : String(err), err);
    }

    const usable = raw.filter((c) => c.label.trim().length > 0 && c.value.trim().length > 0);
    if (usable.length < raw.length) {
      logger.warn('Dropped candidates without a label', { domain, dropped: raw.length - usable.length });
    }
    if (usable.length === 0) throw new EmptyGenerationError(domain);
    return usable;
  }

  merge(state: ScriptState, input: MergeInput): ScriptState {
    const rule = DOMAIN_RULES[input.domain];
    const previous = state[rule.field];
    const now = (input.now ?? new Date()).toISOString();

    const phase = input.mode === 'create' && rule.advancesTo
      ? laterPhase(state.phase, rule.advancesTo)
      : state.phase;

    const next: ScriptState = { ...state, phase, status: statusFor(phase), updated_at: now };
    next[rule.field] = {
      content: input.candidate.value,
      label: input.candidate.label,
      description: input.candidate.description ?? null,
      domain: input.domain,
      provider: input.candidate.provider ?? null,
      model: input.candidate.model ?? null,
      instruction: input.instruction,
      iterations: (previous?.iterations ?? 0) + 1,
      generated_at: now,
    };
    return next;
  }
}
