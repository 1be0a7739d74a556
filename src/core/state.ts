/**
 * ScriptState construction and the per-domain rules table.
 */
import { randomUUID } from 'node:crypto';
import { CONVERSATION } from '../config.js';
import {
  DOMAINS, PHASES,
  type Domain, type PartField, type Phase, type Platform, type ScriptPart, type ScriptState,
  type ScriptStatus, type SessionContext,
} from './types.js';

// ─── Domain rules ─────────────────────────────────────────────────────────────

export interface DomainRule {
  /** Parts that must exist before this domain can generate. */
  requires: PartField[];
  /** Part an accepted candidate is written to. */
  field: PartField;
  /** Phase reached on a create-mode merge; null for advisory domains. */
  advancesTo: Phase | null;
  /** Parts read into the generation context. */
  reads: PartField[];
  title: string;
}

export const DOMAIN_RULES: Record<Domain, DomainRule> = {
  hook:     { requires: [],        field: 'hook',           advancesTo: 'hook_drafted',  reads: ['research_notes'],                    title: 'Hook' },
  story:    { requires: ['hook'],  field: 'story',          advancesTo: 'story_drafted', reads: ['hook', 'research_notes'],            title: 'Story' },
  cta:      { requires: ['story'], field: 'cta',            advancesTo: 'cta_drafted',   reads: ['hook', 'story'],                     title: 'Call to action' },
  review:   { requires: ['cta'],   field: 'review_notes',   advancesTo: 'reviewed',      reads: ['hook', 'story', 'cta'],              title: 'Review' },
  humanize: { requires: ['cta'],   field: 'style_notes',    advancesTo: 'humanized',     reads: ['hook', 'story', 'cta', 'review_notes'], title: 'Humanized script' },
  style:    { requires: ['cta'],   field: 'style_notes',    advancesTo: 'complete',      reads: ['hook', 'story', 'cta', 'style_notes'],  title: 'Style pass' },
  critique: { requires: ['hook'],  field: 'review_notes',   advancesTo: null,            reads: ['hook', 'story', 'cta'],              title: 'Critique' },
  research: { requires: [],        field: 'research_notes', advancesTo: null,            reads: [],                                    title: 'Research notes' },
};

const PART_DOMAIN: Record<PartField, Domain> = {
  hook: 'hook',
  story: 'story',
  cta: 'cta',
  review_notes: 'review',
  style_notes: 'style',
  research_notes: 'research',
};

/** Steps that rewrite the script in the creator's own voice. */
export const VOICE_DOMAINS: readonly Domain[] = ['humanize', 'style'];

export function isDomain(word: string): word is Domain {
  return (DOMAINS as readonly string[]).includes(word);
}

/** First missing prerequisite for `domain`, expressed as the domain that produces it. */
export function missingPrerequisite(domain: Domain, state: ScriptState): Domain | null {
  for (const field of DOMAIN_RULES[domain].requires) {
    if (!hasContent(state[field])) return PART_DOMAIN[field];
  }
  return null;
}

export function hasContent(part: ScriptPart | null): part is ScriptPart {
  return part !== null && part.content.trim().length > 0;
}

// ─── Phases ───────────────────────────────────────────────────────────────────

export function phaseRank(phase: Phase): number {
  return PHASES.indexOf(phase);
}

export function laterPhase(a: Phase, b: Phase): Phase {
  return phaseRank(a) >= phaseRank(b) ? a : b;
}

export function statusFor(phase: Phase): ScriptStatus {
  return phase === 'complete' ? 'complete' : 'in_progress';
}

const NEXT_STEP: Record<Domain, Domain | 'export'> = {
  research: 'hook',
  hook:     'story',
  story:    'cta',
  cta:      'review',
  review:   'humanize',
  critique: 'story',
  humanize: 'style',
  style:    'export',
};

/** Step suggested after accepting a candidate for `domain`, skipping parts already written. */
export function nextSuggestion(domain: Domain, state: ScriptState): Domain | 'export' {
  let next = NEXT_STEP[domain];
  const seen = new Set<string>();
  while (next !== 'export' && !seen.has(next)) {
    seen.add(next);
    const rule = DOMAIN_RULES[next];
    const alreadyDone = rule.advancesTo !== null && phaseRank(state.phase) >= phaseRank(rule.advancesTo);
    if (!alreadyDone) return next;
    next = NEXT_STEP[next];
  }
  return next;
}

const SCRIPT_ORDER: Domain[] = ['hook', 'story', 'cta', 'review', 'humanize', 'style'];

/** First step in script order whose phase has not been reached. */
export function suggestedStep(state: ScriptState): Domain | 'export' {
  return SCRIPT_ORDER.find((d) => {
    const target = DOMAIN_RULES[d].advancesTo;
    return target !== null && phaseRank(state.phase) < phaseRank(target);
  }) ?? 'export';
}

// ─── Construction ─────────────────────────────────────────────────────────────

export function createScriptState(platform: Platform, now = new Date()): ScriptState {
  const ts = now.toISOString();
  return {
    id: randomUUID(),
    title: CONVERSATION.defaultTitle,
    platform,
    topic: null,
    audience: null,
    duration: null,
    phase: 'empty',
    status: 'in_progress',
    hook: null,
    story: null,
    cta: null,
    review_notes: null,
    style_notes: null,
    research_notes: null,
    tone_samples: [],
    created_at: ts,
    updated_at: ts,
  };
}

export function emptySession(): SessionContext {
  return { focus: null, notes: [] };
}

export function titleForTopic(topic: string): string {
  const clipped = topic.length > CONVERSATION.titleTopicChars
    ? `${topic.slice(0, CONVERSATION.titleTopicChars).trimEnd()}...`
    : topic;
  return `Video Script: ${clipped}`;
}
