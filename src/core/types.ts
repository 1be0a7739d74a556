/**
 * Conversation and script data model.
 */

// ─── Enums ────────────────────────────────────────────────────────────────────

export const PLATFORMS = ['youtube', 'tiktok', 'instagram', 'linkedin', 'generic'] as const;
export type Platform = typeof PLATFORMS[number];

/** Script-completion milestones, in order. */
export const PHASES = [
  'empty',
  'hook_drafted',
  'story_drafted',
  'cta_drafted',
  'reviewed',
  'humanized',
  'complete',
] as const;
export type Phase = typeof PHASES[number];

export type ScriptStatus = 'in_progress' | 'complete';

export const DOMAINS = [
  'hook',
  'story',
  'cta',
  'review',
  'humanize',
  'style',
  'critique',
  'research',
] as const;
export type Domain = typeof DOMAINS[number];

export type PartField = 'hook' | 'story' | 'cta' | 'review_notes' | 'style_notes' | 'research_notes';

/** Fields set by `<field> <value>`. `tone` appends a writing sample instead of replacing. */
export const BRIEF_FIELDS = ['topic', 'platform', 'audience', 'duration', 'tone'] as const;
export type BriefField = typeof BRIEF_FIELDS[number];

// ─── Script state ─────────────────────────────────────────────────────────────

/** An accepted candidate plus the metadata of the generation that produced it. */
export interface ScriptPart {
  content: string;
  label: string;
  description: string | null;
  domain: Domain;
  provider: string | null;
  model: string | null;
  instruction: string | null;
  iterations: number;
  generated_at: string;
}

export interface ScriptState {
  id: string;
  title: string;
  platform: Platform;
  topic: string | null;
  audience: string | null;
  duration: string | null;
  phase: Phase;
  status: ScriptStatus;
  hook: ScriptPart | null;
  story: ScriptPart | null;
  cta: ScriptPart | null;
  review_notes: ScriptPart | null;
  style_notes: ScriptPart | null;
  research_notes: ScriptPart | null;
  /** The user's own writing, used to match their voice in humanize and style passes. */
  tone_samples: string[];
  created_at: string;
  updated_at: string;
}

// ─── Generation ───────────────────────────────────────────────────────────────

/** One generated option for a domain, prior to user acceptance. */
export interface Candidate {
  label: string;
  value: string;
  description?: string;
  provider?: string;
  model?: string;
}

/** Everything a provider needs to produce candidates for one step. */
export interface GenerationContext {
  domain: Domain;
  platform: Platform;
  topic: string | null;
  audience: string | null;
  duration: string | null;
  count: number;
  mode: MergeMode;
  /** Relevant slices of the script, keyed by part name. */
  script: Partial<Record<PartField, string>>;
  /** The value being replaced, in edit mode. */
  current: string | null;
  instruction: string | null;
  exclude: string[];
  /** Writing samples to match; empty for steps that do not use them. */
  tone_samples: string[];
}

export interface GenerationProvider {
  generate(domain: Domain, context: GenerationContext, signal?: AbortSignal): Promise<Candidate[]>;
}

export type MergeMode = 'create' | 'edit';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface OptionItem {
  id: string;
  label: string;
  value: string;
  description: string;
}

export interface PendingOptions {
  options: OptionItem[];
  origin_step: Domain;
  mode: MergeMode;
  instruction: string | null;
  /** Every value shown for this step since the domain command was issued. */
  shown: string[];
  /** Provider metadata per option, parallel to `options`. */
  sources: Array<{ provider: string | null; model: string | null }>;
  created_at: string;
}

export interface SelectedOption {
  index: number;
  option: OptionItem;
  origin_step: Domain;
  mode: MergeMode;
  instruction: string | null;
  provider: string | null;
  model: string | null;
}

// ─── Conversation record ──────────────────────────────────────────────────────

export type Role = 'user' | 'assistant';

export interface Message {
  role: Role;
  content: string;
  timestamp: string;
}

export interface SessionContext {
  /** Domain the last assistant reply pointed the user to. */
  focus: Domain | null;
  /** Free text accumulated for `focus` since the last generation for it. */
  notes: string[];
}

/** The unit the store commits: state, pending option set and session context. */
export interface ConversationRecord {
  state: ScriptState;
  pending: PendingOptions | null;
  session: SessionContext;
  /** Option sets presented so far; numbers the ids of the next set. */
  option_sets: number;
}

export interface ConversationSummary {
  id: string;
  title: string;
  platform: Platform;
  status: ScriptStatus;
  updated_at: string;
}

// ─── Intents ──────────────────────────────────────────────────────────────────

export type Intent =
  | { kind: 'start' }
  | { kind: 'select'; index: number; optionId?: string }
  | { kind: 'more' }
  | { kind: 'command'; domain: Domain; rest: string }
  | { kind: 'edit'; target: Domain | null; raw: string; rest: string }
  | { kind: 'setup'; field: BriefField; value: string }
  | { kind: 'status' }
  | { kind: 'export' }
  | { kind: 'help' }
  | { kind: 'free_text'; text: string };

// ─── Transport contract ───────────────────────────────────────────────────────

export interface ChatRequest {
  message?: string;
  option_selected?: string | null;
  conversation_id?: string | null;
}

export interface ChatSuccess {
  conversation_id: string;
  response: string;
  options: OptionItem[];
}

export interface ChatFailure {
  error: string;
  conversation_id?: string;
}

export type ChatResponse = ChatSuccess | ChatFailure;
