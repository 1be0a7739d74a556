/**
 * Shape checks for records read back from storage. Stored JSON is parsed
 * through these schemas instead of being trusted.
 */
import { z } from 'zod';
import {
  DOMAINS, PHASES, PLATFORMS, type ConversationRecord, type ConversationSummary, type Message,
} from '../core/types.js';

const ScriptPartSchema = z.object({
  content:      z.string(),
  label:        z.string(),
  description:  z.string().nullable(),
  domain:       z.enum(DOMAINS),
  provider:     z.string().nullable(),
  model:        z.string().nullable(),
  instruction:  z.string().nullable(),
  iterations:   z.number().int().nonnegative(),
  generated_at: z.string(),
});

const ScriptStateSchema = z.object({
  id:             z.string(),
  title:          z.string(),
  platform:       z.enum(PLATFORMS),
  topic:          z.string().nullable(),
  audience:       z.string().nullable(),
  duration:       z.string().nullable(),
  phase:          z.enum(PHASES),
  status:         z.enum(['in_progress', 'complete']),
  hook:           ScriptPartSchema.nullable(),
  story:          ScriptPartSchema.nullable(),
  cta:            ScriptPartSchema.nullable(),
  review_notes:   ScriptPartSchema.nullable(),
  style_notes:    ScriptPartSchema.nullable(),
  research_notes: ScriptPartSchema.nullable(),
  tone_samples:   z.array(z.string()).default([]),
  created_at:     z.string(),
  updated_at:     z.string(),
});

const PendingOptionsSchema = z.object({
  options: z.array(z.object({
    id:          z.string(),
    label:       z.string(),
    value:       z.string(),
    description: z.string(),
  })).min(1),
  origin_step: z.enum(DOMAINS),
  mode:        z.enum(['create', 'edit']),
  instruction: z.string().nullable(),
  shown:       z.array(z.string()),
  sources:     z.array(z.object({ provider: z.string().nullable(), model: z.string().nullable() })),
  created_at:  z.string(),
});

export const ConversationRecordSchema = z.object({
  state:   ScriptStateSchema,
  pending: PendingOptionsSchema.nullable(),
  session: z.object({
    focus: z.enum(DOMAINS).nullable(),
    notes: z.array(z.string()),
  }),
  option_sets: z.number().int().nonnegative().default(0),
});

const SummarySchema = z.object({
  id:         z.string(),
  title:      z.string(),
  platform:   z.enum(PLATFORMS),
  status:     z.enum(['in_progress', 'complete']),
  updated_at: z.string(),
});

export const MessageSchema = z.object({
  role:      z.enum(['user', 'assistant']),
  content:   z.string(),
  timestamp: z.string(),
});

/** Parse a stored record; `source` names the row for the error message. */
export function parseRecord(raw: unknown, source: string): ConversationRecord {
  const json = typeof raw === 'string' ? JSON.parse(raw) : raw;
  const result = ConversationRecordSchema.safeParse(json);
  if (!result.success) {
    throw new Error(`Stored record ${source} is malformed: ${result.error.issues.map((i) => i.path.join('.')).join(', ')}`);
  }
  return result.data;
}

/** Parse the summary columns of a conversation row. */
export function parseSummary(raw: unknown): ConversationSummary {
  return SummarySchema.parse(raw);
}

export function parseMessage(raw: unknown): Message {
  return MessageSchema.parse(raw);
}
