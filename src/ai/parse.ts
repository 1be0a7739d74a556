/**
 * Candidate extraction from raw model output.
 *
 * Models are asked for a JSON array; fenced blocks, prose around the array
 * and bare strings are tolerated. When no JSON array is found the numbered
 * list fallback ("1. …", "Option 2: …") is used.
 */
import { z } from 'zod';
import type { Candidate } from '../core/types.js';

const LABEL_CHARS = 80;

const RawCandidate = z.union([
  z.string(),
  z.object({
    label:       z.string().optional(),
    title:       z.string().optional(),
    value:       z.string().optional(),
    text:        z.string().optional(),
    description: z.string().optional(),
  }),
]);

const RawCandidates = z.array(RawCandidate);

function labelFor(value: string): string {
  const firstLine = value.split('\n')[0]?.trim() ?? '';
  return firstLine.length > LABEL_CHARS ? `${firstLine.slice(0, LABEL_CHARS - 3).trimEnd()}...` : firstLine;
}

function toCandidate(raw: z.infer<typeof RawCandidate>): Candidate | null {
  if (typeof raw === 'string') {
    const value = raw.trim();
    return value ? { label: labelFor(value), value } : null;
  }
  const value = (raw.value ?? raw.text ?? raw.label ?? raw.title ?? '').trim();
  if (!value) return null;
  const label = (raw.label ?? raw.title ?? labelFor(value)).trim();
  const description = raw.description?.trim();
  return description ? { label, value, description } : { label, value };
}

function extractJsonArray(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const body = fenced?.[1] ?? text;
  const start = body.indexOf('[');
  const end = body.lastIndexOf(']');
  if (start < 0 || end <= start) return undefined;
  try {
    return JSON.parse(body.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

function parseNumberedList(text: string): Candidate[] {
  const items: string[] = [];
  let current: string[] | null = null;

  for (const line of text.split('\n')) {
    const head = /^\s*(?:\*\*)?(?:option\s+)?(\d+)[.):]\s*(?:\*\*)?\s*(.*)$/i.exec(line);
    if (head) {
      if (current) items.push(current.join('\n'));
      current = [head[2] ?? ''];
    } else if (current && line.trim()) {
      current.push(line.trim());
    }
  }
  if (current) items.push(current.join('\n'));

  return items
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((value) => ({ label: labelFor(value), value }));
}

export function parseCandidates(text: string): Candidate[] {
  const parsed = RawCandidates.safeParse(extractJsonArray(text));
  if (parsed.success) {
    return parsed.data.map(toCandidate).filter((c): c is Candidate => c !== null);
  }
  return parseNumberedList(text);
}
