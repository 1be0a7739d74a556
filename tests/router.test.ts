import { OptionRegistry } from '../src/core/options.js';
import { parseIndex, route, routeSelection } from '../src/core/router.js';
import { candidates } from './helpers.js';

const fresh = { conversationExists: false, pendingCount: 0 };
const idle = { conversationExists: true, pendingCount: 0 };
const picking = { conversationExists: true, pendingCount: 3 };

describe('route', () => {
  it('starts a conversation on empty input', () => {
    expect(route('', fresh)).toEqual({ kind: 'start' });
  });

  it('shows help on empty input for an existing conversation', () => {
    expect(route('   ', idle)).toEqual({ kind: 'help' });
  });

  it('selects an in-range index while options are pending', () => {
    expect(route('2', picking)).toEqual({ kind: 'select', index: 2 });
    expect(route(' 3 ', picking)).toEqual({ kind: 'select', index: 3 });
  });

  it('treats an out-of-range number as free text', () => {
    expect(route('4', picking)).toEqual({ kind: 'free_text', text: '4' });
    expect(route('0', picking)).toEqual({ kind: 'free_text', text: '0' });
  });

  it('treats a number as free text when nothing is pending', () => {
    expect(route('1', idle)).toEqual({ kind: 'free_text', text: '1' });
  });

  it('recognises more only while options are pending', () => {
    expect(route('MORE', picking)).toEqual({ kind: 'more' });
    expect(route('more', idle)).toEqual({ kind: 'free_text', text: 'more' });
  });

  it('parses domain commands with the rest of the line', () => {
    expect(route('Hook make it punchy', idle)).toEqual({ kind: 'command', domain: 'hook', rest: 'make it punchy' });
    expect(route('/story', idle)).toEqual({ kind: 'command', domain: 'story', rest: '' });
    expect(route('research', picking)).toEqual({ kind: 'command', domain: 'research', rest: '' });
  });

  it('routes read-only commands', () => {
    expect(route('status', idle)).toEqual({ kind: 'status' });
    expect(route('Export', idle)).toEqual({ kind: 'export' });
    expect(route('help me', idle)).toEqual({ kind: 'help' });
  });

  it('parses edit with known, unknown and missing targets', () => {
    expect(route('edit hook shorter please', idle)).toEqual({ kind: 'edit', target: 'hook', raw: 'hook', rest: 'shorter please' });
    expect(route('edit intro', idle)).toEqual({ kind: 'edit', target: null, raw: 'intro', rest: '' });
    expect(route('edit', idle)).toEqual({ kind: 'edit', target: null, raw: '', rest: '' });
  });

  it('parses brief setup only when a value follows', () => {
    expect(route('topic Morning routines', idle)).toEqual({ kind: 'setup', field: 'topic', value: 'Morning routines' });
    expect(route('platform TikTok', idle)).toEqual({ kind: 'setup', field: 'platform', value: 'TikTok' });
    expect(route('tone  honestly, just try it', idle)).toEqual({ kind: 'setup', field: 'tone', value: 'honestly, just try it' });
    expect(route('topic', idle)).toEqual({ kind: 'free_text', text: 'topic' });
  });

  it('falls back to free text', () => {
    expect(route('I want it to feel upbeat', idle)).toEqual({ kind: 'free_text', text: 'I want it to feel upbeat' });
  });
});

describe('parseIndex', () => {
  it('accepts plain digits only', () => {
    expect(parseIndex('2')).toBe(2);
    expect(parseIndex('02')).toBe(2);
    expect(parseIndex('2.5')).toBeNull();
    expect(parseIndex('+2')).toBeNull();
    expect(parseIndex('2a')).toBeNull();
    expect(parseIndex('')).toBeNull();
  });
});

describe('routeSelection', () => {
  const registry = OptionRegistry.restore(null);
  const pending = registry.present('hook', candidates('hook'), { mode: 'create', instruction: null });

  it('turns any integer into a selection so the registry can range-check it', () => {
    expect(routeSelection('2', pending, picking)).toEqual({ kind: 'select', index: 2 });
    expect(routeSelection('9', null, idle)).toEqual({ kind: 'select', index: 9 });
  });

  it('maps a pending option id to its position', () => {
    expect(routeSelection('hook-1-2', pending, picking)).toEqual({ kind: 'select', index: 2, optionId: 'hook-1-2' });
  });

  it('keeps stale option ids as selections', () => {
    expect(routeSelection('story-4-1', pending, picking)).toEqual({ kind: 'select', index: 1, optionId: 'story-4-1' });
    expect(routeSelection('hook-7-2', pending, picking)).toEqual({ kind: 'select', index: 2, optionId: 'hook-7-2' });
  });

  it('handles more and routes other text normally', () => {
    expect(routeSelection('more', pending, picking)).toEqual({ kind: 'more' });
    expect(routeSelection('status', pending, picking)).toEqual({ kind: 'status' });
  });
});
