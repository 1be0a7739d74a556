import type { ProviderRoute } from '../src/config.js';
import { buildPrompt, type Prompt } from '../src/ai/prompts.js';
import { RoutedGenerationProvider, isTransient } from '../src/ai/provider.js';
import { GenerationError } from '../src/core/errors.js';
import type { GenerationContext } from '../src/core/types.js';

const ROUTES: Record<'hook', ProviderRoute[]> = {
  hook: [
    { provider: 'anthropic', model: 'a-model', temperature: 0.5, maxTokens: 100 },
    { provider: 'openai',    model: 'o-model', temperature: 0.5, maxTokens: 100 },
  ],
};

const CONTEXT: GenerationContext = {
  domain: 'hook',
  platform: 'tiktok',
  topic: 'budget travel',
  audience: null,
  duration: null,
  count: 3,
  mode: 'create',
  script: {},
  current: null,
  instruction: 'keep it under 8 seconds',
  exclude: ['old hook'],
  tone_samples: [],
};

const JSON_REPLY = '[{"label":"A","value":"Alpha"}]';

function statusError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe('RoutedGenerationProvider', () => {
  it('uses the first enabled route and tags candidates with it', async () => {
    const anthropic = vi.fn(async (_route: ProviderRoute, _prompt: Prompt) => JSON_REPLY);
    const provider = new RoutedGenerationProvider({ routes: ROUTES, completers: { anthropic }, enabled: () => true });

    await expect(provider.generate('hook', CONTEXT)).resolves.toEqual([
      { label: 'A', value: 'Alpha', provider: 'anthropic', model: 'a-model' },
    ]);
    expect(anthropic).toHaveBeenCalledTimes(1);
    expect(anthropic.mock.calls[0]?.[0].model).toBe('a-model');
  });

  it('skips providers without credentials', async () => {
    const anthropic = vi.fn(async () => JSON_REPLY);
    const openai = vi.fn(async () => JSON_REPLY);
    const provider = new RoutedGenerationProvider({
      routes: ROUTES, completers: { anthropic, openai }, enabled: (p) => p === 'openai',
    });

    const [first] = await provider.generate('hook', CONTEXT);
    expect(first?.provider).toBe('openai');
    expect(anthropic).not.toHaveBeenCalled();
  });

  it('falls back to the next route on a transient failure', async () => {
    const anthropic = vi.fn(async (): Promise<string> => { throw statusError('overloaded', 529); });
    const openai = vi.fn(async () => JSON_REPLY);
    const provider = new RoutedGenerationProvider({ routes: ROUTES, completers: { anthropic, openai }, enabled: () => true });

    const [first] = await provider.generate('hook', CONTEXT);
    expect(first).toEqual({ label: 'A', value: 'Alpha', provider: 'openai', model: 'o-model' });
  });

  it('fails the step on a non-transient error without trying further routes', async () => {
    const anthropic = vi.fn(async (): Promise<string> => { throw statusError('invalid request', 400); });
    const openai = vi.fn(async () => JSON_REPLY);
    const provider = new RoutedGenerationProvider({ routes: ROUTES, completers: { anthropic, openai }, enabled: () => true });

    const err: unknown = await provider.generate('hook', CONTEXT).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toMatchObject({ reason: 'provider', domain: 'hook' });
    expect(openai).not.toHaveBeenCalled();
  });

  it('reports a network failure when the last route is down', async () => {
    const down = async (): Promise<string> => { throw new Error('fetch failed'); };
    const provider = new RoutedGenerationProvider({
      routes: ROUTES, completers: { anthropic: down, openai: down }, enabled: () => true,
    });
    await expect(provider.generate('hook', CONTEXT)).rejects.toMatchObject({ reason: 'network' });
  });

  it('reports unavailable when no route is enabled', async () => {
    const provider = new RoutedGenerationProvider({ routes: ROUTES, enabled: () => false });
    await expect(provider.generate('hook', CONTEXT)).rejects.toMatchObject({ reason: 'unavailable' });
    await expect(provider.generate('story', CONTEXT)).rejects.toMatchObject({ reason: 'unavailable' });
  });

  it('reports a timeout when the signal was aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const anthropic = async (): Promise<string> => { throw new Error('Request was aborted.'); };
    const provider = new RoutedGenerationProvider({ routes: ROUTES, completers: { anthropic }, enabled: () => true });
    await expect(provider.generate('hook', CONTEXT, controller.signal)).rejects.toMatchObject({ reason: 'timeout' });
  });
});

describe('isTransient', () => {
  it('recognises server, rate-limit and connection failures', () => {
    expect(isTransient(statusError('x', 503))).toBe(true);
    expect(isTransient(statusError('x', 429))).toBe(true);
    expect(isTransient(new Error('connect ECONNREFUSED 127.0.0.1:443'))).toBe(true);
    expect(isTransient(statusError('x', 401))).toBe(false);
    expect(isTransient('nope')).toBe(false);
  });
});

describe('buildPrompt', () => {
  it('asks for JSON and carries the brief, instructions and exclusions', () => {
    const prompt = buildPrompt(CONTEXT);
    expect(prompt.system).toContain('Reply with a JSON array only');
    const lines = prompt.user.split('\n');
    expect(lines).toContain('Platform: tiktok');
    expect(lines).toContain('Topic: budget travel');
    expect(lines).toContain('Creator instructions: keep it under 8 seconds');
    expect(lines).toContain('- old hook');
    expect(lines.at(-1)).toBe('Return exactly 3 options.');
    expect(prompt.user).not.toContain('Audience:');
  });

  it('includes the script so far and the value being reworked', () => {
    const prompt = buildPrompt({
      ...CONTEXT,
      domain: 'story',
      mode: 'edit',
      script: { hook: 'Ever missed a flight?' },
      current: 'Old story',
      instruction: null,
      exclude: [],
    });
    const lines = prompt.user.split('\n');
    expect(lines).toContain('Script so far:');
    expect(lines).toContain('## Hook');
    expect(lines).toContain('Ever missed a flight?');
    expect(lines).toContain('Rework this existing version instead of starting over:');
    expect(lines).toContain('Old story');
    expect(prompt.user).not.toContain('Creator instructions');
  });

  it('asks for voice matching when writing samples are present', () => {
    const prompt = buildPrompt({ ...CONTEXT, domain: 'style', tone_samples: ['ok so here is the thing', 'no fluff, ever'] });
    const lines = prompt.user.split('\n');
    expect(lines).toContain("Match the voice of these samples of the creator's own writing (word choice, rhythm, humour):");
    expect(lines).toContain('Sample 1: ok so here is the thing');
    expect(lines).toContain('Sample 2: no fluff, ever');
    expect(buildPrompt(CONTEXT).user).not.toContain('Match the voice');
  });
});
