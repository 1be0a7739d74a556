/**
 * Routed generation provider. Each domain has an ordered provider list in
 * PROVIDER_ROUTES; providers without credentials are skipped, and a transient
 * failure (5xx, 429, connection) falls through to the next entry. Anything
 * else fails the step.
 */
import { PROVIDER_ROUTES, providerEnabled, type ProviderName, type ProviderRoute } from '../config.js';
import { GenerationError } from '../core/errors.js';
import type { Candidate, Domain, GenerationContext, GenerationProvider } from '../core/types.js';
import { telegram } from '../monitoring/telegram.js';
import { logger } from '../utils/logger.js';
import { claudeComplete, isAnthropicTransient } from './claude.js';
import { geminiComplete, isGeminiTransient } from './gemini.js';
import { isOpenAITransient, openaiComplete } from './openai.js';
import { parseCandidates } from './parse.js';
import { buildPrompt, type Prompt } from './prompts.js';

export type Completer = (route: ProviderRoute, prompt: Prompt, signal?: AbortSignal) => Promise<string>;

const DEFAULT_COMPLETERS: Record<ProviderName, Completer> = {
  anthropic: claudeComplete,
  openai:    (route, prompt, signal) => openaiComplete('openai', route, prompt, signal),
  deepseek:  (route, prompt, signal) => openaiComplete('deepseek', route, prompt, signal),
  gemini:    geminiComplete,
};

export interface RoutedProviderOptions {
  routes?: Partial<Record<Domain, readonly ProviderRoute[]>>;
  completers?: Partial<Record<ProviderName, Completer>>;
  enabled?: (provider: ProviderName) => boolean;
}

function isConnError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.message.includes('ECONNREFUSED') ||
      err.message.includes('ECONNRESET') ||
      err.message.includes('fetch failed') ||
      err.message.includes('ETIMEDOUT'))
  );
}

export function isTransient(err: unknown): boolean {
  return isAnthropicTransient(err) || isOpenAITransient(err) || isGeminiTransient(err) || isConnError(err);
}

export class RoutedGenerationProvider implements GenerationProvider {
  private readonly routes: Partial<Record<Domain, readonly ProviderRoute[]>>;
  private readonly completers: Record<ProviderName, Completer>;
  private readonly enabled: (provider: ProviderName) => boolean;

  constructor(options: RoutedProviderOptions = {}) {
    this.routes = options.routes ?? PROVIDER_ROUTES;
    this.completers = { ...DEFAULT_COMPLETERS, ...options.completers };
    this.enabled = options.enabled ?? providerEnabled;
  }

  async generate(domain: Domain, context: GenerationContext, signal?: AbortSignal): Promise<Candidate[]> {
    const routes = (this.routes[domain] ?? []).filter((r) => this.enabled(r.provider));
    if (routes.length === 0) {
      throw new GenerationError(domain, 'unavailable', `No provider configured for ${domain}`);
    }

    const prompt = buildPrompt(context);

    for (const [i, route] of routes.entries()) {
      const isLast = i === routes.length - 1;
      try {
        const text = await this.completers[route.provider](route, prompt, signal);
        return parseCandidates(text).map((c) => ({ ...c, provider: route.provider, model: route.model }));
      } catch (err) {
        if (signal?.aborted) {
          throw new GenerationError(domain, 'timeout', `${route.provider} call for ${domain} was aborted`, err);
        }
        if (isTransient(err) && !isLast) {
          const next = routes[i + 1]?.provider ?? 'next provider';
          logger.warn(`${route.provider} unavailable, falling back to ${next}`, { domain, model: route.model, err });
          void telegram.alert(`${route.provider} unavailable for ${domain}, using ${next} fallback.`);
          continue;
        }
        throw new GenerationError(
          domain,
          isTransient(err) ? 'network' : 'provider',
          `${route.provider} failed for ${domain}: ${err instanceof Error ? err.message : String(err)}`,
          err,
        );
      }
    }

    // Loop always returns or throws on the last route
    throw new GenerationError(domain, 'unavailable', `No provider answered for ${domain}`);
  }
}
