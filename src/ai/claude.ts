/**
 * Anthropic text client. Providers are reached only through ai/provider.ts;
 * never import the SDK in core modules.
 */
import Anthropic from '@anthropic-ai/sdk';
import { env, type ProviderRoute } from '../config.js';
import { logger } from '../utils/logger.js';
import type { Prompt } from './prompts.js';

let _anthropic: Anthropic | null = null;

function getAnthropic(): Anthropic {
  if (!_anthropic) _anthropic = new Anthropic({ apiKey: env.ANTHROPIC_API_KEY, maxRetries: 0 });
  return _anthropic;
}

export async function claudeComplete(route: ProviderRoute, prompt: Prompt, signal?: AbortSignal): Promise<string> {
  logger.debug('claude.complete', { model: route.model, maxTokens: route.maxTokens });

  const res = await getAnthropic().messages.create({
    model: route.model,
    max_tokens: route.maxTokens,
    temperature: route.temperature,
    system: prompt.system,
    messages: [{ role: 'user', content: prompt.user }],
  }, { signal });

  logger.debug('claude.complete done', {
    inputTokens: res.usage.input_tokens,
    outputTokens: res.usage.output_tokens,
  });
  return res.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('\n');
}

export function isAnthropicTransient(err: unknown): boolean {
  if (err instanceof Anthropic.APIConnectionError) return true;
  return err instanceof Anthropic.APIError && err.status !== undefined && (err.status >= 500 || err.status === 429);
}
