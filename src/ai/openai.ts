/**
 * OpenAI-compatible chat client. DeepSeek is served through the same SDK
 * with its own base URL.
 */
import OpenAI from 'openai';
import { env, type ProviderRoute } from '../config.js';
import { logger } from '../utils/logger.js';
import type { Prompt } from './prompts.js';

const clients = new Map<'openai' | 'deepseek', OpenAI>();

function getClient(kind: 'openai' | 'deepseek'): OpenAI {
  let client = clients.get(kind);
  if (!client) {
    client = kind === 'openai'
      ? new OpenAI({ apiKey: env.OPENAI_API_KEY, maxRetries: 0 })
      : new OpenAI({ apiKey: env.DEEPSEEK_API_KEY, baseURL: env.DEEPSEEK_BASE_URL, maxRetries: 0 });
    clients.set(kind, client);
  }
  return client;
}

export async function openaiComplete(
  kind: 'openai' | 'deepseek',
  route: ProviderRoute,
  prompt: Prompt,
  signal?: AbortSignal,
): Promise<string> {
  logger.debug('openai.complete', { kind, model: route.model });

  const res = await getClient(kind).chat.completions.create({
    model: route.model,
    max_tokens: route.maxTokens,
    temperature: route.temperature,
    messages: [
      { role: 'system', content: prompt.system },
      { role: 'user', content: prompt.user },
    ],
  }, { signal });

  return res.choices[0]?.message?.content ?? '';
}

export function isOpenAITransient(err: unknown): boolean {
  if (err instanceof OpenAI.APIConnectionError) return true;
  return err instanceof OpenAI.APIError && err.status !== undefined && (err.status >= 500 || err.status === 429);
}
