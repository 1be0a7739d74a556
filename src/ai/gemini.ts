/**
 * Gemini text client.
 */
import { GoogleGenAI } from '@google/genai';
import { env, type ProviderRoute } from '../config.js';
import { logger } from '../utils/logger.js';
import type { Prompt } from './prompts.js';

let _gemini: GoogleGenAI | null = null;

function getGemini(): GoogleGenAI {
  if (!_gemini) _gemini = new GoogleGenAI({ apiKey: env.GEMINI_API_KEY });
  return _gemini;
}

export async function geminiComplete(route: ProviderRoute, prompt: Prompt, signal?: AbortSignal): Promise<string> {
  logger.debug('gemini.complete', { model: route.model });

  const res = await getGemini().models.generateContent({
    model: route.model,
    contents: prompt.user,
    config: {
      systemInstruction: prompt.system,
      temperature: route.temperature,
      maxOutputTokens: route.maxTokens,
      responseMimeType: 'application/json',
      abortSignal: signal,
    },
  });
  return res.text ?? '';
}

export function isGeminiTransient(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('status' in err)) return false;
  const { status } = err;
  return typeof status === 'number' && (status >= 500 || status === 429);
}
