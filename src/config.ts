import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const optionalKey = z.string().min(1).optional();

const EnvSchema = z.object({
  // AI / Generation (at least one provider key must be set)
  ANTHROPIC_API_KEY:       optionalKey,
  OPENAI_API_KEY:          optionalKey,
  DEEPSEEK_API_KEY:        optionalKey,
  GEMINI_API_KEY:          optionalKey,
  DEEPSEEK_BASE_URL:       z.string().url().default('https://api.deepseek.com'),

  // Persistence
  STORE_DRIVER:            z.enum(['sqlite', 'supabase']).default('sqlite'),
  SQLITE_PATH:             z.string().default(`${process.env['HOME'] ?? '/tmp'}/.reelwright/conversations.db`),
  SUPABASE_URL:            z.string().url().optional(),
  SUPABASE_SERVICE_KEY:    optionalKey,

  // Notifications
  TELEGRAM_BOT_TOKEN:      optionalKey,
  TELEGRAM_CHAT_ID:        optionalKey,

  // Conversation behaviour
  DEFAULT_PLATFORM:        z.enum(['youtube', 'tiktok', 'instagram', 'linkedin', 'generic']).default('generic'),
  GENERATION_TIMEOUT_MS:   z.coerce.number().int().positive().default(60_000),
  OPTIONS_PER_STEP:        z.coerce.number().int().min(1).max(9).default(3),

  // Logging
  LOG_LEVEL:               z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:              z.enum(['text', 'json']).default('text'),
})
  .refine(
    (e) => Boolean(e.ANTHROPIC_API_KEY || e.OPENAI_API_KEY || e.DEEPSEEK_API_KEY || e.GEMINI_API_KEY),
    { message: 'at least one provider key is required', path: ['ANTHROPIC_API_KEY'] },
  )
  .refine(
    (e) => e.STORE_DRIVER !== 'supabase' || Boolean(e.SUPABASE_URL && e.SUPABASE_SERVICE_KEY),
    { message: 'supabase driver needs SUPABASE_URL and SUPABASE_SERVICE_KEY', path: ['SUPABASE_URL'] },
  );

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

// ── Providers ─────────────────────────────────────────────────────────────────

export type ProviderName = 'anthropic' | 'openai' | 'deepseek' | 'gemini';

export interface ProviderRoute {
  provider: ProviderName;
  model: string;
  temperature: number;
  maxTokens: number;
}

/** Whether a provider has credentials in this environment. */
export function providerEnabled(provider: ProviderName): boolean {
  switch (provider) {
    case 'anthropic': return Boolean(env.ANTHROPIC_API_KEY);
    case 'openai':    return Boolean(env.OPENAI_API_KEY);
    case 'deepseek':  return Boolean(env.DEEPSEEK_API_KEY);
    case 'gemini':    return Boolean(env.GEMINI_API_KEY);
  }
}

// Domain → ordered list of acceptable providers. The first enabled entry is
// tried first; later entries are fallbacks on provider outage.
export const PROVIDER_ROUTES = {
  hook: [
    { provider: 'anthropic', model: 'claude-sonnet-4-5',     temperature: 0.8, maxTokens: 2048 },
    { provider: 'gemini',    model: 'gemini-2.5-pro',        temperature: 0.8, maxTokens: 2048 },
    { provider: 'openai',    model: 'gpt-4o',                temperature: 0.8, maxTokens: 2048 },
  ],
  story: [
    { provider: 'anthropic', model: 'claude-sonnet-4-5',     temperature: 0.7, maxTokens: 4096 },
    { provider: 'openai',    model: 'gpt-4o',                temperature: 0.7, maxTokens: 4096 },
    { provider: 'gemini',    model: 'gemini-2.5-pro',        temperature: 0.7, maxTokens: 4096 },
  ],
  cta: [
    { provider: 'openai',    model: 'gpt-4o',                temperature: 0.6, maxTokens: 1024 },
    { provider: 'anthropic', model: 'claude-sonnet-4-5',     temperature: 0.6, maxTokens: 1024 },
    { provider: 'deepseek',  model: 'deepseek-chat',         temperature: 0.6, maxTokens: 1024 },
  ],
  review: [
    { provider: 'anthropic', model: 'claude-sonnet-4-5',     temperature: 0.4, maxTokens: 2048 },
    { provider: 'openai',    model: 'gpt-4o',                temperature: 0.4, maxTokens: 2048 },
  ],
  humanize: [
    { provider: 'anthropic', model: 'claude-haiku-4-5',      temperature: 0.7, maxTokens: 2048 },
    { provider: 'gemini',    model: 'gemini-2.5-flash',      temperature: 0.7, maxTokens: 2048 },
    { provider: 'openai',    model: 'gpt-4o-mini',           temperature: 0.7, maxTokens: 2048 },
  ],
  style: [
    { provider: 'anthropic', model: 'claude-sonnet-4-5',     temperature: 0.7, maxTokens: 2048 },
    { provider: 'gemini',    model: 'gemini-2.5-pro',        temperature: 0.7, maxTokens: 2048 },
  ],
  critique: [
    { provider: 'deepseek',  model: 'deepseek-reasoner',     temperature: 0.5, maxTokens: 2048 },
    { provider: 'anthropic', model: 'claude-sonnet-4-5',     temperature: 0.5, maxTokens: 2048 },
    { provider: 'openai',    model: 'gpt-4o',                temperature: 0.5, maxTokens: 2048 },
  ],
  research: [
    { provider: 'gemini',    model: 'gemini-2.5-flash',      temperature: 0.1, maxTokens: 4096 },
    { provider: 'anthropic', model: 'claude-haiku-4-5',      temperature: 0.1, maxTokens: 4096 },
    { provider: 'openai',    model: 'gpt-4o-mini',           temperature: 0.1, maxTokens: 4096 },
  ],
} as const satisfies Record<string, readonly ProviderRoute[]>;

// ── Conversation ──────────────────────────────────────────────────────────────

export const CONVERSATION = {
  optionsPerStep:     env.OPTIONS_PER_STEP,
  generationTimeout:  env.GENERATION_TIMEOUT_MS,
  defaultTitle:       'New Video Script Project',
  titleTopicChars:    40,
  listLimit:          50,
  maxToneSamples:     5,
} as const;
