import { z } from 'zod';
import { AnthropicCompletionClient } from './agent/anthropic.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, OpenAICompletionClient, type CompletionClient } from './agent/client.js';
import type { Provider } from './agent/models.js';
import { ConfigError } from './errors.js';
import type { DayDreamRule } from './mind/blender.js';

const EnvSchema = z.object({
  MINDLOOP_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  MINDLOOP_MODEL: z.string().optional(),
  MINDLOOP_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  MINDLOOP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  MINDLOOP_DAYDREAM: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((v) => v === 'true' || v === '1'),
  MINDLOOP_DAYDREAM_RULE: z.enum(['table', 'associative']).default('table'),
  MINDLOOP_ROOT: z.string().optional(),
});

export interface MindConfig {
  provider: Provider;
  apiKey: string;
  model?: string;
  baseUrl: string;
  timeoutMs: number;
  dayDream: boolean;
  dayDreamRule: DayDreamRule;
  dataRoot: string;
}

const KEY_VARIABLE: Record<Provider, 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

/**
 * Reads configuration from the environment. Entry points load `.env` via
 * `dotenv/config` before calling this. Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): MindConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }

  const vars = parsed.data;
  const provider = vars.MINDLOOP_PROVIDER;
  const keyName = KEY_VARIABLE[provider];
  const apiKey = vars[keyName];
  if (!apiKey) {
    throw new ConfigError(`${keyName} is required when MINDLOOP_PROVIDER=${provider}`);
  }

  return {
    provider,
    apiKey,
    model: vars.MINDLOOP_MODEL,
    baseUrl: vars.MINDLOOP_BASE_URL,
    timeoutMs: vars.MINDLOOP_TIMEOUT_MS,
    dayDream: vars.MINDLOOP_DAYDREAM,
    dayDreamRule: vars.MINDLOOP_DAYDREAM_RULE,
    dataRoot: vars.MINDLOOP_ROOT ?? cwd,
  };
}

export function createCompletionClient(config: MindConfig): CompletionClient {
  if (config.provider === 'anthropic') {
    return new AnthropicCompletionClient({
      apiKey: config.apiKey,
      model: config.model,
      timeoutMs: config.timeoutMs,
    });
  }
  return new OpenAICompletionClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    model: config.model,
    timeoutMs: config.timeoutMs,
  });
}
