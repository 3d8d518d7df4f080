import { InvalidModelError } from '../errors.js';

export type Provider = 'openai' | 'anthropic';

export const MODELS: Record<Provider, { default: string; available: readonly string[] }> = {
  openai: {
    default: 'gpt-4.1-mini',
    available: ['gpt-4.1-mini', 'gpt-4.1-nano', 'gpt-4.1', 'gpt-4o-mini'],
  },
  anthropic: {
    default: 'claude-sonnet-4-6',
    available: ['claude-sonnet-4-6', 'claude-haiku-4-5-20251001'],
  },
};

/** Whitelisted model, or the provider default for anything else. */
export function resolveModel(provider: Provider, requested?: string): string {
  const { default: fallback, available } = MODELS[provider];
  return requested && available.includes(requested) ? requested : fallback;
}

/** For explicit user choices, where a silent fallback would hide a typo. */
export function assertModel(provider: Provider, model: string): string {
  if (!MODELS[provider].available.includes(model)) throw new InvalidModelError(model);
  return model;
}
