import type { Dispatcher } from 'undici';

import { MissingApiKeyError } from '../errors.js';
import type { AppConfig, ProviderName } from '../types.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';
import type { ChatProvider } from './types.js';

export type { ChatProvider, ProviderOptions } from './types.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAIProvider } from './openai.js';

export const API_KEY_ENV: Record<ProviderName, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

export const PROVIDER_LABELS: Record<ProviderName, string> = {
  anthropic: 'Claude (Anthropic)',
  openai: 'ChatGPT (OpenAI)',
};

export interface ProviderSelection {
  name: ProviderName;
  apiKey: string;
}

type Env = Record<string, string | undefined>;

/**
 * An explicit choice wins (CLI flag, then config.yml). Otherwise the first
 * provider with a key in the environment, Anthropic first.
 */
export function selectProvider(config: AppConfig, env: Env, override?: ProviderName): ProviderSelection {
  const chosen = override ?? config.provider;
  if (chosen) {
    const apiKey = env[API_KEY_ENV[chosen]]?.trim() ?? '';
    if (!apiKey) throw new MissingApiKeyError([API_KEY_ENV[chosen]]);
    return { name: chosen, apiKey };
  }

  for (const name of ['anthropic', 'openai'] as const) {
    const apiKey = env[API_KEY_ENV[name]]?.trim();
    if (apiKey) return { name, apiKey };
  }
  throw new MissingApiKeyError();
}

export function createProvider(selection: ProviderSelection, config: AppConfig, dispatcher?: Dispatcher): ChatProvider {
  const opts = {
    apiKey: selection.apiKey,
    settings: config.providers[selection.name],
    timeoutMs: config.request.timeoutMs,
    dispatcher,
  };
  return selection.name === 'anthropic' ? new AnthropicProvider(opts) : new OpenAIProvider(opts);
}
