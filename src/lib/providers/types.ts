import type { Dispatcher } from 'undici';
import type { ProviderName, ProviderSettings } from '../types.js';

/**
 * One stateless chat exchange: a prompt goes out, the reply text comes back.
 */
export interface ChatProvider {
  readonly name: ProviderName;
  readonly model: string;
  /** Whether the provider can run a hosted web search for the request */
  readonly supportsWebSearch: boolean;
  sendChat(prompt: string, useWebSearch?: boolean): Promise<string>;
}

export interface ProviderOptions {
  apiKey: string;
  settings: ProviderSettings;
  timeoutMs: number;
  /** Tests route requests through an undici MockAgent */
  dispatcher?: Dispatcher;
}
