import { z } from 'zod';

import { AuthenticationError, ProviderResponseError } from '../errors.js';
import { endpointUrl, postJson } from './http.js';
import type { ChatProvider, ProviderOptions } from './types.js';

export const ANTHROPIC_VERSION = '2023-06-01';

export const WEB_SEARCH_TOOL = { type: 'web_search_20250305', name: 'web_search' } as const;

const MessagesResponseSchema = z.object({
  content: z.array(
    z
      .object({
        type: z.string(),
        text: z.string().optional(),
      })
      .passthrough()
  ),
});

/** Anthropic Messages API. Supports the hosted web search tool. */
export class AnthropicProvider implements ChatProvider {
  readonly name = 'anthropic' as const;
  readonly supportsWebSearch = true;

  constructor(private readonly opts: ProviderOptions) {}

  get model(): string {
    return this.opts.settings.model;
  }

  async sendChat(prompt: string, useWebSearch = false): Promise<string> {
    const { apiKey, settings, timeoutMs, dispatcher } = this.opts;
    if (!apiKey) throw new AuthenticationError(this.name, 'No Anthropic API key configured');

    const payload = {
      model: settings.model,
      max_tokens: settings.maxTokens,
      messages: [{ role: 'user', content: prompt }],
      ...(useWebSearch ? { tools: [WEB_SEARCH_TOOL] } : {}),
    };

    const json = await postJson(
      this.name,
      endpointUrl(settings.baseUrl, '/v1/messages'),
      { 'x-api-key': apiKey, 'anthropic-version': ANTHROPIC_VERSION },
      payload,
      { timeoutMs, dispatcher }
    );

    const parsed = MessagesResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderResponseError(this.name, `Unexpected response shape: ${parsed.error.message}`);
    }

    // With web search the reply interleaves tool blocks with text blocks
    const text = parsed.data.content
      .filter((b) => b.type === 'text')
      .map((b) => b.text ?? '')
      .join('');
    if (!text.trim()) throw new ProviderResponseError(this.name, 'Empty response from Anthropic');
    return text;
  }
}
