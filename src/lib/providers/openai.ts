import { z } from 'zod';

import { AuthenticationError, ProviderResponseError } from '../errors.js';
import { endpointUrl, postJson } from './http.js';
import type { ChatProvider, ProviderOptions } from './types.js';

const CompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }).passthrough(),
    })
  ),
});

/**
 * OpenAI Chat Completions API. No hosted web search here, so searches rely
 * on the model's training data.
 */
export class OpenAIProvider implements ChatProvider {
  readonly name = 'openai' as const;
  readonly supportsWebSearch = false;

  constructor(private readonly opts: ProviderOptions) {}

  get model(): string {
    return this.opts.settings.model;
  }

  // The web search flag is accepted and ignored
  async sendChat(prompt: string, _useWebSearch = false): Promise<string> {
    const { apiKey, settings, timeoutMs, dispatcher } = this.opts;
    if (!apiKey) throw new AuthenticationError(this.name, 'No OpenAI API key configured');

    const json = await postJson(
      this.name,
      endpointUrl(settings.baseUrl, '/v1/chat/completions'),
      { authorization: `Bearer ${apiKey}` },
      {
        model: settings.model,
        max_tokens: settings.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      },
      { timeoutMs, dispatcher }
    );

    const parsed = CompletionSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderResponseError(this.name, `Unexpected response shape: ${parsed.error.message}`);
    }
    const text = parsed.data.choices[0]?.message.content;
    if (!text) throw new ProviderResponseError(this.name, 'Empty response from OpenAI');
    return text;
  }
}
