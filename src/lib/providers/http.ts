import { errors, request, type Dispatcher } from 'undici';
import { z } from 'zod';

import {
  AuthenticationError,
  NetworkError,
  ProviderResponseError,
  RateLimitError,
  errorMessage,
  type ChatError,
} from '../errors.js';
import type { ProviderName } from '../types.js';

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }).passthrough(),
});

export interface PostOptions {
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/** Join an API path onto a base URL, keeping any path prefix the base carries. */
export function endpointUrl(baseUrl: string, apiPath: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return new URL(apiPath.replace(/^\/+/, ''), base).toString();
}

/** Pull the provider's own error text out of a failed response body. */
export function providerErrorText(raw: string): string {
  const parsed = ErrorBodySchema.safeParse(tryParseJson(raw));
  return parsed.success ? parsed.data.error.message : raw.trim();
}

function tryParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export function errorForStatus(provider: ProviderName, status: number, raw: string): ChatError {
  const detail = providerErrorText(raw);
  const message = detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`;
  if (status === 401 || status === 403) return new AuthenticationError(provider, message, status);
  // 529 is Anthropic's "overloaded"
  if (status === 429 || status === 529) return new RateLimitError(provider, message, status);
  return new ProviderResponseError(provider, message, status);
}

function networkFailure(provider: ProviderName, err: unknown, timeoutMs: number): NetworkError {
  if (err instanceof errors.HeadersTimeoutError || err instanceof errors.BodyTimeoutError) {
    return new NetworkError(provider, `Request timed out after ${timeoutMs} ms`);
  }
  return new NetworkError(provider, errorMessage(err));
}

/**
 * POST a JSON payload and return the parsed JSON reply. Every failure comes
 * back as a ChatError subclass; nothing is retried.
 */
export async function postJson(
  provider: ProviderName,
  url: string,
  headers: Record<string, string>,
  payload: unknown,
  opts: PostOptions
): Promise<unknown> {
  let statusCode: number;
  let raw: string;
  try {
    const res = await request(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: JSON.stringify(payload),
      headersTimeout: opts.timeoutMs,
      bodyTimeout: opts.timeoutMs,
      dispatcher: opts.dispatcher,
    });
    statusCode = res.statusCode;
    raw = await res.body.text();
  } catch (err) {
    throw networkFailure(provider, err, opts.timeoutMs);
  }

  if (statusCode < 200 || statusCode >= 300) {
    throw errorForStatus(provider, statusCode, raw);
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new ProviderResponseError(provider, `Response was not JSON: ${raw.slice(0, 200)}`, statusCode);
  }
}
