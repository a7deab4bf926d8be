import type { ProviderName } from './types.js';

// ─── Local failures ───────────────────────────────────────────────────────────

/** One PDF could not be read. Non-fatal during a folder load. */
export class ExtractionError extends Error {
  constructor(public readonly filePath: string, reason: string) {
    super(`Could not extract text from ${filePath}: ${reason}`);
    this.name = 'ExtractionError';
  }
}

export class DirectoryNotFoundError extends Error {
  constructor(public readonly directory: string) {
    super(`Folder not found: ${directory}`);
    this.name = 'DirectoryNotFoundError';
  }
}

export class EmptyStoreError extends Error {
  constructor() {
    super("No papers loaded. Use 'folder <path>' first.");
    this.name = 'EmptyStoreError';
  }
}

export class UnknownPaperError extends Error {
  constructor(public readonly paperId: string) {
    super(`Unknown paper: ${paperId}`);
    this.name = 'UnknownPaperError';
  }
}

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** The request text alone does not fit the prompt budget, even with no paper text. */
export class PromptTooLargeError extends Error {
  constructor(public readonly maxChars: number, public readonly requiredChars: number) {
    super(`Request needs at least ${requiredChars} characters but the prompt budget is ${maxChars}`);
    this.name = 'PromptTooLargeError';
  }
}

export class MissingApiKeyError extends Error {
  constructor(envVars: readonly string[] = ['ANTHROPIC_API_KEY', 'OPENAI_API_KEY']) {
    super(`No API key found. Set ${envVars.join(' or ')}.`);
    this.name = 'MissingApiKeyError';
  }
}

// ─── Provider failures ────────────────────────────────────────────────────────

export abstract class ChatError extends Error {
  constructor(
    public readonly provider: ProviderName,
    message: string,
    public readonly status: number | null = null
  ) {
    super(message);
  }
}

export class AuthenticationError extends ChatError {
  constructor(provider: ProviderName, message: string, status: number | null = null) {
    super(provider, message, status);
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends ChatError {
  constructor(provider: ProviderName, message: string, status: number | null = null) {
    super(provider, message, status);
    this.name = 'RateLimitError';
  }
}

export class NetworkError extends ChatError {
  constructor(provider: ProviderName, message: string) {
    super(provider, message, null);
    this.name = 'NetworkError';
  }
}

/** Any other non-2xx status, or a 2xx body that does not have the expected shape. */
export class ProviderResponseError extends ChatError {
  constructor(provider: ProviderName, message: string, status: number | null = null) {
    super(provider, message, status);
    this.name = 'ProviderResponseError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
