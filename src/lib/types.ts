export type ProviderName = 'anthropic' | 'openai';

export const PROVIDER_NAMES: readonly ProviderName[] = ['anthropic', 'openai'];

export interface ProviderSettings {
  model: string;
  baseUrl: string;
  maxTokens: number;
}

export interface AppConfig {
  provider?: ProviderName;
  providers: Record<ProviderName, ProviderSettings>;
  request: {
    timeoutMs: number;
  };
  pdf: {
    maxPages: number;
  };
  prompt: {
    maxChars: number; // whole request
    maxPaperChars: number; // one paper's body
  };
  search: {
    minResults: number;
    maxResults: number;
  };
}

export interface Paper {
  id: string; // file name without .pdf
  pages: string[];
  text: string; // pages joined, derived
  path: string;
  pageCount: number;
  // From the PDF's document info, when set
  title?: string;
  author?: string;
}

export interface PaperSummary {
  id: string;
  pageCount: number;
  title?: string;
  author?: string;
}

export const VERDICTS = ['SUPPORTED', 'PARTIALLY SUPPORTED', 'NOT SUPPORTED'] as const;

export type Verdict = (typeof VERDICTS)[number];
