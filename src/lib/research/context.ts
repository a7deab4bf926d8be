import type { Dispatcher } from 'undici';

import { loadConfig } from '../config.js';
import { PaperStore, type PdfExtractor } from '../papers/store.js';
import { createProvider, selectProvider, type ChatProvider } from '../providers/index.js';
import type { AppConfig, ProviderName } from '../types.js';

/**
 * Everything a research operation needs. Created once at startup; the paper
 * store inside is replaced wholesale on every folder load.
 */
export interface ResearchContext {
  config: AppConfig;
  provider: ChatProvider;
  store: PaperStore;
}

export interface CreateContextOptions {
  repoRoot: string;
  env: Record<string, string | undefined>;
  provider?: ProviderName;
  dispatcher?: Dispatcher;
  extractor?: PdfExtractor;
}

export function createResearchContext(opts: CreateContextOptions): ResearchContext {
  const config = loadConfig(opts.repoRoot);
  const selection = selectProvider(config, opts.env, opts.provider);
  return {
    config,
    provider: createProvider(selection, config, opts.dispatcher),
    store: new PaperStore({ maxPages: config.pdf.maxPages, extractor: opts.extractor }),
  };
}
