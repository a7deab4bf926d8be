import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import type { AppConfig } from './types.js';

const providerSettings = (model: string, baseUrl: string) =>
  z
    .object({
      model: z.string().min(1).default(model),
      baseUrl: z.string().url().default(baseUrl),
      maxTokens: z.number().int().min(1).max(64_000).default(4096),
    })
    .default({});

const AppConfigSchema = z.object({
  provider: z.enum(['anthropic', 'openai']).optional(),
  providers: z
    .object({
      anthropic: providerSettings('claude-sonnet-4-20250514', 'https://api.anthropic.com'),
      openai: providerSettings('gpt-4o', 'https://api.openai.com'),
    })
    .default({}),
  request: z
    .object({
      timeoutMs: z.number().int().min(1_000).default(120_000),
    })
    .default({}),
  pdf: z
    .object({
      maxPages: z.number().int().min(1).max(2_000).default(30),
    })
    .default({}),
  prompt: z
    .object({
      maxChars: z.number().int().min(1_000).default(400_000),
      maxPaperChars: z.number().int().min(100).default(50_000),
    })
    .default({}),
  search: z
    .object({
      minResults: z.number().int().min(1).max(20).default(5),
      maxResults: z.number().int().min(1).max(20).default(8),
    })
    .refine((s) => s.minResults <= s.maxResults, 'search.minResults must not exceed search.maxResults')
    .default({}),
});

export const CONFIG_FILE = 'config.yml';

export function loadYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return YAML.parse(raw);
}

export function parseConfig(raw: unknown): AppConfig {
  // An empty YAML document parses to null
  return AppConfigSchema.parse(raw ?? {});
}

/**
 * Load config.yml from the repo root. The file is optional: without it every
 * setting takes its default.
 */
export function loadConfig(repoRoot: string): AppConfig {
  const configPath = path.join(repoRoot, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    return parseConfig({});
  }
  return parseConfig(loadYamlFile(configPath));
}
