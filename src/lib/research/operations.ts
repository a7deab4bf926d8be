import { EmptyStoreError, InvalidInputError } from '../errors.js';
import { interpretAnalysis } from '../interpret/analysis.js';
import { interpretSearch, type SearchInterpretation } from '../interpret/search.js';
import { interpretVerification, type VerificationInterpretation } from '../interpret/verify.js';
import type { LoadReport } from '../papers/store.js';
import type { AssembledPrompt } from '../prompts/budget.js';
import { DEFAULT_VERIFY_INSTRUCTION, buildAnalysisPrompt, buildSearchPrompt, buildVerifyPrompt } from '../prompts/build.js';
import type { Paper, PaperSummary } from '../types.js';
import type { ResearchContext } from './context.js';

export type PromptInfo = Omit<AssembledPrompt, 'text'>;

export interface SearchOutcome {
  query: string;
  webSearch: boolean;
  result: SearchInterpretation;
}

export interface AnalysisOutcome {
  question: string;
  answer: string;
  prompt: PromptInfo;
}

export interface VerificationOutcome {
  paragraph: string;
  instruction: string;
  result: VerificationInterpretation;
  prompt: PromptInfo;
}

function promptInfo(p: AssembledPrompt): PromptInfo {
  return { included: p.included, dropped: p.dropped, truncated: p.truncated, warning: p.warning };
}

function requirePapers(ctx: ResearchContext, ids?: readonly string[]): Paper[] {
  if (ctx.store.size === 0) throw new EmptyStoreError();
  return ctx.store.getPapers(ids && ids.length > 0 ? ids : undefined);
}

function budgetOf(ctx: ResearchContext) {
  return { maxChars: ctx.config.prompt.maxChars, maxPaperChars: ctx.config.prompt.maxPaperChars };
}

export function loadFolder(ctx: ResearchContext, dir: string): Promise<LoadReport> {
  return ctx.store.loadFolder(dir);
}

export function listPapers(ctx: ResearchContext): PaperSummary[] {
  return ctx.store.listPapers();
}

/** Search academic sources online; web search is used when the provider has it. */
export async function findPapers(ctx: ResearchContext, query: string): Promise<SearchOutcome> {
  if (!query.trim()) throw new InvalidInputError('Usage: find <query>');
  const prompt = buildSearchPrompt(query, ctx.config.search);
  const webSearch = ctx.provider.supportsWebSearch;
  const reply = await ctx.provider.sendChat(prompt, webSearch);
  return { query: query.trim(), webSearch, result: interpretSearch(reply) };
}

export async function analyzePapers(
  ctx: ResearchContext,
  question: string,
  ids?: readonly string[]
): Promise<AnalysisOutcome> {
  if (!question.trim()) throw new InvalidInputError('Usage: analyze <question>');
  const papers = requirePapers(ctx, ids);
  const assembled = buildAnalysisPrompt(question, papers, budgetOf(ctx));
  const reply = await ctx.provider.sendChat(assembled.text, false);
  return { question: question.trim(), answer: interpretAnalysis(reply), prompt: promptInfo(assembled) };
}

export async function verifyCitations(
  ctx: ResearchContext,
  paragraph: string,
  instruction = DEFAULT_VERIFY_INSTRUCTION,
  ids?: readonly string[]
): Promise<VerificationOutcome> {
  if (!paragraph.trim()) throw new InvalidInputError('Paste a paragraph to verify');
  const papers = requirePapers(ctx, ids);
  const task = instruction.trim() || DEFAULT_VERIFY_INSTRUCTION;
  const assembled = buildVerifyPrompt(paragraph, task, papers, budgetOf(ctx));
  const reply = await ctx.provider.sendChat(assembled.text, false);
  return {
    paragraph: paragraph.trim(),
    instruction: task,
    result: interpretVerification(reply),
    prompt: promptInfo(assembled),
  };
}
