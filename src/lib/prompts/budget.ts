import { PromptTooLargeError } from '../errors.js';
import type { Paper } from '../types.js';

export const TRUNCATION_MARKER = '\n... [truncated]';

// Below this much room a paper is not worth sending
export const MIN_PAPER_CHARS = 200;

export interface PromptBudget {
  maxChars: number;
  maxPaperChars: number;
}

export interface PromptTooLargeWarning {
  kind: 'prompt-too-large';
  maxChars: number;
  dropped: string[];
  truncated: string[];
  message: string;
}

export interface AssembledPrompt {
  text: string;
  included: string[];
  dropped: string[];
  truncated: string[];
  /** Set whenever a paper was dropped or cut short */
  warning: PromptTooLargeWarning | null;
}

interface Block {
  id: string;
  body: string;
  truncated: boolean;
}

export function renderPaperBody(paper: Paper): string {
  return paper.pages
    .map((text, i) => ({ text, page: i + 1 }))
    .filter((p) => p.text.trim() !== '')
    .map((p) => `--- Page ${p.page} ---\n${p.text}`)
    .join('\n\n');
}

export function truncateTail(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) return { text, truncated: false };
  if (maxChars <= TRUNCATION_MARKER.length) {
    return { text: text.slice(0, maxChars), truncated: true };
  }
  const kept = text.slice(0, maxChars - TRUNCATION_MARKER.length).replace(/\s+$/g, '');
  return { text: kept + TRUNCATION_MARKER, truncated: true };
}

function renderBlock(id: string, body: string): string {
  return `=== ${id} ===\n${body}\n=== END ===`;
}

export function renderPaperSection(blocks: ReadonlyArray<{ id: string; body: string }>): string {
  return blocks.map((b) => renderBlock(b.id, b.body)).join('\n\n');
}

function warningFor(maxChars: number, dropped: string[], truncated: string[]): PromptTooLargeWarning | null {
  if (dropped.length === 0 && truncated.length === 0) return null;
  const parts: string[] = [];
  if (dropped.length > 0) parts.push(`left out ${dropped.join(', ')}`);
  if (truncated.length > 0) parts.push(`shortened ${truncated.join(', ')}`);
  return {
    kind: 'prompt-too-large',
    maxChars,
    dropped,
    truncated,
    message: `Not all paper text fits the ${maxChars}-character prompt budget: ${parts.join('; ')}.`,
  };
}

/**
 * Fit papers into a prompt of at most `budget.maxChars` characters.
 *
 * `compose` wraps the rendered paper section with the feature's instructions.
 * Each paper is cut at the tail to `maxPaperChars` first; if the prompt is
 * still too long, papers are dropped from the end of the list, and the last
 * remaining paper is cut to whatever room is left.
 */
export function assemblePrompt(
  papers: readonly Paper[],
  compose: (paperSection: string) => string,
  budget: PromptBudget
): AssembledPrompt {
  const blocks: Block[] = papers.map((p) => {
    const { text, truncated } = truncateTail(renderPaperBody(p), budget.maxPaperChars);
    return { id: p.id, body: text, truncated };
  });
  const dropped: string[] = [];

  const render = () => compose(renderPaperSection(blocks));
  let text = render();

  while (text.length > budget.maxChars && blocks.length > 1) {
    const last = blocks.pop();
    if (last) dropped.push(last.id);
    text = render();
  }

  const only = blocks[0];
  if (text.length > budget.maxChars && only && blocks.length === 1) {
    const envelope = compose(renderPaperSection([{ id: only.id, body: '' }])).length;
    const room = budget.maxChars - envelope;
    if (room < MIN_PAPER_CHARS) {
      throw new PromptTooLargeError(budget.maxChars, envelope + MIN_PAPER_CHARS);
    }
    const cut = truncateTail(only.body, room);
    blocks[0] = { id: only.id, body: cut.text, truncated: true };
    text = render();
  }

  if (text.length > budget.maxChars) {
    throw new PromptTooLargeError(budget.maxChars, text.length);
  }

  const truncated = blocks.filter((b) => b.truncated).map((b) => b.id);
  return {
    text,
    included: blocks.map((b) => b.id),
    dropped,
    truncated,
    warning: warningFor(budget.maxChars, dropped, truncated),
  };
}
