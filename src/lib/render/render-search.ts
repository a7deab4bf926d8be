/**
 * render-search: terminal rendering for online paper search results
 */

import type { FoundPaper } from '../interpret/search.js';
import type { SearchOutcome } from '../research/operations.js';

const RULE = '-'.repeat(70);
const MAX_AUTHORS = 3;

export function formatAuthors(authors: string[]): string {
  if (authors.length === 0) return 'Unknown';
  const shown = authors.slice(0, MAX_AUTHORS).join(', ');
  return authors.length > MAX_AUTHORS ? `${shown} et al.` : shown;
}

function formatPaper(p: FoundPaper, index: number): string[] {
  const lines: string[] = [];
  lines.push(`[${index + 1}] ${p.title}`);
  lines.push(`    Authors: ${formatAuthors(p.authors)}`);
  lines.push(`    Year: ${p.year ?? 'Unknown'}`);
  if (p.venue) lines.push(`    Venue: ${p.venue}`);
  lines.push('');
  lines.push(`    Summary: ${p.summary ?? 'N/A'}`);
  lines.push('');
  lines.push(`    Relevance: ${p.relevance ?? 'N/A'}`);
  if (p.link) {
    lines.push('');
    lines.push(`    Link: ${p.link}`);
  }
  return lines;
}

export function renderSearchResults(outcome: SearchOutcome): string {
  const { result } = outcome;
  if (result.kind === 'raw') {
    return `Could not parse results. Raw response:\n\n${result.text}`;
  }
  if (result.papers.length === 0) return 'No papers found.';

  const lines: string[] = [];
  lines.push(`Found ${result.papers.length} papers:`);
  lines.push('');
  result.papers.forEach((p, i) => {
    lines.push(...formatPaper(p, i));
    lines.push('');
    lines.push(RULE);
    lines.push('');
  });
  if (!outcome.webSearch) {
    lines.push('Note: this provider has no web search; results come from the model\'s training data.');
  }
  return lines.join('\n').trimEnd();
}
