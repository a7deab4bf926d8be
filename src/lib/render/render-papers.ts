import type { LoadReport } from '../papers/store.js';
import type { PromptInfo } from '../research/operations.js';
import type { PaperSummary } from '../types.js';

export function renderPaperList(papers: PaperSummary[]): string {
  if (papers.length === 0) return "No papers loaded. Use 'folder <path>' first.";
  const width = String(papers.length).length;
  const lines = ['Loaded papers:'];
  papers.forEach((p, i) => {
    const pages = p.pageCount === 1 ? '1 page' : `${p.pageCount} pages`;
    const title = p.title ? ` "${p.title}"` : '';
    const author = p.author ? ` by ${p.author}` : '';
    lines.push(`  ${String(i + 1).padStart(width)}. ${p.id} (${pages})${title}${author}`);
  });
  return lines.join('\n');
}

export function renderLoadReport(report: LoadReport): string {
  const lines = [`Loaded ${report.loaded} PDFs from ${report.directory}`];
  if (report.failures.length > 0) {
    lines.push(`Skipped ${report.failures.length} file(s):`);
    for (const f of report.failures) {
      lines.push(`  ${f.file}: ${f.message}`);
    }
  }
  return lines.join('\n');
}

/** Null when every paper went into the prompt in full. */
export function renderPromptWarning(info: PromptInfo): string | null {
  return info.warning ? `Warning: ${info.warning.message}` : null;
}
