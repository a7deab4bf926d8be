import fs from 'node:fs';
import path from 'node:path';

import { DirectoryNotFoundError, UnknownPaperError, errorMessage } from '../errors.js';
import { extractPdfPages, type ExtractedPdf, type ExtractOptions } from '../extract.js';
import { isPdfFileName } from '../pdf.js';
import type { Paper, PaperSummary } from '../types.js';

export type PdfExtractor = (pdfPath: string, opts: ExtractOptions) => Promise<ExtractedPdf>;

export interface LoadFailure {
  file: string;
  message: string;
}

export interface LoadReport {
  directory: string;
  loaded: number;
  failures: LoadFailure[];
}

export interface PaperStoreOptions {
  maxPages?: number;
  extractor?: PdfExtractor;
}

interface Snapshot {
  directory: string | null;
  papers: ReadonlyMap<string, Paper>;
}

const EMPTY: Snapshot = { directory: null, papers: new Map() };

function paperIdFor(fileName: string, taken: Set<string>): string {
  const base = fileName.replace(/\.pdf$/i, '');
  let id = base;
  for (let n = 2; taken.has(id); n++) {
    id = `${base} (${n})`;
  }
  return id;
}

/** PDF files directly inside `dir`, sorted by name. */
export function listPdfFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && isPdfFileName(e.name))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * In-memory set of loaded papers.
 *
 * A load builds a complete new snapshot and swaps it in with one assignment,
 * so readers see either the old set or the new one. Loads are serialized.
 */
export class PaperStore {
  private snapshot: Snapshot = EMPTY;
  private loading: Promise<unknown> = Promise.resolve();
  private readonly maxPages: number | undefined;
  private readonly extractor: PdfExtractor;

  constructor(opts: PaperStoreOptions = {}) {
    this.maxPages = opts.maxPages;
    this.extractor = opts.extractor ?? extractPdfPages;
  }

  get directory(): string | null {
    return this.snapshot.directory;
  }

  get size(): number {
    return this.snapshot.papers.size;
  }

  loadFolder(dir: string): Promise<LoadReport> {
    const run = this.loading.then(() => this.scan(dir));
    // Keep the chain alive after a failed load; the caller still gets the rejection
    this.loading = run.catch(() => undefined);
    return run;
  }

  listPapers(): PaperSummary[] {
    return [...this.snapshot.papers.values()].map((p) => ({
      id: p.id,
      pageCount: p.pageCount,
      title: p.title,
      author: p.author,
    }));
  }

  /**
   * All papers in store order, or the given subset in the caller's order.
   */
  getPapers(ids?: readonly string[]): Paper[] {
    const { papers } = this.snapshot;
    if (!ids) return [...papers.values()];
    return ids.map((id) => {
      const paper = papers.get(id);
      if (!paper) throw new UnknownPaperError(id);
      return paper;
    });
  }

  private async scan(dir: string): Promise<LoadReport> {
    const directory = path.resolve(dir);
    const stat = fs.statSync(directory, { throwIfNoEntry: false });
    if (!stat?.isDirectory()) throw new DirectoryNotFoundError(dir);

    const papers = new Map<string, Paper>();
    const failures: LoadFailure[] = [];
    const taken = new Set<string>();

    for (const fileName of listPdfFiles(directory)) {
      const filePath = path.join(directory, fileName);
      try {
        const { pages, pageCount, title, author } = await this.extractor(filePath, { maxPages: this.maxPages });
        const id = paperIdFor(fileName, taken);
        taken.add(id);
        papers.set(id, { id, pages, text: pages.join('\n\n'), path: filePath, pageCount, title, author });
      } catch (err) {
        failures.push({ file: fileName, message: errorMessage(err) });
      }
    }

    this.snapshot = { directory, papers };
    return { directory, loaded: papers.size, failures };
  }
}
