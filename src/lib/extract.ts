import fs from 'node:fs/promises';
import { getDocument, VerbosityLevel } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { z } from 'zod';

import { ExtractionError, errorMessage } from './errors.js';
import { isPdfFileValid } from './pdf.js';

export const DEFAULT_MAX_PAGES = 30;

export interface ExtractedPdf {
  /** Text of the first `maxPages` pages; '' for a page without a text layer */
  pages: string[];
  pageCount: number;
  title?: string;
  author?: string;
}

export interface ExtractOptions {
  maxPages?: number;
}

const DocumentInfoSchema = z
  .object({
    Title: z.string().optional(),
    Author: z.string().optional(),
  })
  .passthrough();

function infoValue(s: string | undefined): string | undefined {
  const v = s?.replace(/\s+/g, ' ').trim();
  return v ? v : undefined;
}

function normalizePageText(s: string): string {
  return s
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
}

/**
 * Extract plain text from a PDF, one string per page. No OCR: scanned pages
 * come back empty.
 */
export async function extractPdfPages(pdfPath: string, opts: ExtractOptions = {}): Promise<ExtractedPdf> {
  const maxPages = opts.maxPages ?? DEFAULT_MAX_PAGES;

  if (!isPdfFileValid(pdfPath)) {
    throw new ExtractionError(pdfPath, 'missing %PDF- header or unreadable file');
  }

  let data: Uint8Array;
  try {
    const buf = await fs.readFile(pdfPath);
    // pdfjs refuses Node Buffers
    data = new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  } catch (err) {
    throw new ExtractionError(pdfPath, errorMessage(err));
  }

  const loadingTask = getDocument({
    data,
    isEvalSupported: false,
    disableFontFace: true,
    useSystemFonts: false,
    verbosity: VerbosityLevel.ERRORS,
  });

  try {
    const pdf = await loadingTask.promise.catch((err: unknown) => {
      throw new ExtractionError(pdfPath, errorMessage(err));
    });

    const pageCount = pdf.numPages;
    const pages: string[] = [];

    for (let i = 1; i <= Math.min(pageCount, maxPages); i++) {
      try {
        const page = await pdf.getPage(i);
        const content = await page.getTextContent();
        let raw = '';
        for (const item of content.items) {
          if (!('str' in item)) continue;
          raw += item.str;
          raw += item.hasEOL ? '\n' : ' ';
        }
        pages.push(normalizePageText(raw));
        page.cleanup();
      } catch {
        // Unreadable page: keep its slot so page numbers stay aligned
        pages.push('');
      }
    }

    // Missing or broken document info is not an extraction failure
    const meta = await pdf.getMetadata().catch(() => null);
    const info = DocumentInfoSchema.safeParse(meta?.info);
    if (!info.success) return { pages, pageCount };
    return { pages, pageCount, title: infoValue(info.data.Title), author: infoValue(info.data.Author) };
  } finally {
    await loadingTask.destroy();
  }
}
