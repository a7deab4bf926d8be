import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { extractPdfPages } from './extract.js';
import { ExtractionError } from './errors.js';
import { writePdf } from './testing/pdf-fixture.js';

describe('extractPdfPages', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'research-agent-extract-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns one text per page and the page count', async () => {
    const p = path.join(tmpDir, 'Smith2022.pdf');
    writePdf(p, ['Oxygen penetration depths measured between 1.8 and 5.2 mm', 'Methods section']);

    const result = await extractPdfPages(p);

    expect(result.pageCount).toBe(2);
    expect(result.pages).toEqual(['Oxygen penetration depths measured between 1.8 and 5.2 mm', 'Methods section']);
  });

  it('reads title and author from the document info', async () => {
    const p = path.join(tmpDir, 'Jones2019.pdf');
    writePdf(p, ['Body'], { title: 'Sediment  oxygen dynamics', author: 'A. Jones' });

    const result = await extractPdfPages(p);

    expect(result.title).toBe('Sediment oxygen dynamics');
    expect(result.author).toBe('A. Jones');
  });

  it('leaves title and author unset without document info', async () => {
    const p = path.join(tmpDir, 'plain.pdf');
    writePdf(p, ['Body']);

    const result = await extractPdfPages(p);

    expect(result.title).toBeUndefined();
    expect(result.author).toBeUndefined();
  });

  it('gives an empty string for a page without text', async () => {
    const p = path.join(tmpDir, 'scan.pdf');
    writePdf(p, ['', 'Second page']);

    const result = await extractPdfPages(p);

    expect(result.pages).toEqual(['', 'Second page']);
  });

  it('reads at most maxPages pages but reports the full count', async () => {
    const p = path.join(tmpDir, 'long.pdf');
    writePdf(p, ['one', 'two', 'three']);

    const result = await extractPdfPages(p, { maxPages: 2 });

    expect(result.pageCount).toBe(3);
    expect(result.pages).toEqual(['one', 'two']);
  });

  it('throws ExtractionError for a file that is not a PDF', async () => {
    const p = path.join(tmpDir, 'fake.pdf');
    fs.writeFileSync(p, 'plain text pretending to be a pdf');

    await expect(extractPdfPages(p)).rejects.toBeInstanceOf(ExtractionError);
  });

  it('throws ExtractionError for a corrupt PDF body', async () => {
    const p = path.join(tmpDir, 'corrupt.pdf');
    fs.writeFileSync(p, '%PDF-1.4\nthis is not a pdf body at all');

    await expect(extractPdfPages(p)).rejects.toBeInstanceOf(ExtractionError);
  });

  it('throws ExtractionError for a missing file', async () => {
    await expect(extractPdfPages(path.join(tmpDir, 'missing.pdf'))).rejects.toBeInstanceOf(ExtractionError);
  });
});
