import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { isPdfFileName, isPdfFileValid } from './pdf.js';

describe('isPdfFileName', () => {
  it('matches the extension case-insensitively', () => {
    expect(isPdfFileName('Smith2022.pdf')).toBe(true);
    expect(isPdfFileName('Smith2022.PDF')).toBe(true);
  });

  it('rejects other files', () => {
    expect(isPdfFileName('notes.txt')).toBe(false);
    expect(isPdfFileName('paper.pdf.bak')).toBe(false);
  });
});

describe('isPdfFileValid', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'research-agent-pdf-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('accepts a file starting with the PDF header', () => {
    const p = path.join(tmpDir, 'ok.pdf');
    fs.writeFileSync(p, '%PDF-1.4\n');
    expect(isPdfFileValid(p)).toBe(true);
  });

  it('rejects a file without the header', () => {
    const p = path.join(tmpDir, 'bad.pdf');
    fs.writeFileSync(p, '<html>not a pdf</html>');
    expect(isPdfFileValid(p)).toBe(false);
  });

  it('rejects a missing file', () => {
    expect(isPdfFileValid(path.join(tmpDir, 'missing.pdf'))).toBe(false);
  });
});
