import { describe, expect, it } from 'vitest';

import { renderLoadReport, renderPaperList, renderPromptWarning } from './render-papers.js';
import { formatAuthors, renderSearchResults } from './render-search.js';
import { renderVerification } from './render-verify.js';

describe('renderSearchResults', () => {
  it('renders each paper with its fields', () => {
    const text = renderSearchResults({
      query: 'q',
      webSearch: true,
      result: {
        kind: 'papers',
        papers: [
          {
            title: 'Oxygen dynamics',
            authors: ['A', 'B', 'C', 'D'],
            year: '2020',
            venue: 'Limnology',
            summary: 'Sum.',
            relevance: 'High',
            link: 'https://example.org/x',
          },
        ],
      },
    });

    expect(text).toBe(
      [
        'Found 1 papers:',
        '',
        '[1] Oxygen dynamics',
        '    Authors: A, B, C et al.',
        '    Year: 2020',
        '    Venue: Limnology',
        '',
        '    Summary: Sum.',
        '',
        '    Relevance: High',
        '',
        '    Link: https://example.org/x',
        '',
        '-'.repeat(70),
      ].join('\n')
    );
  });

  it('notes when results come without web search', () => {
    const text = renderSearchResults({
      query: 'q',
      webSearch: false,
      result: { kind: 'papers', papers: [{ title: 'T', authors: [], year: null, venue: null, summary: null, relevance: null, link: null }] },
    });
    expect(text.split('\n').at(-1)).toBe("Note: this provider has no web search; results come from the model's training data.");
  });

  it('says when nothing was found', () => {
    expect(renderSearchResults({ query: 'q', webSearch: true, result: { kind: 'papers', papers: [] } })).toBe('No papers found.');
  });

  it('shows the raw reply on fallback', () => {
    expect(renderSearchResults({ query: 'q', webSearch: true, result: { kind: 'raw', text: 'free text' } })).toBe(
      'Could not parse results. Raw response:\n\nfree text'
    );
  });
});

describe('formatAuthors', () => {
  it('handles short and empty lists', () => {
    expect(formatAuthors(['A', 'B'])).toBe('A, B');
    expect(formatAuthors([])).toBe('Unknown');
  });
});

describe('renderVerification', () => {
  const prompt = { included: ['Smith2022'], dropped: [], truncated: [], warning: null };

  it('renders verdict, claims and recommendations', () => {
    const text = renderVerification({
      paragraph: 'p',
      instruction: 'i',
      prompt,
      result: {
        kind: 'verdict',
        overall: 'SUPPORTED',
        claims: [
          {
            index: 1,
            claim: 'depth 2-5mm',
            verdict: 'SUPPORTED',
            rawVerdict: 'SUPPORTED',
            evidence: '"1.8 and 5.2 mm"',
            source: 'Smith2022, page 1',
            notes: null,
          },
        ],
        recommendations: 'None.',
        text: 'ignored',
      },
    });

    expect(text).toBe(
      [
        'Overall verdict: SUPPORTED',
        '',
        'Claim 1: depth 2-5mm',
        '  Verdict: SUPPORTED',
        '  Evidence: "1.8 and 5.2 mm"',
        '  Source: Smith2022, page 1',
        '',
        'Recommendations:',
        'None.',
      ].join('\n')
    );
  });

  it('shows the raw reply unchanged apart from outer whitespace', () => {
    expect(renderVerification({ paragraph: 'p', instruction: 'i', prompt, result: { kind: 'raw', text: '\nodd reply\n' } })).toBe(
      'odd reply'
    );
  });
});

describe('renderPaperList', () => {
  it('numbers papers with page counts', () => {
    expect(renderPaperList([{ id: 'A', pageCount: 1 }, { id: 'B', pageCount: 12 }])).toBe(
      'Loaded papers:\n  1. A (1 page)\n  2. B (12 pages)'
    );
  });

  it('shows title and author when the PDF carries them', () => {
    expect(
      renderPaperList([
        { id: 'Jones2019', pageCount: 3, title: 'Sediment oxygen dynamics', author: 'A. Jones' },
        { id: 'Notes', pageCount: 2, author: 'B. Smith' },
      ])
    ).toBe('Loaded papers:\n  1. Jones2019 (3 pages) "Sediment oxygen dynamics" by A. Jones\n  2. Notes (2 pages) by B. Smith');
  });

  it('hints at the folder command when empty', () => {
    expect(renderPaperList([])).toBe("No papers loaded. Use 'folder <path>' first.");
  });
});

describe('renderLoadReport', () => {
  it('lists skipped files', () => {
    expect(
      renderLoadReport({ directory: '/papers', loaded: 1, failures: [{ file: 'bad.pdf', message: 'broken' }] })
    ).toBe('Loaded 1 PDFs from /papers\nSkipped 1 file(s):\n  bad.pdf: broken');
  });
});

describe('renderPromptWarning', () => {
  it('is null without a warning', () => {
    expect(renderPromptWarning({ included: ['a'], dropped: [], truncated: [], warning: null })).toBeNull();
  });

  it('prefixes the warning message', () => {
    const warning = {
      kind: 'prompt-too-large' as const,
      maxChars: 1000,
      dropped: ['b'],
      truncated: [],
      message: 'Not all paper text fits the 1000-character prompt budget: left out b.',
    };
    expect(renderPromptWarning({ included: ['a'], dropped: ['b'], truncated: [], warning })).toBe(
      'Warning: Not all paper text fits the 1000-character prompt budget: left out b.'
    );
  });
});
