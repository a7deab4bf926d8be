import { describe, expect, it } from 'vitest';

import { extractJsonArray, interpretSearch, splitAuthors } from './search.js';

describe('interpretSearch', () => {
  it('parses a bare JSON array', () => {
    const reply = JSON.stringify([
      {
        title: 'Pore-scale modeling of methane oxidation',
        authors: ['A. Author', 'B. Author'],
        year: 2021,
        journal: 'Water Resources Research',
        summary: 'A model.',
        relevance: 'Directly on topic.',
        link: 'https://doi.org/10.0000/example',
      },
    ]);

    expect(interpretSearch(reply)).toEqual({
      kind: 'papers',
      papers: [
        {
          title: 'Pore-scale modeling of methane oxidation',
          authors: ['A. Author', 'B. Author'],
          year: '2021',
          venue: 'Water Resources Research',
          summary: 'A model.',
          relevance: 'Directly on topic.',
          link: 'https://doi.org/10.0000/example',
        },
      ],
    });
  });

  it('finds the array inside prose with citation brackets and a code fence', () => {
    const reply = [
      'I searched several databases [1] and found these:',
      '```json',
      '[{"title": "Micro-CT of carbonates", "authors": "C. One, D. Two", "year": "2019"}]',
      '```',
    ].join('\n');

    const r = interpretSearch(reply);

    expect(r.kind).toBe('papers');
    if (r.kind !== 'papers') return;
    expect(r.papers).toHaveLength(1);
    expect(r.papers[0]).toMatchObject({ title: 'Micro-CT of carbonates', authors: ['C. One', 'D. Two'], year: '2019', venue: null });
  });

  it('ignores citation brackets after the array', () => {
    const reply = [
      '[{"title": "Oxygen microprofiles in sediment", "year": 2021}]',
      '',
      'These come from my searches [1][2].',
    ].join('\n');

    const r = interpretSearch(reply);

    expect(r.kind).toBe('papers');
    if (r.kind !== 'papers') return;
    expect(r.papers.map((p) => [p.title, p.year])).toEqual([['Oxygen microprofiles in sediment', '2021']]);
  });

  it('returns an empty list for []', () => {
    expect(interpretSearch('[]')).toEqual({ kind: 'papers', papers: [] });
  });

  it('skips entries without a title', () => {
    const r = interpretSearch('[{"title": "Kept"}, {"authors": ["nobody"]}]');
    expect(r.kind === 'papers' && r.papers.map((p) => p.title)).toEqual(['Kept']);
  });

  it('falls back to field markers', () => {
    const reply = [
      '1. **Title:** Oxygen dynamics in sediments',
      '   **Authors:** E. Five and F. Six',
      '   **Year:** 2020',
      '   **Venue:** Limnology',
      '   **Summary:** Measures oxygen',
      '   penetration with microsensors.',
      '   **Relevance to query:** High',
      '   **Link:** https://example.org/paper',
      '',
      '2. Title: Second paper',
    ].join('\n');

    const r = interpretSearch(reply);

    expect(r).toEqual({
      kind: 'papers',
      papers: [
        {
          title: 'Oxygen dynamics in sediments',
          authors: ['E. Five', 'F. Six'],
          year: '2020',
          venue: 'Limnology',
          summary: 'Measures oxygen penetration with microsensors.',
          relevance: 'High',
          link: 'https://example.org/paper',
        },
        { title: 'Second paper', authors: [], year: null, venue: null, summary: null, relevance: null, link: null },
      ],
    });
  });

  it('returns the raw text when nothing can be parsed', () => {
    const reply = 'Sorry, I could not search right now.';
    expect(interpretSearch(reply)).toEqual({ kind: 'raw', text: reply });
  });

  it('returns the raw text for broken JSON', () => {
    const reply = '[{"title": "unterminated"';
    expect(interpretSearch(reply)).toEqual({ kind: 'raw', text: reply });
  });
});

describe('extractJsonArray', () => {
  it('returns null without brackets', () => {
    expect(extractJsonArray('no json here')).toBeNull();
  });

  it('skips bracketed numbers and keeps brackets inside strings', () => {
    const text = 'See [1] and [2, 3]: [{"title": "A [draft]"}] [4]';
    expect(extractJsonArray(text)).toEqual([{ title: 'A [draft]' }]);
  });

  it('stops at an unbalanced array', () => {
    expect(extractJsonArray('[{"title": "open"')).toBeNull();
  });
});

describe('splitAuthors', () => {
  it('splits on commas, semicolons and "and"', () => {
    expect(splitAuthors('A. One; B. Two, C. Three and D. Four')).toEqual(['A. One', 'B. Two', 'C. Three', 'D. Four']);
  });
});
