/**
 * Best-effort parsing of a provider's paper search reply.
 *
 * The reply is free text that usually contains the JSON array we asked for,
 * sometimes wrapped in prose or a code fence, and occasionally a plain
 * "Title: ... / Authors: ..." listing instead. Anything else is shown raw.
 */

import { z } from 'zod';

export interface FoundPaper {
  title: string;
  authors: string[];
  year: string | null;
  venue: string | null;
  summary: string | null;
  relevance: string | null;
  link: string | null;
}

export type SearchInterpretation = { kind: 'papers'; papers: FoundPaper[] } | { kind: 'raw'; text: string };

const MAX_JSON_ATTEMPTS = 20;

const scalar = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

const EntrySchema = z
  .object({
    title: z.string().trim().min(1),
    authors: z.union([z.array(scalar), scalar]).optional(),
    year: scalar.nullish(),
    venue: scalar.nullish(),
    journal: scalar.nullish(),
    summary: scalar.nullish(),
    relevance: scalar.nullish(),
    link: scalar.nullish(),
    url: scalar.nullish(),
  })
  .passthrough();

function orNull(s: string | null | undefined): string | null {
  return s ? s : null;
}

export function splitAuthors(s: string): string[] {
  return s
    .split(/\s*(?:;|,|\band\b)\s*/)
    .map((a) => a.trim())
    .filter(Boolean);
}

function toFoundPaper(raw: z.infer<typeof EntrySchema>): FoundPaper {
  const authors = Array.isArray(raw.authors)
    ? raw.authors.filter(Boolean)
    : raw.authors
      ? splitAuthors(raw.authors)
      : [];
  return {
    title: raw.title,
    authors,
    year: orNull(raw.year),
    venue: orNull(raw.venue) ?? orNull(raw.journal),
    summary: orNull(raw.summary),
    relevance: orNull(raw.relevance),
    link: orNull(raw.link) ?? orNull(raw.url),
  };
}

function parseJsonArray(candidate: string): unknown[] | null {
  try {
    const value: unknown = JSON.parse(candidate);
    return Array.isArray(value) ? value : null;
  } catch {
    return null;
  }
}

/** Index of the ']' that closes the '[' at `start`, skipping brackets inside JSON strings. */
function closingBracket(text: string, start: number): number | null {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '[') depth++;
    else if (ch === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return null;
}

function isRecord(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find the first JSON array of objects. Prose around the array may contain
 * brackets of its own (citation marks like [1][2]), so each '[' is tried with
 * its balanced closing bracket, and arrays of anything but objects are skipped.
 */
export function extractJsonArray(text: string): unknown[] | null {
  let start = text.indexOf('[');
  for (let attempt = 0; start >= 0 && attempt < MAX_JSON_ATTEMPTS; attempt++) {
    const end = closingBracket(text, start);
    const arr = end === null ? null : parseJsonArray(text.slice(start, end + 1));
    if (arr && arr.every(isRecord)) return arr;
    start = text.indexOf('[', start + 1);
  }
  return null;
}

function fromJson(text: string): FoundPaper[] | null {
  const arr = extractJsonArray(text);
  if (!arr) return null;
  if (arr.length === 0) return [];
  const papers = arr.flatMap((entry) => {
    const parsed = EntrySchema.safeParse(entry);
    return parsed.success ? [toFoundPaper(parsed.data)] : [];
  });
  return papers.length > 0 ? papers : null;
}

// ─── Field-marker listing ─────────────────────────────────────────────────────

type Field = keyof FoundPaper;

const FIELD_ALIASES: Record<string, Field> = {
  title: 'title',
  author: 'authors',
  authors: 'authors',
  year: 'year',
  venue: 'venue',
  journal: 'venue',
  summary: 'summary',
  relevance: 'relevance',
  'relevance to query': 'relevance',
  link: 'link',
  url: 'link',
  doi: 'link',
};

const FIELD_LINE =
  /^\s*(?:\d+[.)]\s*)?(?:[-*•]\s*)?(title|authors?|year|venue|journal|summary|relevance(?:[ -]to[ -]query)?|link|url|doi)\s*:\s*(.*)$/i;

function cleanLine(line: string): string {
  return line.replace(/\*\*|__/g, '').replace(/^\s*#{1,6}\s*/, '');
}

function fromFieldMarkers(text: string): FoundPaper[] | null {
  const entries: Array<Partial<Record<Field, string>>> = [];
  let current: Partial<Record<Field, string>> | null = null;
  let lastField: Field | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = cleanLine(rawLine);
    const m = line.match(FIELD_LINE);
    if (m) {
      const field = FIELD_ALIASES[(m[1] ?? '').toLowerCase().replace(/-/g, ' ')];
      if (!field) continue;
      const value = (m[2] ?? '').trim();
      if (field === 'title') {
        current = { title: value };
        entries.push(current);
      } else if (current) {
        current[field] = value;
      }
      lastField = current ? field : null;
    } else if (current && lastField && line.trim()) {
      current[lastField] = `${current[lastField] ?? ''} ${line.trim()}`.trim();
    } else if (!line.trim()) {
      lastField = null;
    }
  }

  const papers = entries
    .filter((e): e is Partial<Record<Field, string>> & { title: string } => Boolean(e.title))
    .map((e) => ({
      title: e.title,
      authors: e.authors ? splitAuthors(e.authors) : [],
      year: orNull(e.year),
      venue: orNull(e.venue),
      summary: orNull(e.summary),
      relevance: orNull(e.relevance),
      link: orNull(e.link),
    }));
  return papers.length > 0 ? papers : null;
}

/** Never throws: unparseable replies come back as `{ kind: 'raw' }`. */
export function interpretSearch(text: string): SearchInterpretation {
  const papers = fromJson(text) ?? fromFieldMarkers(text);
  return papers ? { kind: 'papers', papers } : { kind: 'raw', text };
}
