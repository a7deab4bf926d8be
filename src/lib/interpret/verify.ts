/**
 * Best-effort parsing of a citation verification reply.
 *
 * We ask for `OVERALL VERDICT:` followed by `CLAIM n:` blocks, but the reply
 * is free text: headings, bold markers and bullets are stripped before
 * matching. A reply without a recognizable overall verdict is shown raw.
 * Unknown verdict words are never mapped onto the three known tokens.
 */

import { VERDICTS, type Verdict } from '../types.js';

export interface ClaimAssessment {
  index: number;
  claim: string;
  verdict: Verdict | null;
  /** Verdict text as written, kept when it is not one of the known tokens */
  rawVerdict: string | null;
  evidence: string | null;
  source: string | null;
  notes: string | null;
}

export type VerificationInterpretation =
  | {
      kind: 'verdict';
      overall: Verdict;
      claims: ClaimAssessment[];
      recommendations: string | null;
      text: string;
    }
  | { kind: 'raw'; text: string };

const OVERALL_LINE = /^(?:\d+[.)]\s*)?overall\s+verdict\s*(?::|-|–)?\s*(.*)$/i;
const CLAIM_LINE = /^claim\s*#?\s*(\d+)\s*(?::|\.|\)|-|–)?\s*(.*)$/i;
const FIELD_LINE = /^(verdict|evidence|quote|source|notes?|analysis|explanation)\s*(?::|-|–)\s*(.*)$/i;
const RECOMMENDATIONS_LINE = /^(?:\d+[.)]\s*)?recommendations?\s*(?::|-|–)?\s*(.*)$/i;

// Longest first so "NOT SUPPORTED" is not read as "SUPPORTED"
const VERDICT_PREFIX = new RegExp(`^(${[...VERDICTS].sort((a, b) => b.length - a.length).join('|')})\\b`);

export function parseVerdict(value: string): Verdict | null {
  const normalized = value
    .toUpperCase()
    .replace(/[_*`"'[\]()]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  const token = normalized.match(VERDICT_PREFIX)?.[1];
  return VERDICTS.find((v) => v === token) ?? null;
}

function cleanLine(line: string): string {
  return line
    .replace(/\*\*|__/g, '')
    .replace(/^\s*#{1,6}\s*/, '')
    .replace(/^\s*[-*•]\s+/, '')
    .trim();
}

type ClaimField = 'claim' | 'verdict' | 'evidence' | 'source' | 'notes';

function fieldFor(label: string): ClaimField {
  const l = label.toLowerCase();
  if (l === 'verdict') return 'verdict';
  if (l === 'evidence' || l === 'quote') return 'evidence';
  if (l === 'source') return 'source';
  return 'notes';
}

interface ClaimDraft {
  index: number;
  claim: string[];
  verdict: string[];
  evidence: string[];
  source: string[];
  notes: string[];
}

function joined(parts: string[]): string | null {
  const s = parts.join('\n').trim();
  return s ? s : null;
}

function finishClaim(d: ClaimDraft): ClaimAssessment {
  const rawVerdict = joined(d.verdict);
  return {
    index: d.index,
    claim: joined(d.claim) ?? '',
    verdict: rawVerdict ? parseVerdict(rawVerdict) : null,
    rawVerdict,
    evidence: joined(d.evidence),
    source: joined(d.source),
    notes: joined(d.notes),
  };
}

/** Never throws: unparseable replies come back as `{ kind: 'raw' }`. */
export function interpretVerification(text: string): VerificationInterpretation {
  const lines = text.split(/\r?\n/).map(cleanLine);

  let overallText: string | null = null;
  let awaitingOverall = false;
  const claims: ClaimDraft[] = [];
  let current: ClaimDraft | null = null;
  let field: ClaimField = 'claim';
  const recommendations: string[] = [];
  let inRecommendations = false;

  for (const line of lines) {
    if (inRecommendations) {
      recommendations.push(line);
      continue;
    }
    if (awaitingOverall) {
      if (!line) continue;
      overallText = line;
      awaitingOverall = false;
      continue;
    }

    const overall: RegExpMatchArray | null = overallText === null ? line.match(OVERALL_LINE) : null;
    if (overall) {
      const value: string = (overall[1] ?? '').trim();
      if (value) overallText = value;
      else awaitingOverall = true;
      continue;
    }

    const claim = line.match(CLAIM_LINE);
    if (claim) {
      current = { index: Number(claim[1]), claim: [], verdict: [], evidence: [], source: [], notes: [] };
      const rest = (claim[2] ?? '').trim();
      if (rest) current.claim.push(rest);
      claims.push(current);
      field = 'claim';
      continue;
    }

    const rec = line.match(RECOMMENDATIONS_LINE);
    if (rec) {
      inRecommendations = true;
      const rest = (rec[1] ?? '').trim();
      if (rest) recommendations.push(rest);
      continue;
    }

    if (!current) continue;

    const f = line.match(FIELD_LINE);
    if (f) {
      field = fieldFor(f[1] ?? '');
      const rest = (f[2] ?? '').trim();
      if (rest) current[field].push(rest);
      continue;
    }
    if (line) current[field].push(line);
  }

  const overall = overallText ? parseVerdict(overallText) : null;
  if (!overall) return { kind: 'raw', text };

  return {
    kind: 'verdict',
    overall,
    claims: claims.map(finishClaim),
    recommendations: joined(recommendations),
    text,
  };
}
