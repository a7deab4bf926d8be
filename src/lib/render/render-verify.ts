import type { ClaimAssessment } from '../interpret/verify.js';
import type { VerificationOutcome } from '../research/operations.js';

function formatClaim(c: ClaimAssessment): string[] {
  const lines = [`Claim ${c.index}: ${c.claim}`];
  lines.push(`  Verdict: ${c.verdict ?? c.rawVerdict ?? 'not given'}`);
  if (c.evidence) lines.push(`  Evidence: ${c.evidence}`);
  if (c.source) lines.push(`  Source: ${c.source}`);
  if (c.notes) lines.push(`  Notes: ${c.notes}`);
  return lines;
}

export function renderVerification(outcome: VerificationOutcome): string {
  const { result } = outcome;
  if (result.kind === 'raw') return result.text.trim();

  const lines: string[] = [`Overall verdict: ${result.overall}`];
  for (const claim of result.claims) {
    lines.push('');
    lines.push(...formatClaim(claim));
  }
  if (result.recommendations) {
    lines.push('');
    lines.push('Recommendations:');
    lines.push(result.recommendations);
  }
  return lines.join('\n');
}
