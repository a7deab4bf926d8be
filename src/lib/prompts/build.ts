import { VERDICTS, type Paper } from '../types.js';
import { assemblePrompt, type AssembledPrompt, type PromptBudget } from './budget.js';

export const DEFAULT_VERIFY_INSTRUCTION = 'Verify that the citations support the claims made';

export interface SearchPromptOptions {
  minResults: number;
  maxResults: number;
}

export function buildSearchPrompt(query: string, opts: SearchPromptOptions): string {
  return `You are a research assistant helping find academic papers. Search for papers related to:
"${query.trim()}"

Find relevant academic papers from Google Scholar, arXiv, PubMed, Semantic Scholar, or other academic databases.

Provide your findings in this JSON format (output ONLY the JSON array):
[
  {
    "title": "Full paper title",
    "authors": ["Author 1", "Author 2"],
    "year": 2023,
    "venue": "Journal or conference name",
    "summary": "3-4 sentence summary",
    "relevance": "How it relates to the query",
    "link": "URL or DOI"
  }
]

Find ${opts.minResults}-${opts.maxResults} highly relevant papers. If you cannot find papers, return [].`;
}

export function buildAnalysisPrompt(question: string, papers: readonly Paper[], budget: PromptBudget): AssembledPrompt {
  const q = question.trim();
  return assemblePrompt(
    papers,
    (section) => `Analyze these papers:

${section}

Question: ${q}

Provide a detailed answer citing specific papers and quotes. Attribute every claim to the paper id shown in the === <id> === header it comes from.`,
    budget
  );
}

const verdictList = VERDICTS.join(' / ');

export function buildVerifyPrompt(
  paragraph: string,
  instruction: string,
  papers: readonly Paper[],
  budget: PromptBudget
): AssembledPrompt {
  const para = paragraph.trim();
  const task = instruction.trim() || DEFAULT_VERIFY_INSTRUCTION;
  return assemblePrompt(
    papers,
    (section) => `Verify citations in this paragraph.

PAPERS:
${section}

PARAGRAPH:
${para}

TASK: ${task}

Answer in exactly this layout, using one of ${verdictList} for every verdict:

OVERALL VERDICT: <verdict>

CLAIM 1: <claim text from the paragraph>
VERDICT: <verdict>
EVIDENCE: "<quote from the paper>"
SOURCE: <paper id>, page <n if identifiable>

(one CLAIM block per claim)

RECOMMENDATIONS:
<suggested fixes to the paragraph or its citations>`,
    budget
  );
}
