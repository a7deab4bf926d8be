/**
 * Interactive command dispatcher.
 *
 * Commands:
 *   folder [path]        load PDFs from a folder (no path: show current folder)
 *   list                 list loaded papers
 *   find <query>         search for papers online (alias: search)
 *   analyze <question>   ask a question about the loaded papers
 *   verify [task]        check a pasted paragraph against the loaded papers
 *   help                 show this list
 *   quit                 exit (aliases: exit, q)
 */

import { errorMessage } from '../errors.js';
import { PROVIDER_LABELS } from '../providers/index.js';
import { renderLoadReport, renderPaperList, renderPromptWarning } from '../render/render-papers.js';
import { renderSearchResults } from '../render/render-search.js';
import { renderVerification } from '../render/render-verify.js';
import { analyzePapers, findPapers, listPapers, loadFolder, verifyCitations } from '../research/operations.js';
import type { ResearchContext } from '../research/context.js';

export const HELP_TEXT = `Commands:
  folder <path>       Set the folder containing your PDFs
  list                List all loaded papers
  find <query>        Search for papers online
  analyze <question>  Analyze your local papers
  verify [task]       Verify citations in a paragraph
  help                Show this help
  quit                Exit`;

export interface CommandIO {
  print(text: string): void;
  status(text: string): void;
  error(text: string): void;
  /** Next input line, or null once input has ended */
  readLine(): Promise<string | null>;
}

export type CommandResult = 'continue' | 'quit';

export interface ParsedCommand {
  command: string;
  args: string;
}

export function parseCommandLine(line: string): ParsedCommand | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  const m = trimmed.match(/^(\S+)\s*([\s\S]*)$/);
  if (!m) return null;
  return { command: (m[1] ?? '').toLowerCase(), args: (m[2] ?? '').trim() };
}

/**
 * Read a pasted paragraph: lines up to the second consecutive empty line.
 */
export async function collectParagraph(readLine: () => Promise<string | null>): Promise<string> {
  const lines: string[] = [];
  for (;;) {
    const line = await readLine();
    if (line === null) break;
    if (line.trim() === '' && lines.length > 0 && lines[lines.length - 1] === '') break;
    lines.push(line.trim() === '' ? '' : line);
  }
  return lines.join('\n').trim();
}

async function handle(ctx: ResearchContext, cmd: ParsedCommand, io: CommandIO): Promise<CommandResult> {
  const { command, args } = cmd;

  switch (command) {
    case 'quit':
    case 'exit':
    case 'q':
      io.print('Goodbye!');
      return 'quit';

    case 'help':
      io.print(HELP_TEXT);
      return 'continue';

    case 'folder': {
      if (!args) {
        io.print(`Current folder: ${ctx.store.directory ?? 'Not set'}`);
        return 'continue';
      }
      io.status(`Loading PDFs from ${args}...`);
      const report = await loadFolder(ctx, args);
      io.print(renderLoadReport(report));
      return 'continue';
    }

    case 'list':
      io.print(renderPaperList(listPapers(ctx)));
      return 'continue';

    case 'find':
    case 'search': {
      if (!args) {
        io.print('Usage: find <query>');
        return 'continue';
      }
      io.status(`Searching for papers with ${PROVIDER_LABELS[ctx.provider.name]}...`);
      const outcome = await findPapers(ctx, args);
      io.print(renderSearchResults(outcome));
      return 'continue';
    }

    case 'analyze': {
      if (!args) {
        io.print('Usage: analyze <question>');
        return 'continue';
      }
      io.status('Reading and analyzing papers...');
      const outcome = await analyzePapers(ctx, args);
      const warning = renderPromptWarning(outcome.prompt);
      if (warning) io.error(warning);
      io.print(outcome.answer);
      return 'continue';
    }

    case 'verify': {
      if (ctx.store.size === 0) {
        io.print(renderPaperList([]));
        return 'continue';
      }
      io.print('Paste your paragraph (Enter twice to finish):');
      const paragraph = await collectParagraph(() => io.readLine());
      if (!paragraph) {
        io.print('No paragraph given.');
        return 'continue';
      }
      io.status('Verifying citations...');
      const outcome = await verifyCitations(ctx, paragraph, args || undefined);
      const warning = renderPromptWarning(outcome.prompt);
      if (warning) io.error(warning);
      io.print(renderVerification(outcome));
      return 'continue';
    }

    default:
      io.print(`Unknown command: ${command}. Type 'help' for commands.`);
      return 'continue';
  }
}

/**
 * Run one input line. Failures are printed and the session continues.
 */
export async function runCommand(ctx: ResearchContext, line: string, io: CommandIO): Promise<CommandResult> {
  const cmd = parseCommandLine(line);
  if (!cmd) return 'continue';
  try {
    return await handle(ctx, cmd, io);
  } catch (err) {
    io.error(`Error: ${errorMessage(err)}`);
    return 'continue';
  }
}
