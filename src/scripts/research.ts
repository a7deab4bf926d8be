#!/usr/bin/env node
/**
 * research: interactive research assistant
 *
 * Finds papers online, answers questions over a folder of PDFs and checks
 * whether a paragraph's citations are supported by those PDFs.
 *
 * Usage:
 *   npm run research
 *   npm run research -- --provider openai
 *   npm run research -- --folder ~/papers
 *
 * Options:
 *   --provider <anthropic|openai>   Provider to use (default: from config.yml, then env keys)
 *   --folder <path>                 Load a folder of PDFs at startup
 *
 * Environment:
 *   ANTHROPIC_API_KEY, OPENAI_API_KEY
 *
 * Exit codes:
 *   0  Quit normally
 *   1  Startup failed (bad arguments, no API key, invalid config.yml)
 */

import path from 'node:path';
import readline from 'node:readline';

import { expandHome, parseStartupArgs, type StartupArgs } from '../lib/cli/args.js';
import { HELP_TEXT, runCommand, type CommandIO } from '../lib/cli/commands.js';
import { PROVIDER_LABELS } from '../lib/providers/index.js';
import { createResearchContext, type ResearchContext } from '../lib/research/context.js';

// ─── Main ─────────────────────────────────────────────────────────────────────

async function main() {
  let args: StartupArgs;
  let ctx: ResearchContext;
  try {
    args = parseStartupArgs(process.argv.slice(2));
    ctx = createResearchContext({
      repoRoot: path.resolve(process.cwd()),
      env: process.env,
      provider: args.provider,
    });
  } catch (err) {
    console.error('research: startup failed:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
    return;
  }

  console.log('Research Agent');
  console.log(`Using ${PROVIDER_LABELS[ctx.provider.name]} (${ctx.provider.model})`);
  console.log('');
  console.log(HELP_TEXT);
  console.log('');

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'research> ' });
  rl.on('SIGINT', () => {
    console.log("\nUse 'quit' to exit.");
    rl.prompt();
  });
  const lines = rl[Symbol.asyncIterator]();

  const readLine = async (): Promise<string | null> => {
    const next = await lines.next();
    return next.done ? null : next.value;
  };

  const io: CommandIO = {
    print: (text) => console.log(text),
    status: (text) => console.log(text),
    error: (text) => console.error(text),
    readLine,
  };

  const expand = (line: string) => line.replace(/^(\s*folder\s+)(~.*)$/i, (_m, cmd: string, p: string) => cmd + expandHome(p));

  if (args.folder) {
    await runCommand(ctx, `folder ${expandHome(args.folder)}`, io);
  }

  for (;;) {
    rl.prompt();
    const line = await readLine();
    if (line === null) break;
    const result = await runCommand(ctx, expand(line), io);
    if (result === 'quit') break;
  }

  rl.close();
}

main().catch((err) => {
  console.error('research error:', err);
  process.exit(1);
});
