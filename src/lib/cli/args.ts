import os from 'node:os';
import path from 'node:path';

import { InvalidInputError } from '../errors.js';
import { PROVIDER_NAMES, type ProviderName } from '../types.js';

export interface StartupArgs {
  provider: ProviderName | undefined;
  folder: string | undefined;
}

function asProvider(value: string): ProviderName {
  const provider = PROVIDER_NAMES.find((p) => p === value.toLowerCase());
  if (!provider) {
    throw new InvalidInputError(`Unknown provider "${value}". Expected one of: ${PROVIDER_NAMES.join(', ')}`);
  }
  return provider;
}

/** Parse `--provider` and `--folder`. An unknown provider name throws. */
export function parseStartupArgs(argv: string[]): StartupArgs {
  let provider: ProviderName | undefined;
  let folder: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const next = argv[i + 1];

    if ((arg === '--provider' || arg === '-p') && next !== undefined) {
      provider = asProvider(next);
      i++;
    } else if (arg.startsWith('--provider=')) {
      provider = asProvider(arg.slice('--provider='.length));
    } else if ((arg === '--folder' || arg === '-f') && next !== undefined) {
      folder = next;
      i++;
    } else if (arg.startsWith('--folder=')) {
      folder = arg.slice('--folder='.length);
    }
  }

  return { provider, folder };
}

export function expandHome(p: string, home = os.homedir()): string {
  return p === '~' || p.startsWith('~/') ? path.join(home, p.slice(1)) : p;
}
