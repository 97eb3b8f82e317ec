import { Command, CommanderError } from 'commander';
import { z } from 'zod';

import { ConfigError } from '../errors.js';

export interface AppArgs {
  modules: string[];
  dataDir: string;
  props: Record<string, string>;
  runApp: boolean;
}

// `-m None` selects nothing; it only satisfies the required flag.
const NO_MODULE = 'None';

const RawOptionsSchema = z.object({
  modules: z.array(z.string()).optional(),
  dataDir: z.string().min(1).optional(),
  props: z.array(z.string()).optional(),
  runApp: z.boolean().optional(),
});

function parseProps(pairs: readonly string[]): Record<string, string> {
  return pairs.reduce<Record<string, string>>((acc, pair) => {
    const idx = pair.indexOf('=');
    if (idx <= 0) throw new ConfigError(`invalid property '${pair}', expected key=value`);
    acc[pair.slice(0, idx).trim()] = pair.slice(idx + 1).trim();
    return acc;
  }, {});
}

function buildProgram(): Command {
  return new Command('tabular-app')
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    })
    .option('-m, --modules <names...>', 'modules to run')
    .option('--data-dir <dir>', 'top level data directory')
    .option('--props <pairs...>', 'run configuration properties as key=value')
    .option('--run-app', 'run every output module of the app');
}

export function parseAppArgs(argv: readonly string[], defaultDataDir = 'data'): AppArgs {
  const program = buildProgram();
  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new ConfigError(`invalid app arguments [${argv.join(' ')}]: ${error.message}`);
    }
    throw error;
  }
  const parsed = RawOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    throw new ConfigError(`invalid app arguments [${argv.join(' ')}]: ${parsed.error.message}`);
  }
  const raw = parsed.data;
  return {
    modules: (raw.modules ?? []).filter((name) => name !== NO_MODULE),
    dataDir: raw.dataDir ?? defaultDataDir,
    props: parseProps(raw.props ?? []),
    runApp: raw.runApp ?? false,
  };
}
