// Raised for malformed command lines; the CLI exits with status 2.
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ParsedArgs {
  command: string | undefined;
  flags: Record<string, string>;
}

/**
 * `<command> [--flag value | --flag=value]...`
 * A repeated flag keeps its last value.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const flags: Record<string, string> = {};

  if (command !== undefined && command.startsWith('--')) {
    throw new UsageError(`Expected a command before '${command}'`);
  }

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    if (!arg.startsWith('--') || arg.length === 2) {
      throw new UsageError(`Unexpected argument '${arg}'`);
    }

    const eq = arg.indexOf('=');
    if (eq !== -1) {
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      continue;
    }

    const value = rest[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Flag '${arg}' needs a value`);
    }
    flags[arg.slice(2)] = value;
    i += 1;
  }

  return { command, flags };
}
