// ============================================
// STRATA - CLI argument parsing
// ============================================

export interface ParsedArgs {
  command: string | undefined;
  params: string[];
  yes: boolean;
  quiet: boolean;
  models: string[];
}

/**
 * `makemigrations -y --model User --model Post` style arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    command: undefined,
    params: [],
    yes: false,
    quiet: false,
    models: []
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '-y':
      case '--yes':
        parsed.yes = true;
        break;

      case '-q':
      case '--quiet':
        parsed.quiet = true;
        break;

      case '-m':
      case '--model': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('-')) {
          throw new Error(`${arg} requires a model name`);
        }
        parsed.models.push(value);
        i++;
        break;
      }

      default:
        if (arg.startsWith('--model=')) {
          parsed.models.push(arg.slice('--model='.length));
        } else if (parsed.command === undefined) {
          parsed.command = arg;
        } else {
          parsed.params.push(arg);
        }
    }
  }

  return parsed;
}

/**
 * Positive integer argument, or null
 */
export function parseSequence(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const sequence = Number(value);
  return sequence >= 1 ? sequence : null;
}
