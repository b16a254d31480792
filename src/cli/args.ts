export interface CliOptions {
  inputs: string[];
  config?: string;
  title: string;
  background?: string;
  out: string;
  help: boolean;
}

export const DEFAULT_OUTPUT = 'spellbook.pdf';

const VALUE_FLAGS = new Set(['--config', '--title', '--background', '--out']);

/**
 * Parse command-line arguments. Throws with a usage message on a flag
 * missing its value or an unknown flag.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { inputs: [], title: '', out: DEFAULT_OUTPUT, help: false };

  for (let index = 0; index < args.length; index++) {
    const arg = args[index];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      options.inputs.push(arg);
      continue;
    }
    if (!VALUE_FLAGS.has(arg)) {
      throw new Error(`Unknown option ${arg}`);
    }
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Option ${arg} needs a value`);
    }
    index++;

    switch (arg) {
      case '--config':
        options.config = value;
        break;
      case '--title':
        options.title = value;
        break;
      case '--background':
        options.background = value;
        break;
      case '--out':
        options.out = value;
        break;
    }
  }

  return options;
}
