import type { RunOverrides } from '../config/TokenizerConfig.js';
import { ConfigurationError } from '../errors/ErrorHandling.js';

export interface CliOptions extends RunOverrides {
  help?: boolean;
}

type ValueOption = 'strategy' | 'mappingPath' | 'delimiter' | 'encoding' | 'config';

const VALUE_FLAGS: Record<string, ValueOption> = {
  '-s': 'strategy',
  '--strategy': 'strategy',
  '--token_method': 'strategy',
  '-m': 'mappingPath',
  '--map': 'mappingPath',
  '--token_map_file': 'mappingPath',
  '--delimiter': 'delimiter',
  '--encoding': 'encoding',
  '--config': 'config',
};

const COLUMN_FLAGS = new Set(['-c', '--columns', '--tokenize_columns']);

function isFlag(arg: string): boolean {
  return arg.startsWith('-') && arg.length > 1;
}

function normalizeDelimiter(value: string): string {
  return value === '\\t' || value.toLowerCase() === 'tab' ? '\t' : value;
}

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {};
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '-d' || arg === '--detokenize') {
      options.detokenize = true;
    } else if (COLUMN_FLAGS.has(arg)) {
      const columns: string[] = [];
      while (i + 1 < args.length && !isFlag(args[i + 1])) {
        columns.push(args[++i]);
      }
      if (columns.length === 0) {
        throw new ConfigurationError(`Option ${arg} expects at least one column name`);
      }
      options.columns = [...(options.columns ?? []), ...columns];
    } else if (Object.prototype.hasOwnProperty.call(VALUE_FLAGS, arg)) {
      const value = args[i + 1];
      if (value === undefined || isFlag(value)) {
        throw new ConfigurationError(`Option ${arg} expects a value`);
      }
      i++;
      const key = VALUE_FLAGS[arg];
      options[key] = key === 'delimiter' ? normalizeDelimiter(value) : value;
    } else if (isFlag(arg)) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (options.help) {
    return options;
  }

  if (positionals.length < 2) {
    throw new ConfigurationError('Both <input> and <output> paths are required');
  }
  if (positionals.length > 2) {
    throw new ConfigurationError(`Unexpected argument: ${positionals[2]}`);
  }

  [options.inputPath, options.outputPath] = positionals;
  return options;
}

export function printHelp(write: (text: string) => void = (text) => console.log(text)): void {
  write(`
Usage: tabtoken <input> <output> [options]

Replace values in selected columns of a delimited file with reversible tokens,
or restore them from a saved token map.

Options:
  -c, --columns <name...>   Columns to tokenize (alias: --tokenize_columns)
  -s, --strategy <name>     uuid | sequential (default: uuid; alias: --token_method)
  -m, --map <path>          Token map file (default: token_map.csv; alias: --token_map_file)
  -d, --detokenize          Restore original values using the token map
  --delimiter <char>        Field delimiter for input and output (default: ,)
  --encoding <name>         utf8 | utf16le | latin1 | ascii (default: utf8)
  --config <path>           Defaults file (default: tabtoken.config.json)
  -h, --help                Show this help message

Examples:
  tabtoken people.csv people.tok.csv -c ssn email -s sequential
  tabtoken people.tok.csv people.restored.csv --detokenize -m token_map.csv

Environment:
  TABTOKEN_LOG_LEVEL        Log level (default: info)
  TABTOKEN_LOG_ENABLE       Also log JSON to TABTOKEN_LOG_FILE (default: tabtoken.log)
  TABTOKEN_HIDE_SENSITIVE   Mask original values in warnings
`);
}
