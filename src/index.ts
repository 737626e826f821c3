/**
 * Tabular tokenizer
 * Replaces selected columns of a delimited file with reversible tokens and
 * restores them from the saved token map.
 */

import type winston from 'winston';
import { parseArgs, printHelp } from './cli/args.js';
import { resolveRunConfig, type RunConfig } from './config/TokenizerConfig.js';
import { detokenize } from './core/Detokenizer.js';
import { tokenize } from './core/Tokenizer.js';
import type { Reporter } from './core/types.js';
import { describeError } from './errors/ErrorHandling.js';
import { createLogger, createLoggerReporter } from './utils/Logger.js';

export { tokenize, Tokenizer } from './core/Tokenizer.js';
export { detokenize, Detokenizer } from './core/Detokenizer.js';
export type {
  DetokenizeOptions,
  DetokenizeSummary,
  RecordFormat,
  RecordRow,
  Reporter,
  TokenizeOptions,
  TokenizeSummary,
} from './core/types.js';
export { TokenMap, type MappingEntry } from './mapping/TokenMap.js';
export { MappingStore } from './mapping/MappingStore.js';
export {
  createTokenGenerator,
  parseStrategy,
  RandomUniqueGenerator,
  SequentialCounterGenerator,
  type TokenGenerator,
  type TokenStrategy,
} from './tokens/TokenGenerator.js';
export {
  TokenizationError,
  NotFoundError,
  MalformedRowError,
  IOError,
  ConfigurationError,
} from './errors/ErrorHandling.js';

async function run(config: RunConfig, logger: winston.Logger, reporter: Reporter): Promise<void> {
  if (config.mode === 'detokenize') {
    const summary = await detokenize(config, reporter);
    logger.info(`Data detokenized successfully. Output saved to '${config.outputPath}'.`);
    logger.info(`Restored ${summary.valuesRestored} value(s) across ${summary.records} record(s).`);
    return;
  }

  const summary = await tokenize(config, reporter);
  logger.info(
    `Data tokenized successfully. Output saved to '${config.outputPath}'. ` +
      `Token map saved to '${config.mappingPath}'.`,
  );
  logger.info(
    `Processed ${summary.records} record(s): ${summary.tokensMinted} new token(s), ` +
      `${summary.tokensReused} reused, ${summary.mappingSize} in map.`,
  );
}

export interface MainOptions {
  logger?: winston.Logger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * CLI entry point. Resolves to the process exit code.
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  options: MainOptions = {},
): Promise<number> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger(env);

  try {
    const cliOptions = parseArgs(argv);
    if (cliOptions.help) {
      printHelp();
      return 0;
    }

    const config = resolveRunConfig(cliOptions, env, options.cwd);
    await run(config, logger, createLoggerReporter(logger));
    return 0;
  } catch (error) {
    logger.error(`An error occurred: ${describeError(error)}`);
    return 1;
  }
}
