import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/ErrorHandling.js';
import { parseStrategy } from '../tokens/TokenGenerator.js';
import { getMaskString, isSensitiveMaskEnabled } from '../utils/SensitiveData.js';

export const DEFAULT_CONFIG_FILE = 'tabtoken.config.json';
export const DEFAULT_MAPPING_PATH = 'token_map.csv';
export const DEFAULT_STRATEGY = 'uuid';

const ENCODINGS = ['utf8', 'utf-8', 'utf16le', 'latin1', 'ascii'] as const;

/**
 * Defaults file: everything except the paths of a single run
 */
export const ConfigFileSchema = z
  .object({
    columns: z.array(z.string().min(1)).optional(),
    strategy: z.string().optional(),
    mappingPath: z.string().min(1).optional(),
    delimiter: z.string().length(1).optional(),
    encoding: z.enum(ENCODINGS).optional(),
    hideSensitive: z.boolean().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const RunConfigSchema = z
  .object({
    mode: z.enum(['tokenize', 'detokenize']).default('tokenize'),
    inputPath: z.string().min(1),
    outputPath: z.string().min(1),
    columns: z.array(z.string().min(1)).default([]),
    strategy: z.string().default(DEFAULT_STRATEGY),
    mappingPath: z.string().min(1).default(DEFAULT_MAPPING_PATH),
    delimiter: z.string().length(1).default(','),
    encoding: z.enum(ENCODINGS).default('utf8'),
    hideSensitive: z.boolean().default(false),
    sensitiveMask: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.mode === 'tokenize' && config.columns.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['columns'],
        message: 'at least one column is required to tokenize',
      });
    }
  });

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Values supplied on the command line; undefined means "not given"
 */
export interface RunOverrides {
  inputPath?: string;
  outputPath?: string;
  columns?: string[];
  strategy?: string;
  mappingPath?: string;
  detokenize?: boolean;
  delimiter?: string;
  encoding?: string;
  config?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseConfigFile(raw: unknown, source: string): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${source}: ${formatIssues(result.error)}`, {
      path: source,
    });
  }
  return result.data;
}

/**
 * Read the defaults file. An explicitly named file must exist; the default
 * one in cwd is optional.
 */
export function loadConfigFile(explicitPath: string | undefined, cwd: string = process.cwd()): ConfigFile {
  const configPath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(configPath)) {
    if (explicitPath !== undefined) {
      throw new ConfigurationError(`Config file '${configPath}' not found`, { path: configPath });
    }
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read config file ${configPath}: ${reason}`, {
      path: configPath,
    });
  }
  return parseConfigFile(json, configPath);
}

/**
 * Validate a run configuration. The strategy is resolved here so an unknown
 * name fails before any file is touched.
 */
export function parseRunConfig(raw: unknown): RunConfig {
  const result = RunConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  if (result.data.mode === 'tokenize') {
    parseStrategy(result.data.strategy);
  }
  return result.data;
}

/**
 * Layer CLI overrides over the defaults file and environment
 */
export function resolveRunConfig(
  overrides: RunOverrides,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RunConfig {
  const file = loadConfigFile(overrides.config ?? env.TABTOKEN_CONFIG, cwd);

  return parseRunConfig({
    mode: overrides.detokenize ? 'detokenize' : 'tokenize',
    inputPath: overrides.inputPath,
    outputPath: overrides.outputPath,
    columns: overrides.columns ?? file.columns,
    strategy: overrides.strategy ?? file.strategy,
    mappingPath: overrides.mappingPath ?? file.mappingPath,
    delimiter: overrides.delimiter ?? file.delimiter,
    encoding: overrides.encoding ?? file.encoding,
    hideSensitive: isSensitiveMaskEnabled(env) || file.hideSensitive,
    sensitiveMask: env.TABTOKEN_SENSITIVE_MASK ? getMaskString(env) : undefined,
  });
}
