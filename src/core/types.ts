/**
 * Shared types for the tokenize and detokenize operations
 */

/**
 * Sink for non-fatal diagnostics. The CLI backs it with winston; tests stub it.
 */
export interface Reporter {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

/** One row of a record file, positionally aligned with the header. */
export type RecordRow = string[];

/**
 * Formatting shared by the input and output record files
 */
export interface RecordFormat {
  /** Field delimiter (default ',') */
  delimiter?: string;
  /** Text encoding (default 'utf8') */
  encoding?: BufferEncoding;
}

export interface TokenizeOptions extends RecordFormat {
  inputPath: string;
  outputPath: string;
  /** Column names whose values are replaced by tokens */
  columns: readonly string[];
  /** Strategy name, see parseStrategy for accepted aliases */
  strategy: string;
  mappingPath: string;
  /** Mask original values in diagnostics */
  hideSensitive?: boolean;
  sensitiveMask?: string;
}

export interface DetokenizeOptions extends RecordFormat {
  inputPath: string;
  outputPath: string;
  mappingPath: string;
  hideSensitive?: boolean;
  sensitiveMask?: string;
}

export interface TokenizeSummary {
  /** Data rows processed, header excluded */
  records: number;
  tokensMinted: number;
  tokensReused: number;
  /** Configured columns absent from the header */
  missingColumns: string[];
  /** Entries in the mapping after the run */
  mappingSize: number;
}

export interface DetokenizeSummary {
  records: number;
  valuesRestored: number;
}
