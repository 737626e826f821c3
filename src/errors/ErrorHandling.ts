/**
 * Tokenizer Error Handling Module
 *
 * Typed errors for tokenize/detokenize runs plus conversion helpers for
 * failures raised by fs and stream APIs.
 */

/**
 * Base error class for all tokenizer errors
 */
export class TokenizationError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'TokenizationError';
    this.code = code;
    this.details = details || {};
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, TokenizationError.prototype);
  }
}

/**
 * Error thrown when a required file is missing
 */
export class NotFoundError extends TokenizationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Raised for a mapping row that does not have exactly two fields.
 * The mapping store reports it and moves on; it never leaves the store.
 */
export class MalformedRowError extends TokenizationError {
  public readonly line: number;
  public readonly fieldCount: number;

  constructor(message: string, line: number, fieldCount: number, details?: Record<string, unknown>) {
    super(message, 'MALFORMED_ROW', { ...(details || {}), line, fieldCount });
    this.name = 'MalformedRowError';
    this.line = line;
    this.fieldCount = fieldCount;
    Object.setPrototypeOf(this, MalformedRowError.prototype);
  }
}

/**
 * Error thrown when reading or writing a stream fails
 */
export class IOError extends TokenizationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'IO_ERROR', details);
    this.name = 'IOError';
    Object.setPrototypeOf(this, IOError.prototype);
  }
}

/**
 * Error thrown for invalid run configuration (unknown strategy, missing columns, bad flags)
 */
export class ConfigurationError extends TokenizationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Where a failure happened, used to build the converted error's message
 */
export interface ErrorContext {
  operation: string;
  path?: string;
}

function readStringField(error: unknown, field: string): string | undefined {
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Convert fs and stream errors to typed errors
 */
export function convertFsError(error: unknown, context: ErrorContext): TokenizationError {
  if (error instanceof TokenizationError) {
    return error;
  }

  const code = readStringField(error, 'code');
  const path = readStringField(error, 'path') ?? context.path;
  const reason = error instanceof Error ? error.message : String(error);
  const details = { operation: context.operation, path, code };

  if (code === 'ENOENT') {
    return new NotFoundError(`File '${path ?? 'unknown'}' not found`, details);
  }

  const target = path ? ` for '${path}'` : '';
  return new IOError(`${context.operation} failed${target}: ${reason}`, details);
}

/**
 * Like convertFsError, but a missing path is reported as an I/O failure.
 * Used on write paths, where ENOENT means the target directory is absent.
 */
export function toIOError(error: unknown, context: ErrorContext): TokenizationError {
  const converted = convertFsError(error, context);
  if (!(converted instanceof NotFoundError) || error instanceof TokenizationError) {
    return converted;
  }
  const reason = error instanceof Error ? error.message : String(error);
  const target = context.path ? ` for '${context.path}'` : '';
  return new IOError(`${context.operation} failed${target}: ${reason}`, converted.details);
}

/**
 * One-line description of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof TokenizationError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
