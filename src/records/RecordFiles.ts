import { createReadStream, createWriteStream, promises as fs, type Stats } from 'fs';
import { pipeline } from 'stream/promises';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify/sync';
import type { RecordFormat, RecordRow } from '../core/types.js';
import { IOError, NotFoundError, convertFsError, toIOError } from '../errors/ErrorHandling.js';

export const DEFAULT_DELIMITER = ',';
export const DEFAULT_ENCODING: BufferEncoding = 'utf8';
export const DEFAULT_RECORD_DELIMITER = '\n';

/**
 * Per-file callbacks. `header` sees the first row once; `row` maps every data
 * row. The header is written back exactly as read.
 */
export interface RecordTransform {
  header(columns: readonly string[]): void;
  row(row: RecordRow): RecordRow;
}

function isRecordRow(value: unknown): value is RecordRow {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}

/**
 * Serialize one record. A record holding a single empty field is written as
 * `""` so it does not read back as a blank line.
 */
export function formatRecord(row: RecordRow, delimiter: string, recordDelimiter: string): string {
  if (row.length === 1 && row[0] === '') {
    return `""${recordDelimiter}`;
  }
  return stringify([row], { delimiter, record_delimiter: recordDelimiter });
}

/**
 * Line ending of the first line in text, or undefined while no newline has been seen.
 * `previous` is the last character of the text read before it.
 */
export function detectRecordDelimiter(text: string, previous = ''): string | undefined {
  const index = text.indexOf('\n');
  if (index < 0) {
    return undefined;
  }
  const before = index > 0 ? text[index - 1] : previous;
  return before === '\r' ? '\r\n' : '\n';
}

/**
 * Fail with NotFoundError unless inputPath is an existing regular file.
 * Runs before the output is opened so a missing input leaves no output behind.
 */
export async function assertInputFile(inputPath: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(inputPath);
  } catch (error) {
    const converted = convertFsError(error, { operation: 'Reading input', path: inputPath });
    if (converted instanceof NotFoundError) {
      throw new NotFoundError(`Input file '${inputPath}' not found`, converted.details);
    }
    throw converted;
  }

  if (!stats.isFile()) {
    throw new NotFoundError(`Input file '${inputPath}' is not a regular file`, { path: inputPath });
  }
}

/**
 * Stream inputPath to outputPath one record at a time, applying transform to
 * every data row. Delimiter and encoding apply to both files.
 */
export async function transformRecordFile(
  inputPath: string,
  outputPath: string,
  format: RecordFormat,
  transform: RecordTransform,
): Promise<void> {
  const delimiter = format.delimiter ?? DEFAULT_DELIMITER;
  const encoding = format.encoding ?? DEFAULT_ENCODING;
  // Output lines end the way the input's first line does
  let recordDelimiter: string | undefined;

  async function* sniffLineEnding(chunks: AsyncIterable<unknown>): AsyncGenerator<string> {
    let previous = '';
    for await (const chunk of chunks) {
      if (typeof chunk !== 'string') {
        throw new IOError(`Unexpected chunk type while reading '${inputPath}'`, { path: inputPath });
      }
      if (recordDelimiter === undefined && chunk.length > 0) {
        recordDelimiter = detectRecordDelimiter(chunk, previous);
        previous = chunk[chunk.length - 1];
      }
      yield chunk;
    }
  }

  async function* applyTransform(records: AsyncIterable<unknown>): AsyncGenerator<string> {
    let headerSeen = false;
    for await (const record of records) {
      if (!isRecordRow(record)) {
        throw new IOError(`Unexpected record shape while reading '${inputPath}'`, { path: inputPath });
      }
      const lineEnding = recordDelimiter ?? DEFAULT_RECORD_DELIMITER;
      if (!headerSeen) {
        headerSeen = true;
        transform.header(record);
        yield formatRecord(record, delimiter, lineEnding);
        continue;
      }
      yield formatRecord(transform.row(record), delimiter, lineEnding);
    }
  }

  try {
    await pipeline(
      createReadStream(inputPath, { encoding }),
      sniffLineEnding,
      parse({ delimiter, relax_column_count: true, relax_quotes: true, skip_empty_lines: true }),
      applyTransform,
      createWriteStream(outputPath, { encoding }),
    );
  } catch (error) {
    throw toIOError(error, { operation: 'Transforming records', path: inputPath });
  }
}
