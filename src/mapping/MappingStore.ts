import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { Reporter } from '../core/types.js';
import {
  MalformedRowError,
  NotFoundError,
  convertFsError,
  toIOError,
} from '../errors/ErrorHandling.js';
import { presentFields } from '../utils/SensitiveData.js';
import { TokenMap } from './TokenMap.js';

export interface MappingStoreOptions {
  reporter: Reporter;
  /** Mask field contents when reporting malformed rows */
  hideSensitive?: boolean;
  sensitiveMask?: string;
}

export interface LoadOptions {
  /** Missing file is a NotFoundError instead of an empty mapping */
  required: boolean;
}

const MAPPING_ENCODING = 'utf8';

function isFieldList(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((field) => typeof field === 'string');
}

/**
 * Persists a TokenMap as headerless two-field rows: token,original_value.
 * All mapping file I/O goes through this class.
 */
export class MappingStore {
  private readonly reporter: Reporter;
  private readonly hideSensitive: boolean;
  private readonly sensitiveMask?: string;

  constructor(options: MappingStoreOptions) {
    this.reporter = options.reporter;
    this.hideSensitive = options.hideSensitive ?? false;
    this.sensitiveMask = options.sensitiveMask;
  }

  async load(mappingPath: string, options: LoadOptions): Promise<TokenMap> {
    let content: string;
    try {
      content = await fs.readFile(mappingPath, MAPPING_ENCODING);
    } catch (error) {
      const converted = convertFsError(error, { operation: 'Reading token map', path: mappingPath });
      if (converted instanceof NotFoundError) {
        if (options.required) {
          throw new NotFoundError(`Token map file '${mappingPath}' not found`, converted.details);
        }
        this.reporter.debug(`No token map at ${mappingPath}, starting with an empty mapping`);
        return new TokenMap();
      }
      throw converted;
    }

    let rows: unknown[];
    try {
      rows = parse(content, { relax_column_count: true, relax_quotes: true });
    } catch (error) {
      throw convertFsError(error, { operation: 'Parsing token map', path: mappingPath });
    }

    const map = new TokenMap();
    rows.forEach((row, index) => {
      const line = index + 1;
      if (!isFieldList(row) || row.length !== 2) {
        const fields = isFieldList(row) ? row : [];
        this.report(new MalformedRowError(
          `Skipping malformed row in token map file: expected 2 fields, got ${fields.length}`,
          line,
          fields.length,
          { path: mappingPath, fields: presentFields(fields, this.hideSensitive, this.sensitiveMask) },
        ));
        return;
      }

      const [token, value] = row;
      const existing = map.tokenOf(value);
      if (existing !== undefined && existing !== token) {
        this.reporter.warn(`Token map assigns a second token to one value; keeping '${existing}'`, {
          path: mappingPath,
          line,
          token,
        });
      }
      map.set(token, value);
    });

    this.reporter.debug(`Loaded ${map.size} token(s) from ${mappingPath}`);
    return map;
  }

  /**
   * Overwrite mappingPath with every entry. Writes a sibling temp file and
   * renames it into place, so a failed save leaves the old file untouched.
   */
  async save(mappingPath: string, map: TokenMap): Promise<void> {
    const rows = Array.from(map.entries(), (entry) => [entry.token, entry.value]);
    const content = stringify(rows);
    const tempPath = path.join(
      path.dirname(mappingPath),
      `.${path.basename(mappingPath)}.${process.pid}.tmp`,
    );

    try {
      await fs.writeFile(tempPath, content, MAPPING_ENCODING);
      await fs.rename(tempPath, mappingPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw toIOError(error, { operation: 'Writing token map', path: mappingPath });
    }

    this.reporter.debug(`Saved ${map.size} token(s) to ${mappingPath}`);
  }

  private report(error: MalformedRowError): void {
    this.reporter.warn(error.message, { code: error.code, ...error.details });
  }
}
