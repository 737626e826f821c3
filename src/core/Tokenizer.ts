import { MappingStore } from '../mapping/MappingStore.js';
import type { TokenMap } from '../mapping/TokenMap.js';
import { assertInputFile, transformRecordFile } from '../records/RecordFiles.js';
import { createTokenGenerator, type TokenGenerator } from '../tokens/TokenGenerator.js';
import type { RecordRow, Reporter, TokenizeOptions, TokenizeSummary } from './types.js';

/**
 * Replaces configured column values with tokens, growing the mapping as new
 * values show up. One instance handles one pass over one file.
 */
export class Tokenizer {
  private indices: number[] = [];
  private records = 0;
  private tokensMinted = 0;
  private tokensReused = 0;
  private missingColumns: string[] = [];

  constructor(
    private readonly columns: readonly string[],
    private readonly generator: TokenGenerator,
    private readonly map: TokenMap,
    private readonly reporter: Reporter,
  ) {}

  /**
   * Resolve configured columns against the header. Every position carrying a
   * configured name is tokenized; names with no position are reported once.
   */
  bindHeader(header: readonly string[]): void {
    const wanted = new Set(this.columns);
    this.indices = header.flatMap((name, index) => (wanted.has(name) ? [index] : []));

    const present = new Set(header);
    this.missingColumns = Array.from(wanted).filter((column) => !present.has(column));
    for (const column of this.missingColumns) {
      this.reporter.warn(`Column '${column}' not found in input file.`, { column });
    }
  }

  tokenizeRow(row: RecordRow): RecordRow {
    this.records++;
    const result = [...row];
    for (const index of this.indices) {
      if (index < result.length) {
        result[index] = this.tokenFor(result[index]);
      }
    }
    return result;
  }

  tokenFor(value: string): string {
    const existing = this.map.tokenOf(value);
    if (existing !== undefined) {
      this.tokensReused++;
      return existing;
    }

    const token = this.generator.tokenFor(value, this.map);
    this.map.set(token, value);
    this.tokensMinted++;
    return token;
  }

  summary(): TokenizeSummary {
    return {
      records: this.records,
      tokensMinted: this.tokensMinted,
      tokensReused: this.tokensReused,
      missingColumns: [...this.missingColumns],
      mappingSize: this.map.size,
    };
  }
}

/**
 * Tokenize options.columns of options.inputPath into options.outputPath and
 * persist the mapping once, after the whole file has been written.
 */
export async function tokenize(options: TokenizeOptions, reporter: Reporter): Promise<TokenizeSummary> {
  const generator = createTokenGenerator(options.strategy);
  await assertInputFile(options.inputPath);

  const store = new MappingStore({
    reporter,
    hideSensitive: options.hideSensitive,
    sensitiveMask: options.sensitiveMask,
  });
  const map = await store.load(options.mappingPath, { required: false });

  const tokenizer = new Tokenizer(options.columns, generator, map, reporter);
  reporter.debug(`Tokenizing ${options.inputPath} with ${generator.strategy} tokens`, {
    columns: [...options.columns],
    knownTokens: map.size,
  });

  await transformRecordFile(options.inputPath, options.outputPath, options, {
    header: (columns) => tokenizer.bindHeader(columns),
    row: (row) => tokenizer.tokenizeRow(row),
  });

  await store.save(options.mappingPath, map);
  return tokenizer.summary();
}
