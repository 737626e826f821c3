import { MappingStore } from '../mapping/MappingStore.js';
import type { TokenMap } from '../mapping/TokenMap.js';
import { assertInputFile, transformRecordFile } from '../records/RecordFiles.js';
import type { DetokenizeOptions, DetokenizeSummary, RecordRow, Reporter } from './types.js';

/**
 * Restores original values. Column-agnostic: every field of every row that
 * exactly equals a known token is replaced, whatever column it sits in.
 */
export class Detokenizer {
  private records = 0;
  private valuesRestored = 0;

  constructor(private readonly map: TokenMap) {}

  detokenizeRow(row: RecordRow): RecordRow {
    this.records++;
    return row.map((field) => {
      const original = this.map.valueOf(field);
      if (original === undefined) {
        return field;
      }
      this.valuesRestored++;
      return original;
    });
  }

  summary(): DetokenizeSummary {
    return { records: this.records, valuesRestored: this.valuesRestored };
  }
}

export async function detokenize(
  options: DetokenizeOptions,
  reporter: Reporter,
): Promise<DetokenizeSummary> {
  const store = new MappingStore({
    reporter,
    hideSensitive: options.hideSensitive,
    sensitiveMask: options.sensitiveMask,
  });
  const map = await store.load(options.mappingPath, { required: true });
  await assertInputFile(options.inputPath);

  const detokenizer = new Detokenizer(map);
  reporter.debug(`Detokenizing ${options.inputPath} against ${map.size} token(s)`);

  await transformRecordFile(options.inputPath, options.outputPath, options, {
    header: () => undefined,
    row: (row) => detokenizer.detokenizeRow(row),
  });

  return detokenizer.summary();
}
