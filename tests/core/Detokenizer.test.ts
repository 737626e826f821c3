import { promises as fs } from 'fs';
import path from 'path';
import { Detokenizer, detokenize } from '../../src/core/Detokenizer.js';
import { tokenize } from '../../src/core/Tokenizer.js';
import { NotFoundError } from '../../src/errors/ErrorHandling.js';
import { TokenMap } from '../../src/mapping/TokenMap.js';
import {
  PEOPLE_CSV,
  createReporterStub,
  fileExists,
  makeTempDir,
  readText,
  removeDir,
} from '../helpers/fixtures.js';

describe('detokenize', () => {
  let dir: string;
  let inputPath: string;
  let outputPath: string;
  let mappingPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    inputPath = path.join(dir, 'people.tok.csv');
    outputPath = path.join(dir, 'people.restored.csv');
    mappingPath = path.join(dir, 'token_map.csv');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('restores the original ssn values', async () => {
    await fs.writeFile(inputPath, 'id,name,ssn\n1,Alice,1\n2,Bob,2\n3,Alice,3\n', 'utf-8');
    await fs.writeFile(mappingPath, '1,111-22-3333\n2,444-55-6666\n3,777-88-9999\n', 'utf-8');

    await detokenize({ inputPath, outputPath, mappingPath }, createReporterStub());

    expect(await readText(outputPath)).toBe(
      'id,name,ssn\n1,Alice,111-22-3333\n2,Bob,444-55-6666\n3,Alice,777-88-9999\n',
    );
  });

  it('replaces known tokens in any column and leaves the header alone', async () => {
    await fs.writeFile(inputPath, 'a,1\n1,x\nz,2\n', 'utf-8');
    await fs.writeFile(mappingPath, '1,one\n2,two\n', 'utf-8');

    const summary = await detokenize({ inputPath, outputPath, mappingPath }, createReporterStub());

    expect(await readText(outputPath)).toBe('a,1\none,x\nz,two\n');
    expect(summary).toEqual({ records: 2, valuesRestored: 2 });
  });

  it('keeps a lone empty field through tokenize and repeated detokenize passes', async () => {
    const sourcePath = path.join(dir, 'values.csv');
    const againPath = path.join(dir, 'values.again.csv');
    await fs.writeFile(sourcePath, 'v\na\n""\nb\n', 'utf-8');

    await tokenize(
      {
        inputPath: sourcePath,
        outputPath: inputPath,
        mappingPath,
        columns: ['v'],
        strategy: 'sequential',
      },
      createReporterStub(),
    );
    expect(await readText(inputPath)).toBe('v\n1\n2\n3\n');
    expect(await readText(mappingPath)).toBe('1,a\n2,\n3,b\n');

    await detokenize({ inputPath, outputPath, mappingPath }, createReporterStub());
    expect(await readText(outputPath)).toBe('v\na\n""\nb\n');

    const summary = await detokenize(
      { inputPath: outputPath, outputPath: againPath, mappingPath },
      createReporterStub(),
    );
    expect(await readText(againPath)).toBe('v\na\n""\nb\n');
    expect(summary).toEqual({ records: 3, valuesRestored: 0 });
  });

  it('fails with NotFoundError when the mapping file is missing', async () => {
    await fs.writeFile(inputPath, 'id\n1\n', 'utf-8');

    await expect(
      detokenize({ inputPath, outputPath, mappingPath }, createReporterStub()),
    ).rejects.toThrow(new NotFoundError(`Token map file '${mappingPath}' not found`));

    expect(await fileExists(outputPath)).toBe(false);
  });

  it('fails with NotFoundError when the input file is missing', async () => {
    await fs.writeFile(mappingPath, '1,one\n', 'utf-8');

    await expect(
      detokenize({ inputPath, outputPath, mappingPath }, createReporterStub()),
    ).rejects.toBeInstanceOf(NotFoundError);

    expect(await fileExists(outputPath)).toBe(false);
  });

  it('undoes a uuid tokenization through the saved mapping', async () => {
    const sourcePath = path.join(dir, 'people.csv');
    await fs.writeFile(sourcePath, PEOPLE_CSV, 'utf-8');

    await tokenize(
      {
        inputPath: sourcePath,
        outputPath: inputPath,
        mappingPath,
        columns: ['name', 'ssn'],
        strategy: 'uuid',
      },
      createReporterStub(),
    );
    expect(await readText(inputPath)).not.toBe(PEOPLE_CSV);

    await detokenize({ inputPath, outputPath, mappingPath }, createReporterStub());

    expect(await readText(outputPath)).toBe(PEOPLE_CSV);
  });
});

describe('Detokenizer', () => {
  it('counts only the fields it restores', () => {
    const detokenizer = new Detokenizer(TokenMap.from([{ token: 'T', value: 'secret' }]));

    expect(detokenizer.detokenizeRow(['T', 'plain', 'T'])).toEqual(['secret', 'plain', 'secret']);
    expect(detokenizer.detokenizeRow(['other'])).toEqual(['other']);
    expect(detokenizer.summary()).toEqual({ records: 2, valuesRestored: 2 });
  });
});
