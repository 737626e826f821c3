import { promises as fs } from 'fs';
import path from 'path';
import winston from 'winston';
import { main } from '../src/index.js';
import { PEOPLE_CSV, fileExists, makeTempDir, readText, removeDir } from './helpers/fixtures.js';

function createSilentLogger(): winston.Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}

describe('main', () => {
  let dir: string;
  let logger: winston.Logger;

  beforeEach(async () => {
    dir = await makeTempDir();
    logger = createSilentLogger();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('tokenizes and then detokenizes a file', async () => {
    const input = path.join(dir, 'people.csv');
    const tokenized = path.join(dir, 'people.tok.csv');
    const restored = path.join(dir, 'people.restored.csv');
    const map = path.join(dir, 'map.csv');
    await fs.writeFile(input, PEOPLE_CSV, 'utf-8');
    const info = jest.spyOn(logger, 'info');

    const tokenizeCode = await main(
      [input, tokenized, '--columns', 'ssn', '--strategy', 'sequential', '--map', map],
      { logger, env: {}, cwd: dir },
    );

    expect(tokenizeCode).toBe(0);
    expect(await readText(tokenized)).toBe('id,name,ssn\n1,Alice,1\n2,Bob,2\n3,Alice,3\n');
    expect(info).toHaveBeenCalledWith(
      `Data tokenized successfully. Output saved to '${tokenized}'. Token map saved to '${map}'.`,
    );
    expect(info).toHaveBeenCalledWith(
      'Processed 3 record(s): 3 new token(s), 0 reused, 3 in map.',
    );

    const detokenizeCode = await main([tokenized, restored, '--detokenize', '--map', map], {
      logger,
      env: {},
      cwd: dir,
    });

    expect(detokenizeCode).toBe(0);
    expect(await readText(restored)).toBe(PEOPLE_CSV);
    expect(info).toHaveBeenCalledWith('Restored 3 value(s) across 3 record(s).');
  });

  it('logs the error and exits non-zero when the input is missing', async () => {
    const input = path.join(dir, 'absent.csv');
    const output = path.join(dir, 'out.csv');
    const error = jest.spyOn(logger, 'error');

    const code = await main([input, output, '-c', 'ssn'], { logger, env: {}, cwd: dir });

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith(
      `An error occurred: NotFoundError: Input file '${input}' not found`,
    );
    expect(await fileExists(output)).toBe(false);
  });

  it('rejects an unknown strategy before touching any file', async () => {
    const input = path.join(dir, 'people.csv');
    const output = path.join(dir, 'out.csv');
    await fs.writeFile(input, PEOPLE_CSV, 'utf-8');
    const error = jest.spyOn(logger, 'error');

    const code = await main([input, output, '-c', 'ssn', '-s', 'md5'], { logger, env: {}, cwd: dir });

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith(
      "An error occurred: ConfigurationError: Invalid token strategy 'md5'. " +
        'Expected one of: random-unique, uuid, sequential-counter, sequential',
    );
    expect(await fileExists(output)).toBe(false);
  });

  it('prints help and exits zero', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    expect(await main(['--help'], { logger, env: {} })).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);

    log.mockRestore();
  });
});
