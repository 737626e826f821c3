import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { Reporter } from '../../src/core/types.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'tabtoken-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function readText(file: string): Promise<string> {
  return fs.readFile(file, 'utf-8');
}

export async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export function createReporterStub(): jest.Mocked<Reporter> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
  };
}

export const PEOPLE_CSV =
  'id,name,ssn\n1,Alice,111-22-3333\n2,Bob,444-55-6666\n3,Alice,777-88-9999\n';

export const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
