#!/usr/bin/env node
import path from 'path';
import { main } from '../index.js';

// Script names this file runs under: compiled, from source, or the npm bin link
const ENTRY_NAMES = new Set(['cli.js', 'cli.ts', 'tabtoken']);

function invokedAsEntry(entry: string | undefined): boolean {
  return entry !== undefined && ENTRY_NAMES.has(path.basename(entry));
}

if (invokedAsEntry(process.argv[1])) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('tabtoken: unexpected failure', error);
      process.exitCode = 1;
    },
  );
}
