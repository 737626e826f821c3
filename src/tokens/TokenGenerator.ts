import { v4 as uuidv4 } from 'uuid';
import { ConfigurationError } from '../errors/ErrorHandling.js';
import type { TokenMap } from '../mapping/TokenMap.js';

export type TokenStrategy = 'random-unique' | 'sequential-counter';

/**
 * Names accepted on the command line and in config files
 */
const STRATEGY_ALIASES = new Map<string, TokenStrategy>([
  ['random-unique', 'random-unique'],
  ['uuid', 'random-unique'],
  ['sequential-counter', 'sequential-counter'],
  ['sequential', 'sequential-counter'],
]);

export const STRATEGY_NAMES: readonly string[] = Array.from(STRATEGY_ALIASES.keys());

export function parseStrategy(name: string): TokenStrategy {
  const strategy = STRATEGY_ALIASES.get(name.trim().toLowerCase());
  if (!strategy) {
    throw new ConfigurationError(
      `Invalid token strategy '${name}'. Expected one of: ${STRATEGY_NAMES.join(', ')}`,
      { strategy: name },
    );
  }
  return strategy;
}

/**
 * Produces the token for a value: the one it already has in the mapping, or a
 * fresh one that is not yet a key. Callers insert the returned pair.
 */
export interface TokenGenerator {
  readonly strategy: TokenStrategy;
  tokenFor(value: string, map: TokenMap): string;
}

/**
 * Draws v4 UUIDs, redrawing on the (practically impossible) hit of an existing key
 */
export class RandomUniqueGenerator implements TokenGenerator {
  readonly strategy = 'random-unique';

  constructor(private readonly nextId: () => string = uuidv4) {}

  tokenFor(value: string, map: TokenMap): string {
    const existing = map.tokenOf(value);
    if (existing !== undefined) {
      return existing;
    }

    let token = this.nextId();
    while (map.hasToken(token)) {
      token = this.nextId();
    }
    return token;
  }
}

/**
 * Picks the smallest positive integer whose decimal form is not yet a key
 */
export class SequentialCounterGenerator implements TokenGenerator {
  readonly strategy = 'sequential-counter';

  tokenFor(value: string, map: TokenMap): string {
    const existing = map.tokenOf(value);
    if (existing !== undefined) {
      return existing;
    }

    let next = 1;
    while (map.hasToken(String(next))) {
      next++;
    }
    return String(next);
  }
}

export function createTokenGenerator(strategy: string): TokenGenerator {
  switch (parseStrategy(strategy)) {
    case 'random-unique':
      return new RandomUniqueGenerator();
    case 'sequential-counter':
      return new SequentialCounterGenerator();
  }
}
