/**
 * A single token to original value association
 */
export interface MappingEntry {
  token: string;
  value: string;
}

/**
 * In-memory token to value mapping with a secondary value to token index,
 * so "does this value already have a token" is a lookup instead of a scan.
 */
export class TokenMap {
  private readonly tokenToValue = new Map<string, string>();
  private readonly valueToToken = new Map<string, string>();

  static from(entries: Iterable<MappingEntry>): TokenMap {
    const map = new TokenMap();
    for (const entry of entries) {
      map.set(entry.token, entry.value);
    }
    return map;
  }

  get size(): number {
    return this.tokenToValue.size;
  }

  hasToken(token: string): boolean {
    return this.tokenToValue.has(token);
  }

  valueOf(token: string): string | undefined {
    return this.tokenToValue.get(token);
  }

  tokenOf(value: string): string | undefined {
    return this.valueToToken.get(value);
  }

  /**
   * Associate token with value. Re-setting a token drops its old value from the
   * reverse index; a value that already has a token keeps the first one there.
   */
  set(token: string, value: string): void {
    const previous = this.tokenToValue.get(token);
    this.tokenToValue.set(token, value);

    if (previous !== undefined && previous !== value && this.valueToToken.get(previous) === token) {
      this.valueToToken.delete(previous);
      const fallback = this.findToken(previous);
      if (fallback !== undefined) {
        this.valueToToken.set(previous, fallback);
      }
    }

    if (!this.valueToToken.has(value)) {
      this.valueToToken.set(value, token);
    }
  }

  // Only reached when a loaded file reassigns a token.
  private findToken(value: string): string | undefined {
    for (const [token, candidate] of this.tokenToValue) {
      if (candidate === value) {
        return token;
      }
    }
    return undefined;
  }

  /**
   * Entries in insertion order
   */
  *entries(): IterableIterator<MappingEntry> {
    for (const [token, value] of this.tokenToValue) {
      yield { token, value };
    }
  }
}
