/**
 * Token Store
 *
 * The set of bearer tokens this process accepts. Built once by the startup
 * routine from API_KEYS and handed by reference to whatever needs it.
 *
 * Production code only reads from a store. `snapshot`, `replace` and
 * `restore` exist so tests can swap the accepted tokens around a test body
 * and put the original set back afterwards.
 */

import type { AppConfig } from '../../config';

export class TokenStore {
  private tokens: Set<string>;

  constructor(tokens: Iterable<string> = []) {
    this.tokens = new Set(tokens);
  }

  /** Store accepting exactly the given tokens. */
  static fromList(tokens: readonly string[]): TokenStore {
    return new TokenStore(tokens);
  }

  /** Store built from the configured API keys. */
  static fromConfig(config: Pick<AppConfig, 'auth'>): TokenStore {
    return new TokenStore(config.auth.apiKeys);
  }

  /** True when at least one token is accepted. */
  isConfigured(): boolean {
    return this.tokens.size > 0;
  }

  contains(token: string): boolean {
    return this.tokens.has(token);
  }

  get size(): number {
    return this.tokens.size;
  }

  // ---------------------------------------------------------------------------
  // Test isolation
  // ---------------------------------------------------------------------------

  /** Copy of the current token set. */
  snapshot(): ReadonlySet<string> {
    return new Set(this.tokens);
  }

  /** Installs a replacement token set; `null` clears the store. */
  replace(tokens: Iterable<string> | null): void {
    this.tokens = new Set(tokens ?? []);
  }

  /** Re-installs a set previously returned by `snapshot()`. */
  restore(snapshot: ReadonlySet<string>): void {
    this.tokens = new Set(snapshot);
  }
}
