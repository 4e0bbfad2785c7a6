/**
 * Model Cache
 *
 * In-memory map from (credential, base URL) to the model ids a provider last
 * reported. Entries never expire; a successful fetch overwrites the entry and
 * invalidate() removes it.
 */

import { createHash } from 'crypto';

export class ModelCache {
  private readonly entries = new Map<string, readonly string[]>();

  /**
   * Cached model ids for the key, or undefined on a miss
   */
  get(credential: string, baseUrl: string): string[] | undefined {
    const models = this.entries.get(this.key(credential, baseUrl));
    return models ? [...models] : undefined;
  }

  /**
   * Replace the entry for the key. The stored list is a frozen copy, swapped
   * in with a single assignment.
   */
  set(credential: string, baseUrl: string, models: readonly string[]): void {
    this.entries.set(this.key(credential, baseUrl), Object.freeze([...models]));
  }

  has(credential: string, baseUrl: string): boolean {
    return this.entries.has(this.key(credential, baseUrl));
  }

  invalidate(credential: string, baseUrl: string): boolean {
    return this.entries.delete(this.key(credential, baseUrl));
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  // API keys are not kept in clear text as map keys
  private key(credential: string, baseUrl: string): string {
    const digest = createHash('sha256').update(credential).digest('hex');
    return `${digest}|${baseUrl}`;
  }
}
