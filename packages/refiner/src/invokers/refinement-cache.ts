import { createHash } from 'node:crypto';

/**
 * Store for refined chunk texts, keyed by `createRefinementCacheKey`.
 * Only successful refinements are stored.
 */
export interface RefinementCache {
  get(key: string): string | undefined;
  set(key: string, refinedText: string): void;
}

/**
 * SHA-256 over the model, the system prompt the chunk was refined with and
 * the chunk text
 */
export function createRefinementCacheKey(
  modelName: string,
  systemPrompt: string,
  text: string,
): string {
  return createHash('sha256')
    .update(JSON.stringify([modelName, systemPrompt, text]))
    .digest('hex');
}

export class InMemoryRefinementCache implements RefinementCache {
  private readonly entries = new Map<string, string>();

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  set(key: string, refinedText: string): void {
    this.entries.set(key, refinedText);
  }

  get size(): number {
    return this.entries.size;
  }
}
