// Content deduplication for accumulated assistant text
// Models often restate an earlier answer nearly verbatim before finishing.

import { similarityRatio } from '../../utils/similarity.js';
import type { DeduplicationOptions } from './types.js';

export const DEFAULT_DEDUPLICATION_OPTIONS: DeduplicationOptions = {
  minSimilarityLength: 100,
  similarityThreshold: 0.94,
};

export function normalizeBlock(block: string): string {
  return block.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Joins the distinct blocks with a blank line. First occurrence wins; later
 * blocks are compared against kept blocks only.
 */
export function deduplicateContent(
  blocks: readonly string[],
  options: Partial<DeduplicationOptions> = {}
): string {
  const { minSimilarityLength, similarityThreshold } = { ...DEFAULT_DEDUPLICATION_OPTIONS, ...options };
  const kept: Array<{ text: string; normalized: string }> = [];

  for (const block of blocks) {
    const text = block.trim();
    if (!text) continue;

    const normalized = normalizeBlock(text);
    const duplicate = kept.some(existing => {
      if (existing.normalized === normalized) return true;
      if (normalized.length < minSimilarityLength || existing.normalized.length < minSimilarityLength) {
        return false;
      }
      return similarityRatio(existing.normalized, normalized) >= similarityThreshold;
    });

    if (!duplicate) {
      kept.push({ text, normalized });
    }
  }

  return kept.map(k => k.text).join('\n\n');
}
