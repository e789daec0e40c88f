import { assertThreshold } from './errors';
import type { SearchHit } from './types';

export const DEFAULT_CONTEXT_THRESHOLD = 0.3;
export const NO_CONTEXT_FOUND = 'No specific information found in the knowledge base for this query.';

/**
 * Formats hits above the threshold as numbered context blocks. A response
 * already shown by an earlier hit is never repeated.
 */
export function assembleContext(hits: readonly SearchHit[], threshold = DEFAULT_CONTEXT_THRESHOLD): string {
  assertThreshold(threshold);

  const seen = new Set<string>();
  const blocks: string[] = [];

  for (const hit of [...hits].sort((a, b) => a.rank - b.rank)) {
    if (hit.score < threshold) {
      continue;
    }

    const fresh = hit.record.responses.filter((response) => !seen.has(response));
    if (fresh.length === 0) {
      continue;
    }
    for (const response of hit.record.responses) {
      seen.add(response);
    }

    blocks.push([
      `[Context ${hit.rank}] (Relevance: ${hit.score.toFixed(2)})`,
      `Topic: ${hit.record.tag}`,
      `Related Query: ${hit.record.text}`,
      `Information: ${fresh[0]}`
    ].join('\n'));
  }

  return blocks.length > 0 ? blocks.join('\n\n') : NO_CONTEXT_FOUND;
}
