/**
 * Pure helpers for the query console. Exported for testing.
 */

import { z } from 'zod';

const recordSchema = z.object({
  text: z.string(),
  tag: z.string(),
  responses: z.array(z.string()),
  kind: z.string()
});

const hitSchema = z.object({
  rank: z.number(),
  score: z.number(),
  distance: z.number(),
  record: recordSchema
});

export const matchResponseSchema = z.object({
  matched: z.boolean(),
  best: hitSchema.optional()
});

export const searchResponseSchema = z.object({
  results: z.array(hitSchema)
});

export const statsResponseSchema = z.object({
  loaded: z.boolean(),
  threshold: z.number(),
  total_vectors: z.number().optional(),
  dimension: z.number().optional(),
  model_name: z.string().optional()
});

export const chatResponseSchema = z.object({
  response: z.string(),
  sessionId: z.string(),
  source: z.string(),
  model: z.string(),
  timestamp: z.string()
});

export type HitView = z.infer<typeof hitSchema>;
export type MatchResponse = z.infer<typeof matchResponseSchema>;
export type StatsResponse = z.infer<typeof statsResponseSchema>;
export type ChatResponse = z.infer<typeof chatResponseSchema>;

export function formatHit(hit: HitView): string {
  return `${hit.rank}. [${hit.record.tag}] ${hit.record.text} (score ${hit.score.toFixed(3)})`;
}

export function formatHits(hits: HitView[]): string {
  if (!hits.length) {
    return 'No results.';
  }
  return hits.map(formatHit).join('\n');
}

export function formatMatch(result: MatchResponse): string {
  if (!result.best) {
    return 'No match: the index is empty.';
  }
  const verdict = result.matched ? 'Matched' : 'Below threshold';
  return `${verdict}: ${formatHit(result.best)}`;
}

export function formatStats(stats: StatsResponse): string {
  if (!stats.loaded) {
    return `Index not loaded (threshold ${stats.threshold})`;
  }
  return [
    `Total vectors: ${stats.total_vectors ?? 0}`,
    `Dimension: ${stats.dimension ?? 0}`,
    `Model: ${stats.model_name ?? 'unknown'}`,
    `Threshold: ${stats.threshold}`
  ].join('\n');
}

export function formatChatReply(reply: ChatResponse): string {
  return `${reply.response}\n(${reply.source} via ${reply.model})`;
}

export function describeHttpError(status: number, body: string): string {
  const parsed = z.object({ error: z.string() }).safeParse(parseJson(body));
  return parsed.success ? `HTTP ${status}: ${parsed.data.error}` : `HTTP ${status}: ${body}`;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
