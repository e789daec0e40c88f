import { InvalidArgumentError } from 'commander';
import { BUNDLE_FILES } from '../retrieval/persistence';
import type { IndexConfig, SearchHit } from '../retrieval/types';

const RESPONSE_PREVIEW_LENGTH = 100;

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function formatBuildSummary(config: IndexConfig, outputDir: string): string {
  return [
    'Vector index statistics:',
    `  Total vectors: ${config.totalVectors}`,
    `  Dimension: ${config.dimension}`,
    `  Model: ${config.modelName}`,
    `Saved to ${outputDir} (${BUNDLE_FILES.index}, ${BUNDLE_FILES.metadata}, ${BUNDLE_FILES.config})`
  ].join('\n');
}

export function formatTestHits(query: string, hits: SearchHit[]): string {
  const lines = [`Test query: "${query}"`, `Top ${hits.length} results:`];
  for (const hit of hits) {
    lines.push(
      `  Rank ${hit.rank}:`,
      `    Tag: ${hit.record.tag}`,
      `    Pattern: ${hit.record.text}`,
      `    Score: ${hit.score.toFixed(4)}`,
      `    Distance: ${hit.distance.toFixed(4)}`
    );
    const [response] = hit.record.responses;
    if (response !== undefined) {
      lines.push(`    Response: ${truncate(response, RESPONSE_PREVIEW_LENGTH)}`);
    }
  }
  return lines.join('\n');
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
