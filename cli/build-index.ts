/**
 * Builds a vector index bundle from an intents JSON file.
 */

import { Command } from 'commander';
import { embedderRegistryOptions, loadSettings } from '../config/settings';
import { ConsoleLogger, type Logger } from '../observability/logger';
import { createDefaultRegistry, type EmbedderRegistry } from '../retrieval/embedding/registry';
import { loadIntentsFile } from '../retrieval/intents-loader';
import { saveBundle } from '../retrieval/persistence';
import { buildSemanticIndex } from '../retrieval/semantic-index';
import type { IndexConfig, SearchHit } from '../retrieval/types';
import { formatBuildSummary, formatTestHits, parsePositiveInt } from './build-index-helpers';

export interface BuildIndexOptions {
  input: string;
  output: string;
  model: string;
  batchSize: number;
  testQuery?: string;
}

export interface BuildIndexDeps {
  registry: EmbedderRegistry;
  logger: Logger;
  print: (line: string) => void;
}

export interface BuildIndexOutcome {
  config: IndexConfig;
  testHits?: SearchHit[];
}

export async function runBuildIndex(options: BuildIndexOptions, deps: BuildIndexDeps): Promise<BuildIndexOutcome> {
  deps.logger.info('Building vector index', {
    input: options.input,
    output: options.output,
    model: options.model,
    batchSize: options.batchSize
  });

  const records = await loadIntentsFile(options.input);
  const embedder = deps.registry.resolve(options.model);
  const semanticIndex = await buildSemanticIndex(records, embedder, {
    batchSize: options.batchSize,
    logger: deps.logger
  });
  const config = await saveBundle(semanticIndex, options.output, { logger: deps.logger });
  deps.print(formatBuildSummary(config, options.output));

  if (!options.testQuery) {
    return { config };
  }

  const testHits = await semanticIndex.search(options.testQuery, 5);
  deps.print(formatTestHits(options.testQuery, testHits));
  return { config, testHits };
}

export function createBuildIndexCommand(
  deps: BuildIndexDeps,
  defaults = loadSettings()
): Command {
  return new Command('build-index')
    .description('Build a vector index bundle from an intents JSON file')
    .option('--input <path>', 'Intents JSON file', defaults.intentsPath)
    .option('--output <dir>', 'Output directory for the bundle', defaults.indexPath)
    .option('--model <id>', 'Embedding model identifier', defaults.embeddingModel)
    .option('--batch-size <n>', 'Encode batch size', parsePositiveInt, defaults.embeddingBatchSize)
    .option('--test-query <text>', 'Query to run against the new index')
    .action(async (opts: BuildIndexOptions) => {
      await runBuildIndex(opts, deps);
    });
}

if (require.main === module) {
  const settings = loadSettings();
  const logger = new ConsoleLogger({ level: settings.logLevel, scope: 'build-index' });
  const registry = createDefaultRegistry(embedderRegistryOptions(settings));

  createBuildIndexCommand({ registry, logger, print: (line) => console.log(line) }, settings)
    .parseAsync(process.argv)
    .catch((error) => {
      logger.error('Failed to build vector index', { error });
      process.exit(1);
    });
}
