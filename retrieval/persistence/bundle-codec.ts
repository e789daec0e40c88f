import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import type { Logger } from '../../observability/logger';
import type { EmbedderRegistry } from '../embedding/registry';
import { ConfigError, CorruptionError } from '../errors';
import { MetadataStore } from '../metadata-store';
import { SemanticIndex } from '../semantic-index';
import type { IndexConfig } from '../types';
import type { NativeIndexProvider } from '../vector/native-flat-index';
import { decodeConfig, encodeConfig } from './config-format';
import { decodeIndex, encodeIndex } from './index-format';
import { decodeMetadata, encodeMetadata } from './metadata-format';

export const BUNDLE_FILES = {
  index: 'vectors.index',
  metadata: 'metadata.json',
  config: 'config.json'
} as const;

export interface SaveBundleOptions {
  logger?: Logger;
}

export interface LoadBundleOptions {
  native?: NativeIndexProvider;
  logger?: Logger;
}

const pendingSaves = new Map<string, Promise<void>>();

/**
 * Writes index, metadata and config in that order. The previous config is
 * removed first, so a directory with a config.json always holds the
 * artifacts that config describes.
 */
export async function saveBundle(
  semanticIndex: SemanticIndex,
  directory: string,
  options: SaveBundleOptions = {}
): Promise<IndexConfig> {
  const target = path.resolve(directory);

  return withTargetLock(target, async () => {
    const index = semanticIndex.vectorIndex;
    const records = semanticIndex.records;
    if (records.length !== index.count) {
      throw new CorruptionError(`Refusing to save ${index.count} vectors with ${records.length} records`);
    }

    const config: IndexConfig = {
      modelName: semanticIndex.embedder.modelName,
      dimension: index.dimension,
      totalVectors: index.count
    };

    await fs.mkdir(target, { recursive: true });
    await fs.rm(path.join(target, BUNDLE_FILES.config), { force: true });
    await writeFileAtomic(path.join(target, BUNDLE_FILES.index), encodeIndex(index));
    await writeFileAtomic(path.join(target, BUNDLE_FILES.metadata), encodeMetadata(records));
    await writeFileAtomic(path.join(target, BUNDLE_FILES.config), encodeConfig(config));

    options.logger?.info('Saved index bundle', { path: target, totalVectors: config.totalVectors });
    return config;
  });
}

/**
 * Reads and cross-checks all three artifacts, then re-creates the embedder
 * the config names. Returns nothing partial: any failed step throws.
 */
export async function loadBundle(
  directory: string,
  registry: EmbedderRegistry,
  options: LoadBundleOptions = {}
): Promise<SemanticIndex> {
  const target = path.resolve(directory);

  const configPath = path.join(target, BUNDLE_FILES.config);
  let configText: string;
  try {
    configText = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read index config at ${configPath}`, { cause: error });
  }
  const config = decodeConfig(configText);

  const index = decodeIndex(
    await readArtifact(path.join(target, BUNDLE_FILES.index)),
    { native: options.native, logger: options.logger }
  );
  if (index.count !== config.totalVectors) {
    throw new CorruptionError(`Index holds ${index.count} vectors but config declares ${config.totalVectors}`);
  }
  if (index.dimension !== config.dimension) {
    throw new CorruptionError(`Index dimension ${index.dimension} does not match config dimension ${config.dimension}`);
  }

  const metadataText = (await readArtifact(path.join(target, BUNDLE_FILES.metadata))).toString('utf8');
  const records = decodeMetadata(metadataText);
  if (records.length !== index.count) {
    throw new CorruptionError(`Metadata holds ${records.length} records but index holds ${index.count} vectors`);
  }

  const embedder = registry.resolve(config.modelName);
  if (embedder.dimension !== undefined && embedder.dimension !== config.dimension) {
    throw new ConfigError(
      `Embedder ${config.modelName} produces ${embedder.dimension}-d vectors but the bundle is ${config.dimension}-d`
    );
  }

  const loaded = new SemanticIndex({ embedder, index, metadata: new MetadataStore(records) });
  options.logger?.info('Loaded index bundle', {
    path: target,
    totalVectors: config.totalVectors,
    model: config.modelName
  });
  return loaded;
}

async function readArtifact(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new CorruptionError(`Cannot read bundle artifact ${path.basename(filePath)}`, { cause: error });
  }
}

async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

async function withTargetLock<T>(target: string, task: () => Promise<T>): Promise<T> {
  const previous = pendingSaves.get(target) ?? Promise.resolve();
  const run = previous.then(task);
  const settled = run.then(() => undefined, () => undefined);
  pendingSaves.set(target, settled);
  try {
    return await run;
  } finally {
    if (pendingSaves.get(target) === settled) {
      pendingSaves.delete(target);
    }
  }
}
