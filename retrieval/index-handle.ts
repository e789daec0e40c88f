import type { Logger } from '../observability/logger';
import { silentLogger } from '../observability/logger';
import type { EmbedderRegistry } from './embedding/registry';
import { ConfigError, NotLoadedError } from './errors';
import { loadBundle, type LoadBundleOptions } from './persistence';
import type { SemanticIndex } from './semantic-index';

export interface IndexHandleOptions extends LoadBundleOptions {
  registry: EmbedderRegistry;
}

/**
 * Owns the currently published index. Readers take `current()` once per
 * call; publishing replaces the reference in a single assignment.
 */
export class IndexHandle {
  private active?: SemanticIndex;
  private readonly registry: EmbedderRegistry;
  private readonly loadOptions: LoadBundleOptions;
  private readonly logger: Logger;
  private sourcePath?: string;

  constructor(options: IndexHandleOptions) {
    this.registry = options.registry;
    this.loadOptions = { native: options.native, logger: options.logger };
    this.logger = options.logger ?? silentLogger;
  }

  get isLoaded(): boolean {
    return this.active !== undefined;
  }

  get path(): string | undefined {
    return this.sourcePath;
  }

  peek(): SemanticIndex | undefined {
    return this.active;
  }

  current(): SemanticIndex {
    const snapshot = this.active;
    if (!snapshot) {
      throw new NotLoadedError();
    }
    return snapshot;
  }

  publish(index: SemanticIndex): void {
    this.active = index;
    this.logger.info('Published index', { totalVectors: index.config.totalVectors });
  }

  /**
   * Loads a bundle and publishes it. On failure the previously published
   * index, if any, stays active and the error is rethrown.
   */
  async load(directory: string): Promise<SemanticIndex> {
    try {
      const loaded = await loadBundle(directory, this.registry, this.loadOptions);
      this.sourcePath = directory;
      this.publish(loaded);
      return loaded;
    } catch (error) {
      this.logger.error('Failed to load index bundle', {
        path: directory,
        error,
        keptPrevious: this.isLoaded
      });
      throw error;
    }
  }

  async reload(directory?: string): Promise<SemanticIndex> {
    const target = directory ?? this.sourcePath;
    if (!target) {
      throw new ConfigError('No index path to reload from');
    }
    return this.load(target);
  }
}
