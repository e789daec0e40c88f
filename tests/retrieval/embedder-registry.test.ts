import { createDefaultRegistry, EmbedderRegistry } from '../../retrieval/embedding/registry';
import { ConfigError, EmbeddingError } from '../../retrieval/errors';
import { TableEmbedder } from '../fixtures/table-embedder';

describe('EmbedderRegistry', () => {
  it('resolves identifiers by prefix to fresh instances', () => {
    const registry = new EmbedderRegistry().register('table-', () => new TableEmbedder({}));

    const first = registry.resolve('table-2');
    const second = registry.resolve('table-2');

    expect(first.modelName).toBe('table-2');
    expect(first).not.toBe(second);
  });

  it('prefers the most recently registered factory', () => {
    const registry = new EmbedderRegistry()
      .register('table-', () => new TableEmbedder({}, 2))
      .register('table-', () => new TableEmbedder({}, 5, 'table-2'));

    expect(registry.resolve('table-2').dimension).toBe(5);
    expect(registry.has('table-2')).toBe(true);
    expect(registry.has('other')).toBe(false);
  });

  it('rejects unknown and empty identifiers', () => {
    const registry = new EmbedderRegistry();

    expect(() => registry.resolve('mystery-model')).toThrow('Unknown embedding model: mystery-model');
    expect(() => registry.resolve('')).toThrow(ConfigError);
  });

  it('rejects a factory that builds a different model', () => {
    const registry = new EmbedderRegistry().register('table-', () => new TableEmbedder({}, 2, 'table-2'));

    expect(() => registry.resolve('table-3')).toThrow('Embedder for table-3 reports model table-2');
  });
});

describe('createDefaultRegistry', () => {
  it('builds hashing embedders of the requested width', () => {
    const embedder = createDefaultRegistry().resolve('hashing-64');
    expect(embedder.dimension).toBe(64);
  });

  it('builds remote embedders only when an API key is configured', () => {
    expect(() => createDefaultRegistry().resolve('openai:text-embed')).toThrow(EmbeddingError);

    const registry = createDefaultRegistry({ openai: { apiKey: 'test-secret' } });
    expect(registry.resolve('openai:text-embed').modelName).toBe('openai:text-embed');
  });
});
