import fs from 'fs';
import os from 'os';
import path from 'path';
import { EmbedderRegistry } from '../../retrieval/embedding/registry';
import { ConfigError, CorruptionError } from '../../retrieval/errors';
import { loadBundle, readIndexHeader, saveBundle } from '../../retrieval/persistence';
import { buildSemanticIndex } from '../../retrieval/semantic-index';
import { CAMPUS_RECORDS, CAMPUS_TABLE, intentRecord, TableEmbedder } from '../fixtures/table-embedder';

function tableRegistry(dimension = 2): EmbedderRegistry {
  return new EmbedderRegistry().register('table-', () => new TableEmbedder(CAMPUS_TABLE, dimension, 'table-2'));
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf8'));
}

describe('bundle persistence', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'intent-bundle-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function saveCampusBundle(): Promise<void> {
    const index = await buildSemanticIndex(CAMPUS_RECORDS, new TableEmbedder(CAMPUS_TABLE));
    await saveBundle(index, dir);
  }

  it('round-trips records, config and search results', async () => {
    const built = await buildSemanticIndex(CAMPUS_RECORDS, new TableEmbedder(CAMPUS_TABLE));
    const config = await saveBundle(built, dir);

    const loaded = await loadBundle(dir, tableRegistry());

    expect(config).toEqual({ modelName: 'table-2', dimension: 2, totalVectors: 2 });
    expect(loaded.config).toEqual(config);
    expect(loaded.records).toEqual(CAMPUS_RECORDS);
    expect(await loaded.search('what time do you open', 2)).toEqual(await built.search('what time do you open', 2));
  });

  it('writes exactly the three artifacts', async () => {
    await saveCampusBundle();

    expect(fs.readdirSync(dir).sort()).toEqual(['config.json', 'metadata.json', 'vectors.index']);
    expect(readJson(path.join(dir, 'config.json'))).toEqual({ model_name: 'table-2', dimension: 2, total_vectors: 2 });
    expect(readJson(path.join(dir, 'metadata.json'))).toMatchObject({
      format: 'semantic-intent-metadata',
      version: 1,
      count: 2
    });

    const indexBytes = fs.readFileSync(path.join(dir, 'vectors.index'));
    expect(indexBytes.length).toBe(16 + 2 * 2 * 4);
    expect(readIndexHeader(indexBytes)).toEqual({ version: 1, dimension: 2, count: 2 });
  });

  it('serialises concurrent saves to the same directory', async () => {
    const first = await buildSemanticIndex(CAMPUS_RECORDS, new TableEmbedder(CAMPUS_TABLE));
    const second = await buildSemanticIndex(
      [intentRecord('parking', 'parking', ['Lot B is open to visitors.'])],
      new TableEmbedder(CAMPUS_TABLE)
    );

    await Promise.all([saveBundle(first, dir), saveBundle(second, dir)]);

    const loaded = await loadBundle(dir, tableRegistry());
    expect(loaded.records.map((record) => record.tag)).toEqual(['parking']);
    expect(fs.readdirSync(dir).sort()).toEqual(['config.json', 'metadata.json', 'vectors.index']);
  });

  it('fails with a config error when the directory has no bundle', async () => {
    await expect(loadBundle(dir, tableRegistry())).rejects.toThrow(ConfigError);
  });

  it('fails with a config error on an invalid config', async () => {
    await saveCampusBundle();
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ model_name: 'table-2', dimension: 0, total_vectors: 2 }));

    await expect(loadBundle(dir, tableRegistry())).rejects.toThrow(ConfigError);
  });

  it('detects a vector count that disagrees with the config', async () => {
    await saveCampusBundle();
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ model_name: 'table-2', dimension: 2, total_vectors: 3 }));

    await expect(loadBundle(dir, tableRegistry())).rejects.toThrow('Index holds 2 vectors but config declares 3');
  });

  it('detects a truncated index', async () => {
    await saveCampusBundle();
    const indexPath = path.join(dir, 'vectors.index');
    fs.writeFileSync(indexPath, fs.readFileSync(indexPath).subarray(0, 30));

    await expect(loadBundle(dir, tableRegistry())).rejects.toThrow('Index artifact is 30 bytes, expected 32');
  });

  it('detects an index in an unknown format', async () => {
    await saveCampusBundle();
    fs.writeFileSync(path.join(dir, 'vectors.index'), Buffer.alloc(32));

    await expect(loadBundle(dir, tableRegistry())).rejects.toThrow(CorruptionError);
  });

  it('detects metadata that does not line up with the index', async () => {
    await saveCampusBundle();
    fs.writeFileSync(path.join(dir, 'metadata.json'), JSON.stringify({
      format: 'semantic-intent-metadata',
      version: 1,
      count: 1,
      records: [intentRecord('hours', 'hours', ['We open at 9am.'])]
    }));

    await expect(loadBundle(dir, tableRegistry())).rejects.toThrow('Metadata holds 1 records but index holds 2 vectors');
  });

  it('detects a metadata count field that disagrees with its records', async () => {
    await saveCampusBundle();
    fs.writeFileSync(path.join(dir, 'metadata.json'), JSON.stringify({
      format: 'semantic-intent-metadata',
      version: 1,
      count: 2,
      records: [intentRecord('hours', 'hours')]
    }));

    await expect(loadBundle(dir, tableRegistry())).rejects.toThrow('Metadata artifact declares 2 records but holds 1');
  });

  it('rejects a model the registry cannot build', async () => {
    await saveCampusBundle();

    await expect(loadBundle(dir, new EmbedderRegistry())).rejects.toThrow('Unknown embedding model: table-2');
  });

  it('rejects an embedder whose width differs from the bundle', async () => {
    await saveCampusBundle();

    await expect(loadBundle(dir, tableRegistry(3))).rejects.toThrow(ConfigError);
  });
});
