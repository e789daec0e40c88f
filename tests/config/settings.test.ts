import { embedderRegistryOptions, loadSettings, openRouterHeaders } from '../../config/settings';
import { ConfigError } from '../../retrieval/errors';

describe('loadSettings', () => {
  it('applies defaults to an empty environment', () => {
    const settings = loadSettings({});

    expect(settings).toMatchObject({
      indexPath: 'data/vector_db',
      intentsPath: 'data/intents.json',
      embeddingModel: 'hashing-384',
      embeddingBatchSize: 32,
      intentMatchThreshold: 0.5,
      contextSimilarityThreshold: 0.3,
      directMatchThreshold: 0.85,
      ragTopK: 5,
      llmProvider: 'mock',
      historyLimit: 10,
      port: 3000,
      logLevel: 'info'
    });
    expect(settings.openai).toEqual({
      apiKey: undefined,
      baseUrl: 'https://openrouter.ai/api/v1',
      model: undefined
    });
    expect(settings.databaseUrl).toBeUndefined();
  });

  it('coerces and normalises provided values', () => {
    const settings = loadSettings({
      INDEX_PATH: ' /srv/index ',
      INTENT_MATCH_THRESHOLD: '0.65',
      RAG_TOP_K: '3',
      LLM_PROVIDER: 'OpenAI',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_MODEL: 'test/model',
      LOG_LEVEL: 'WARN',
      PORT: '8080'
    });

    expect(settings.indexPath).toBe('/srv/index');
    expect(settings.intentMatchThreshold).toBe(0.65);
    expect(settings.ragTopK).toBe(3);
    expect(settings.llmProvider).toBe('openai');
    expect(settings.openai.apiKey).toBe('test-secret');
    expect(settings.logLevel).toBe('warn');
    expect(settings.port).toBe(8080);
  });

  it('treats blank variables as unset', () => {
    const settings = loadSettings({ DATABASE_URL: '  ', INTENT_MATCH_THRESHOLD: '' });

    expect(settings.databaseUrl).toBeUndefined();
    expect(settings.intentMatchThreshold).toBe(0.5);
  });

  it('rejects out-of-range values with the variable name', () => {
    expect(() => loadSettings({ INTENT_MATCH_THRESHOLD: '1.5' })).toThrow(ConfigError);
    expect(() => loadSettings({ INTENT_MATCH_THRESHOLD: '1.5' })).toThrow(/INTENT_MATCH_THRESHOLD/);
    expect(() => loadSettings({ LLM_PROVIDER: 'other' })).toThrow(/LLM_PROVIDER/);
    expect(() => loadSettings({ PORT: 'abc' })).toThrow(/^Invalid environment: PORT/);
  });
});

describe('openRouterHeaders', () => {
  it('includes only configured attribution headers', () => {
    expect(openRouterHeaders({})).toEqual({});
    expect(openRouterHeaders({ siteUrl: 'https://campus.example', siteName: 'Campus' })).toEqual({
      'HTTP-Referer': 'https://campus.example',
      'X-Title': 'Campus'
    });
  });
});

describe('embedderRegistryOptions', () => {
  it('carries credentials and attribution headers for remote embedders', () => {
    const settings = loadSettings({
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'https://llm.example.test/v1',
      SITE_URL: 'https://campus.example',
      SITE_NAME: 'Campus'
    });

    expect(embedderRegistryOptions(settings)).toEqual({
      openai: {
        apiKey: 'test-secret',
        baseUrl: 'https://llm.example.test/v1',
        headers: { 'HTTP-Referer': 'https://campus.example', 'X-Title': 'Campus' }
      }
    });
  });
});
