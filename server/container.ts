import { Pool } from 'pg';
import { ChatService } from '../chat/chat-service';
import { embedderRegistryOptions, loadSettings, type Settings } from '../config/settings';
import { Container, createToken } from '../core/di/container';
import { MockTextGenerator, OpenAICompatibleGenerator, type TextGenerator } from '../llm';
import { ConsoleLogger, type Logger } from '../observability/logger';
import { RagService } from '../rag/rag-service';
import { createDefaultRegistry, type EmbedderRegistry } from '../retrieval/embedding/registry';
import { ConfigError } from '../retrieval/errors';
import { IndexHandle } from '../retrieval/index-handle';
import { IntentMatcher } from '../retrieval/intent-matcher';
import type { NativeIndexProvider } from '../retrieval/vector/native-flat-index';
import { InMemorySessionStore, PostgresSessionStore, type SessionStore } from '../sessions';

export const TOKENS = {
  settings: createToken<Settings>('settings'),
  logger: createToken<Logger>('logger'),
  registry: createToken<EmbedderRegistry>('registry'),
  indexHandle: createToken<IndexHandle>('indexHandle'),
  intentMatcher: createToken<IntentMatcher>('intentMatcher'),
  generator: createToken<TextGenerator>('generator'),
  sessionStore: createToken<SessionStore>('sessionStore'),
  ragService: createToken<RagService>('ragService'),
  chatService: createToken<ChatService>('chatService')
};

export interface ContainerContext {
  container: Container;
  settings: Settings;
  /**
   * Closes the Postgres pool when one was opened. Call from server
   * shutdown or test teardown.
   */
  cleanup(): Promise<void>;
}

export interface BuildContainerOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  registry?: EmbedderRegistry;
  generator?: TextGenerator;
  sessionStore?: SessionStore;
  native?: NativeIndexProvider;
}

export async function buildContainer(options: BuildContainerOptions = {}): Promise<ContainerContext> {
  const container = new Container();
  const settings = loadSettings(options.env ?? process.env);
  const logger = options.logger ?? new ConsoleLogger({ level: settings.logLevel });

  const registry = options.registry ?? createDefaultRegistry(embedderRegistryOptions(settings));

  const indexHandle = new IndexHandle({ registry, native: options.native, logger });
  try {
    await indexHandle.load(settings.indexPath);
  } catch (error) {
    // Degraded start: retrieval answers 503 until /admin/reload succeeds.
    logger.warn('Starting without a vector index', { path: settings.indexPath, error });
  }

  const { store: sessionStore, pool } = options.sessionStore
    ? { store: options.sessionStore, pool: undefined }
    : await buildSessionStore(settings);

  container.registerValue(TOKENS.settings, settings);
  container.registerValue(TOKENS.logger, logger);
  container.registerValue(TOKENS.registry, registry);
  container.registerValue(TOKENS.indexHandle, indexHandle);
  container.registerValue(TOKENS.sessionStore, sessionStore);

  const singleton = { singleton: true };
  container.register(
    TOKENS.generator,
    () => options.generator ?? buildGenerator(settings),
    singleton
  );
  container.register(TOKENS.intentMatcher, (c) => new IntentMatcher(c.resolve(TOKENS.indexHandle), {
    threshold: settings.intentMatchThreshold,
    fallbackResponse: settings.fallbackResponse,
    logger
  }), singleton);
  container.register(TOKENS.ragService, (c) => new RagService(
    c.resolve(TOKENS.indexHandle),
    c.resolve(TOKENS.generator),
    {
      topK: settings.ragTopK,
      contextThreshold: settings.contextSimilarityThreshold,
      directMatchThreshold: settings.directMatchThreshold,
      assistantName: settings.assistantName,
      logger
    }
  ), singleton);
  container.register(TOKENS.chatService, (c) => new ChatService(
    c.resolve(TOKENS.ragService),
    c.resolve(TOKENS.sessionStore),
    { historyLimit: settings.historyLimit, logger }
  ), singleton);

  // Resolved eagerly: a missing generator setting must fail startup.
  try {
    container.resolve(TOKENS.intentMatcher);
    container.resolve(TOKENS.chatService);
  } catch (error) {
    await pool?.end();
    throw error;
  }

  return {
    container,
    settings,
    async cleanup() {
      if (pool) {
        await pool.end();
      }
    }
  };
}

async function buildSessionStore(settings: Settings): Promise<{ store: SessionStore; pool?: Pool }> {
  if (settings.databaseUrl) {
    const pool = new Pool({ connectionString: settings.databaseUrl });
    const store = new PostgresSessionStore(pool);
    await store.ensureSchema();
    return { store, pool };
  }

  return { store: new InMemorySessionStore() };
}

function buildGenerator(settings: Settings): TextGenerator {
  if (settings.llmProvider === 'openai') {
    return new OpenAICompatibleGenerator({
      apiKey: requireSetting('OPENAI_API_KEY', settings.openai.apiKey),
      model: requireSetting('OPENAI_MODEL', settings.openai.model),
      baseUrl: settings.openai.baseUrl,
      siteUrl: settings.siteUrl,
      siteName: settings.siteName
    });
  }

  return new MockTextGenerator({ response: settings.mockResponse });
}

function requireSetting(name: string, value: string | undefined): string {
  if (!value) {
    throw new ConfigError(`${name} is required`);
  }
  return value;
}
