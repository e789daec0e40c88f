import { z } from 'zod';
import type { LogLevel } from '../observability/logger';
import type { DefaultRegistryOptions } from '../retrieval/embedding/registry';
import { ConfigError } from '../retrieval/errors';
import { describeIssues } from '../retrieval/record-schema';

const probability = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const settingsSchema = z.object({
  INDEX_PATH: z.string().default('data/vector_db'),
  INTENTS_PATH: z.string().default('data/intents.json'),
  EMBEDDING_MODEL: z.string().default('hashing-384'),
  EMBEDDING_BATCH_SIZE: positiveInt(32),
  INTENT_MATCH_THRESHOLD: probability(0.5),
  CONTEXT_SIMILARITY_THRESHOLD: probability(0.3),
  DIRECT_MATCH_THRESHOLD: probability(0.85),
  RAG_TOP_K: positiveInt(5),
  FALLBACK_RESPONSE: z.string().default("I'm not sure how to help with that. Can you rephrase?"),
  ASSISTANT_NAME: z.string().default('Campus Assistant'),
  LLM_PROVIDER: z.string().toLowerCase().pipe(z.enum(['mock', 'openai'])).default('mock'),
  MOCK_LLM_RESPONSE: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  OPENAI_MODEL: z.string().optional(),
  SITE_URL: z.string().optional(),
  SITE_NAME: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  HISTORY_LIMIT: z.coerce.number().int().nonnegative().default(10),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent'])).default('info')
});

export interface Settings {
  indexPath: string;
  intentsPath: string;
  embeddingModel: string;
  embeddingBatchSize: number;
  intentMatchThreshold: number;
  contextSimilarityThreshold: number;
  directMatchThreshold: number;
  ragTopK: number;
  fallbackResponse: string;
  assistantName: string;
  llmProvider: 'mock' | 'openai';
  mockResponse?: string;
  openai: {
    apiKey?: string;
    baseUrl: string;
    model?: string;
  };
  siteUrl?: string;
  siteName?: string;
  databaseUrl?: string;
  historyLimit: number;
  port: number;
  logLevel: LogLevel;
}

/**
 * Reads settings from an environment map. Blank variables count as unset;
 * every invalid variable is reported at once.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(parsed.error)}`);
  }

  const values = parsed.data;
  return {
    indexPath: values.INDEX_PATH,
    intentsPath: values.INTENTS_PATH,
    embeddingModel: values.EMBEDDING_MODEL,
    embeddingBatchSize: values.EMBEDDING_BATCH_SIZE,
    intentMatchThreshold: values.INTENT_MATCH_THRESHOLD,
    contextSimilarityThreshold: values.CONTEXT_SIMILARITY_THRESHOLD,
    directMatchThreshold: values.DIRECT_MATCH_THRESHOLD,
    ragTopK: values.RAG_TOP_K,
    fallbackResponse: values.FALLBACK_RESPONSE,
    assistantName: values.ASSISTANT_NAME,
    llmProvider: values.LLM_PROVIDER,
    mockResponse: values.MOCK_LLM_RESPONSE,
    openai: {
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.OPENAI_BASE_URL,
      model: values.OPENAI_MODEL
    },
    siteUrl: values.SITE_URL,
    siteName: values.SITE_NAME,
    databaseUrl: values.DATABASE_URL,
    historyLimit: values.HISTORY_LIMIT,
    port: values.PORT,
    logLevel: values.LOG_LEVEL
  };
}

export function openRouterHeaders(settings: Pick<Settings, 'siteUrl' | 'siteName'>): Record<string, string> {
  const headers: Record<string, string> = {};
  if (settings.siteUrl) {
    headers['HTTP-Referer'] = settings.siteUrl;
  }
  if (settings.siteName) {
    headers['X-Title'] = settings.siteName;
  }
  return headers;
}

/** Registry options shared by the server and the build CLI. */
export function embedderRegistryOptions(settings: Settings): DefaultRegistryOptions {
  return {
    openai: {
      apiKey: settings.openai.apiKey,
      baseUrl: settings.openai.baseUrl,
      headers: openRouterHeaders(settings)
    }
  };
}

function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}
