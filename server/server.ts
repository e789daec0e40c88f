import Fastify from 'fastify';
import { z } from 'zod';
import { loadSettings } from '../config/settings';
import { describeIssues } from '../retrieval/record-schema';
import { RetrievalError } from '../retrieval/errors';
import { buildContainer, TOKENS, type BuildContainerOptions } from './container';
import { httpStatusFor } from './http-errors';

const matchSchema = z.object({
  query: z.string(),
  k: z.number().int().min(0).max(100).default(5),
  threshold: z.number().min(0).max(1).optional()
});

const searchSchema = z.object({
  query: z.string(),
  k: z.number().int().min(0).max(100).default(10),
  minScore: z.number().min(0).max(1).optional()
});

const respondSchema = z.object({
  query: z.string(),
  randomize: z.boolean().default(true)
});

const chatSchema = z.object({
  message: z.string().max(4000),
  sessionId: z.string().min(1).max(128).optional()
});

const messagesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

export interface BuildServerOptions {
  logger?: boolean;
  container?: BuildContainerOptions;
}

export async function buildServer(options?: BuildServerOptions) {
  const fastify = Fastify({ logger: options?.logger ?? true });
  const containerContext = await buildContainer(options?.container);
  const { container, settings } = containerContext;

  const indexHandle = container.resolve(TOKENS.indexHandle);
  const matcher = container.resolve(TOKENS.intentMatcher);
  const chatService = container.resolve(TOKENS.chatService);
  const logger = container.resolve(TOKENS.logger);

  fastify.addHook('onClose', async () => {
    await containerContext.cleanup();
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof RetrievalError) {
      reply.code(httpStatusFor(error)).send({ error: error.message, code: error.code });
      return;
    }
    if (error.validation) {
      reply.code(400).send({ error: error.message });
      return;
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      reply.code(error.statusCode).send({ error: error.message });
      return;
    }
    logger.error('Unhandled request error', { url: request.url, error });
    reply.code(500).send({ error: 'Internal server error' });
  });

  fastify.get('/health', async () => ({ status: 'ok', indexLoaded: indexHandle.isLoaded }));

  fastify.post('/intent/match', async (request, reply) => {
    const parsed = matchSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: describeIssues(parsed.error) });
      return;
    }
    const { query, k, threshold } = parsed.data;
    return matcher.match(query, k, threshold);
  });

  fastify.post('/intent/search', async (request, reply) => {
    const parsed = searchSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: describeIssues(parsed.error) });
      return;
    }
    const { query, k, minScore } = parsed.data;
    return { results: await matcher.searchIntents(query, k, minScore) };
  });

  fastify.post('/intent/respond', async (request, reply) => {
    const parsed = respondSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: describeIssues(parsed.error) });
      return;
    }
    const { query, randomize } = parsed.data;
    return { response: await matcher.getResponse(query, randomize) };
  });

  fastify.get('/intent/stats', async () => {
    const stats = matcher.stats();
    if (!stats.loaded) {
      return { loaded: false, threshold: stats.threshold };
    }
    return {
      loaded: true,
      total_vectors: stats.totalVectors,
      dimension: stats.dimension,
      model_name: stats.modelName,
      threshold: stats.threshold
    };
  });

  fastify.post('/admin/reload', async () => {
    const index = await indexHandle.reload(settings.indexPath);
    const { totalVectors, modelName } = index.config;
    return { status: 'reloaded', total_vectors: totalVectors, model_name: modelName };
  });

  fastify.post('/chat', async (request, reply) => {
    const parsed = chatSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: describeIssues(parsed.error) });
      return;
    }
    const { message, sessionId } = parsed.data;
    return chatService.sendMessage(sessionId, message);
  });

  fastify.get<{ Params: { sessionId: string } }>('/chat/sessions/:sessionId/messages', async (request, reply) => {
    const parsed = messagesQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      reply.code(400).send({ error: describeIssues(parsed.error) });
      return;
    }
    const messages = await chatService.getSessionMessages(request.params.sessionId, parsed.data.limit);
    if (!messages) {
      reply.code(404).send({ error: 'Chat session not found' });
      return;
    }
    return { sessionId: request.params.sessionId, messages };
  });

  return fastify;
}

if (require.main === module) {
  buildServer().then(async (fastify) => {
    const { port } = loadSettings();
    try {
      await fastify.listen({ port, host: '0.0.0.0' });
      console.log(`[INFO] Server listening on port ${port}`);
    } catch (error) {
      console.error(`[ERROR] Failed to start server on port ${port}:`, error);
      process.exit(1);
    }
  }).catch((error) => {
    console.error('[ERROR] Failed to build server:', error);
    process.exit(1);
  });
}
