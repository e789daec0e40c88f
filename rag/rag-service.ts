import type { PromptMessage, TextGenerator } from '../core/contracts/llm';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from '../core/contracts/llm';
import type { Logger } from '../observability/logger';
import { silentLogger } from '../observability/logger';
import { assembleContext, DEFAULT_CONTEXT_THRESHOLD } from '../retrieval/context-assembler';
import { assertQueryText, assertThreshold, assertTopK } from '../retrieval/errors';
import type { IndexHandle } from '../retrieval/index-handle';
import type { SearchHit } from '../retrieval/types';

export const DEFAULT_RAG_TOP_K = 5;
export const DEFAULT_DIRECT_MATCH_THRESHOLD = 0.85;
export const DEFAULT_ASSISTANT_NAME = 'Campus Assistant';

export const NO_KNOWLEDGE_RESPONSE =
  "I apologize, but I don't have specific information about your query in my knowledge base. " +
  'Please try rephrasing your question.';
export const GENERATION_UNAVAILABLE_RESPONSE =
  "I apologize, but I'm unable to generate a response at the moment. Please try again later.";

export type AnswerSource = 'direct' | 'generated' | 'fallback';

export interface RagAnswer {
  content: string;
  source: AnswerSource;
  /** Number of hits that passed the context threshold. */
  contextCount: number;
  model?: string;
}

export interface RagServiceOptions {
  topK?: number;
  contextThreshold?: number;
  directMatchThreshold?: number;
  assistantName?: string;
  logger?: Logger;
}

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
}

export class RagService {
  private readonly topK: number;
  private readonly contextThreshold: number;
  private readonly directMatchThreshold: number;
  private readonly assistantName: string;
  private readonly logger: Logger;

  constructor(
    private readonly handle: IndexHandle,
    private readonly generator: TextGenerator,
    options: RagServiceOptions = {}
  ) {
    this.topK = options.topK ?? DEFAULT_RAG_TOP_K;
    this.contextThreshold = options.contextThreshold ?? DEFAULT_CONTEXT_THRESHOLD;
    this.directMatchThreshold = options.directMatchThreshold ?? DEFAULT_DIRECT_MATCH_THRESHOLD;
    assertTopK(this.topK);
    assertThreshold(this.contextThreshold, 'contextThreshold');
    assertThreshold(this.directMatchThreshold, 'directMatchThreshold');
    this.assistantName = options.assistantName ?? DEFAULT_ASSISTANT_NAME;
    this.logger = options.logger ?? silentLogger;
  }

  get model(): string {
    return this.generator.model;
  }

  async retrieveContext(query: string): Promise<SearchHit[]> {
    const hits = await this.handle.current().search(query, this.topK);
    const relevant = hits.filter((hit) => hit.score >= this.contextThreshold);
    this.logger.info('Retrieved context', { hits: hits.length, relevant: relevant.length });
    return relevant;
  }

  buildSystemPrompt(context: string): string {
    return [
      `You are ${this.assistantName}, a professional and knowledgeable virtual assistant.`,
      '',
      'Guidelines:',
      '- Answer accurately using the context information below.',
      '- Keep a courteous, formal tone and well-structured answers.',
      '- If the context does not cover the question, say so honestly and offer general guidance.',
      '- Be concise but complete.',
      '',
      'Context Information:',
      context,
      '',
      "Based on the above context, provide an accurate response to the user's query."
    ].join('\n');
  }

  /**
   * Grounds the generator on retrieved context. Retrieval errors propagate;
   * a failing generator is replaced by the best retrieved response.
   */
  async generateResponse(
    query: string,
    history: PromptMessage[] = [],
    options: GenerateOptions = {}
  ): Promise<RagAnswer> {
    const text = assertQueryText(query);
    const hits = await this.retrieveContext(text);
    const systemPrompt = this.buildSystemPrompt(assembleContext(hits, this.contextThreshold));

    try {
      const result = await this.generator.generate({
        messages: [
          { role: 'system', content: systemPrompt },
          ...history,
          { role: 'user', content: text }
        ],
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS
      });
      return { content: result.content, source: 'generated', contextCount: hits.length, model: this.generator.model };
    } catch (error) {
      this.logger.error('Text generation failed, using fallback', { error, contextCount: hits.length });
      return { content: fallbackFor(hits), source: 'fallback', contextCount: hits.length };
    }
  }

  async getDirectMatch(query: string): Promise<string | undefined> {
    const [best] = await this.handle.current().search(query, 1);
    if (!best || best.score < this.directMatchThreshold) {
      return undefined;
    }
    const [response] = best.record.responses;
    if (response !== undefined) {
      this.logger.info('Direct match found', { tag: best.record.tag, score: best.score });
    }
    return response;
  }
}

function fallbackFor(hits: SearchHit[]): string {
  const [best] = hits;
  if (!best) {
    return NO_KNOWLEDGE_RESPONSE;
  }
  return best.record.responses[0] ?? GENERATION_UNAVAILABLE_RESPONSE;
}
