import type { PromptMessage } from '../core/contracts/llm';
import type { Logger } from '../observability/logger';
import { silentLogger } from '../observability/logger';
import type { AnswerSource, RagService } from '../rag/rag-service';
import { assertQueryText } from '../retrieval/errors';
import type { ChatMessage, SessionStore } from '../sessions/session-store';

export const DEFAULT_HISTORY_LIMIT = 10;
export const DIRECT_MATCH_MODEL = 'direct-match';

export interface ChatReply {
  response: string;
  sessionId: string;
  source: AnswerSource;
  model: string;
  timestamp: string;
}

export interface ChatServiceOptions {
  /** Conversation turns (user + assistant pairs) passed to the generator. */
  historyLimit?: number;
  now?: () => Date;
  logger?: Logger;
}

export class ChatService {
  private readonly historyLimit: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly rag: RagService,
    private readonly sessions: SessionStore,
    options: ChatServiceOptions = {}
  ) {
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Answers in an existing session, or in a new one when `sessionId` is
   * absent or unknown. The session and both turns are stored only after an
   * answer exists.
   */
  async sendMessage(sessionId: string | undefined, message: string): Promise<ChatReply> {
    const text = assertQueryText(message);
    const existing = sessionId ? await this.sessions.getSession(sessionId) : undefined;
    const history = existing
      ? await this.sessions.listMessages(existing.id, this.historyLimit * 2)
      : [];

    const direct = await this.rag.getDirectMatch(text);
    const answer = direct !== undefined
      ? { content: direct, source: 'direct' as const, model: DIRECT_MATCH_MODEL }
      : await this.rag.generateResponse(text, history.map(toPromptMessage));
    const model = answer.model ?? this.rag.model;

    const session = existing ?? await this.sessions.createSession();
    if (!existing) {
      this.logger.info('Created chat session', { sessionId: session.id });
    }

    await this.sessions.appendMessage({ sessionId: session.id, role: 'user', content: text });
    await this.sessions.appendMessage({
      sessionId: session.id,
      role: 'assistant',
      content: answer.content,
      model
    });

    this.logger.info('Answered chat message', { sessionId: session.id, source: answer.source });
    return {
      response: answer.content,
      sessionId: session.id,
      source: answer.source,
      model,
      timestamp: this.now().toISOString()
    };
  }

  async getSessionMessages(sessionId: string, limit = 50): Promise<ChatMessage[] | undefined> {
    const session = await this.sessions.getSession(sessionId);
    if (!session) {
      return undefined;
    }
    return this.sessions.listMessages(session.id, limit);
  }
}

function toPromptMessage(message: ChatMessage): PromptMessage {
  return { role: message.role, content: message.content };
}
