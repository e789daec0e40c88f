import { randomUUID } from 'crypto';
import {
  defaultSessionTitle,
  type ChatMessage,
  type ChatSession,
  type NewChatMessage,
  type SessionStore
} from './session-store';

interface InMemorySessionStoreOptions {
  now?: () => number;
  generateId?: () => string;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly messages = new Map<string, ChatMessage[]>();
  private readonly now: () => number;
  private readonly generateId: () => string;
  private nextMessageId = 1;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  async createSession(title?: string): Promise<ChatSession> {
    const createdAt = this.now();
    const session: ChatSession = {
      id: this.generateId(),
      title: title ?? defaultSessionTitle(createdAt),
      createdAt
    };
    this.sessions.set(session.id, session);
    this.messages.set(session.id, []);
    return { ...session };
  }

  async getSession(id: string): Promise<ChatSession | undefined> {
    const session = this.sessions.get(id);
    return session ? { ...session } : undefined;
  }

  async appendMessage(message: NewChatMessage): Promise<ChatMessage> {
    const history = this.messages.get(message.sessionId);
    if (!history) {
      throw new Error(`Unknown chat session: ${message.sessionId}`);
    }

    const stored: ChatMessage = {
      id: this.nextMessageId,
      sessionId: message.sessionId,
      role: message.role,
      content: message.content,
      ...(message.model ? { model: message.model } : {}),
      createdAt: this.now()
    };
    this.nextMessageId += 1;
    history.push(stored);
    return { ...stored };
  }

  async listMessages(sessionId: string, limit: number): Promise<ChatMessage[]> {
    if (limit <= 0) {
      return [];
    }
    const history = this.messages.get(sessionId) ?? [];
    return history.slice(-limit).map((message) => ({ ...message }));
  }
}
