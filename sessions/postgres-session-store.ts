import { randomUUID } from 'crypto';
import type { Pool } from 'pg';
import {
  defaultSessionTitle,
  type ChatMessage,
  type ChatSession,
  type MessageRole,
  type NewChatMessage,
  type SessionStore
} from './session-store';

export class PostgresSessionStore implements SessionStore {
  constructor(private readonly pool: Pool, private readonly now: () => number = Date.now) {}

  async ensureSchema(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS chat_sessions (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        created_at BIGINT NOT NULL
      );
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS chat_messages (
        id SERIAL PRIMARY KEY,
        session_id TEXT NOT NULL REFERENCES chat_sessions(id),
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        model TEXT,
        created_at BIGINT NOT NULL
      );
    `);
  }

  async createSession(title?: string): Promise<ChatSession> {
    const createdAt = this.now();
    const session: ChatSession = {
      id: randomUUID(),
      title: title ?? defaultSessionTitle(createdAt),
      createdAt
    };

    await this.pool.query(
      `INSERT INTO chat_sessions (id, title, created_at) VALUES ($1, $2, $3)`,
      [session.id, session.title, session.createdAt]
    );
    return session;
  }

  async getSession(id: string): Promise<ChatSession | undefined> {
    const result = await this.pool.query<SessionRow>(
      `SELECT id, title, created_at FROM chat_sessions WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? toSession(row) : undefined;
  }

  async appendMessage(message: NewChatMessage): Promise<ChatMessage> {
    const result = await this.pool.query<MessageRow>(
      `
      INSERT INTO chat_messages (session_id, role, content, model, created_at)
      VALUES ($1, $2, $3, $4, $5)
      RETURNING id, session_id, role, content, model, created_at
      `,
      [message.sessionId, message.role, message.content, message.model ?? null, this.now()]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('Insert returned no row');
    }
    return toMessage(row);
  }

  async listMessages(sessionId: string, limit: number): Promise<ChatMessage[]> {
    if (limit <= 0) {
      return [];
    }
    const result = await this.pool.query<MessageRow>(
      `
      SELECT id, session_id, role, content, model, created_at
      FROM chat_messages
      WHERE session_id = $1
      ORDER BY id DESC
      LIMIT $2
      `,
      [sessionId, limit]
    );
    return result.rows.map(toMessage).reverse();
  }
}

interface SessionRow {
  id: string;
  title: string;
  created_at: number | string;
}

interface MessageRow {
  id: number | string;
  session_id: string;
  role: string;
  content: string;
  model: string | null;
  created_at: number | string;
}

function toSession(row: SessionRow): ChatSession {
  return {
    id: row.id,
    title: row.title,
    createdAt: Number(row.created_at)
  };
}

function toMessage(row: MessageRow): ChatMessage {
  return {
    id: Number(row.id),
    sessionId: row.session_id,
    role: toRole(row.role),
    content: row.content,
    ...(row.model ? { model: row.model } : {}),
    createdAt: Number(row.created_at)
  };
}

function toRole(value: string): MessageRole {
  if (value === 'user' || value === 'assistant') {
    return value;
  }
  throw new Error(`Unknown message role: ${value}`);
}
