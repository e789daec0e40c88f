export type MessageRole = 'user' | 'assistant';

export interface ChatSession {
  id: string;
  title: string;
  createdAt: number;
}

export interface ChatMessage {
  id: number;
  sessionId: string;
  role: MessageRole;
  content: string;
  /** Generator model for assistant turns; absent for user turns. */
  model?: string;
  createdAt: number;
}

export interface NewChatMessage {
  sessionId: string;
  role: MessageRole;
  content: string;
  model?: string;
}

export interface SessionStore {
  createSession(title?: string): Promise<ChatSession>;
  getSession(id: string): Promise<ChatSession | undefined>;
  appendMessage(message: NewChatMessage): Promise<ChatMessage>;
  /** The most recent `limit` messages, oldest first. */
  listMessages(sessionId: string, limit: number): Promise<ChatMessage[]>;
}

export function defaultSessionTitle(timestamp: number): string {
  const iso = new Date(timestamp).toISOString();
  return `Chat Session ${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}
