export { InMemorySessionStore } from './in-memory-session-store';
export { PostgresSessionStore } from './postgres-session-store';
export { defaultSessionTitle } from './session-store';
export type { ChatMessage, ChatSession, MessageRole, NewChatMessage, SessionStore } from './session-store';
