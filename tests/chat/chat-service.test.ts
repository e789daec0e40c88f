import { ChatService, DIRECT_MATCH_MODEL } from '../../chat/chat-service';
import type { GenerationRequest } from '../../core/contracts/llm';
import { MockTextGenerator } from '../../llm/mock-generator';
import { RagService } from '../../rag/rag-service';
import { EmbedderRegistry } from '../../retrieval/embedding/registry';
import { EmptyQueryError, NotLoadedError } from '../../retrieval/errors';
import { IndexHandle } from '../../retrieval/index-handle';
import { buildSemanticIndex } from '../../retrieval/semantic-index';
import { InMemorySessionStore } from '../../sessions/in-memory-session-store';
import { CAMPUS_RECORDS, CAMPUS_TABLE, TableEmbedder } from '../fixtures/table-embedder';

const NOW = new Date('2026-03-01T12:00:00.000Z');

async function setup(historyLimit?: number) {
  const handle = new IndexHandle({ registry: new EmbedderRegistry() });
  handle.publish(await buildSemanticIndex(CAMPUS_RECORDS, new TableEmbedder(CAMPUS_TABLE)));

  const requests: GenerationRequest[] = [];
  const generator = new MockTextGenerator({
    model: 'test-model',
    generateFn: (input) => {
      requests.push(input);
      return `Answer ${requests.length}`;
    }
  });

  let counter = 0;
  const sessions = new InMemorySessionStore({
    now: () => NOW.getTime(),
    generateId: () => {
      counter += 1;
      return `session-${counter}`;
    }
  });

  const chat = new ChatService(new RagService(handle, generator), sessions, { historyLimit, now: () => NOW });
  return { chat, sessions, requests };
}

describe('ChatService', () => {
  it('creates a session and answers directly on a strong match', async () => {
    const { chat, sessions, requests } = await setup();

    const reply = await chat.sendMessage(undefined, 'what time do you open');

    expect(reply).toEqual({
      response: 'We open at 9am.',
      sessionId: 'session-1',
      source: 'direct',
      model: DIRECT_MATCH_MODEL,
      timestamp: '2026-03-01T12:00:00.000Z'
    });
    expect(requests).toHaveLength(0);

    const stored = await sessions.listMessages('session-1', 10);
    expect(stored.map((message) => [message.role, message.content, message.model])).toEqual([
      ['user', 'what time do you open', undefined],
      ['assistant', 'We open at 9am.', DIRECT_MATCH_MODEL]
    ]);
  });

  it('generates an answer with the stored history', async () => {
    const { chat, requests } = await setup();

    const first = await chat.sendMessage(undefined, 'what time do you open');
    const second = await chat.sendMessage(first.sessionId, 'parking');

    expect(second).toMatchObject({
      response: 'Answer 1',
      sessionId: 'session-1',
      source: 'generated',
      model: 'test-model'
    });
    expect(requests[0]?.messages.map((message) => `${message.role}:${message.content}`).slice(1)).toEqual([
      'user:what time do you open',
      'assistant:We open at 9am.',
      'user:parking'
    ]);
  });

  it('caps history at the configured number of turns', async () => {
    const { chat, requests } = await setup(1);

    const first = await chat.sendMessage(undefined, 'parking');
    await chat.sendMessage(first.sessionId, 'where are you');
    await chat.sendMessage(first.sessionId, 'parking');

    const history = requests[1]?.messages.slice(1, -1).map((message) => message.content);
    expect(history).toEqual(['where are you', 'We are on Main Street.']);
  });

  it('starts a new session for an unknown id', async () => {
    const { chat } = await setup();

    const reply = await chat.sendMessage('missing', 'where are you');

    expect(reply.sessionId).toBe('session-1');
    expect(reply.response).toBe('We are on Main Street.');
  });

  it('stores nothing for an empty message', async () => {
    const { chat, sessions } = await setup();
    const session = await sessions.createSession();

    await expect(chat.sendMessage(session.id, '  ')).rejects.toBeInstanceOf(EmptyQueryError);
    await expect(sessions.listMessages(session.id, 10)).resolves.toEqual([]);
  });

  it('creates no session when the index is not loaded', async () => {
    const sessions = new InMemorySessionStore();
    const createSession = jest.spyOn(sessions, 'createSession');
    const rag = new RagService(new IndexHandle({ registry: new EmbedderRegistry() }), new MockTextGenerator());
    const chat = new ChatService(rag, sessions);

    await expect(chat.sendMessage(undefined, 'where are you')).rejects.toBeInstanceOf(NotLoadedError);
    expect(createSession).not.toHaveBeenCalled();
  });

  it('lists session messages and reports unknown sessions', async () => {
    const { chat } = await setup();
    const reply = await chat.sendMessage(undefined, 'where are you');

    const messages = await chat.getSessionMessages(reply.sessionId, 1);

    expect(messages?.map((message) => message.role)).toEqual(['assistant']);
    await expect(chat.getSessionMessages('missing')).resolves.toBeUndefined();
  });
});
