import { InMemorySessionStore } from '../../sessions/in-memory-session-store';

function sequence(prefix: string): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

describe('InMemorySessionStore', () => {
  const startedAt = Date.UTC(2026, 0, 15, 14, 30);

  it('creates sessions with a timestamped default title', async () => {
    const store = new InMemorySessionStore({ now: () => startedAt, generateId: sequence('s') });

    const session = await store.createSession();

    expect(session).toEqual({ id: 's-1', title: 'Chat Session 2026-01-15 14:30', createdAt: startedAt });
    await expect(store.getSession('s-1')).resolves.toEqual(session);
    await expect(store.getSession('missing')).resolves.toBeUndefined();
  });

  it('returns the most recent messages oldest first', async () => {
    let clock = startedAt;
    const store = new InMemorySessionStore({ now: () => clock++, generateId: sequence('s') });
    const { id } = await store.createSession('Advising');

    for (const content of ['one', 'two', 'three', 'four']) {
      await store.appendMessage({ sessionId: id, role: 'user', content });
    }

    const recent = await store.listMessages(id, 2);
    expect(recent.map((message) => message.content)).toEqual(['three', 'four']);
    expect(recent.map((message) => message.id)).toEqual([3, 4]);
    await expect(store.listMessages(id, 0)).resolves.toEqual([]);
  });

  it('keeps the generator model on assistant turns only', async () => {
    const store = new InMemorySessionStore({ now: () => startedAt });
    const { id } = await store.createSession();

    const user = await store.appendMessage({ sessionId: id, role: 'user', content: 'hi' });
    const assistant = await store.appendMessage({ sessionId: id, role: 'assistant', content: 'hello', model: 'mock' });

    expect(user).not.toHaveProperty('model');
    expect(assistant.model).toBe('mock');
  });

  it('keeps sessions apart', async () => {
    const store = new InMemorySessionStore({ generateId: sequence('s') });
    const first = await store.createSession();
    const second = await store.createSession();

    await store.appendMessage({ sessionId: first.id, role: 'user', content: 'first' });

    await expect(store.listMessages(second.id, 10)).resolves.toEqual([]);
  });

  it('rejects messages for unknown sessions', async () => {
    const store = new InMemorySessionStore();

    await expect(store.appendMessage({ sessionId: 'nope', role: 'user', content: 'hi' }))
      .rejects.toThrow('Unknown chat session: nope');
  });
});
