/**
 * Interactive console for querying a running intent server.
 */

/* eslint-disable no-await-in-loop */

import { input, select } from '@inquirer/prompts';
import type { z } from 'zod';
import {
  chatResponseSchema,
  describeHttpError,
  formatChatReply,
  formatHits,
  formatMatch,
  formatStats,
  matchResponseSchema,
  searchResponseSchema,
  statsResponseSchema
} from './query-console-helpers';

const PORT = Number(process.env.PORT) || 3000;
const BASE_URL = process.env.INTENT_SERVER_URL ?? `http://127.0.0.1:${PORT}`;
const REQUEST_TIMEOUT_MS = 60_000;

type Action = 'match' | 'search' | 'respond' | 'chat' | 'stats' | 'health' | 'exit';

async function callApi<T>(path: string, schema: z.ZodType<T>, body?: unknown): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
  let res: Response;
  try {
    res = await fetch(`${BASE_URL}${path}`, {
      method: body === undefined ? 'GET' : 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal
    });
  } finally {
    clearTimeout(timeoutId);
  }

  const text = await res.text();
  if (!res.ok) {
    throw new Error(describeHttpError(res.status, text));
  }
  const parsed = schema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Unexpected response from ${path}`);
  }
  return parsed.data;
}

async function askQuery(message: string): Promise<string> {
  const value = await input({
    message,
    validate: (v: string) => (v.trim() ? true : 'Required')
  });
  return value.trim();
}

async function main(): Promise<void> {
  console.log(`\nIntent query console (${BASE_URL})\n`);
  let sessionId: string | undefined;

  while (true) {
    const action = await select<Action>({
      message: 'Choose an operation',
      choices: [
        { name: 'Match intent', value: 'match' },
        { name: 'Search intents', value: 'search' },
        { name: 'Get response', value: 'respond' },
        { name: sessionId ? 'Chat (continue session)' : 'Chat', value: 'chat' },
        { name: 'Index stats', value: 'stats' },
        { name: 'Health check', value: 'health' },
        { name: 'Exit', value: 'exit' }
      ]
    });

    if (action === 'exit') {
      console.log('\nGoodbye.\n');
      break;
    }

    try {
      if (action === 'match') {
        const query = await askQuery('Query');
        console.log(formatMatch(await callApi('/intent/match', matchResponseSchema, { query })));
      } else if (action === 'search') {
        const query = await askQuery('Query');
        const { results } = await callApi('/intent/search', searchResponseSchema, { query });
        console.log(formatHits(results));
      } else if (action === 'respond') {
        const query = await askQuery('Query');
        const { response } = await callApi('/intent/respond', chatResponseSchema.pick({ response: true }), { query });
        console.log(response);
      } else if (action === 'chat') {
        const message = await askQuery('Message');
        const reply = await callApi('/chat', chatResponseSchema, { message, sessionId });
        sessionId = reply.sessionId;
        console.log(formatChatReply(reply));
      } else if (action === 'stats') {
        console.log(formatStats(await callApi('/intent/stats', statsResponseSchema)));
      } else {
        const res = await fetch(`${BASE_URL}/health`);
        console.log(`Health: ${res.status} ${await res.text()}`);
      }
    } catch (err) {
      console.error('\nRequest failed:', err instanceof Error ? err.message : String(err));
    }
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('[ERROR] Query console failed:', error);
    process.exit(1);
  });
}
