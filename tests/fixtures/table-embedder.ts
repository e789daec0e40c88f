import { DEFAULT_BATCH_SIZE, encodeInBatches, type Embedder } from '../../retrieval/embedding/embedder';
import { EmbeddingError } from '../../retrieval/errors';
import type { IntentRecord } from '../../retrieval/types';

/**
 * Embedder with a fixed text → vector table. Unknown texts fail, so tests
 * notice when an unexpected string reaches the embedder.
 */
export class TableEmbedder implements Embedder {
  readonly calls: string[][] = [];

  constructor(
    private readonly table: Record<string, number[]>,
    readonly dimension = 2,
    readonly modelName = `table-${dimension}`
  ) {}

  async encode(texts: string[], batchSize: number = DEFAULT_BATCH_SIZE): Promise<number[][]> {
    this.calls.push([...texts]);
    return encodeInBatches(texts, batchSize, async (batch) => batch.map((text) => {
      const vector = this.table[text];
      if (!vector) {
        throw new EmbeddingError(`No vector for "${text}"`);
      }
      return [...vector];
    }), this.dimension);
  }
}

export function intentRecord(text: string, tag: string, responses: string[] = []): IntentRecord {
  return { text, tag, responses, kind: 'pattern' };
}

export const CAMPUS_TABLE: Record<string, number[]> = {
  hours: [1, 0],
  location: [0, 1],
  'what time do you open': [0.9, 0.1],
  'where are you': [0.1, 0.9],
  'opening hours': [1, 0],
  parking: [0.6, 0.8]
};

export const CAMPUS_RECORDS: IntentRecord[] = [
  intentRecord('hours', 'hours', ['We open at 9am.', 'Doors open at nine.']),
  intentRecord('location', 'location', ['We are on Main Street.'])
];
