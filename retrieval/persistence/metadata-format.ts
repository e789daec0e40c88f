import { z } from 'zod';
import { CorruptionError } from '../errors';
import { describeIssues, parseRecord } from '../record-schema';
import type { IntentRecord } from '../types';

export const METADATA_FORMAT = 'semantic-intent-metadata';
export const METADATA_FORMAT_VERSION = 1;

const metadataDocumentSchema = z.object({
  format: z.literal(METADATA_FORMAT),
  version: z.literal(METADATA_FORMAT_VERSION),
  count: z.number().int().nonnegative(),
  records: z.array(z.unknown())
});

export function encodeMetadata(records: readonly IntentRecord[]): string {
  return JSON.stringify({
    format: METADATA_FORMAT,
    version: METADATA_FORMAT_VERSION,
    count: records.length,
    records: records.map((record) => ({
      text: record.text,
      tag: record.tag,
      responses: record.responses,
      kind: record.kind
    }))
  }, null, 2);
}

export function decodeMetadata(text: string): IntentRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CorruptionError('Metadata artifact is not valid JSON', { cause: error });
  }

  const parsed = metadataDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptionError(`Metadata artifact is malformed: ${describeIssues(parsed.error)}`);
  }

  const { count, records } = parsed.data;
  if (records.length !== count) {
    throw new CorruptionError(`Metadata artifact declares ${count} records but holds ${records.length}`);
  }

  return records.map((value, position) => {
    const result = parseRecord(value);
    if (!result.success) {
      throw new CorruptionError(`Metadata record ${position} is invalid: ${result.error}`);
    }
    return result.record;
  });
}
