import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigError, InvalidArgumentError } from './errors';
import { describeIssues } from './record-schema';
import type { IntentRecord } from './types';

const nonBlank = (label: string) =>
  z.string().refine((value) => value.trim().length > 0, `${label} cannot be empty`);

const intentsFileSchema = z.object({
  intents: z.array(z.object({
    tag: nonBlank('tag'),
    patterns: z.array(z.string()),
    responses: z.array(z.string()).default([])
  }))
});

export type IntentsFile = z.infer<typeof intentsFileSchema>;

/**
 * Flattens an intents document into one record per pattern. Blank patterns
 * are skipped; every record of an intent shares its responses.
 */
export function flattenIntents(document: unknown): IntentRecord[] {
  const parsed = intentsFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid intents document: ${describeIssues(parsed.error)}`);
  }

  const records: IntentRecord[] = [];
  for (const intent of parsed.data.intents) {
    for (const pattern of intent.patterns) {
      if (!pattern.trim()) {
        continue;
      }
      records.push({
        text: pattern,
        tag: intent.tag,
        responses: [...intent.responses],
        kind: 'pattern'
      });
    }
  }
  return records;
}

export async function loadIntentsFile(filePath: string): Promise<IntentRecord[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read intents file at ${filePath}`, { cause: error });
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch {
    throw new InvalidArgumentError(`Intents file ${filePath} is not valid JSON`);
  }
  return flattenIntents(document);
}
