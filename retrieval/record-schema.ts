import { z } from 'zod';
import type { IntentRecord } from './types';

export const intentRecordSchema = z.object({
  text: z.string().refine((value) => value.trim().length > 0, 'Record text cannot be empty'),
  tag: z.string().refine((value) => value.trim().length > 0, 'Record tag cannot be empty'),
  responses: z.array(z.string()),
  kind: z.literal('pattern')
}).strict();

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseRecord(value: unknown): { success: true; record: IntentRecord } | { success: false; error: string } {
  const parsed = intentRecordSchema.safeParse(value);
  if (!parsed.success) {
    return { success: false, error: describeIssues(parsed.error) };
  }
  return { success: true, record: parsed.data };
}
