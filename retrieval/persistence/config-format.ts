import { z } from 'zod';
import { ConfigError } from '../errors';
import { describeIssues } from '../record-schema';
import type { IndexConfig } from '../types';

const configSchema = z.object({
  model_name: z.string().refine((value) => value.trim().length > 0, 'model_name cannot be empty'),
  dimension: z.number().int().positive(),
  total_vectors: z.number().int().nonnegative()
});

export function encodeConfig(config: IndexConfig): string {
  return JSON.stringify({
    model_name: config.modelName,
    dimension: config.dimension,
    total_vectors: config.totalVectors
  }, null, 2);
}

export function decodeConfig(text: string): IndexConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError('Index config is not valid JSON', { cause: error });
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Index config is invalid: ${describeIssues(parsed.error)}`);
  }

  return {
    modelName: parsed.data.model_name,
    dimension: parsed.data.dimension,
    totalVectors: parsed.data.total_vectors
  };
}
