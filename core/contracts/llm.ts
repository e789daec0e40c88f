export type PromptRole = 'system' | 'user' | 'assistant';

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface GenerationRequest {
  messages: PromptMessage[];
  maxTokens?: number;
  temperature?: number;
}

export interface GenerationResult {
  content: string;
  tokensUsed: number;
  raw?: unknown;
}

/**
 * Turns a system prompt plus conversation into text. Callers never look
 * past this interface.
 */
export interface TextGenerator {
  readonly model: string;
  generate(input: GenerationRequest): Promise<GenerationResult>;
}

export const DEFAULT_MAX_TOKENS = 500;
export const DEFAULT_TEMPERATURE = 0.7;

export function countApproxTokens(text: string): number {
  if (!text) {
    return 0;
  }

  return Math.ceil(text.trim().split(/\s+/u).length * 1.3);
}
