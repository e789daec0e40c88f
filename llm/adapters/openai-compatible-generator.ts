import { z } from 'zod';
import type { GenerationRequest, GenerationResult, PromptMessage, TextGenerator } from '../../core/contracts/llm';
import { countApproxTokens, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from '../../core/contracts/llm';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

interface OpenAICompatibleGeneratorOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Sent as HTTP-Referer for OpenRouter attribution. */
  siteUrl?: string;
  /** Sent as X-Title for OpenRouter attribution. */
  siteName?: string;
}

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() }).optional(),
    text: z.string().optional()
  })).optional(),
  usage: z.object({ total_tokens: z.number().optional() }).optional()
});

export class OpenAICompatibleGenerator implements TextGenerator {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly siteUrl?: string;
  private readonly siteName?: string;

  constructor(options: OpenAICompatibleGeneratorOptions) {
    if (!options.apiKey) {
      throw new Error('API key required');
    }
    if (!options.model) {
      throw new Error('Model name required');
    }
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? OPENROUTER_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.siteUrl = options.siteUrl;
    this.siteName = options.siteName;
  }

  async generate(input: GenerationRequest): Promise<GenerationResult> {
    if (!input.messages.length) {
      throw new Error('Prompt messages are required');
    }

    const payload = {
      model: this.model,
      messages: input.messages.map(toChatMessage),
      max_tokens: input.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: input.temperature ?? DEFAULT_TEMPERATURE
    };

    const response = await fetchWithTimeout(`${trimSlash(this.baseUrl)}/chat/completions`, {
      method: 'POST',
      headers: this.buildHeaders(),
      body: JSON.stringify(payload)
    }, this.timeoutMs);

    if (!response.ok) {
      throw new Error(`Chat completion API error: ${response.status}`);
    }

    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Chat completion response is malformed');
    }

    const data = parsed.data;
    const content = data.choices?.[0]?.message?.content ?? data.choices?.[0]?.text;
    if (!content) {
      throw new Error('Chat completion response missing content');
    }

    const tokensUsed = data.usage?.total_tokens ?? countApproxTokens(content);

    return { content, tokensUsed, raw: data };
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json'
    };

    if (this.siteUrl) {
      headers['HTTP-Referer'] = this.siteUrl;
    }
    if (this.siteName) {
      headers['X-Title'] = this.siteName;
    }

    return headers;
  }
}

function toChatMessage(message: PromptMessage): { role: string; content: string } {
  return { role: message.role, content: message.content };
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}
