import {
  countApproxTokens,
  DEFAULT_MAX_TOKENS,
  type GenerationRequest,
  type GenerationResult,
  type TextGenerator
} from '../core/contracts/llm';

interface MockGeneratorOptions {
  response?: string;
  model?: string;
  maxInputLength?: number;
  generateFn?: (input: GenerationRequest) => string | Promise<string>;
}

export class MockTextGenerator implements TextGenerator {
  readonly model: string;
  private readonly response: string;
  private readonly maxInputLength: number;
  private readonly generateFn?: (input: GenerationRequest) => string | Promise<string>;

  constructor(options: MockGeneratorOptions = {}) {
    this.response = options.response ?? 'mock-response';
    this.model = options.model ?? 'mock';
    this.maxInputLength = options.maxInputLength ?? 20_000;
    this.generateFn = options.generateFn;
  }

  async generate(input: GenerationRequest): Promise<GenerationResult> {
    if (!input.messages.length) {
      throw new Error('Prompt messages are required');
    }

    const combined = input.messages.map((message) => message.content).join('\n');
    if (combined.length > this.maxInputLength) {
      throw new Error('Prompt exceeds maximum length');
    }

    const content = this.generateFn
      ? await this.generateFn(input)
      : this.response;

    const tokensUsed = Math.min(
      countApproxTokens(content),
      input.maxTokens ?? DEFAULT_MAX_TOKENS
    );

    return {
      content,
      tokensUsed
    };
  }
}
