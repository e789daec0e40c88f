export type { GenerationRequest, GenerationResult, PromptMessage, PromptRole, TextGenerator } from '../core/contracts/llm';
export { MockTextGenerator } from './mock-generator';
export { OpenAICompatibleGenerator, OPENROUTER_BASE_URL } from './adapters/openai-compatible-generator';
