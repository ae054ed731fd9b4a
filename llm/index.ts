export type { LLMAdapter, LLMResponse, PromptRequest, PromptMessage } from '../core/contracts/llm';
export { AnthropicAdapter } from './adapters/anthropic-adapter';
