export type PromptRole = 'system' | 'user' | 'assistant';

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface PromptRequest {
  messages: PromptMessage[];
  maxTokens?: number;
  temperature?: number;
}

export interface LLMResponse {
  content: string;
  tokensUsed: number;
  raw?: unknown;
}

/** Text generation backend used by the extraction pipeline. */
export interface LLMAdapter {
  generate(input: PromptRequest): Promise<LLMResponse>;
}

export const DEFAULT_MAX_TOKENS = 1024;

export function countApproxTokens(text: string): number {
  if (!text) {
    return 0;
  }

  return Math.ceil(text.trim().split(/\s+/u).length * 1.3);
}
