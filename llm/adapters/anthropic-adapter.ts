import { z } from 'zod';
import type { LLMAdapter, LLMResponse, PromptMessage, PromptRequest } from '../../core/contracts/llm';
import { DEFAULT_MAX_TOKENS, countApproxTokens } from '../../core/contracts/llm';

export const DEFAULT_ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1';
export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';

interface AnthropicAdapterOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  anthropicVersion?: string;
}

const messagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).default([]),
  usage: z.object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional()
  }).optional()
});

export class AnthropicAdapter implements LLMAdapter {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly anthropicVersion: string;

  constructor(options: AnthropicAdapterOptions) {
    if (!options.apiKey) {
      throw new Error('Anthropic API key required');
    }

    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.baseUrl = options.baseUrl ?? DEFAULT_ANTHROPIC_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.anthropicVersion = options.anthropicVersion ?? '2023-06-01';

    if (!isHttpUrl(this.baseUrl)) {
      throw new Error(`Invalid Anthropic base URL: ${this.baseUrl}`);
    }
  }

  async generate(input: PromptRequest): Promise<LLMResponse> {
    if (!input.messages.length) {
      throw new Error('Prompt messages are required');
    }

    const { system, messages } = splitMessages(input.messages);
    const payload = {
      model: this.model,
      max_tokens: input.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages,
      system,
      temperature: input.temperature
    };

    const response = await fetchWithTimeout(`${trimSlash(this.baseUrl)}/messages`, {
      method: 'POST',
      headers: buildHeaders(this.apiKey, this.anthropicVersion),
      body: JSON.stringify(payload)
    }, this.timeoutMs);

    if (!response.ok) {
      throw new Error(`Anthropic API error: ${response.status}`);
    }

    const raw: unknown = await response.json();
    const parsed = messagesResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error('Anthropic response malformed');
    }

    const content = parsed.data.content
      .map((part) => part.text)
      .filter((text): text is string => typeof text === 'string')
      .join('');
    if (!content) {
      throw new Error('Anthropic response missing content');
    }

    const { usage } = parsed.data;
    const tokensUsed = usage
      ? (usage.input_tokens ?? 0) + (usage.output_tokens ?? 0)
      : countApproxTokens(content);

    return { content, tokensUsed, raw };
  }
}

function splitMessages(messages: PromptMessage[]): { system?: string; messages: Array<{ role: 'user' | 'assistant'; content: string }> } {
  const systemParts: string[] = [];
  const normalized: Array<{ role: 'user' | 'assistant'; content: string }> = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push(message.content);
    } else {
      normalized.push({ role: message.role, content: message.content });
    }
  }

  return {
    system: systemParts.length ? systemParts.join('\n') : undefined,
    messages: normalized
  };
}

function buildHeaders(apiKey: string, version: string): Record<string, string> {
  return {
    'x-api-key': apiKey,
    'anthropic-version': version,
    'content-type': 'application/json'
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'https:' || protocol === 'http:';
  } catch {
    return false;
  }
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
