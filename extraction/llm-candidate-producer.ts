import { z } from 'zod';
import type { LLMAdapter } from '../core/contracts/llm';
import type { CandidateProducer, MemoryCandidate } from './candidate-producer';

export const EXCERPT_CHARS = 4000;

const EXTRACTION_PROMPT = `Review the following excerpt of a working session between a user and an assistant.
List only knowledge that will still be useful in later sessions.

Use one of these categories for each item:
- preferences: how the user explicitly likes things done
- corrections: a mistake or wrong assumption the user corrected
- decisions: technical or design choices, with their rationale when given
- facts: stable facts about the user, their tools or their environment
- procedures: workflows or techniques that worked
- project-knowledge: architecture and conventions of a specific project
- relationships: links between people, tools, concepts or projects

Describe every item as a JSON object with these fields:
- content: one or two sentences, phrased as a reusable statement
- category: one of the categories above
- importance: number from 0 to 1
- confidence: number from 0 to 1 (explicit statements 0.9 and above, inferences lower)
- tags: one to three keywords

Skip routine edits, temporary state, small talk and anything already recorded in the project files.
Reply with a JSON array only, or [] when nothing qualifies.

Excerpt:
---
{{transcript}}
---`;

const candidateSchema = z.object({
  content: z.string(),
  category: z.string().optional(),
  importance: z.number().optional(),
  confidence: z.number().optional(),
  tags: z.array(z.unknown()).optional()
});

interface LlmCandidateProducerOptions {
  adapter: LLMAdapter;
  maxTokens?: number;
  excerptChars?: number;
}

/** Asks an LLM for candidates over the tail of a transcript. */
export class LlmCandidateProducer implements CandidateProducer {
  private readonly adapter: LLMAdapter;
  private readonly maxTokens: number;
  private readonly excerptChars: number;

  constructor(options: LlmCandidateProducerOptions) {
    this.adapter = options.adapter;
    this.maxTokens = options.maxTokens ?? 1024;
    this.excerptChars = options.excerptChars ?? EXCERPT_CHARS;
  }

  async produce(transcript: string): Promise<MemoryCandidate[]> {
    const excerpt = transcript.slice(-this.excerptChars);
    const response = await this.adapter.generate({
      messages: [{ role: 'user', content: buildExtractionPrompt(excerpt) }],
      maxTokens: this.maxTokens
    });

    return parseCandidates(response.content);
  }
}

export function buildExtractionPrompt(excerpt: string): string {
  return EXTRACTION_PROMPT.replace('{{transcript}}', () => excerpt);
}

/**
 * Parses a model reply into candidates. Items that fail validation are
 * dropped one by one; a reply that is not JSON throws.
 */
export function parseCandidates(reply: string): MemoryCandidate[] {
  const parsed: unknown = JSON.parse(stripCodeFence(reply));
  if (!Array.isArray(parsed)) {
    return [];
  }

  const candidates: MemoryCandidate[] = [];
  for (const item of parsed) {
    const result = candidateSchema.safeParse(item);
    if (!result.success) {
      continue;
    }
    const { tags, ...rest } = result.data;
    candidates.push({
      ...rest,
      tags: tags?.filter((tag): tag is string => typeof tag === 'string')
    });
  }
  return candidates;
}

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }

  const firstBreak = trimmed.indexOf('\n');
  const body = firstBreak === -1 ? '' : trimmed.slice(firstBreak + 1);
  const closing = body.lastIndexOf('```');
  return (closing === -1 ? body : body.slice(0, closing)).trim();
}
