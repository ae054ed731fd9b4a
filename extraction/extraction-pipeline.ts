import type { AuditLogger } from '../core/contracts/audit';
import type { MemoryRepository } from '../memory/repositories/memory-repository';
import type { MemoryCategory, NewMemoryRecord } from '../memory/types';
import { clampUnit, isMemoryCategory, normalizeTags } from '../memory/validation';
import type { CandidateProducer, MemoryCandidate } from './candidate-producer';
import { EXCERPT_CHARS } from './llm-candidate-producer';

export const MIN_TRANSCRIPT_CHARS = 200;
export const MAX_CANDIDATES = 5;
export const MIN_CONTENT_CHARS = 10;
export const MAX_TAGS = 5;
export const EXTRACTED_CONTEXT = 'Auto-extracted';

export interface IngestRequest {
  transcript: string;
  sessionId?: string | null;
  project?: string | null;
}

export interface NormalizedCandidate {
  memory: NewMemoryRecord;
  tags: string[];
}

interface ExtractionPipelineOptions {
  producer: CandidateProducer;
  repository: MemoryRepository;
  auditLogger?: AuditLogger;
  clock?: () => number;
}

/**
 * Stores producer candidates for a transcript. Ingestion is best effort: any
 * failure is logged and the call resolves with the number of memories stored.
 */
export class ExtractionPipeline {
  private readonly producer: CandidateProducer;
  private readonly repository: MemoryRepository;
  private readonly auditLogger?: AuditLogger;
  private readonly clock: () => number;

  constructor(options: ExtractionPipelineOptions) {
    this.producer = options.producer;
    this.repository = options.repository;
    this.auditLogger = options.auditLogger;
    this.clock = options.clock ?? Date.now;
  }

  async ingest(request: IngestRequest): Promise<number> {
    const excerpt = request.transcript.slice(-EXCERPT_CHARS);
    if (excerpt.trim().length < MIN_TRANSCRIPT_CHARS) {
      return 0;
    }

    const sessionId = request.sessionId ?? null;
    const project = request.project?.trim() || null;

    try {
      const candidates = await this.producer.produce(excerpt);
      const normalized = candidates
        .slice(0, MAX_CANDIDATES)
        .map((candidate) => normalizeCandidate(candidate, { sessionId, project }))
        .filter((candidate): candidate is NormalizedCandidate => candidate !== null);

      const stored = normalized.length
        ? await this.repository.transaction(async (store) => {
          for (const candidate of normalized) {
            await store.create(candidate.memory, candidate.tags);
          }
          return normalized.length;
        })
        : 0;

      await this.auditLogger?.log({
        timestamp: this.clock(),
        sessionId: sessionId ?? undefined,
        eventType: 'extraction_completed',
        data: { candidates: candidates.length, stored, project }
      });
      return stored;
    } catch (error) {
      await this.auditLogger?.log({
        timestamp: this.clock(),
        sessionId: sessionId ?? undefined,
        eventType: 'extraction_failed',
        data: { error, project }
      });
      return 0;
    }
  }
}

export function normalizeCandidate(
  candidate: MemoryCandidate,
  origin: { sessionId: string | null; project: string | null }
): NormalizedCandidate | null {
  const content = candidate.content.trim();
  if (content.length < MIN_CONTENT_CHARS) {
    return null;
  }

  const category: MemoryCategory = candidate.category && isMemoryCategory(candidate.category)
    ? candidate.category
    : 'facts';

  return {
    memory: {
      category,
      content,
      context: EXTRACTED_CONTEXT,
      project: origin.project,
      importance: clampUnit(candidate.importance ?? 0.5, 0.5),
      confidence: clampUnit(candidate.confidence ?? 0.8, 0.8),
      sourceSession: origin.sessionId
    },
    tags: normalizeTags((candidate.tags ?? []).slice(0, MAX_TAGS))
  };
}
