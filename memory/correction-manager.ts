import type { AuditLogger } from '../core/contracts/audit';
import { IllegalTransitionError, InvalidInputError, NotFoundError } from '../core/errors';
import { isActive, lifecycleState, retirePatch, supersedePatch } from './lifecycle';
import type { MemoryRepository } from './repositories/memory-repository';
import type { MemoryRecord, MemoryRelation } from './types';
import { assertRelationType } from './validation';

/** Floor applied to a correction's importance. */
export const CORRECTION_MIN_IMPORTANCE = 0.7;
export const CORRECTION_CONFIDENCE = 0.9;

export interface CorrectionResult {
  /** The corrected memory, now superseded by `replacement`. */
  previous: MemoryRecord;
  replacement: MemoryRecord;
}

export interface RelateResult {
  relation: MemoryRelation;
  /** `false` when the same edge already existed. */
  created: boolean;
}

interface CorrectionManagerOptions {
  repository: MemoryRepository;
  auditLogger?: AuditLogger;
  sessionId?: string | null;
  clock?: () => number;
}

export class CorrectionManager {
  private readonly repository: MemoryRepository;
  private readonly auditLogger?: AuditLogger;
  private readonly sessionId: string | null;
  private readonly clock: () => number;

  constructor(options: CorrectionManagerOptions) {
    this.repository = options.repository;
    this.auditLogger = options.auditLogger;
    this.sessionId = options.sessionId ?? null;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Replaces an active memory with a corrected copy. The replacement is created
   * and linked before the old memory is marked superseded, all in one store
   * transaction.
   */
  async correct(oldId: number, newContent: string, reason?: string): Promise<CorrectionResult> {
    const content = newContent.trim();
    if (!content) {
      throw new InvalidInputError('Corrected content is required');
    }

    const result = await this.repository.transaction(async (store) => {
      const previous = await store.get(oldId);
      if (!previous) {
        throw new NotFoundError(oldId);
      }
      if (!isActive(previous)) {
        throw new IllegalTransitionError(
          `Memory #${oldId} is ${lifecycleState(previous)}; only active memories can be corrected`
        );
      }

      const tags = await store.getTags(oldId);
      const replacement = await store.create(
        {
          category: previous.category,
          content,
          context: reason?.trim() || `Correction of #${oldId}`,
          project: previous.project,
          importance: Math.max(previous.importance, CORRECTION_MIN_IMPORTANCE),
          confidence: CORRECTION_CONFIDENCE,
          sourceSession: this.sessionId
        },
        tags
      );

      await store.addRelation({ fromId: replacement.id, toId: oldId, type: 'supersedes' });

      const outcome = await store.update(oldId, (current) => supersedePatch(current, replacement.id));
      if (outcome.status !== 'updated') {
        throw new NotFoundError(oldId);
      }
      return { previous: outcome.record, replacement };
    });

    await this.audit('memory_corrected', {
      previousId: result.previous.id,
      replacementId: result.replacement.id
    });
    return result;
  }

  /** Retires an active memory with no replacement. */
  async forget(id: number): Promise<MemoryRecord> {
    const outcome = await this.repository.update(id, (current) =>
      isActive(current) ? retirePatch(current, 'forgotten') : null
    );
    if (outcome.status !== 'updated') {
      throw new NotFoundError(id, `Memory #${id} not found or already forgotten`);
    }

    await this.audit('memory_forgotten', { memoryId: id });
    return outcome.record;
  }

  async relate(fromId: number, toId: number, relationType: string): Promise<RelateResult> {
    const relation: MemoryRelation = { fromId, toId, type: assertRelationType(relationType) };
    const created = await this.repository.addRelation(relation);
    if (created) {
      await this.audit('relation_created', { ...relation });
    }
    return { relation, created };
  }

  private async audit(eventType: 'memory_corrected' | 'memory_forgotten' | 'relation_created', data: Record<string, unknown>): Promise<void> {
    await this.auditLogger?.log({
      timestamp: this.clock(),
      sessionId: this.sessionId ?? undefined,
      eventType,
      data
    });
  }
}
