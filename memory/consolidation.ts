import type { AuditLogger } from '../core/contracts/audit';
import { StoreUnavailableError } from '../core/errors';
import { isActive, retirePatch, supersedePatch } from './lifecycle';
import type { MemoryRepository } from './repositories/memory-repository';
import type { MemoryRecord } from './types';
import { dedupKey } from './validation';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface SweepPolicy {
  /** Idle time (since creation and since the last mutation) before decay applies. */
  decayAfterMs: number;
  decayFactor: number;
  /** Memories at or below this importance no longer decay. */
  decayFloor: number;
  retireAfterMs: number;
  /** Unaccessed memories below this importance retire once old enough. */
  retireBelow: number;
}

export const DEFAULT_SWEEP_POLICY: SweepPolicy = {
  decayAfterMs: 30 * MS_PER_DAY,
  decayFactor: 0.9,
  decayFloor: 0.1,
  retireAfterMs: 90 * MS_PER_DAY,
  retireBelow: 0.1
};

export interface SweepMerge {
  memoryId: number;
  keeperId: number;
}

export interface SweepReport {
  startedAt: number;
  finishedAt: number;
  decayed: number[];
  retired: number[];
  merged: SweepMerge[];
}

interface ConsolidationSweepOptions {
  repository: MemoryRepository;
  auditLogger?: AuditLogger;
  policy?: Partial<SweepPolicy>;
  clock?: () => number;
}

/**
 * Background maintenance over the active set: decay, then retirement, then
 * deduplication. Each change is its own atomic row update, so readers may
 * observe a partially applied sweep; repeating the sweep converges.
 */
export class ConsolidationSweep {
  private readonly repository: MemoryRepository;
  private readonly auditLogger?: AuditLogger;
  private readonly policy: SweepPolicy;
  private readonly clock: () => number;
  private inFlight: Promise<SweepReport | null> | null = null;

  constructor(options: ConsolidationSweepOptions) {
    this.repository = options.repository;
    this.auditLogger = options.auditLogger;
    this.policy = { ...DEFAULT_SWEEP_POLICY, ...options.policy };
    this.clock = options.clock ?? Date.now;

    if (!(this.policy.decayFactor > 0 && this.policy.decayFactor < 1)) {
      throw new Error(`decayFactor must be between 0 and 1 (exclusive). Got: ${this.policy.decayFactor}`);
    }
    if (!(this.policy.decayAfterMs >= 0) || !(this.policy.retireAfterMs >= 0)) {
      throw new Error('Sweep age thresholds must be non-negative');
    }
  }

  /**
   * Runs one sweep. A call made while a sweep is in progress joins it instead
   * of starting a second one. Resolves `null` when the store is unavailable.
   */
  run(now: number = this.clock()): Promise<SweepReport | null> {
    if (!this.inFlight) {
      this.inFlight = this.execute(now).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async execute(now: number): Promise<SweepReport | null> {
    try {
      const report: SweepReport = {
        startedAt: now,
        finishedAt: now,
        decayed: await this.decay(now),
        retired: await this.retire(now),
        merged: await this.deduplicate()
      };
      report.finishedAt = this.clock();

      await this.auditLogger?.log({
        timestamp: report.finishedAt,
        eventType: 'sweep_completed',
        data: {
          decayed: report.decayed.length,
          retired: report.retired.length,
          merged: report.merged.length
        }
      });
      return report;
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) {
        throw error;
      }
      await this.auditLogger?.log({
        timestamp: this.clock(),
        eventType: 'sweep_skipped',
        data: { reason: error.message }
      });
      return null;
    }
  }

  private async decay(now: number): Promise<number[]> {
    const idleCutoff = now - this.policy.decayAfterMs;
    const candidates = await this.repository.query({
      maxAccessCount: 0,
      createdBefore: idleCutoff,
      updatedBefore: idleCutoff,
      importanceAbove: this.policy.decayFloor
    });

    const decayed: number[] = [];
    for (const candidate of candidates) {
      const outcome = await this.repository.update(candidate.id, (current) =>
        this.isDecayable(current, idleCutoff)
          ? { importance: current.importance * this.policy.decayFactor }
          : null
      );
      if (outcome.status === 'updated') {
        decayed.push(candidate.id);
      }
    }
    return decayed;
  }

  private async retire(now: number): Promise<number[]> {
    const ageCutoff = now - this.policy.retireAfterMs;
    const candidates = await this.repository.query({
      maxAccessCount: 0,
      createdBefore: ageCutoff,
      importanceBelow: this.policy.retireBelow
    });

    const retired: number[] = [];
    for (const candidate of candidates) {
      const outcome = await this.repository.update(candidate.id, (current) =>
        this.isRetirable(current, ageCutoff) ? retirePatch(current, 'decayed') : null
      );
      if (outcome.status === 'updated') {
        retired.push(candidate.id);
      }
    }
    return retired;
  }

  private async deduplicate(): Promise<SweepMerge[]> {
    const active = await this.repository.query({}, { order: 'id' });
    const groups = new Map<string, MemoryRecord[]>();
    for (const record of active) {
      const key = dedupKey(record.content);
      const group = groups.get(key);
      if (group) {
        group.push(record);
      } else {
        groups.set(key, [record]);
      }
    }

    const merged: SweepMerge[] = [];
    for (const group of groups.values()) {
      if (group.length < 2) {
        continue;
      }

      const keeper = selectKeeper(group);
      for (const duplicate of group) {
        if (duplicate.id === keeper.id) {
          continue;
        }
        const outcome = await this.repository.update(duplicate.id, (current) =>
          isActive(current) ? supersedePatch(current, keeper.id) : null
        );
        if (outcome.status === 'updated') {
          merged.push({ memoryId: duplicate.id, keeperId: keeper.id });
        }
      }
    }
    return merged;
  }

  private isDecayable(record: MemoryRecord, idleCutoff: number): boolean {
    return isActive(record)
      && record.accessCount === 0
      && record.createdAt <= idleCutoff
      && record.updatedAt <= idleCutoff
      && record.importance > this.policy.decayFloor;
  }

  private isRetirable(record: MemoryRecord, ageCutoff: number): boolean {
    return isActive(record)
      && record.accessCount === 0
      && record.createdAt <= ageCutoff
      && record.importance < this.policy.retireBelow;
  }
}

/**
 * Most accessed wins, then most important; remaining ties go to the lowest id.
 */
export function selectKeeper(group: readonly MemoryRecord[]): MemoryRecord {
  const [keeper, ...rest] = group;
  if (!keeper) {
    throw new Error('Cannot select a keeper from an empty group');
  }

  return rest.reduce((best, candidate) => {
    if (candidate.accessCount !== best.accessCount) {
      return candidate.accessCount > best.accessCount ? candidate : best;
    }
    if (candidate.importance !== best.importance) {
      return candidate.importance > best.importance ? candidate : best;
    }
    return candidate.id < best.id ? candidate : best;
  }, keeper);
}
