import { IllegalTransitionError } from '../core/errors';
import type { LifecycleState, MemoryPatch, MemoryRecord } from './types';

/** `superseded_by` value for memories retired by decay (no replacement). */
export const RETIRED_SENTINEL = -1;

export type RetirementReason = 'forgotten' | 'decayed';

export function lifecycleState(record: Pick<MemoryRecord, 'id' | 'supersededBy'>): LifecycleState {
  const { supersededBy } = record;
  if (supersededBy === null) {
    return 'active';
  }
  if (supersededBy === record.id || supersededBy < 0) {
    return 'retired';
  }
  return 'superseded';
}

export function isActive(record: Pick<MemoryRecord, 'id' | 'supersededBy'>): boolean {
  return lifecycleState(record) === 'active';
}

/**
 * Active -> Superseded. Superseded and Retired are terminal.
 */
export function supersedePatch(record: MemoryRecord, replacementId: number): MemoryPatch {
  assertActive(record, 'supersede');
  if (!Number.isInteger(replacementId) || replacementId <= 0) {
    throw new IllegalTransitionError(`Replacement id must be a positive integer. Got: ${replacementId}`);
  }
  if (replacementId === record.id) {
    throw new IllegalTransitionError(`Memory #${record.id} cannot supersede itself`);
  }
  return { supersededBy: replacementId };
}

/**
 * Active -> Retired. An explicit forget marks the record with its own id,
 * decay-driven retirement with RETIRED_SENTINEL.
 */
export function retirePatch(record: MemoryRecord, reason: RetirementReason): MemoryPatch {
  assertActive(record, 'retire');
  return { supersededBy: reason === 'forgotten' ? record.id : RETIRED_SENTINEL };
}

function assertActive(record: MemoryRecord, action: string): void {
  const state = lifecycleState(record);
  if (state !== 'active') {
    throw new IllegalTransitionError(`Cannot ${action} memory #${record.id}: it is ${state}`);
  }
}
