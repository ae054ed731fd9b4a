import type { MemoryRecord, ScoredMemory } from './types';

const MS_PER_HOUR = 60 * 60 * 1000;

export const HOURLY_DECAY_BASE = 0.998;
export const ACCESS_BOOST_STEP = 0.1;
/** Decay used when a memory's creation time cannot be read. */
export const FALLBACK_DECAY = 0.5;

export type ScoringInput = Pick<MemoryRecord, 'importance' | 'confidence' | 'accessCount' | 'createdAt'>;

export function frequencyBoost(accessCount: number): number {
  return 1 + Math.max(0, accessCount) * ACCESS_BOOST_STEP;
}

export function timeDecay(createdAt: number, now: number = Date.now()): number {
  if (!Number.isFinite(createdAt) || !Number.isFinite(now)) {
    return FALLBACK_DECAY;
  }

  const ageHours = Math.max(0, now - createdAt) / MS_PER_HOUR;
  return HOURLY_DECAY_BASE ** ageHours;
}

export function scoreMemory(memory: ScoringInput, now: number = Date.now()): number {
  return memory.importance
    * memory.confidence
    * frequencyBoost(memory.accessCount)
    * timeDecay(memory.createdAt, now);
}

/** Highest score first; equal scores keep the older (lower id) memory first. */
export function compareByScore(a: ScoredMemory, b: ScoredMemory): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.record.id - b.record.id;
}

export function rankByScore(records: readonly MemoryRecord[], now: number = Date.now()): ScoredMemory[] {
  return records
    .map((record) => ({ record, score: scoreMemory(record, now) }))
    .sort(compareByScore);
}
