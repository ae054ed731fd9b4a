import {
  compareByScore,
  FALLBACK_DECAY,
  frequencyBoost,
  rankByScore,
  scoreMemory,
  timeDecay
} from '../../memory/scoring';
import type { MemoryRecord } from '../../memory/types';

const HOUR = 60 * 60 * 1000;
const NOW = Date.UTC(2025, 0, 15);

function record(id: number, overrides: Partial<MemoryRecord> = {}): MemoryRecord {
  return {
    id,
    category: 'facts',
    content: `memory ${id}`,
    context: null,
    project: null,
    importance: 0.5,
    confidence: 0.8,
    accessCount: 0,
    lastAccessedAt: null,
    createdAt: NOW,
    updatedAt: NOW,
    sourceSession: null,
    supersededBy: null,
    ...overrides
  };
}

describe('scoring', () => {
  it('multiplies importance, confidence, access boost and decay', () => {
    expect(scoreMemory({ importance: 1, confidence: 1, accessCount: 0, createdAt: NOW }, NOW)).toBe(1);
    expect(scoreMemory({ importance: 0.5, confidence: 0.8, accessCount: 2, createdAt: NOW }, NOW)).toBeCloseTo(0.48);
    expect(scoreMemory({ importance: 1, confidence: 1, accessCount: 0, createdAt: NOW - 100 * HOUR }, NOW))
      .toBeCloseTo(0.998 ** 100, 10);
  });

  it('boosts by a tenth per access', () => {
    expect(frequencyBoost(0)).toBe(1);
    expect(frequencyBoost(5)).toBeCloseTo(1.5);
  });

  it('decays hourly and never grows for future timestamps', () => {
    expect(timeDecay(NOW - 24 * HOUR, NOW)).toBeCloseTo(0.998 ** 24, 10);
    expect(timeDecay(NOW + HOUR, NOW)).toBe(1);
  });

  it('falls back to a fixed decay for unreadable timestamps', () => {
    expect(timeDecay(Number.NaN, NOW)).toBe(FALLBACK_DECAY);
    expect(scoreMemory({ importance: 1, confidence: 1, accessCount: 0, createdAt: Number.NaN }, NOW)).toBe(0.5);
  });

  it('is monotonic in importance, access count and age', () => {
    const base = { importance: 0.5, confidence: 0.8, accessCount: 1, createdAt: NOW - 10 * HOUR };
    const score = scoreMemory(base, NOW);

    expect(scoreMemory({ ...base, importance: 0.6 }, NOW)).toBeGreaterThan(score);
    expect(scoreMemory({ ...base, accessCount: 2 }, NOW)).toBeGreaterThan(score);
    expect(scoreMemory({ ...base, createdAt: NOW - 20 * HOUR }, NOW)).toBeLessThan(score);
  });

  it('ranks by score and breaks ties by lower id', () => {
    const ranked = rankByScore([
      record(3, { importance: 0.4 }),
      record(2, { importance: 0.9 }),
      record(1, { importance: 0.4 })
    ], NOW);

    expect(ranked.map((entry) => entry.record.id)).toEqual([2, 1, 3]);
    expect(compareByScore({ record: record(1), score: 0.3 }, { record: record(2), score: 0.3 })).toBeLessThan(0);
    expect(compareByScore({ record: record(2), score: 0.1 }, { record: record(1), score: 0.3 })).toBeGreaterThan(0);
  });
});
