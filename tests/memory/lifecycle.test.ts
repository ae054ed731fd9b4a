import { IllegalTransitionError } from '../../core/errors';
import { isActive, lifecycleState, RETIRED_SENTINEL, retirePatch, supersedePatch } from '../../memory/lifecycle';
import type { MemoryRecord } from '../../memory/types';

function record(id: number, supersededBy: number | null = null): MemoryRecord {
  return {
    id,
    category: 'facts',
    content: 'content',
    context: null,
    project: null,
    importance: 0.5,
    confidence: 0.8,
    accessCount: 0,
    lastAccessedAt: null,
    createdAt: 0,
    updatedAt: 0,
    sourceSession: null,
    supersededBy
  };
}

describe('lifecycle', () => {
  it('derives the state from superseded_by', () => {
    expect(lifecycleState(record(4))).toBe('active');
    expect(lifecycleState(record(4, 9))).toBe('superseded');
    expect(lifecycleState(record(4, 4))).toBe('retired');
    expect(lifecycleState(record(4, RETIRED_SENTINEL))).toBe('retired');
    expect(isActive(record(4))).toBe(true);
    expect(isActive(record(4, 4))).toBe(false);
  });

  it('supersedes an active memory with another memory', () => {
    expect(supersedePatch(record(4), 9)).toEqual({ supersededBy: 9 });
  });

  it('rejects self, non-positive and terminal transitions', () => {
    expect(() => supersedePatch(record(4), 4)).toThrow(IllegalTransitionError);
    expect(() => supersedePatch(record(4), 0)).toThrow('Replacement id must be a positive integer. Got: 0');
    expect(() => supersedePatch(record(4, 9), 10)).toThrow('Cannot supersede memory #4: it is superseded');
    expect(() => retirePatch(record(4, 4), 'forgotten')).toThrow('Cannot retire memory #4: it is retired');
  });

  it('marks forgotten memories with their own id and decayed ones with the sentinel', () => {
    expect(retirePatch(record(4), 'forgotten')).toEqual({ supersededBy: 4 });
    expect(retirePatch(record(4), 'decayed')).toEqual({ supersededBy: RETIRED_SENTINEL });
  });
});
