import { InvalidCategoryError, InvalidRelationTypeError } from '../core/errors';
import { MEMORY_CATEGORIES, RELATION_TYPES, type MemoryCategory, type RelationType } from './types';

export function isMemoryCategory(value: string): value is MemoryCategory {
  return MEMORY_CATEGORIES.some((category) => category === value);
}

export function isRelationType(value: string): value is RelationType {
  return RELATION_TYPES.some((type) => type === value);
}

export function assertCategory(value: string): MemoryCategory {
  if (!isMemoryCategory(value)) {
    throw new InvalidCategoryError(value, MEMORY_CATEGORIES);
  }
  return value;
}

export function assertRelationType(value: string): RelationType {
  if (!isRelationType(value)) {
    throw new InvalidRelationTypeError(value, RELATION_TYPES);
  }
  return value;
}

export function clampUnit(value: number, fallback: number): number {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(1, Math.max(0, value));
}

export function normalizeTags(tags: readonly string[] = []): string[] {
  const normalized = new Set<string>();
  for (const tag of tags) {
    const value = tag.trim().toLowerCase();
    if (value) {
      normalized.add(value);
    }
  }
  return [...normalized];
}

/** Key two memories must share to be merged by the consolidation sweep. */
export function dedupKey(content: string): string {
  return content.trim().toLowerCase();
}
