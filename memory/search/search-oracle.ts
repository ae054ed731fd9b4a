import type { MemoryCategory } from '../types';

export interface SearchFilter {
  category?: MemoryCategory;
  project?: string;
  includeInactive?: boolean;
}

export interface SearchHit {
  id: number;
  /** Oracle-specific; only the order of hits is meaningful to callers. */
  relevance: number;
}

/** Locates candidate memories for a free-text query, best match first. */
export interface SearchOracle {
  search(text: string, filter: SearchFilter, limit: number): Promise<SearchHit[]>;
}
