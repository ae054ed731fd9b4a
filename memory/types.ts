export const MEMORY_CATEGORIES = [
  'preferences',
  'facts',
  'corrections',
  'decisions',
  'project-knowledge',
  'relationships',
  'procedures'
] as const;

export type MemoryCategory = (typeof MEMORY_CATEGORIES)[number];

export const RELATION_TYPES = ['contradicts', 'supports', 'refines', 'supersedes'] as const;

export type RelationType = (typeof RELATION_TYPES)[number];

export type LifecycleState = 'active' | 'superseded' | 'retired';

export interface MemoryRecord {
  id: number;
  category: MemoryCategory;
  content: string;
  context: string | null;
  /** `null` means the memory is global. */
  project: string | null;
  importance: number;
  confidence: number;
  accessCount: number;
  lastAccessedAt: number | null;
  createdAt: number;
  updatedAt: number;
  sourceSession: string | null;
  /**
   * `null` while active. A different record's id when superseded; the record's
   * own id or RETIRED_SENTINEL when retired.
   */
  supersededBy: number | null;
}

export interface NewMemoryRecord {
  category: string;
  content: string;
  context?: string | null;
  project?: string | null;
  importance: number;
  confidence: number;
  sourceSession?: string | null;
  /** Defaults to the store's clock. */
  createdAt?: number;
}

/** Fields a lifecycle mutation may change. */
export interface MemoryPatch {
  importance?: number;
  supersededBy?: number;
}

export interface MemoryRelation {
  fromId: number;
  toId: number;
  type: RelationType;
}

export interface MemoryFilter {
  /** Defaults to `['active']`. */
  states?: LifecycleState[];
  ids?: number[];
  category?: MemoryCategory;
  /** Matches the project's own memories and global ones. */
  project?: string;
  /** Case-insensitive substring match on content; any term matches. */
  contentTerms?: string[];
  maxAccessCount?: number;
  /** Inclusive. */
  createdBefore?: number;
  /** Inclusive. */
  updatedBefore?: number;
  importanceAbove?: number;
  importanceBelow?: number;
}

export type MemoryOrder = 'id' | 'recency' | 'importance' | 'accessed';

export interface QueryOptions {
  order?: MemoryOrder;
  limit?: number;
}

export type UpdateOutcome =
  | { status: 'updated'; record: MemoryRecord }
  | { status: 'unchanged'; record: MemoryRecord }
  | { status: 'not_found' };

export type MemoryMutator = (current: MemoryRecord) => MemoryPatch | null;

export interface MemoryStats {
  totalActive: number;
  totalSuperseded: number;
  totalRetired: number;
  byCategory: Partial<Record<MemoryCategory, number>>;
  byProject: Record<string, number>;
  mostAccessed: Array<Pick<MemoryRecord, 'id' | 'content' | 'accessCount'>>;
}

export interface ScoredMemory {
  record: MemoryRecord;
  score: number;
}
