import type {
  MemoryFilter,
  MemoryMutator,
  MemoryRecord,
  MemoryRelation,
  MemoryStats,
  NewMemoryRecord,
  QueryOptions,
  UpdateOutcome
} from '../types';

/**
 * Durable store for memories, their tags and relations. Every mutation bumps
 * `updatedAt`; `update` applies its mutator atomically for the row.
 */
export interface MemoryRepository {
  create(memory: NewMemoryRecord, tags?: string[]): Promise<MemoryRecord>;
  get(id: number): Promise<MemoryRecord | undefined>;
  update(id: number, mutator: MemoryMutator): Promise<UpdateOutcome>;
  query(filter?: MemoryFilter, options?: QueryOptions): Promise<MemoryRecord[]>;
  recordAccess(ids: number[], accessedAt: number): Promise<void>;
  getTags(id: number): Promise<string[]>;
  /** Tags live beside the record; adding them leaves `updatedAt` unchanged. */
  addTags(id: number, tags: string[]): Promise<void>;
  /** Resolves `false` when the edge already existed. */
  addRelation(relation: MemoryRelation): Promise<boolean>;
  listRelations(id: number): Promise<MemoryRelation[]>;
  stats(): Promise<MemoryStats>;
  /**
   * Runs `work` against a transactional view of the store. Nothing done inside
   * is kept when `work` throws.
   */
  transaction<T>(work: (repository: MemoryRepository) => Promise<T>): Promise<T>;
}
