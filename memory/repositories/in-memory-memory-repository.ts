import { InvalidInputError, NotFoundError } from '../../core/errors';
import { lifecycleState } from '../lifecycle';
import type {
  LifecycleState,
  MemoryFilter,
  MemoryMutator,
  MemoryOrder,
  MemoryRecord,
  MemoryRelation,
  MemoryStats,
  NewMemoryRecord,
  QueryOptions,
  UpdateOutcome
} from '../types';
import { assertCategory, clampUnit, normalizeTags } from '../validation';
import type { MemoryRepository } from './memory-repository';

interface InMemoryRepositoryOptions {
  clock?: () => number;
}

interface Tables {
  memories: Map<number, MemoryRecord>;
  tags: Map<number, Set<string>>;
  relations: Map<string, MemoryRelation>;
  nextId: number;
}

/**
 * Process-local store. Operations run one at a time, so a mutator always sees
 * the latest committed row and a transaction is never interleaved with other
 * callers.
 */
export class InMemoryMemoryRepository implements MemoryRepository {
  private readonly view: TableView;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: InMemoryRepositoryOptions = {}) {
    this.view = new TableView(
      { memories: new Map(), tags: new Map(), relations: new Map(), nextId: 1 },
      options.clock ?? Date.now
    );
  }

  create(memory: NewMemoryRecord, tags?: string[]): Promise<MemoryRecord> {
    return this.exclusive(() => this.view.create(memory, tags));
  }

  get(id: number): Promise<MemoryRecord | undefined> {
    return this.exclusive(() => this.view.get(id));
  }

  update(id: number, mutator: MemoryMutator): Promise<UpdateOutcome> {
    return this.exclusive(() => this.view.update(id, mutator));
  }

  query(filter?: MemoryFilter, options?: QueryOptions): Promise<MemoryRecord[]> {
    return this.exclusive(() => this.view.query(filter, options));
  }

  recordAccess(ids: number[], accessedAt: number): Promise<void> {
    return this.exclusive(() => this.view.recordAccess(ids, accessedAt));
  }

  getTags(id: number): Promise<string[]> {
    return this.exclusive(() => this.view.getTags(id));
  }

  addTags(id: number, tags: string[]): Promise<void> {
    return this.exclusive(() => this.view.addTags(id, tags));
  }

  addRelation(relation: MemoryRelation): Promise<boolean> {
    return this.exclusive(() => this.view.addRelation(relation));
  }

  listRelations(id: number): Promise<MemoryRelation[]> {
    return this.exclusive(() => this.view.listRelations(id));
  }

  stats(): Promise<MemoryStats> {
    return this.exclusive(() => this.view.stats());
  }

  transaction<T>(work: (repository: MemoryRepository) => Promise<T>): Promise<T> {
    return this.exclusive(() => this.view.transaction(work));
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The queue only orders tasks; each caller still receives its own rejection.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/** Direct access to the tables, used by the repository and inside transactions. */
class TableView implements MemoryRepository {
  constructor(
    private readonly tables: Tables,
    private readonly clock: () => number
  ) {}

  async create(memory: NewMemoryRecord, tags: string[] = []): Promise<MemoryRecord> {
    const category = assertCategory(memory.category);
    const content = memory.content.trim();
    if (!content) {
      throw new InvalidInputError('Memory content is required');
    }

    const createdAt = memory.createdAt ?? this.clock();
    const record: MemoryRecord = {
      id: this.tables.nextId,
      category,
      content,
      context: memory.context ?? null,
      project: memory.project ?? null,
      importance: clampUnit(memory.importance, 0.5),
      confidence: clampUnit(memory.confidence, 0.8),
      accessCount: 0,
      lastAccessedAt: null,
      createdAt,
      updatedAt: createdAt,
      sourceSession: memory.sourceSession ?? null,
      supersededBy: null
    };

    this.tables.nextId += 1;
    this.tables.memories.set(record.id, record);
    this.tables.tags.set(record.id, new Set(normalizeTags(tags)));
    return { ...record };
  }

  async get(id: number): Promise<MemoryRecord | undefined> {
    const record = this.tables.memories.get(id);
    return record ? { ...record } : undefined;
  }

  async update(id: number, mutator: MemoryMutator): Promise<UpdateOutcome> {
    const current = this.tables.memories.get(id);
    if (!current) {
      return { status: 'not_found' };
    }

    const patch = mutator({ ...current });
    if (!patch) {
      return { status: 'unchanged', record: { ...current } };
    }

    const target = patch.supersededBy;
    if (target !== undefined && target > 0 && target !== id && !this.tables.memories.has(target)) {
      throw new NotFoundError(target);
    }

    const next: MemoryRecord = {
      ...current,
      importance: patch.importance === undefined ? current.importance : clampUnit(patch.importance, current.importance),
      supersededBy: target === undefined ? current.supersededBy : target,
      updatedAt: this.clock()
    };
    this.tables.memories.set(id, next);
    return { status: 'updated', record: { ...next } };
  }

  async query(filter: MemoryFilter = {}, options: QueryOptions = {}): Promise<MemoryRecord[]> {
    const matches = [...this.tables.memories.values()]
      .filter((record) => matchesFilter(record, filter))
      .sort(comparatorFor(options.order ?? 'id'));

    const limited = options.limit === undefined ? matches : matches.slice(0, Math.max(0, options.limit));
    return limited.map((record) => ({ ...record }));
  }

  async recordAccess(ids: number[], accessedAt: number): Promise<void> {
    for (const id of new Set(ids)) {
      const current = this.tables.memories.get(id);
      if (!current) {
        continue;
      }
      this.tables.memories.set(id, {
        ...current,
        accessCount: current.accessCount + 1,
        lastAccessedAt: accessedAt,
        updatedAt: accessedAt
      });
    }
  }

  async getTags(id: number): Promise<string[]> {
    return [...(this.tables.tags.get(id) ?? [])].sort();
  }

  async addTags(id: number, tags: string[]): Promise<void> {
    const existing = this.tables.tags.get(id);
    if (!existing) {
      throw new NotFoundError(id);
    }
    for (const tag of normalizeTags(tags)) {
      existing.add(tag);
    }
  }

  async addRelation(relation: MemoryRelation): Promise<boolean> {
    for (const id of [relation.fromId, relation.toId]) {
      if (!this.tables.memories.has(id)) {
        throw new NotFoundError(id);
      }
    }

    const key = `${relation.fromId}:${relation.toId}:${relation.type}`;
    if (this.tables.relations.has(key)) {
      return false;
    }
    this.tables.relations.set(key, { ...relation });
    return true;
  }

  async listRelations(id: number): Promise<MemoryRelation[]> {
    return [...this.tables.relations.values()]
      .filter((relation) => relation.fromId === id || relation.toId === id)
      .map((relation) => ({ ...relation }));
  }

  async stats(): Promise<MemoryStats> {
    const stats: MemoryStats = {
      totalActive: 0,
      totalSuperseded: 0,
      totalRetired: 0,
      byCategory: {},
      byProject: {},
      mostAccessed: []
    };
    const active: MemoryRecord[] = [];

    for (const record of this.tables.memories.values()) {
      const state = lifecycleState(record);
      if (state === 'superseded') {
        stats.totalSuperseded += 1;
        continue;
      }
      if (state === 'retired') {
        stats.totalRetired += 1;
        continue;
      }

      stats.totalActive += 1;
      active.push(record);
      stats.byCategory[record.category] = (stats.byCategory[record.category] ?? 0) + 1;
      const project = record.project ?? 'global';
      stats.byProject[project] = (stats.byProject[project] ?? 0) + 1;
    }

    stats.mostAccessed = active
      .sort(comparatorFor('accessed'))
      .slice(0, 5)
      .map(({ id, content, accessCount }) => ({ id, content, accessCount }));
    return stats;
  }

  async transaction<T>(work: (repository: MemoryRepository) => Promise<T>): Promise<T> {
    const snapshot = cloneTables(this.tables);
    try {
      return await work(this);
    } catch (error) {
      this.tables.memories = snapshot.memories;
      this.tables.tags = snapshot.tags;
      this.tables.relations = snapshot.relations;
      this.tables.nextId = snapshot.nextId;
      throw error;
    }
  }
}

function cloneTables(tables: Tables): Tables {
  return {
    memories: new Map(tables.memories),
    tags: new Map([...tables.tags].map(([id, tags]) => [id, new Set(tags)])),
    relations: new Map(tables.relations),
    nextId: tables.nextId
  };
}

function matchesFilter(record: MemoryRecord, filter: MemoryFilter): boolean {
  const states: LifecycleState[] = filter.states ?? ['active'];
  if (!states.includes(lifecycleState(record))) {
    return false;
  }
  if (filter.ids && !filter.ids.includes(record.id)) {
    return false;
  }
  if (filter.category && record.category !== filter.category) {
    return false;
  }
  if (filter.project !== undefined && record.project !== null && record.project !== filter.project) {
    return false;
  }
  if (filter.contentTerms && filter.contentTerms.length > 0) {
    const content = record.content.toLowerCase();
    if (!filter.contentTerms.some((term) => content.includes(term.toLowerCase()))) {
      return false;
    }
  }
  if (filter.maxAccessCount !== undefined && record.accessCount > filter.maxAccessCount) {
    return false;
  }
  if (filter.createdBefore !== undefined && record.createdAt > filter.createdBefore) {
    return false;
  }
  if (filter.updatedBefore !== undefined && record.updatedAt > filter.updatedBefore) {
    return false;
  }
  if (filter.importanceAbove !== undefined && !(record.importance > filter.importanceAbove)) {
    return false;
  }
  if (filter.importanceBelow !== undefined && !(record.importance < filter.importanceBelow)) {
    return false;
  }
  return true;
}

function comparatorFor(order: MemoryOrder): (a: MemoryRecord, b: MemoryRecord) => number {
  switch (order) {
    case 'recency':
      return (a, b) => b.createdAt - a.createdAt || b.id - a.id;
    case 'importance':
      return (a, b) => b.importance - a.importance || a.id - b.id;
    case 'accessed':
      return (a, b) => b.accessCount - a.accessCount || a.id - b.id;
    case 'id':
      return (a, b) => a.id - b.id;
  }
}
