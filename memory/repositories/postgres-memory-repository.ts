import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { InvalidInputError, NotFoundError, StoreUnavailableError } from '../../core/errors';
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
import { assertCategory, assertRelationType, clampUnit, normalizeTags } from '../validation';
import type { MemoryRepository } from './memory-repository';

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS memories (
    id SERIAL PRIMARY KEY,
    category TEXT NOT NULL,
    content TEXT NOT NULL,
    context TEXT,
    project TEXT,
    importance DOUBLE PRECISION NOT NULL DEFAULT 0.5,
    confidence DOUBLE PRECISION NOT NULL DEFAULT 0.8,
    access_count INTEGER NOT NULL DEFAULT 0,
    last_accessed_at BIGINT,
    created_at BIGINT NOT NULL,
    updated_at BIGINT NOT NULL,
    source_session TEXT,
    superseded_by INTEGER,
    version INTEGER NOT NULL DEFAULT 0
  )`,
  `CREATE TABLE IF NOT EXISTS memory_tags (
    memory_id INTEGER NOT NULL REFERENCES memories(id) ON DELETE CASCADE,
    tag TEXT NOT NULL,
    PRIMARY KEY (memory_id, tag)
  )`,
  `CREATE TABLE IF NOT EXISTS memory_relations (
    from_id INTEGER NOT NULL REFERENCES memories(id),
    to_id INTEGER NOT NULL REFERENCES memories(id),
    relation_type TEXT NOT NULL,
    PRIMARY KEY (from_id, to_id, relation_type)
  )`,
  'CREATE INDEX IF NOT EXISTS idx_memories_category ON memories(category)',
  'CREATE INDEX IF NOT EXISTS idx_memories_project ON memories(project)',
  'CREATE INDEX IF NOT EXISTS idx_memories_superseded_by ON memories(superseded_by)',
  'CREATE INDEX IF NOT EXISTS idx_memory_tags_tag ON memory_tags(tag)'
];

/** Optimistic update attempts before giving up on a contended row. */
const MAX_UPDATE_ATTEMPTS = 5;

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', '57P01', '57P03']);

type SqlExecutor = <R extends QueryResultRow>(text: string, values?: unknown[]) => Promise<QueryResult<R>>;

interface PostgresRepositoryOptions {
  clock?: () => number;
}

export class PostgresMemoryRepository implements MemoryRepository {
  private readonly session: SqlSession;
  private readonly clock: () => number;
  private schemaReady?: Promise<void>;

  constructor(private readonly pool: Pool, options: PostgresRepositoryOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.session = new SqlSession(
      guarded(<R extends QueryResultRow>(text: string, values: unknown[] = []) => pool.query<R>(text, values)),
      this.clock
    );
  }

  /** Creates tables and indexes once per repository instance. */
  ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema().catch((error: unknown) => {
        this.schemaReady = undefined;
        throw error instanceof StoreUnavailableError
          ? error
          : new StoreUnavailableError('Failed to initialize memory schema', error);
      });
    }
    return this.schemaReady;
  }

  private async createSchema(): Promise<void> {
    for (const statement of SCHEMA_STATEMENTS) {
      await this.session.execute(statement);
    }
  }

  create(memory: NewMemoryRecord, tags?: string[]): Promise<MemoryRecord> {
    return this.transaction((repository) => repository.create(memory, tags));
  }

  get(id: number): Promise<MemoryRecord | undefined> {
    return this.session.get(id);
  }

  update(id: number, mutator: MemoryMutator): Promise<UpdateOutcome> {
    return this.session.update(id, mutator);
  }

  query(filter?: MemoryFilter, options?: QueryOptions): Promise<MemoryRecord[]> {
    return this.session.query(filter, options);
  }

  recordAccess(ids: number[], accessedAt: number): Promise<void> {
    return this.session.recordAccess(ids, accessedAt);
  }

  getTags(id: number): Promise<string[]> {
    return this.session.getTags(id);
  }

  addTags(id: number, tags: string[]): Promise<void> {
    return this.session.addTags(id, tags);
  }

  addRelation(relation: MemoryRelation): Promise<boolean> {
    return this.session.addRelation(relation);
  }

  listRelations(id: number): Promise<MemoryRelation[]> {
    return this.session.listRelations(id);
  }

  stats(): Promise<MemoryStats> {
    return this.session.stats();
  }

  async transaction<T>(work: (repository: MemoryRepository) => Promise<T>): Promise<T> {
    const client = await this.connect();
    const session = new SqlSession(
      guarded(<R extends QueryResultRow>(text: string, values: unknown[] = []) => client.query<R>(text, values)),
      this.clock
    );

    try {
      await session.execute('BEGIN');
      const result = await work(session);
      await session.execute('COMMIT');
      return result;
    } catch (error) {
      try {
        await session.execute('ROLLBACK');
      } catch (rollbackError) {
        throw new AggregateError([error, rollbackError], 'Memory transaction rollback failed');
      }
      throw error;
    } finally {
      client.release();
    }
  }

  private async connect(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw new StoreUnavailableError('Memory store connection failed', error);
    }
  }
}

/** Statements against one connection (the pool, or a client inside a transaction). */
class SqlSession implements MemoryRepository {
  constructor(
    private readonly run: SqlExecutor,
    private readonly clock: () => number
  ) {}

  async execute(sql: string): Promise<void> {
    await this.run(sql);
  }

  async create(memory: NewMemoryRecord, tags: string[] = []): Promise<MemoryRecord> {
    const category = assertCategory(memory.category);
    const content = memory.content.trim();
    if (!content) {
      throw new InvalidInputError('Memory content is required');
    }

    const createdAt = memory.createdAt ?? this.clock();
    const result = await this.run<MemoryRow>(
      `INSERT INTO memories
         (category, content, context, project, importance, confidence, created_at, updated_at, source_session)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING *`,
      [
        category,
        content,
        memory.context ?? null,
        memory.project ?? null,
        clampUnit(memory.importance, 0.5),
        clampUnit(memory.confidence, 0.8),
        createdAt,
        createdAt,
        memory.sourceSession ?? null
      ]
    );

    const record = toMemoryRecord(firstRow(result));
    await this.insertTags(record.id, tags);
    return record;
  }

  async get(id: number): Promise<MemoryRecord | undefined> {
    const row = await this.getRow(id);
    return row ? toMemoryRecord(row) : undefined;
  }

  /**
   * Compare-and-set on the row version: the mutator only ever sees a committed
   * row, and a concurrent writer forces a re-read instead of a lost update.
   */
  async update(id: number, mutator: MemoryMutator): Promise<UpdateOutcome> {
    for (let attempt = 0; attempt < MAX_UPDATE_ATTEMPTS; attempt += 1) {
      const row = await this.getRow(id);
      if (!row) {
        return { status: 'not_found' };
      }

      const current = toMemoryRecord(row);
      const patch = mutator(current);
      if (!patch) {
        return { status: 'unchanged', record: current };
      }

      const target = patch.supersededBy;
      if (target !== undefined && target > 0 && target !== id && !(await this.getRow(target))) {
        throw new NotFoundError(target);
      }

      const result = await this.run<MemoryRow>(
        `UPDATE memories
         SET importance = $1, superseded_by = $2, updated_at = $3, version = version + 1
         WHERE id = $4 AND version = $5
         RETURNING *`,
        [
          patch.importance === undefined ? current.importance : clampUnit(patch.importance, current.importance),
          target === undefined ? current.supersededBy : target,
          this.clock(),
          id,
          Number(row.version)
        ]
      );

      const updated = result.rows[0];
      if (updated) {
        return { status: 'updated', record: toMemoryRecord(updated) };
      }
    }

    throw new Error(`Memory #${id} is being updated concurrently; gave up after ${MAX_UPDATE_ATTEMPTS} attempts`);
  }

  async query(filter: MemoryFilter = {}, options: QueryOptions = {}): Promise<MemoryRecord[]> {
    if (filter.ids && filter.ids.length === 0) {
      return [];
    }

    const values: unknown[] = [];
    const param = (value: unknown): string => {
      values.push(value);
      return `$${values.length}`;
    };

    const conditions = [statesCondition(filter.states ?? ['active'])];
    if (filter.ids) {
      conditions.push(`id IN (${filter.ids.map((id) => param(id)).join(', ')})`);
    }
    if (filter.category) {
      conditions.push(`category = ${param(filter.category)}`);
    }
    if (filter.project !== undefined) {
      conditions.push(`(project = ${param(filter.project)} OR project IS NULL)`);
    }
    if (filter.contentTerms && filter.contentTerms.length > 0) {
      const terms = filter.contentTerms.map((term) => `LOWER(content) LIKE ${param(`%${escapeLike(term.toLowerCase())}%`)}`);
      conditions.push(`(${terms.join(' OR ')})`);
    }
    if (filter.maxAccessCount !== undefined) {
      conditions.push(`access_count <= ${param(filter.maxAccessCount)}`);
    }
    if (filter.createdBefore !== undefined) {
      conditions.push(`created_at <= ${param(filter.createdBefore)}`);
    }
    if (filter.updatedBefore !== undefined) {
      conditions.push(`updated_at <= ${param(filter.updatedBefore)}`);
    }
    if (filter.importanceAbove !== undefined) {
      conditions.push(`importance > ${param(filter.importanceAbove)}`);
    }
    if (filter.importanceBelow !== undefined) {
      conditions.push(`importance < ${param(filter.importanceBelow)}`);
    }

    const limit = options.limit === undefined ? '' : ` LIMIT ${Math.max(0, Math.floor(options.limit))}`;
    const result = await this.run<MemoryRow>(
      `SELECT * FROM memories WHERE ${conditions.join(' AND ')} ORDER BY ${orderClause(options.order ?? 'id')}${limit}`,
      values
    );
    return result.rows.map(toMemoryRecord);
  }

  async recordAccess(ids: number[], accessedAt: number): Promise<void> {
    const unique = [...new Set(ids)];
    if (!unique.length) {
      return;
    }

    const placeholders = unique.map((_, i) => `$${i + 2}`).join(',');
    await this.run(
      `UPDATE memories
       SET access_count = access_count + 1, last_accessed_at = $1, updated_at = $1, version = version + 1
       WHERE id IN (${placeholders})`,
      [accessedAt, ...unique]
    );
  }

  async getTags(id: number): Promise<string[]> {
    const result = await this.run<{ tag: string }>(
      'SELECT tag FROM memory_tags WHERE memory_id = $1 ORDER BY tag',
      [id]
    );
    return result.rows.map((row) => row.tag);
  }

  async addTags(id: number, tags: string[]): Promise<void> {
    if (!(await this.getRow(id))) {
      throw new NotFoundError(id);
    }
    await this.insertTags(id, tags);
  }

  async addRelation(relation: MemoryRelation): Promise<boolean> {
    const type = assertRelationType(relation.type);
    for (const id of [relation.fromId, relation.toId]) {
      if (!(await this.getRow(id))) {
        throw new NotFoundError(id);
      }
    }

    const values = [relation.fromId, relation.toId, type];
    const existing = await this.run(
      'SELECT 1 FROM memory_relations WHERE from_id = $1 AND to_id = $2 AND relation_type = $3',
      values
    );
    if (existing.rows.length > 0) {
      return false;
    }

    const inserted = await this.run(
      `INSERT INTO memory_relations (from_id, to_id, relation_type)
       VALUES ($1, $2, $3)
       ON CONFLICT DO NOTHING
       RETURNING from_id`,
      values
    );
    return inserted.rows.length > 0;
  }

  async listRelations(id: number): Promise<MemoryRelation[]> {
    const result = await this.run<RelationRow>(
      `SELECT from_id, to_id, relation_type FROM memory_relations
       WHERE from_id = $1 OR to_id = $1
       ORDER BY from_id, to_id, relation_type`,
      [id]
    );
    return result.rows.map((row) => ({
      fromId: Number(row.from_id),
      toId: Number(row.to_id),
      type: assertRelationType(row.relation_type)
    }));
  }

  async stats(): Promise<MemoryStats> {
    const active = statesCondition(['active']);
    const count = async (condition: string): Promise<number> => {
      const result = await this.run<{ count: number | string }>(
        `SELECT COUNT(*) AS count FROM memories WHERE ${condition}`
      );
      return Number(result.rows[0]?.count ?? 0);
    };

    const stats: MemoryStats = {
      totalActive: await count(active),
      totalSuperseded: await count(statesCondition(['superseded'])),
      totalRetired: await count(statesCondition(['retired'])),
      byCategory: {},
      byProject: {},
      mostAccessed: []
    };

    const categories = await this.run<{ category: string; count: number | string }>(
      `SELECT category, COUNT(*) AS count FROM memories WHERE ${active} GROUP BY category`
    );
    for (const row of categories.rows) {
      stats.byCategory[assertCategory(row.category)] = Number(row.count);
    }

    const projects = await this.run<{ project: string | null; count: number | string }>(
      `SELECT project, COUNT(*) AS count FROM memories WHERE ${active} GROUP BY project`
    );
    for (const row of projects.rows) {
      const project = row.project ?? 'global';
      stats.byProject[project] = (stats.byProject[project] ?? 0) + Number(row.count);
    }

    const mostAccessed = await this.run<MemoryRow>(
      `SELECT * FROM memories WHERE ${active} ORDER BY ${orderClause('accessed')} LIMIT 5`
    );
    stats.mostAccessed = mostAccessed.rows
      .map(toMemoryRecord)
      .map(({ id, content, accessCount }) => ({ id, content, accessCount }));
    return stats;
  }

  async transaction<T>(work: (repository: MemoryRepository) => Promise<T>): Promise<T> {
    return work(this);
  }

  private async getRow(id: number): Promise<MemoryRow | undefined> {
    const result = await this.run<MemoryRow>('SELECT * FROM memories WHERE id = $1', [id]);
    return result.rows[0];
  }

  private async insertTags(id: number, tags: string[]): Promise<void> {
    for (const tag of normalizeTags(tags)) {
      await this.run(
        'INSERT INTO memory_tags (memory_id, tag) VALUES ($1, $2) ON CONFLICT DO NOTHING',
        [id, tag]
      );
    }
  }
}

type MemoryRow = {
  id: number | string;
  category: string;
  content: string;
  context: string | null;
  project: string | null;
  importance: number | string;
  confidence: number | string;
  access_count: number | string;
  last_accessed_at: number | string | null;
  created_at: number | string;
  updated_at: number | string;
  source_session: string | null;
  superseded_by: number | string | null;
  version: number | string;
};

type RelationRow = {
  from_id: number | string;
  to_id: number | string;
  relation_type: string;
};

function toMemoryRecord(row: MemoryRow): MemoryRecord {
  return {
    id: Number(row.id),
    category: assertCategory(row.category),
    content: row.content,
    context: row.context,
    project: row.project,
    importance: Number(row.importance),
    confidence: Number(row.confidence),
    accessCount: Number(row.access_count),
    lastAccessedAt: row.last_accessed_at === null ? null : Number(row.last_accessed_at),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
    sourceSession: row.source_session,
    supersededBy: row.superseded_by === null ? null : Number(row.superseded_by)
  };
}

function firstRow<R extends QueryResultRow>(result: QueryResult<R>): R {
  const row = result.rows[0];
  if (!row) {
    throw new Error('Insert returned no row');
  }
  return row;
}

function statesCondition(states: LifecycleState[]): string {
  const clauses = [...new Set(states)].map((state) => {
    switch (state) {
      case 'active':
        return 'superseded_by IS NULL';
      case 'retired':
        return '(superseded_by = id OR superseded_by < 0)';
      case 'superseded':
        return '(superseded_by > 0 AND superseded_by <> id)';
    }
  });
  return clauses.length ? `(${clauses.join(' OR ')})` : 'FALSE';
}

function orderClause(order: MemoryOrder): string {
  switch (order) {
    case 'recency':
      return 'created_at DESC, id DESC';
    case 'importance':
      return 'importance DESC, id ASC';
    case 'accessed':
      return 'access_count DESC, id ASC';
    case 'id':
      return 'id ASC';
  }
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/gu, (char) => `\\${char}`);
}

function guarded(run: SqlExecutor): SqlExecutor {
  return async <R extends QueryResultRow>(text: string, values?: unknown[]) => {
    try {
      return await run<R>(text, values);
    } catch (error) {
      if (isConnectionError(error)) {
        throw new StoreUnavailableError('Memory store unavailable', error);
      }
      throw error;
    }
  };
}

function isConnectionError(error: unknown): boolean {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === 'string' && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08'));
}
