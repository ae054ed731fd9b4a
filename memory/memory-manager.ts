import type { AuditLogger } from '../core/contracts/audit';
import { InvalidInputError, NotFoundError, toResult, type OperationResult } from '../core/errors';
import { CorrectionManager, type CorrectionResult, type RelateResult } from './correction-manager';
import { lifecycleState } from './lifecycle';
import type { MemoryRepository } from './repositories/memory-repository';
import { rankByScore, scoreMemory } from './scoring';
import type { SearchOracle } from './search/search-oracle';
import type {
  LifecycleState,
  MemoryCategory,
  MemoryFilter,
  MemoryRecord,
  MemoryRelation,
  MemoryStats,
  ScoredMemory
} from './types';
import { assertCategory, clampUnit, normalizeTags } from './validation';

export const DEFAULT_IMPORTANCE = 0.5;
export const DEFAULT_CONFIDENCE = 0.8;
export const DEFAULT_CATEGORY: MemoryCategory = 'facts';

export const DEFAULT_VIEW_CAPS: Record<MemoryCategory, number> = {
  preferences: 8,
  corrections: 5,
  facts: 6,
  decisions: 5,
  procedures: 5,
  relationships: 4,
  'project-knowledge': 8
};
export const DEFAULT_PROJECT_CAP = 8;

/** Categories that never appear in the project section of a view. */
const PROJECT_SECTION_EXCLUDED: readonly MemoryCategory[] = ['preferences', 'corrections'];
const ALL_STATES: LifecycleState[] = ['active', 'superseded', 'retired'];

export interface RememberInput {
  content: string;
  category?: string;
  context?: string;
  project?: string;
  importance?: number;
  confidence?: number;
  tags?: string[];
}

export interface RecallQuery {
  text: string;
  category?: string;
  project?: string;
  limit?: number;
  includeSuperseded?: boolean;
}

export interface RecallHit {
  record: MemoryRecord;
  relevance: number;
  score: number;
  superseded: boolean;
}

export type ListSort = 'score' | 'recency' | 'importance' | 'accessed';

export interface ListOptions {
  category?: string;
  project?: string;
  limit?: number;
  sort?: ListSort;
}

export interface CategoryViewOptions {
  project?: string;
  now?: number;
}

export interface CategoryView {
  categories: Record<MemoryCategory, ScoredMemory[]>;
  /** Memories of the requested project outside preferences and corrections. */
  project: ScoredMemory[];
  projectName: string | null;
  totalActive: number;
}

interface MemoryManagerOptions {
  repository: MemoryRepository;
  searchOracle: SearchOracle;
  corrections?: CorrectionManager;
  auditLogger?: AuditLogger;
  sessionId?: string | null;
  clock?: () => number;
  viewCaps?: Partial<Record<MemoryCategory, number>>;
  projectCap?: number;
}

/**
 * Caller-facing operations over the memory store. Every operation resolves an
 * OperationResult; only store outages and unexpected failures reject.
 */
export class MemoryManager {
  private readonly repository: MemoryRepository;
  private readonly searchOracle: SearchOracle;
  private readonly corrections: CorrectionManager;
  private readonly auditLogger?: AuditLogger;
  private readonly sessionId: string | null;
  private readonly clock: () => number;
  private readonly viewCaps: Record<MemoryCategory, number>;
  private readonly projectCap: number;

  constructor(options: MemoryManagerOptions) {
    this.repository = options.repository;
    this.searchOracle = options.searchOracle;
    this.auditLogger = options.auditLogger;
    this.sessionId = options.sessionId ?? null;
    this.clock = options.clock ?? Date.now;
    this.corrections = options.corrections ?? new CorrectionManager({
      repository: options.repository,
      auditLogger: options.auditLogger,
      sessionId: options.sessionId,
      clock: this.clock
    });
    this.viewCaps = { ...DEFAULT_VIEW_CAPS, ...options.viewCaps };
    this.projectCap = options.projectCap ?? DEFAULT_PROJECT_CAP;
  }

  remember(input: RememberInput): Promise<OperationResult<MemoryRecord>> {
    return toResult(async () => {
      const content = input.content.trim();
      if (!content) {
        throw new InvalidInputError('Memory content is required');
      }
      const category = assertCategory(input.category ?? DEFAULT_CATEGORY);

      const record = await this.repository.create(
        {
          category,
          content,
          context: input.context?.trim() || null,
          project: input.project?.trim() || null,
          importance: clampUnit(input.importance ?? DEFAULT_IMPORTANCE, DEFAULT_IMPORTANCE),
          confidence: clampUnit(input.confidence ?? DEFAULT_CONFIDENCE, DEFAULT_CONFIDENCE),
          sourceSession: this.sessionId
        },
        normalizeTags(input.tags)
      );

      await this.auditLogger?.log({
        timestamp: this.clock(),
        sessionId: this.sessionId ?? undefined,
        eventType: 'memory_created',
        data: { memoryId: record.id, category: record.category, project: record.project }
      });
      return record;
    });
  }

  recall(query: RecallQuery): Promise<OperationResult<RecallHit[]>> {
    return toResult(async () => {
      const text = query.text.trim();
      if (!text) {
        throw new InvalidInputError('Query text is required');
      }
      const category = query.category === undefined ? undefined : assertCategory(query.category);
      const includeSuperseded = query.includeSuperseded ?? false;
      const limit = query.limit ?? 10;

      const hits = await this.searchOracle.search(
        text,
        { category, project: query.project, includeInactive: includeSuperseded },
        limit
      );
      if (!hits.length) {
        return [];
      }

      // The oracle is only trusted for order; lifecycle and filters are re-applied here.
      const filter: MemoryFilter = {
        ids: hits.map((hit) => hit.id),
        states: includeSuperseded ? ALL_STATES : ['active'],
        category,
        project: query.project
      };
      const eligible = new Set((await this.repository.query(filter)).map((record) => record.id));
      const ranked = hits.filter((hit) => eligible.has(hit.id)).slice(0, limit);
      if (!ranked.length) {
        return [];
      }

      const now = this.clock();
      await this.repository.recordAccess(ranked.map((hit) => hit.id), now);
      const byId = await this.fetchByIds(ranked.map((hit) => hit.id));

      const results: RecallHit[] = [];
      for (const hit of ranked) {
        const record = byId.get(hit.id);
        if (!record) {
          continue;
        }
        results.push({
          record,
          relevance: hit.relevance,
          score: scoreMemory(record, now),
          superseded: lifecycleState(record) !== 'active'
        });
      }
      return results;
    });
  }

  list(options: ListOptions = {}): Promise<OperationResult<ScoredMemory[]>> {
    return toResult(async () => {
      const category = options.category === undefined ? undefined : assertCategory(options.category);
      const limit = Math.max(0, options.limit ?? 20);
      const sort = options.sort ?? 'score';
      const now = this.clock();
      const filter: MemoryFilter = { category, project: options.project };

      const selected = sort === 'score'
        ? rankByScore(await this.repository.query(filter), now).slice(0, limit)
        : (await this.repository.query(filter, { order: sort, limit }))
          .map((record) => ({ record, score: scoreMemory(record, now) }));
      if (!selected.length) {
        return [];
      }

      const ids = selected.map((entry) => entry.record.id);
      await this.repository.recordAccess(ids, now);
      const byId = await this.fetchByIds(ids);

      return selected.map((entry) => ({
        record: byId.get(entry.record.id) ?? entry.record,
        score: entry.score
      }));
    });
  }

  stats(): Promise<OperationResult<MemoryStats>> {
    return toResult(() => this.repository.stats());
  }

  relations(id: number): Promise<OperationResult<MemoryRelation[]>> {
    return toResult(async () => {
      const record = await this.repository.get(id);
      if (!record) {
        throw new NotFoundError(id);
      }
      return this.repository.listRelations(id);
    });
  }

  tags(id: number): Promise<OperationResult<string[]>> {
    return toResult(async () => {
      const record = await this.repository.get(id);
      if (!record) {
        throw new NotFoundError(id);
      }
      return this.repository.getTags(id);
    });
  }

  /**
   * Active memories grouped per category, best score first and capped. Only
   * the project section is scoped to `project`. Reading a view does not count
   * as accessing its memories.
   */
  categoryView(options: CategoryViewOptions = {}): Promise<OperationResult<CategoryView>> {
    return toResult(async () => {
      const now = options.now ?? this.clock();
      const projectName = options.project?.trim() || null;
      const ranked = rankByScore(await this.repository.query(), now);

      const categories = emptyCategoryMap();
      for (const entry of ranked) {
        const section = categories[entry.record.category];
        if (section.length < this.viewCaps[entry.record.category]) {
          section.push(entry);
        }
      }

      const project = projectName
        ? ranked
          .filter((entry) => entry.record.project === projectName
            && !PROJECT_SECTION_EXCLUDED.includes(entry.record.category))
          .slice(0, this.projectCap)
        : [];

      return { categories, project, projectName, totalActive: ranked.length };
    });
  }

  correct(id: number, newContent: string, reason?: string): Promise<OperationResult<CorrectionResult>> {
    return toResult(() => this.corrections.correct(id, newContent, reason));
  }

  forget(id: number): Promise<OperationResult<MemoryRecord>> {
    return toResult(() => this.corrections.forget(id));
  }

  relate(fromId: number, toId: number, relationType: string): Promise<OperationResult<RelateResult>> {
    return toResult(() => this.corrections.relate(fromId, toId, relationType));
  }

  private async fetchByIds(ids: number[]): Promise<Map<number, MemoryRecord>> {
    const records = await this.repository.query({ ids, states: ALL_STATES });
    return new Map(records.map((record) => [record.id, record]));
  }
}

function emptyCategoryMap(): Record<MemoryCategory, ScoredMemory[]> {
  return {
    preferences: [],
    facts: [],
    corrections: [],
    decisions: [],
    'project-knowledge': [],
    relationships: [],
    procedures: []
  };
}
