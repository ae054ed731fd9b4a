import type { AuditLogger } from '../../core/contracts/audit';
import { StoreUnavailableError, type OperationResult } from '../../core/errors';
import { MemoryManager } from '../../memory/memory-manager';
import { InMemoryMemoryRepository } from '../../memory/repositories/in-memory-memory-repository';
import { LexicalSearchOracle } from '../../memory/search/lexical-search-oracle';
import type { SearchOracle } from '../../memory/search/search-oracle';
import { fact, NOW } from './repository-contract';

function unwrap<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function errorCode<T>(result: OperationResult<T>): string | undefined {
  return result.ok ? undefined : result.error.code;
}

describe('MemoryManager', () => {
  let repo: InMemoryMemoryRepository;
  let auditLogger: AuditLogger & { log: jest.Mock };
  let manager: MemoryManager;

  beforeEach(() => {
    repo = new InMemoryMemoryRepository({ clock: () => NOW });
    auditLogger = { log: jest.fn() };
    manager = new MemoryManager({
      repository: repo,
      searchOracle: new LexicalSearchOracle(repo),
      auditLogger,
      sessionId: 'session-1',
      clock: () => NOW
    });
  });

  describe('remember', () => {
    it('stores a fact with default scores', async () => {
      const record = unwrap(await manager.remember({ content: 'Uses pnpm' }));

      expect(record).toMatchObject({
        category: 'facts',
        content: 'Uses pnpm',
        context: null,
        project: null,
        importance: 0.5,
        confidence: 0.8,
        sourceSession: 'session-1'
      });
      expect(auditLogger.log).toHaveBeenCalledWith({
        timestamp: NOW,
        sessionId: 'session-1',
        eventType: 'memory_created',
        data: { memoryId: record.id, category: 'facts', project: null }
      });
    });

    it('clamps scores and normalizes tags, project and context', async () => {
      const record = unwrap(await manager.remember({
        content: 'Deploys via CI',
        category: 'procedures',
        importance: 3,
        confidence: -2,
        tags: ['CI', ' ci ', 'Deploy'],
        project: ' alpha ',
        context: '  '
      }));

      expect(record).toMatchObject({ importance: 1, confidence: 0, project: 'alpha', context: null });
      expect(unwrap(await manager.tags(record.id))).toEqual(['ci', 'deploy']);
    });

    it('reports invalid input as a failed result', async () => {
      expect(errorCode(await manager.remember({ content: 'Anything', category: 'trivia' }))).toBe('invalid_category');
      expect(errorCode(await manager.remember({ content: '   ' }))).toBe('invalid_input');
      expect(auditLogger.log).not.toHaveBeenCalled();
    });
  });

  describe('recall', () => {
    beforeEach(async () => {
      await repo.create(fact('Postgres stores memories'));
      await repo.create(fact('Redis caches sessions'));
      await repo.create(fact('Postgres runs in Docker', { category: 'procedures', project: 'alpha' }));
    });

    it('returns matches in oracle order and counts the access', async () => {
      const hits = unwrap(await manager.recall({ text: 'postgres' }));

      expect(hits.map((hit) => hit.record.id)).toEqual([1, 3]);
      expect(hits[0]).toMatchObject({ relevance: 1, superseded: false });
      expect(hits[0]?.record.accessCount).toBe(1);
      expect(hits[0]?.record.lastAccessedAt).toBe(NOW);
      expect(hits[0]?.score).toBeCloseTo(0.5 * 0.8 * 1.1);
      expect((await repo.get(2))?.accessCount).toBe(0);
    });

    it('recalls memories written in non-Latin scripts', async () => {
      const remembered = unwrap(await manager.remember({ content: 'Пользователь предпочитает табы' }));

      const hits = unwrap(await manager.recall({ text: 'табы' }));

      expect(hits.map((hit) => hit.record.id)).toEqual([remembered.id]);
    });

    it('filters by category and project', async () => {
      const byCategory = unwrap(await manager.recall({ text: 'postgres', category: 'procedures' }));
      const byProject = unwrap(await manager.recall({ text: 'postgres', project: 'beta' }));

      expect(byCategory.map((hit) => hit.record.id)).toEqual([3]);
      expect(byProject.map((hit) => hit.record.id)).toEqual([1]);
    });

    it('hides superseded memories unless asked', async () => {
      unwrap(await manager.correct(1, 'Postgres stores memories durably'));

      const active = unwrap(await manager.recall({ text: 'postgres' }));
      const all = unwrap(await manager.recall({ text: 'postgres', includeSuperseded: true }));

      expect(active.map((hit) => hit.record.id)).toEqual([3, 4]);
      expect(all.map((hit) => [hit.record.id, hit.superseded])).toEqual([[1, true], [3, false], [4, false]]);
    });

    it('re-checks oracle hits against the store', async () => {
      unwrap(await manager.forget(1));
      const oracle: SearchOracle = {
        search: jest.fn().mockResolvedValue([
          { id: 3, relevance: 0.2 },
          { id: 99, relevance: 0.9 },
          { id: 1, relevance: 0.9 },
          { id: 2, relevance: 0.1 }
        ])
      };
      const stubbed = new MemoryManager({ repository: repo, searchOracle: oracle, clock: () => NOW });

      const hits = unwrap(await stubbed.recall({ text: 'anything', limit: 5 }));

      expect(hits.map((hit) => hit.record.id)).toEqual([3, 2]);
      expect(oracle.search).toHaveBeenCalledWith('anything', { category: undefined, project: undefined, includeInactive: false }, 5);
    });

    it('rejects empty queries and unknown categories', async () => {
      expect(errorCode(await manager.recall({ text: '  ' }))).toBe('invalid_input');
      expect(errorCode(await manager.recall({ text: 'postgres', category: 'trivia' }))).toBe('invalid_category');
    });
  });

  describe('list', () => {
    it('sorts by score by default and counts the access', async () => {
      await repo.create(fact('Low', { importance: 0.2 }));
      await repo.create(fact('High', { importance: 0.9 }));
      await repo.create(fact('Mid', { importance: 0.5 }));

      const listed = unwrap(await manager.list());

      expect(listed.map((entry) => entry.record.content)).toEqual(['High', 'Mid', 'Low']);
      expect(listed[0]?.score).toBeCloseTo(0.72);
      expect(listed.every((entry) => entry.record.accessCount === 1)).toBe(true);
    });

    it('supports the store orderings and limits', async () => {
      await repo.create(fact('First'));
      await repo.create(fact('Second'));
      await repo.create(fact('Third'));

      const listed = unwrap(await manager.list({ sort: 'recency', limit: 2 }));

      expect(listed.map((entry) => entry.record.content)).toEqual(['Third', 'Second']);
      expect((await repo.get(1))?.accessCount).toBe(0);
    });

    it('treats a negative limit as zero for every sort', async () => {
      await repo.create(fact('First'));
      await repo.create(fact('Second'));

      expect(unwrap(await manager.list({ limit: -1 }))).toEqual([]);
      expect(unwrap(await manager.list({ sort: 'recency', limit: -1 }))).toEqual([]);
      expect((await repo.get(1))?.accessCount).toBe(0);
    });

    it('rejects unknown categories', async () => {
      expect(errorCode(await manager.list({ category: 'trivia' }))).toBe('invalid_category');
    });
  });

  describe('categoryView', () => {
    it('groups, ranks and caps without recording access', async () => {
      const capped = new MemoryManager({
        repository: repo,
        searchOracle: new LexicalSearchOracle(repo),
        clock: () => NOW,
        viewCaps: { facts: 2 }
      });
      await repo.create(fact('Low fact', { importance: 0.3 }));
      await repo.create(fact('High fact', { importance: 0.9 }));
      await repo.create(fact('Mid fact', { importance: 0.6 }));
      await repo.create(fact('Likes short answers', { category: 'preferences' }));

      const view = unwrap(await capped.categoryView());

      expect(view.categories.facts.map((entry) => entry.record.content)).toEqual(['High fact', 'Mid fact']);
      expect(view.categories.preferences).toHaveLength(1);
      expect(view.categories.decisions).toEqual([]);
      expect(view.project).toEqual([]);
      expect(view.totalActive).toBe(4);
      expect((await repo.query()).every((record) => record.accessCount === 0)).toBe(true);
    });

    it('builds a project section without preferences or corrections', async () => {
      await repo.create(fact('Alpha prefers squash merges', { category: 'preferences', project: 'alpha' }));
      await repo.create(fact('Alpha chose Postgres', { category: 'decisions', project: 'alpha' }));
      await repo.create(fact('Alpha lives in a monorepo', { category: 'project-knowledge', project: 'alpha' }));
      await repo.create(fact('Global fact'));
      await repo.create(fact('Beta uses Redis', { project: 'beta' }));

      const view = unwrap(await manager.categoryView({ project: 'alpha' }));

      expect(view.projectName).toBe('alpha');
      expect(view.project.map((entry) => entry.record.content)).toEqual([
        'Alpha chose Postgres',
        'Alpha lives in a monorepo'
      ]);
      expect(view.totalActive).toBe(5);
    });

    it('fills category sections from every project', async () => {
      await repo.create(fact('Beta prefers rebase merges', { category: 'preferences', project: 'beta' }));
      await repo.create(fact('Beta uses Redis', { project: 'beta' }));
      await repo.create(fact('Alpha uses Postgres', { project: 'alpha' }));

      const view = unwrap(await manager.categoryView({ project: 'alpha' }));

      expect(view.categories.preferences.map((entry) => entry.record.content)).toEqual(['Beta prefers rebase merges']);
      expect(view.categories.facts.map((entry) => entry.record.content)).toEqual(['Beta uses Redis', 'Alpha uses Postgres']);
      expect(view.project.map((entry) => entry.record.content)).toEqual(['Alpha uses Postgres']);
    });
  });

  describe('corrections and relations', () => {
    it('wraps correction outcomes in results', async () => {
      await repo.create(fact('Uses tabs'));

      const corrected = unwrap(await manager.correct(1, 'Uses spaces'));
      const again = await manager.correct(1, 'Uses both');

      expect(corrected.replacement.id).toBe(2);
      expect(errorCode(again)).toBe('illegal_transition');
      expect(errorCode(await manager.forget(1))).toBe('not_found');
      expect(unwrap(await manager.forget(2)).supersededBy).toBe(2);
    });

    it('lists relations and reports missing memories', async () => {
      await repo.create(fact('A'));
      await repo.create(fact('B'));
      unwrap(await manager.relate(1, 2, 'contradicts'));

      expect(unwrap(await manager.relations(2))).toEqual([{ fromId: 1, toId: 2, type: 'contradicts' }]);
      expect(errorCode(await manager.relations(99))).toBe('not_found');
      expect(errorCode(await manager.relate(1, 2, 'causes'))).toBe('invalid_relation_type');
    });

    it('summarizes the store', async () => {
      await repo.create(fact('A', { project: 'alpha' }));

      expect(unwrap(await manager.stats())).toMatchObject({ totalActive: 1, byProject: { alpha: 1 } });
    });
  });

  it('lets store outages reject', async () => {
    jest.spyOn(repo, 'stats').mockRejectedValue(new StoreUnavailableError('Memory store unavailable'));

    await expect(manager.stats()).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
