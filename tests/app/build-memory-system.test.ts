import { newDb } from 'pg-mem';
import { buildMemorySystem } from '../../app/build-memory-system';
import { loadMemoryConfig } from '../../config/memory-config';
import { ConsoleAuditLogger, NoopAuditLogger } from '../../logging/console-audit-logger';
import { InMemoryMemoryRepository } from '../../memory/repositories/in-memory-memory-repository';
import { PostgresMemoryRepository } from '../../memory/repositories/postgres-memory-repository';
import { NOW } from '../memory/repository-contract';

describe('buildMemorySystem', () => {
  it('wires an in-memory store when no database is configured', async () => {
    const system = await buildMemorySystem({ config: loadMemoryConfig({}) });

    expect(system.repository).toBeInstanceOf(InMemoryMemoryRepository);
    expect(system.auditLogger).toBeInstanceOf(ConsoleAuditLogger);
    expect(system.extraction).toBeUndefined();
    await expect(system.cleanup()).resolves.toBeUndefined();
  });

  it('honours the audit log switch and extraction settings', async () => {
    const system = await buildMemorySystem({
      config: loadMemoryConfig({
        MEMORY_AUDIT_LOG: 'off',
        MEMORY_EXTRACTION_ENABLED: 'true',
        ANTHROPIC_API_KEY: 'test-secret'
      })
    });

    expect(system.auditLogger).toBeInstanceOf(NoopAuditLogger);
    expect(system.extraction).toBeDefined();
  });

  it('runs the full memory lifecycle on Postgres', async () => {
    const db = newDb();
    const pg = db.adapters.createPg();
    const repository = new PostgresMemoryRepository(new pg.Pool(), { clock: () => NOW });
    await repository.ensureSchema();
    const system = await buildMemorySystem({
      config: loadMemoryConfig({ MEMORY_AUDIT_LOG: 'off', MEMORY_SESSION_ID: 'session-1' }),
      repository,
      clock: () => NOW
    });

    const remembered = await system.manager.remember({ content: 'Deploys go through staging', tags: ['deploy'] });
    if (!remembered.ok) {
      throw remembered.error;
    }
    const corrected = await system.manager.correct(remembered.value.id, 'Deploys go through staging and canary');
    if (!corrected.ok) {
      throw corrected.error;
    }

    const recalled = await system.manager.recall({ text: 'deploys canary' });
    const relations = await system.manager.relations(remembered.value.id);

    expect(recalled.ok && recalled.value.map((hit) => hit.record.content)).toEqual(['Deploys go through staging and canary']);
    expect(relations.ok && relations.value).toEqual([
      { fromId: corrected.value.replacement.id, toId: remembered.value.id, type: 'supersedes' }
    ]);
    expect(await repository.getTags(corrected.value.replacement.id)).toEqual(['deploy']);
    expect((await repository.get(remembered.value.id))?.supersededBy).toBe(corrected.value.replacement.id);
  });
});
