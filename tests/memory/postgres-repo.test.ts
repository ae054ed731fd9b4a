import { newDb } from 'pg-mem';
import { StoreUnavailableError } from '../../core/errors';
import { PostgresMemoryRepository } from '../../memory/repositories/postgres-memory-repository';
import { describeRepositoryContract, fact, NOW } from './repository-contract';

function createPool() {
  const db = newDb();
  const pg = db.adapters.createPg();
  return new pg.Pool();
}

describeRepositoryContract('PostgresMemoryRepository', async (clock) => {
  const repo = new PostgresMemoryRepository(createPool(), { clock });
  await repo.ensureSchema();
  return repo;
});

describe('PostgresMemoryRepository', () => {
  it('creates the schema once and tolerates repeated initialisation', async () => {
    const pool = createPool();
    const repo = new PostgresMemoryRepository(pool, { clock: () => NOW });

    await repo.ensureSchema();
    await repo.ensureSchema();
    await new PostgresMemoryRepository(pool, { clock: () => NOW }).ensureSchema();

    const created = await repo.create(fact("O'Reilly publishes books"));
    expect((await repo.get(created.id))?.content).toBe("O'Reilly publishes books");
  });

  it('round-trips nullable columns', async () => {
    const repo = new PostgresMemoryRepository(createPool(), { clock: () => NOW });
    await repo.ensureSchema();

    const created = await repo.create(fact('Scoped', {
      context: 'From onboarding',
      project: 'alpha',
      sourceSession: 'session-1'
    }));

    expect(await repo.get(created.id)).toMatchObject({
      context: 'From onboarding',
      project: 'alpha',
      sourceSession: 'session-1',
      lastAccessedAt: null,
      supersededBy: null
    });
  });

  it('maps connection failures to StoreUnavailableError', async () => {
    const pool = createPool();
    const repo = new PostgresMemoryRepository(pool, { clock: () => NOW });
    await repo.ensureSchema();
    jest.spyOn(pool, 'query').mockRejectedValue(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));

    await expect(repo.get(1)).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('leaves other database errors untouched', async () => {
    const pool = createPool();
    const repo = new PostgresMemoryRepository(pool, { clock: () => NOW });
    await repo.ensureSchema();
    const failure = Object.assign(new Error('syntax error'), { code: '42601' });
    jest.spyOn(pool, 'query').mockRejectedValue(failure);

    await expect(repo.get(1)).rejects.toBe(failure);
  });

  it('reports a failed pool checkout as unavailable', async () => {
    const pool = createPool();
    const repo = new PostgresMemoryRepository(pool, { clock: () => NOW });
    await repo.ensureSchema();
    jest.spyOn(pool, 'connect').mockRejectedValue(new Error('too many clients'));

    await expect(repo.create(fact('Never stored'))).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
