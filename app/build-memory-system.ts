import { Pool } from 'pg';
import { loadMemoryConfig, type MemoryConfig } from '../config/memory-config';
import type { AuditLogger } from '../core/contracts/audit';
import type { LLMAdapter } from '../core/contracts/llm';
import { ExtractionPipeline } from '../extraction/extraction-pipeline';
import { LlmCandidateProducer } from '../extraction/llm-candidate-producer';
import { AnthropicAdapter } from '../llm/adapters/anthropic-adapter';
import { ConsoleAuditLogger, NoopAuditLogger } from '../logging/console-audit-logger';
import { ConsolidationSweep } from '../memory/consolidation';
import { CorrectionManager } from '../memory/correction-manager';
import { MemoryManager } from '../memory/memory-manager';
import { InMemoryMemoryRepository } from '../memory/repositories/in-memory-memory-repository';
import type { MemoryRepository } from '../memory/repositories/memory-repository';
import { PostgresMemoryRepository } from '../memory/repositories/postgres-memory-repository';
import { LexicalSearchOracle } from '../memory/search/lexical-search-oracle';
import { SessionHooks } from '../runtime/session-hooks';

export interface MemorySystem {
  config: MemoryConfig;
  repository: MemoryRepository;
  manager: MemoryManager;
  sweep: ConsolidationSweep;
  extraction?: ExtractionPipeline;
  hooks: SessionHooks;
  auditLogger: AuditLogger;
  /** Closes the Postgres pool, when one was opened. */
  cleanup(): Promise<void>;
}

export interface BuildMemorySystemOptions {
  config?: MemoryConfig;
  /** Used instead of the configured store, e.g. a pg-mem backed pool in tests. */
  repository?: MemoryRepository;
  /** Used instead of the Anthropic adapter when extraction is enabled. */
  llmAdapter?: LLMAdapter;
  auditLogger?: AuditLogger;
  clock?: () => number;
}

export async function buildMemorySystem(options: BuildMemorySystemOptions = {}): Promise<MemorySystem> {
  const config = options.config ?? loadMemoryConfig();
  const clock = options.clock ?? Date.now;
  const auditLogger = options.auditLogger
    ?? (config.auditLog === 'console' ? new ConsoleAuditLogger() : new NoopAuditLogger());

  const { repository, pool } = options.repository
    ? { repository: options.repository, pool: undefined }
    : await buildMemoryRepository(config, clock);

  const corrections = new CorrectionManager({ repository, auditLogger, sessionId: config.sessionId, clock });
  const manager = new MemoryManager({
    repository,
    searchOracle: new LexicalSearchOracle(repository),
    corrections,
    auditLogger,
    sessionId: config.sessionId,
    clock
  });
  const sweep = new ConsolidationSweep({ repository, auditLogger, policy: config.sweep, clock });
  const extraction = buildExtractionPipeline(config, repository, auditLogger, clock, options.llmAdapter);
  const hooks = new SessionHooks({
    manager,
    sweep,
    extraction,
    auditLogger,
    sessionId: config.sessionId,
    clock
  });

  return {
    config,
    repository,
    manager,
    sweep,
    extraction,
    hooks,
    auditLogger,
    async cleanup() {
      if (pool) {
        await pool.end();
      }
    }
  };
}

async function buildMemoryRepository(
  config: MemoryConfig,
  clock: () => number
): Promise<{ repository: MemoryRepository; pool?: Pool }> {
  if (config.databaseUrl) {
    const pool = new Pool({ connectionString: config.databaseUrl });
    const repository = new PostgresMemoryRepository(pool, { clock });
    try {
      await repository.ensureSchema();
    } catch (error) {
      await pool.end();
      throw error;
    }
    return { repository, pool };
  }

  return { repository: new InMemoryMemoryRepository({ clock }) };
}

function buildExtractionPipeline(
  config: MemoryConfig,
  repository: MemoryRepository,
  auditLogger: AuditLogger,
  clock: () => number,
  llmAdapter?: LLMAdapter
): ExtractionPipeline | undefined {
  if (!config.extraction) {
    return undefined;
  }

  const adapter = llmAdapter ?? new AnthropicAdapter({
    apiKey: config.extraction.apiKey,
    model: config.extraction.model,
    baseUrl: config.extraction.baseUrl
  });
  return new ExtractionPipeline({
    producer: new LlmCandidateProducer({ adapter }),
    repository,
    auditLogger,
    clock
  });
}
