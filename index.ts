export * from './core/errors';
export type { AuditEventType, AuditLogEntry, AuditLogger } from './core/contracts/audit';
export type { LLMAdapter, LLMResponse, PromptMessage, PromptRequest } from './core/contracts/llm';
export { loadMemoryConfig, type MemoryConfig } from './config/memory-config';
export { ConsoleAuditLogger, NoopAuditLogger } from './logging/console-audit-logger';
export * from './memory/types';
export { lifecycleState, isActive, RETIRED_SENTINEL } from './memory/lifecycle';
export { scoreMemory, rankByScore, compareByScore } from './memory/scoring';
export type { MemoryRepository } from './memory/repositories/memory-repository';
export { InMemoryMemoryRepository } from './memory/repositories/in-memory-memory-repository';
export { PostgresMemoryRepository } from './memory/repositories/postgres-memory-repository';
export type { SearchOracle, SearchFilter, SearchHit } from './memory/search/search-oracle';
export { LexicalSearchOracle } from './memory/search/lexical-search-oracle';
export { CorrectionManager, type CorrectionResult, type RelateResult } from './memory/correction-manager';
export { ConsolidationSweep, DEFAULT_SWEEP_POLICY, type SweepPolicy, type SweepReport } from './memory/consolidation';
export {
  MemoryManager,
  type CategoryView,
  type ListOptions,
  type RecallHit,
  type RecallQuery,
  type RememberInput
} from './memory/memory-manager';
export { renderMemoryDigest } from './memory/digest';
export type { CandidateProducer, MemoryCandidate } from './extraction/candidate-producer';
export { LlmCandidateProducer } from './extraction/llm-candidate-producer';
export { ExtractionPipeline } from './extraction/extraction-pipeline';
export { AnthropicAdapter } from './llm';
export { SessionHooks } from './runtime/session-hooks';
export { buildMemorySystem, type MemorySystem, type BuildMemorySystemOptions } from './app/build-memory-system';
