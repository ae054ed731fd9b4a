import { DEFAULT_SWEEP_POLICY, type SweepPolicy } from '../memory/consolidation';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type AuditLogMode = 'console' | 'off';

export interface ExtractionConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
}

export interface MemoryConfig {
  /** Postgres when set; otherwise memories live in process memory. */
  databaseUrl: string | null;
  sessionId: string | null;
  sweep: SweepPolicy;
  /** `null` disables automatic extraction. */
  extraction: ExtractionConfig | null;
  auditLog: AuditLogMode;
}

type Env = Record<string, string | undefined>;

export function loadMemoryConfig(env: Env = process.env): MemoryConfig {
  const decayDays = readNumber(env, 'MEMORY_SWEEP_DECAY_DAYS', DEFAULT_SWEEP_POLICY.decayAfterMs / MS_PER_DAY);
  const retireDays = readNumber(env, 'MEMORY_SWEEP_RETIRE_DAYS', DEFAULT_SWEEP_POLICY.retireAfterMs / MS_PER_DAY);
  const decayFactor = readNumber(env, 'MEMORY_SWEEP_DECAY_FACTOR', DEFAULT_SWEEP_POLICY.decayFactor);

  if (decayDays < 0) {
    throw new Error(`Invalid MEMORY_SWEEP_DECAY_DAYS: ${env.MEMORY_SWEEP_DECAY_DAYS}. Must be a non-negative number.`);
  }
  if (retireDays < 0) {
    throw new Error(`Invalid MEMORY_SWEEP_RETIRE_DAYS: ${env.MEMORY_SWEEP_RETIRE_DAYS}. Must be a non-negative number.`);
  }
  if (decayFactor <= 0 || decayFactor >= 1) {
    throw new Error(`Invalid MEMORY_SWEEP_DECAY_FACTOR: ${env.MEMORY_SWEEP_DECAY_FACTOR}. Must be between 0 and 1.`);
  }

  return {
    databaseUrl: optional(env.DATABASE_URL),
    sessionId: optional(env.MEMORY_SESSION_ID),
    sweep: {
      ...DEFAULT_SWEEP_POLICY,
      decayAfterMs: decayDays * MS_PER_DAY,
      retireAfterMs: retireDays * MS_PER_DAY,
      decayFactor
    },
    extraction: readExtraction(env),
    auditLog: readAuditLogMode(env)
  };
}

function readExtraction(env: Env): ExtractionConfig | null {
  const flag = optional(env.MEMORY_EXTRACTION_ENABLED)?.toLowerCase();
  if (flag === undefined || flag === 'false' || flag === '0') {
    return null;
  }
  if (flag !== 'true' && flag !== '1') {
    throw new Error(`Invalid MEMORY_EXTRACTION_ENABLED: ${env.MEMORY_EXTRACTION_ENABLED}. Use true or false.`);
  }

  return {
    apiKey: requireEnv(env, 'ANTHROPIC_API_KEY'),
    model: optional(env.ANTHROPIC_MODEL) ?? undefined,
    baseUrl: optional(env.ANTHROPIC_BASE_URL) ?? undefined
  };
}

function readAuditLogMode(env: Env): AuditLogMode {
  const mode = (optional(env.MEMORY_AUDIT_LOG) ?? 'console').toLowerCase();
  if (mode !== 'console' && mode !== 'off') {
    throw new Error(`Invalid MEMORY_AUDIT_LOG: ${env.MEMORY_AUDIT_LOG}. Use console or off.`);
  }
  return mode;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = optional(env[name]);
  if (raw === null) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a number.`);
  }
  return value;
}

function requireEnv(env: Env, name: string): string {
  const value = optional(env[name]);
  if (!value) {
    throw new Error(`${name} is required`);
  }
  return value;
}

function optional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
