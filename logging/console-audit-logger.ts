import type { AuditLogEntry, AuditLogger } from '../core/contracts/audit';

export class ConsoleAuditLogger implements AuditLogger {
  log(entry: AuditLogEntry): void {
    const logLine = JSON.stringify({
      ...entry,
      data: serializeErrors(entry.data),
      timestamp: new Date(entry.timestamp).toISOString()
    });
    console.log(`[AUDIT] ${logLine}`);
  }
}

export class NoopAuditLogger implements AuditLogger {
  log(): void {
    // discarded
  }
}

/**
 * Error instances stringify to `{}`; keep their name and message in the line.
 */
function serializeErrors(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[key] = value instanceof Error
      ? { name: value.name, message: value.message }
      : value;
  }
  return result;
}
