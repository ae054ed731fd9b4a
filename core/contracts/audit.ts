export type AuditEventType =
  | 'memory_created'
  | 'memory_corrected'
  | 'memory_forgotten'
  | 'relation_created'
  | 'sweep_completed'
  | 'sweep_skipped'
  | 'extraction_completed'
  | 'extraction_failed';

export interface AuditLogEntry {
  timestamp: number;
  sessionId?: string;
  eventType: AuditEventType;
  data: Record<string, unknown>;
}

export interface AuditLogger {
  log(entry: AuditLogEntry): void | Promise<void>;
}
