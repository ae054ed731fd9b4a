import type { AuditLogger } from '../core/contracts/audit';
import type { ExtractionPipeline } from '../extraction/extraction-pipeline';
import type { ConsolidationSweep, SweepReport } from '../memory/consolidation';
import { renderMemoryDigest } from '../memory/digest';
import type { MemoryManager } from '../memory/memory-manager';

interface SessionHooksOptions {
  manager: MemoryManager;
  sweep: ConsolidationSweep;
  /** Absent when automatic extraction is disabled. */
  extraction?: ExtractionPipeline;
  auditLogger?: AuditLogger;
  sessionId?: string | null;
  clock?: () => number;
}

/**
 * Lifecycle boundaries of a working session. The digest is produced at start,
 * extraction runs at checkpoints and consolidation at the end. Maintenance
 * failures are logged, never thrown.
 */
export class SessionHooks {
  private readonly manager: MemoryManager;
  private readonly sweep: ConsolidationSweep;
  private readonly extraction?: ExtractionPipeline;
  private readonly auditLogger?: AuditLogger;
  private readonly sessionId: string | null;
  private readonly clock: () => number;

  constructor(options: SessionHooksOptions) {
    this.manager = options.manager;
    this.sweep = options.sweep;
    this.extraction = options.extraction;
    this.auditLogger = options.auditLogger;
    this.sessionId = options.sessionId ?? null;
    this.clock = options.clock ?? Date.now;
  }

  /** Markdown digest of the memories relevant to `project`; empty when there are none. */
  async onSessionStart(project?: string): Promise<string> {
    const [view, stats] = await Promise.all([
      this.manager.categoryView({ project }),
      this.manager.stats()
    ]);
    if (!view.ok) {
      throw view.error;
    }
    if (!stats.ok) {
      throw stats.error;
    }

    return renderMemoryDigest(view.value, { project, totalActive: stats.value.totalActive });
  }

  /** Resolves the number of memories extracted from the transcript. */
  async onCheckpoint(transcript: string, sessionId?: string | null, project?: string | null): Promise<number> {
    if (!this.extraction) {
      return 0;
    }
    return this.extraction.ingest({
      transcript,
      sessionId: sessionId ?? this.sessionId,
      project
    });
  }

  async onSessionEnd(): Promise<SweepReport | null> {
    try {
      return await this.sweep.run();
    } catch (error) {
      await this.auditLogger?.log({
        timestamp: this.clock(),
        sessionId: this.sessionId ?? undefined,
        eventType: 'sweep_skipped',
        data: { error }
      });
      return null;
    }
  }
}
