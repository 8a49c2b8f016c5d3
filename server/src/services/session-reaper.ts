/**
 * Session Reaper
 * Drops registry entries whose display server died outside normal termination
 */

import type { ProcessTable } from './process-table.js';
import type { SessionDirectories } from './session-directories.js';
import type { SessionRegistry } from './session-registry.js';

export interface SessionReaperOptions {
  intervalMs: number;
  /** A session's root process must carry this name (substring, case-insensitive) */
  expectedProcessName: string;
}

export const DEFAULT_REAPER_OPTIONS: SessionReaperOptions = {
  intervalMs: 30_000,
  expectedProcessName: 'xpra',
};

export type ReapReason = 'not-found' | 'name-mismatch';

export interface ReapedSession {
  port: number;
  processId: number;
  reason: ReapReason;
}

export class SessionReaper {
  private readonly options: SessionReaperOptions;
  private timer: ReturnType<typeof setInterval> | null = null;
  private sweeping = false;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly processTable: ProcessTable,
    private readonly directories: SessionDirectories,
    options: Partial<SessionReaperOptions> = {}
  ) {
    this.options = { ...DEFAULT_REAPER_OPTIONS, ...options };
  }

  start(): void {
    if (this.timer) {
      return;
    }
    console.log(`[SessionReaper] Sweeping every ${this.options.intervalMs}ms`);
    this.timer = setInterval(() => {
      if (this.sweeping) return;
      this.sweep().catch((error) => {
        console.error('[SessionReaper] Sweep failed:', error);
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log('[SessionReaper] Stopped');
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Check every registered session once
   */
  async sweep(): Promise<ReapedSession[]> {
    this.sweeping = true;
    try {
      const reaped: ReapedSession[] = [];
      for (const session of this.registry.snapshot()) {
        const result = await this.reapPort(session.port, session.processId);
        if (result) reaped.push(result);
      }
      if (reaped.length > 0) {
        console.log(`[SessionReaper] Removed ${reaped.length} inactive sessions`);
      }
      return reaped;
    } finally {
      this.sweeping = false;
    }
  }

  /**
   * Check one session; removes it when its process is gone or is not a display server
   * `processId` pins the check to the entry that was observed.
   */
  reapPort(port: number, processId?: number): Promise<ReapedSession | null> {
    return this.registry.withEntryLock(port, async () => {
      const session = this.registry.get(port);
      if (!session || (processId !== undefined && session.processId !== processId)) {
        return null;
      }
      // Being torn down by the termination manager
      if (session.state === 'terminating' || session.state === 'terminated') {
        return null;
      }

      let reason: ReapReason;
      try {
        const liveness = await this.processTable.checkProcess(session.processId);
        if (liveness.status === 'alive') {
          if (liveness.name.toLowerCase().includes(this.options.expectedProcessName.toLowerCase())) {
            return null;
          }
          reason = 'name-mismatch';
        } else {
          reason = 'not-found';
        }
      } catch (error) {
        // Might be temporary; keep the session
        console.warn(`[SessionReaper] Could not check PID ${session.processId} on port ${port}:`, error);
        return null;
      }

      console.log(`[SessionReaper] Session on port ${port} is inactive (PID ${session.processId}: ${reason})`);
      this.registry.transition(port, 'terminated');
      this.registry.remove(port, session.processId);

      try {
        await this.directories.destroy(session.paths.root);
      } catch (error) {
        console.warn(`[SessionReaper] Could not remove ${session.paths.root}:`, error);
      }

      return { port, processId: session.processId, reason };
    });
  }
}
