/**
 * Termination Manager
 * Tears down session process trees and reclaims their scratch directories
 *
 * Cleanup scopes:
 * - managed: the registry session whose root process matches the target pid
 * - bulk-managed: every registry session (target "all")
 * - nuclear: bulk or managed cleanup, then every host process named like a
 *   backend executable that no managed session owns. Needs both `nuclear`
 *   and `confirmNuclear`; `nuclear` alone falls back to managed scope.
 */

import { pollWithBackoff } from '../utils/backoff.js';
import type { ProcessTable } from './process-table.js';
import type { SessionDirectories } from './session-directories.js';
import type { SessionRegistry } from './session-registry.js';
import { PermissionDeniedError, type Session } from './session-types.js';

// ============================================================================
// Types
// ============================================================================

export interface TerminationManagerOptions {
  /** Grace period between SIGTERM and SIGKILL */
  timeoutMs: number;
  /** Grace period in force mode (server shutdown, nuclear sweep) */
  forceTimeoutMs: number;
  /** How often the root is checked while waiting for it to exit */
  pollIntervalMs: number;
  /** Executable names matched by the nuclear sweep */
  nuclearProcessNames: string[];
}

export const DEFAULT_TERMINATION_OPTIONS: TerminationManagerOptions = {
  timeoutMs: 3_000,
  forceTimeoutMs: 500,
  pollIntervalMs: 100,
  nuclearProcessNames: ['xpra', 'firefox', 'Xvfb'],
};

export interface TerminateOptions {
  /** Short grace period before SIGKILL */
  force?: boolean;
}

export type TerminationOutcome = 'terminated' | 'killed' | 'already-gone';

export interface ProcessTreeResult {
  outcome: TerminationOutcome;
  /** Name of the root process, when it was still running */
  processName: string | null;
  /** Every pid that was sent a signal, root last */
  signalled: number[];
}

export interface TerminationResult extends ProcessTreeResult {
  port: number;
  processId: number;
  directoryRemoved: boolean;
}

export type CleanupScope = 'managed' | 'bulk-managed' | 'nuclear';

export interface CleanupRequest {
  /** Root pid of a managed session, or every managed session */
  target: number | 'all';
  nuclear?: boolean;
  confirmNuclear?: boolean;
  /** Also remove session directories that no registry entry owns */
  cleanupDirectories?: boolean;
  force?: boolean;
}

export interface CleanupResult {
  scope: CleanupScope;
  message: string;
  /** `name:pid`, prefixed with NUCLEAR- for processes outside the registry */
  processesAffected: string[];
  remainingSessions: number;
  orphanDirectoriesRemoved: number;
  warnings: string[];
}

const SCOPE_LABELS: Record<CleanupScope, string> = {
  managed: 'Managed',
  'bulk-managed': 'Bulk managed',
  nuclear: 'Nuclear',
};

// ============================================================================
// Termination Manager
// ============================================================================

export class TerminationManager {
  private readonly options: TerminationManagerOptions;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly processTable: ProcessTable,
    private readonly directories: SessionDirectories,
    options: Partial<TerminationManagerOptions> = {}
  ) {
    this.options = { ...DEFAULT_TERMINATION_OPTIONS, ...options };
  }

  /**
   * SIGTERM every descendant then the root; SIGKILL the lot if the root
   * outlives the grace period. A root that is already gone is success.
   */
  async terminateProcessTree(pid: number, opts: TerminateOptions = {}): Promise<ProcessTreeResult> {
    const liveness = await this.processTable.checkProcess(pid);
    if (liveness.status === 'not-found') {
      return { outcome: 'already-gone', processName: null, signalled: [] };
    }

    const descendants = await this.processTable.listDescendants(pid);
    const signalled: number[] = [];

    for (const child of descendants) {
      const outcome = this.processTable.signal(child, 'SIGTERM');
      if (outcome === 'sent') {
        signalled.push(child);
      } else if (outcome === 'permission-denied') {
        console.warn(`[TerminationManager] Access denied to child process ${child} of ${pid}`);
      }
    }

    const rootOutcome = this.processTable.signal(pid, 'SIGTERM');
    if (rootOutcome === 'permission-denied') {
      throw new PermissionDeniedError(pid);
    }
    if (rootOutcome === 'not-found') {
      return { outcome: 'already-gone', processName: liveness.name, signalled };
    }
    signalled.push(pid);

    const timeoutMs = opts.force ? this.options.forceTimeoutMs : this.options.timeoutMs;
    if (await this.waitForExit(pid, timeoutMs)) {
      console.log(`[TerminationManager] Process ${pid} (${liveness.name}) terminated`);
      return { outcome: 'terminated', processName: liveness.name, signalled };
    }

    console.warn(`[TerminationManager] Process ${pid} still running after ${timeoutMs}ms, sending SIGKILL`);
    const stragglers = new Set([...descendants, ...(await this.processTable.listDescendants(pid))]);
    this.processTable.signal(pid, 'SIGKILL');
    for (const child of stragglers) {
      this.processTable.signal(child, 'SIGKILL');
    }
    return { outcome: 'killed', processName: liveness.name, signalled };
  }

  /**
   * SIGKILL every member of a process group whose leader is already gone
   * Returns whether anything was left to signal.
   */
  killProcessGroup(pgid: number): boolean {
    const outcome = this.processTable.signalGroup(pgid, 'SIGKILL');
    if (outcome === 'permission-denied') {
      throw new PermissionDeniedError(pgid);
    }
    if (outcome === 'sent') {
      console.warn(`[TerminationManager] Killed leftover members of process group ${pgid}`);
    }
    return outcome === 'sent';
  }

  /**
   * Terminate one managed session and drop it from the registry
   * A failure part-way puts the entry back in its previous state.
   */
  terminate(session: Session, opts: TerminateOptions = {}): Promise<TerminationResult> {
    const { port, processId } = session;

    return this.registry.withEntryLock(port, async () => {
      const current = this.registry.get(port);
      if (!current || current.processId !== processId) {
        // Handled by a concurrent termination or the reaper
        return { port, processId, outcome: 'already-gone', processName: null, signalled: [], directoryRemoved: false };
      }

      if (this.processTable.signal(processId, 0) === 'permission-denied') {
        throw new PermissionDeniedError(processId);
      }

      console.log(`[TerminationManager] Terminating session on port ${port} (PID ${processId})`);
      const previousState = current.state;
      this.registry.transition(port, 'terminating');

      let tree: ProcessTreeResult;
      try {
        tree = await this.terminateProcessTree(processId, opts);
      } catch (error) {
        if (previousState === 'starting' || previousState === 'ready') {
          this.registry.abortTermination(port, previousState);
        }
        throw error;
      }
      const directoryRemoved = await this.removeDirectory(current);

      this.registry.transition(port, 'terminated');
      this.registry.remove(port, processId);

      return { port, processId, ...tree, directoryRemoved };
    });
  }

  async cleanup(request: CleanupRequest): Promise<CleanupResult> {
    const warnings: string[] = [];
    const processesAffected: string[] = [];

    const nuclear = request.nuclear === true && request.confirmNuclear === true;
    if (request.nuclear === true && !nuclear) {
      const warning = 'Nuclear cleanup requires confirm_nuclear=true; only managed sessions were cleaned up';
      console.warn(`[TerminationManager] ${warning}`);
      warnings.push(warning);
    }

    const scope: CleanupScope = nuclear ? 'nuclear' : request.target === 'all' ? 'bulk-managed' : 'managed';
    console.log(`[TerminationManager] ${SCOPE_LABELS[scope]} cleanup requested (target: ${request.target})`);

    // Managed sweep
    const targets = this.selectTargets(request.target);
    for (const session of targets) {
      try {
        const result = await this.terminate(session, { force: request.force });
        if (result.outcome !== 'already-gone') {
          processesAffected.push(`${result.processName ?? 'unknown'}:${result.processId}`);
        }
        if (!result.directoryRemoved && result.outcome !== 'already-gone') {
          warnings.push(`Could not remove ${session.paths.root}`);
        }
      } catch (error) {
        if (error instanceof PermissionDeniedError && request.target !== 'all') {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[TerminationManager] Failed to terminate session on port ${session.port}:`, message);
        warnings.push(message);
      }
    }

    if (typeof request.target === 'number' && targets.length === 0) {
      console.log(`[TerminationManager] No managed session for PID ${request.target}; nothing to do`);
    }

    if (nuclear) {
      processesAffected.push(...(await this.nuclearSweep(warnings)));
    }

    let orphanDirectoriesRemoved = 0;
    if (request.cleanupDirectories) {
      orphanDirectoriesRemoved = await this.removeOrphanDirectories(warnings);
    }

    const features: string[] = [];
    if (nuclear) features.push('system-wide process scan');
    if (request.cleanupDirectories) features.push(`${orphanDirectoriesRemoved} orphaned directories removed`);

    const remainingSessions = this.registry.activeCount;
    const message =
      `${SCOPE_LABELS[scope]} cleanup completed` +
      (features.length > 0 ? ` (${features.join(', ')})` : '') +
      `, affected ${processesAffected.length} processes, ${remainingSessions} sessions remain active`;
    console.log(`[TerminationManager] ${message}`);

    return { scope, message, processesAffected, remainingSessions, orphanDirectoriesRemoved, warnings };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private selectTargets(target: number | 'all'): Session[] {
    if (target === 'all') {
      return this.registry.snapshot();
    }
    const session = this.registry.findByProcessId(target);
    return session ? [session] : [];
  }

  private async waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
    const interval = this.options.pollIntervalMs;
    const exited = await pollWithBackoff<boolean>(
      async () => (this.processTable.signal(pid, 0) === 'not-found' ? { done: true, value: true } : { done: false }),
      { intervals: [interval], maxAttempts: Math.max(1, Math.ceil(timeoutMs / interval)) }
    );
    return exited === true;
  }

  private async removeDirectory(session: Session): Promise<boolean> {
    try {
      await this.directories.destroy(session.paths.root);
      return true;
    } catch (error) {
      console.error(`[TerminationManager] Failed to remove ${session.paths.root}:`, error);
      return false;
    }
  }

  /**
   * Every pid owned by a session still in the registry
   */
  private async managedPids(): Promise<Set<number>> {
    const owned = new Set<number>();
    for (const session of this.registry.snapshot()) {
      owned.add(session.processId);
      for (const pid of await this.processTable.listDescendants(session.processId)) {
        owned.add(pid);
      }
    }
    return owned;
  }

  private async nuclearSweep(warnings: string[]): Promise<string[]> {
    const owned = await this.managedPids();
    const candidates = (await this.processTable.findByNames(this.options.nuclearProcessNames)).filter(
      (candidate) => !owned.has(candidate.pid)
    );
    console.warn(`[TerminationManager] Nuclear sweep found ${candidates.length} unmanaged backend processes`);

    const affected: string[] = [];
    for (const candidate of candidates) {
      try {
        const result = await this.terminateProcessTree(candidate.pid, { force: true });
        if (result.outcome !== 'already-gone') {
          affected.push(`NUCLEAR-${candidate.name}:${candidate.pid}`);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[TerminationManager] Nuclear sweep skipped ${candidate.name}:${candidate.pid}: ${message}`);
        warnings.push(message);
      }
    }
    return affected;
  }

  private async removeOrphanDirectories(warnings: string[]): Promise<number> {
    let removed = 0;
    for (const entry of await this.directories.listSessionDirectories()) {
      if (this.registry.has(entry.port)) continue;
      try {
        await this.directories.destroy(entry.root);
        removed++;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[TerminationManager] Could not remove orphaned directory ${entry.root}: ${message}`);
        warnings.push(message);
      }
    }
    return removed;
  }
}
