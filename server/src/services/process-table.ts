/**
 * Process Table
 * Liveness checks, process-tree walks and name lookups over the host's processes
 */

import * as path from 'path';
import pidtree from 'pidtree';
import findProcess from 'find-process';
import type { ProcessInfo, ProcessLiveness, SignalOutcome } from './session-types.js';

/**
 * Seam between the lifecycle services and the operating system
 */
export interface ProcessTable {
  /** Single source of truth for "is this pid still there" */
  checkProcess(pid: number): Promise<ProcessLiveness>;
  /** All descendants of pid (children, grandchildren, ...), root excluded */
  listDescendants(pid: number): Promise<number[]>;
  /** Processes whose name contains any of the given names (case-insensitive) */
  findByNames(names: string[]): Promise<ProcessInfo[]>;
  signal(pid: number, signal: NodeJS.Signals | 0): SignalOutcome;
  /** Signal every member of a process group */
  signalGroup(pgid: number, signal: NodeJS.Signals): SignalOutcome;
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * ProcessTable backed by pidtree, find-process and POSIX signals
 */
export class SystemProcessTable implements ProcessTable {
  async checkProcess(pid: number): Promise<ProcessLiveness> {
    // Signal 0 probes existence; EPERM still means the pid exists
    if (this.signal(pid, 0) === 'not-found') {
      return { status: 'not-found', pid };
    }

    const [entry] = await findProcess('pid', pid);
    if (!entry) {
      return { status: 'not-found', pid };
    }
    // macOS reports the full executable path
    return { status: 'alive', pid, name: path.basename(entry.name) };
  }

  async listDescendants(pid: number): Promise<number[]> {
    try {
      return await pidtree(pid);
    } catch (error) {
      // pidtree rejects when the root has gone; a vanished root has no tree
      if (this.signal(pid, 0) === 'not-found') return [];
      throw error;
    }
  }

  async findByNames(names: string[]): Promise<ProcessInfo[]> {
    const needles = names.map((name) => name.toLowerCase());
    const found = new Map<number, ProcessInfo>();

    for (const name of names) {
      for (const entry of await findProcess('name', name)) {
        if (entry.pid === process.pid || found.has(entry.pid)) continue;
        const entryName = path.basename(entry.name);
        // find-process also matches on the command line; only the name counts here
        if (!needles.some((needle) => entryName.toLowerCase().includes(needle))) continue;
        found.set(entry.pid, { pid: entry.pid, name: entryName });
      }
    }
    return [...found.values()].sort((a, b) => a.pid - b.pid);
  }

  signal(pid: number, signal: NodeJS.Signals | 0): SignalOutcome {
    try {
      process.kill(pid, signal);
      return 'sent';
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ESRCH') return 'not-found';
      if (code === 'EPERM') return 'permission-denied';
      throw error;
    }
  }

  signalGroup(pgid: number, signal: NodeJS.Signals): SignalOutcome {
    // A negative pid addresses the whole group
    return this.signal(-pgid, signal);
  }
}

export const systemProcessTable = new SystemProcessTable();
