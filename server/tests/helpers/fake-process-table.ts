import type { ProcessTable } from '../../src/services/process-table.js';
import type { ProcessInfo, ProcessLiveness, SignalOutcome } from '../../src/services/session-types.js';

export interface FakeProcess {
  pid: number;
  ppid: number;
  name: string;
  /** Process group; defaults to the pid itself */
  pgid?: number;
  /** Survives SIGTERM; only SIGKILL removes it */
  ignoresTerm?: boolean;
  /** Owned by another user */
  foreign?: boolean;
}

export interface SignalRecord {
  pid: number;
  signal: NodeJS.Signals | 0;
}

/**
 * In-memory process table; SIGTERM/SIGKILL remove processes immediately
 */
export class FakeProcessTable implements ProcessTable {
  readonly processes = new Map<number, FakeProcess>();
  readonly signals: SignalRecord[] = [];
  failChecks = false;

  add(...processes: FakeProcess[]): this {
    for (const proc of processes) {
      this.processes.set(proc.pid, proc);
    }
    return this;
  }

  isAlive(pid: number): boolean {
    return this.processes.has(pid);
  }

  async checkProcess(pid: number): Promise<ProcessLiveness> {
    if (this.failChecks) {
      throw new Error('ps failed');
    }
    const proc = this.processes.get(pid);
    return proc ? { status: 'alive', pid, name: proc.name } : { status: 'not-found', pid };
  }

  async listDescendants(pid: number): Promise<number[]> {
    const descendants: number[] = [];
    let queue = [pid];
    while (queue.length > 0) {
      const parents = new Set(queue);
      queue = [...this.processes.values()]
        .filter((proc) => parents.has(proc.ppid) && !descendants.includes(proc.pid) && proc.pid !== pid)
        .map((proc) => proc.pid);
      descendants.push(...queue);
    }
    return descendants;
  }

  async findByNames(names: string[]): Promise<ProcessInfo[]> {
    const needles = names.map((name) => name.toLowerCase());
    return [...this.processes.values()]
      .filter((proc) => needles.some((needle) => proc.name.toLowerCase().includes(needle)))
      .map(({ pid, name }) => ({ pid, name }));
  }

  signal(pid: number, signal: NodeJS.Signals | 0): SignalOutcome {
    const proc = this.processes.get(pid);
    if (!proc) return 'not-found';
    if (proc.foreign) return 'permission-denied';

    if (signal !== 0) {
      this.signals.push({ pid, signal });
    }
    if (signal === 'SIGKILL' || (signal === 'SIGTERM' && !proc.ignoresTerm)) {
      this.processes.delete(pid);
    }
    return 'sent';
  }

  signalGroup(pgid: number, signal: NodeJS.Signals): SignalOutcome {
    const members = [...this.processes.values()].filter((proc) => (proc.pgid ?? proc.pid) === pgid);
    if (members.length === 0) return 'not-found';

    this.signals.push({ pid: -pgid, signal });
    for (const proc of members) {
      if (signal === 'SIGKILL' || (signal === 'SIGTERM' && !proc.ignoresTerm)) {
        this.processes.delete(proc.pid);
      }
    }
    return 'sent';
  }

  signalsSent(signal: NodeJS.Signals): number[] {
    return this.signals.filter((record) => record.signal === signal).map((record) => record.pid);
  }
}
