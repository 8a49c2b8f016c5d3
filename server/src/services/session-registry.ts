/**
 * Session Registry
 * In-memory table of managed sessions, keyed by port
 *
 * Every entry has its own lock. Termination and reaping of one session take
 * that lock, so they never interleave with each other, while operations on
 * different ports proceed independently. Inserts happen inside the launch
 * coordinator's section and check for a live entry on the same port first.
 */

import { Mutex } from 'async-mutex';
import { TypedEventEmitter } from '../utils/typed-event-emitter.js';
import {
  SessionPortConflictError,
  type Session,
  type SessionState,
  type SessionStateChangeEvent,
} from './session-types.js';

export type SessionRegistryEvents = {
  'session:added': [session: Session];
  'session:removed': [session: Session];
  'session:stateChange': [event: SessionStateChangeEvent];
};

const VALID_TRANSITIONS: Record<SessionState, SessionState[]> = {
  starting: ['ready', 'terminating', 'terminated'],
  ready: ['terminating', 'terminated'],
  terminating: ['terminated'],
  terminated: [],
};

export function isValidTransition(from: SessionState, to: SessionState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

const isLive = (session: Session): boolean => session.state !== 'terminated';

// Callers get their own copy, paths included
const copyOf = (session: Session): Session => ({ ...session, paths: { ...session.paths } });

export class SessionRegistry extends TypedEventEmitter<SessionRegistryEvents> {
  private sessions = new Map<number, Session>();
  private locks = new Map<number, Mutex>();

  insert(session: Session): void {
    const existing = this.sessions.get(session.port);
    if (existing && isLive(existing)) {
      throw new SessionPortConflictError(session.port);
    }

    this.sessions.set(session.port, copyOf(session));
    console.log(`[SessionRegistry] Added session on port ${session.port} (PID ${session.processId}, ${session.state})`);
    this.emit('session:added', copyOf(session));
  }

  get(port: number): Session | undefined {
    const session = this.sessions.get(port);
    return session ? copyOf(session) : undefined;
  }

  has(port: number): boolean {
    return this.sessions.has(port);
  }

  findByProcessId(processId: number): Session | undefined {
    for (const session of this.sessions.values()) {
      if (session.processId === processId) {
        return copyOf(session);
      }
    }
    return undefined;
  }

  /**
   * Copies of every entry; safe to iterate while entries are removed
   */
  snapshot(): Session[] {
    return [...this.sessions.values()].map(copyOf);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Sessions that count as active (starting or ready)
   */
  get activeCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.state === 'starting' || session.state === 'ready') count++;
    }
    return count;
  }

  /**
   * Move a session to a new state
   * Returns false when the entry is gone or the transition is not allowed.
   */
  transition(port: number, newState: SessionState): boolean {
    const session = this.sessions.get(port);
    if (!session) {
      return false;
    }

    const previousState = session.state;
    if (previousState === newState) {
      return true;
    }
    if (!isValidTransition(previousState, newState)) {
      console.warn(`[SessionRegistry] Ignoring transition ${previousState} -> ${newState} for port ${port}`);
      return false;
    }

    session.state = newState;
    this.emit('session:stateChange', {
      port,
      processId: session.processId,
      previousState,
      newState,
      timestamp: new Date(),
    });
    return true;
  }

  /**
   * Put a session stuck in terminating back to the state it had before
   * Used when a termination fails part-way, so the reaper can see it again.
   */
  abortTermination(port: number, restoreTo: 'starting' | 'ready'): boolean {
    const session = this.sessions.get(port);
    if (!session || session.state !== 'terminating') {
      return false;
    }

    session.state = restoreTo;
    console.warn(`[SessionRegistry] Termination of port ${port} failed; back to ${restoreTo}`);
    this.emit('session:stateChange', {
      port,
      processId: session.processId,
      previousState: 'terminating',
      newState: restoreTo,
      timestamp: new Date(),
    });
    return true;
  }

  /**
   * Remove an entry, optionally only while it still belongs to `expectedProcessId`
   * Absence is not an error; returns whether something was removed.
   */
  remove(port: number, expectedProcessId?: number): boolean {
    const session = this.sessions.get(port);
    if (!session) {
      return false;
    }
    if (expectedProcessId !== undefined && session.processId !== expectedProcessId) {
      return false;
    }

    this.sessions.delete(port);
    if (!this.locks.get(port)?.isLocked()) {
      this.locks.delete(port);
    }
    console.log(`[SessionRegistry] Removed session on port ${port} (PID ${session.processId})`);
    this.emit('session:removed', copyOf(session));
    return true;
  }

  /**
   * Run `fn` holding the lock of one port's entry
   */
  withEntryLock<T>(port: number, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(port);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(port, lock);
    }
    const held = lock;
    return held.runExclusive(fn).finally(() => {
      if (!this.sessions.has(port) && !held.isLocked() && this.locks.get(port) === held) {
        this.locks.delete(port);
      }
    });
  }
}
