/**
 * Session Types
 * Type definitions and error classes shared by the session lifecycle services
 */

// ============================================================================
// Session Model
// ============================================================================

export type SessionState = 'starting' | 'ready' | 'terminating' | 'terminated';

/**
 * Paths of a session's scratch area
 */
export interface SessionPaths {
  /** Session root (`<sessionsRoot>/session-<port>`) */
  root: string;
  /** Unix sockets of the display server */
  sockets: string;
  /** XDG runtime dir, owner-only */
  runtime: string;
  /** Application profile */
  profile: string;
  /** TMPDIR for the session */
  temp: string;
}

/**
 * A launched display-server + application process tree, keyed by port
 */
export interface Session {
  port: number;
  /** Root of the spawned process tree */
  processId: number;
  state: SessionState;
  paths: SessionPaths;
  createdAt: Date;
  /** Route hint handed to clients */
  proxyPath: string;
}

export interface SessionStateChangeEvent {
  port: number;
  processId: number;
  previousState: SessionState;
  newState: SessionState;
  timestamp: Date;
}

// ============================================================================
// Process Table
// ============================================================================

/**
 * Result of a single liveness check
 */
export type ProcessLiveness =
  | { status: 'alive'; pid: number; name: string }
  | { status: 'not-found'; pid: number };

export type SignalOutcome = 'sent' | 'not-found' | 'permission-denied';

export interface ProcessInfo {
  pid: number;
  name: string;
}

// ============================================================================
// Dependencies
// ============================================================================

export interface MissingDependency {
  name: string;
  executable: string;
  description: string;
  installCommands: string[];
}

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base error class for session lifecycle errors
 */
export class SessionManagerError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'SessionManagerError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown at launch time when a required executable is not on PATH
 */
export class DependencyMissingError extends SessionManagerError {
  constructor(public readonly missing: MissingDependency[]) {
    super(
      `Missing required dependencies: ${missing.map((dep) => dep.name).join(', ')}`,
      'DEPENDENCY_MISSING'
    );
    this.name = 'DependencyMissingError';
  }
}

export class PortAllocationError extends SessionManagerError {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message, 'PORT_ALLOCATION_FAILED');
    this.name = 'PortAllocationError';
  }
}

/**
 * Thrown when the display server exits or cannot be spawned during startup
 */
export class ProcessSpawnError extends SessionManagerError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stdout: string,
    public readonly stderr: string,
    public readonly signal: NodeJS.Signals | null = null,
    /** Set when the process started, so its group can still be reaped */
    public readonly processId: number | null = null
  ) {
    super(message, 'PROCESS_SPAWN_FAILED');
    this.name = 'ProcessSpawnError';
  }
}

export class PermissionDeniedError extends SessionManagerError {
  constructor(public readonly processId: number) {
    super(`Access denied to terminate process ${processId}`, 'PERMISSION_DENIED');
    this.name = 'PermissionDeniedError';
  }
}

export class SessionNotFoundError extends SessionManagerError {
  constructor(public readonly port: number) {
    super(`Session not found on port ${port}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class SessionPortConflictError extends SessionManagerError {
  constructor(public readonly port: number) {
    super(`A live session already exists on port ${port}`, 'SESSION_PORT_CONFLICT');
    this.name = 'SessionPortConflictError';
  }
}

export class SubprotocolNegotiationError extends SessionManagerError {
  constructor(
    public readonly required: string,
    public readonly offered: string[]
  ) {
    super(
      `Subprotocol negotiation failed: required '${required}', offered [${offered.join(', ')}]`,
      'SUBPROTOCOL_NEGOTIATION_FAILED'
    );
    this.name = 'SubprotocolNegotiationError';
  }
}

export class RelayIOError extends SessionManagerError {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message, 'RELAY_IO_ERROR');
    this.name = 'RelayIOError';
  }
}

export type LaunchError = DependencyMissingError | PortAllocationError | ProcessSpawnError;
