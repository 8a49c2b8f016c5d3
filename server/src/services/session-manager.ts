/**
 * Session Manager
 * Entry point of the session lifecycle: wires the registry, launch coordinator,
 * termination manager, reaper and proxy registrar together
 */

import { allocatePort as defaultAllocatePort, type PortAllocator } from './port-allocator.js';
import type { DependencyProbe } from './dependency-probe.js';
import { LaunchCoordinator, type LaunchOverrides, type LaunchSettings } from './launch-coordinator.js';
import type { ProcessSupervisor } from './process-supervisor.js';
import type { ProcessTable } from './process-table.js';
import { ProxyRegistrar } from './proxy-registrar.js';
import type { SessionDirectories } from './session-directories.js';
import { SessionReaper, type SessionReaperOptions } from './session-reaper.js';
import { SessionRegistry } from './session-registry.js';
import {
  TerminationManager,
  type CleanupRequest,
  type CleanupResult,
  type TerminationManagerOptions,
  type TerminationResult,
} from './termination-manager.js';
import { SessionNotFoundError, type Session } from './session-types.js';

// ============================================================================
// Types
// ============================================================================

export type PortStatus = 'ready' | 'starting' | 'stopped' | 'notFound';

export interface AggregateStatus {
  activeSessions: number;
  status: 'running' | 'stopped';
}

export interface PortStatusResult {
  port: number;
  status: PortStatus;
}

export interface SessionManagerDeps {
  directories: SessionDirectories;
  processTable: ProcessTable;
  supervisor: ProcessSupervisor;
  dependencyProbe: DependencyProbe;
  allocatePort?: PortAllocator;
  registry?: SessionRegistry;
  registrar?: ProxyRegistrar;
}

export interface SessionManagerOptions {
  launch: LaunchSettings;
  termination?: Partial<TerminationManagerOptions>;
  reaper?: Partial<SessionReaperOptions>;
}

// ============================================================================
// Session Manager
// ============================================================================

export class SessionManager {
  readonly registry: SessionRegistry;
  readonly terminator: TerminationManager;
  readonly reaper: SessionReaper;
  private readonly coordinator: LaunchCoordinator;
  private readonly registrar: ProxyRegistrar;
  private readonly supervisor: ProcessSupervisor;
  private readonly bindHost: string;
  private started = false;

  constructor(deps: SessionManagerDeps, options: SessionManagerOptions) {
    this.registry = deps.registry ?? new SessionRegistry();
    this.registrar = deps.registrar ?? new ProxyRegistrar();
    this.supervisor = deps.supervisor;
    this.bindHost = options.launch.bindHost;

    this.terminator = new TerminationManager(this.registry, deps.processTable, deps.directories, options.termination);
    this.reaper = new SessionReaper(this.registry, deps.processTable, deps.directories, options.reaper);
    this.coordinator = new LaunchCoordinator(
      {
        registry: this.registry,
        directories: deps.directories,
        supervisor: deps.supervisor,
        terminator: this.terminator,
        dependencyProbe: deps.dependencyProbe,
        allocatePort: deps.allocatePort ?? defaultAllocatePort,
      },
      options.launch
    );
  }

  /**
   * Start the reaper and follow process exits and registry removals
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.supervisor.on('process:exit', this.handleProcessExit);
    this.registry.on('session:removed', this.handleSessionRemoved);
    this.reaper.start();
    console.log('[SessionManager] Started');
  }

  async launch(overrides: LaunchOverrides = {}): Promise<Session> {
    const session = await this.coordinator.launch(overrides);
    await this.registrar.register({
      routePath: session.proxyPath,
      targetHost: this.bindHost,
      targetPort: session.port,
    });
    return session;
  }

  status(): AggregateStatus;
  status(port: number): Promise<PortStatusResult>;
  status(port?: number): AggregateStatus | Promise<PortStatusResult> {
    if (port === undefined) {
      const activeSessions = this.registry.activeCount;
      return { activeSessions, status: activeSessions > 0 ? 'running' : 'stopped' };
    }
    return this.portStatus(port);
  }

  list(): Session[] {
    return this.registry.snapshot().sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  cleanup(request: CleanupRequest): Promise<CleanupResult> {
    return this.terminator.cleanup(request);
  }

  /**
   * Terminate every managed session
   */
  stopAll(options: { force?: boolean } = {}): Promise<CleanupResult> {
    return this.terminator.cleanup({ target: 'all', force: options.force });
  }

  /**
   * Terminate the session on one port
   * Throws SessionNotFoundError when no session owns the port.
   */
  async terminate(port: number, options: { force?: boolean } = {}): Promise<TerminationResult> {
    const session = this.registry.get(port);
    if (!session) {
      throw new SessionNotFoundError(port);
    }
    return this.terminator.terminate(session, options);
  }

  /**
   * Stop the reaper and force-terminate every session
   */
  async shutdown(): Promise<void> {
    this.reaper.stop();
    if (this.started) {
      this.supervisor.off('process:exit', this.handleProcessExit);
      this.started = false;
    }

    if (this.registry.size === 0) {
      console.log('[SessionManager] Shutdown: no sessions to clean up');
    } else {
      console.log(`[SessionManager] Shutdown: terminating ${this.registry.size} sessions`);
      await this.stopAll({ force: true });
    }
    this.registry.off('session:removed', this.handleSessionRemoved);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async portStatus(port: number): Promise<PortStatusResult> {
    const session = this.registry.get(port);
    if (!session) {
      return { port, status: 'notFound' };
    }
    if (session.state === 'terminating' || session.state === 'terminated') {
      return { port, status: 'stopped' };
    }

    const reaped = await this.reaper.reapPort(port, session.processId);
    if (reaped) {
      return { port, status: 'stopped' };
    }

    // Read, probe and promote under the entry lock so a concurrent
    // termination either finishes first or waits for the promotion
    return this.registry.withEntryLock(port, async (): Promise<PortStatusResult> => {
      const current = this.registry.get(port);
      if (!current || current.processId !== session.processId) {
        return { port, status: 'stopped' };
      }
      if (current.state === 'ready') {
        return { port, status: 'ready' };
      }
      if (current.state !== 'starting') {
        return { port, status: 'stopped' };
      }

      if (!(await this.supervisor.probePort(port))) {
        return { port, status: 'starting' };
      }
      if (!this.registry.transition(port, 'ready')) {
        return { port, status: 'stopped' };
      }
      console.log(`[SessionManager] Session on port ${port} is now accepting connections`);
      return { port, status: 'ready' };
    });
  }

  private readonly handleProcessExit = ({ port, processId }: { port: number; processId: number }): void => {
    this.reaper.reapPort(port, processId).catch((error) => {
      console.error(`[SessionManager] Failed to reap session on port ${port}:`, error);
    });
  };

  private readonly handleSessionRemoved = (session: Session): void => {
    this.registrar.unregister(session.proxyPath).catch((error) => {
      console.error(`[SessionManager] Failed to unregister ${session.proxyPath}:`, error);
    });
  };
}
