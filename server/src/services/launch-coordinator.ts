/**
 * Launch Coordinator
 * Serializes dependency check -> port -> scratch dir -> spawn -> register
 *
 * Launches run one at a time behind a Mutex. Status queries and termination
 * never wait on it. A launch that fails part-way leaves nothing behind: the
 * spawned tree is killed and the scratch directory removed.
 */

import { Mutex } from 'async-mutex';
import { buildDisplayCommand, type DisplayFeatures, type LaunchCommand } from './display-command.js';
import type { DependencyProbe } from './dependency-probe.js';
import type { PortAllocator } from './port-allocator.js';
import type { ProcessSupervisor, SpawnedProcess } from './process-supervisor.js';
import type { SessionDirectories } from './session-directories.js';
import type { SessionRegistry } from './session-registry.js';
import type { TerminationManager } from './termination-manager.js';
import {
  DependencyMissingError,
  PortAllocationError,
  ProcessSpawnError,
  type Session,
  type SessionPaths,
} from './session-types.js';

// ============================================================================
// Types
// ============================================================================

export interface LaunchSettings {
  xpraPath: string;
  xvfbPath: string;
  /** Address the display server binds its WebSocket listener to */
  bindHost: string;
  applicationCommand: string;
  /** Application argv for a session, given its scratch paths */
  applicationArgs: (paths: SessionPaths) => string[];
  features: DisplayFeatures;
  screen?: string;
  environment: Record<string, string>;
}

/**
 * Per-launch overrides of the configured display settings
 */
export interface LaunchOverrides {
  features?: Partial<DisplayFeatures>;
  screen?: string;
  environment?: Record<string, string>;
}

export interface LaunchCoordinatorDeps {
  registry: SessionRegistry;
  directories: SessionDirectories;
  supervisor: Pick<ProcessSupervisor, 'spawn'>;
  terminator: Pick<TerminationManager, 'terminateProcessTree' | 'killProcessGroup'>;
  dependencyProbe: DependencyProbe;
  allocatePort: PortAllocator;
}

export const defaultApplicationArgs = (paths: SessionPaths): string[] => ['--no-remote', '--profile', paths.profile];

export const proxyPathFor = (port: number): string => `/proxy/${port}/`;

// ============================================================================
// Launch Coordinator
// ============================================================================

export class LaunchCoordinator {
  private readonly mutex = new Mutex();

  constructor(
    private readonly deps: LaunchCoordinatorDeps,
    private readonly settings: LaunchSettings
  ) {}

  /**
   * Whether a launch currently holds the section
   */
  get isLaunching(): boolean {
    return this.mutex.isLocked();
  }

  launch(overrides: LaunchOverrides = {}): Promise<Session> {
    return this.mutex.runExclusive(() => this.launchExclusive(overrides));
  }

  private async launchExclusive(overrides: LaunchOverrides): Promise<Session> {
    const { registry, directories, supervisor, dependencyProbe } = this.deps;

    const report = await dependencyProbe.check();
    if (!report.allPresent) {
      console.error(
        `[LaunchCoordinator] Missing dependencies: ${report.missing.map((dep) => dep.name).join(', ')}`
      );
      throw new DependencyMissingError(report.missing);
    }

    const port = await this.deps.allocatePort(this.settings.bindHost);
    const existing = registry.get(port);
    if (existing && existing.state !== 'terminated') {
      throw new PortAllocationError(`Allocated port ${port} is still held by a managed session`);
    }
    console.log(`[LaunchCoordinator] Launching session on port ${port}`);

    let paths: SessionPaths | null = null;
    let spawned: SpawnedProcess | null = null;
    try {
      paths = await directories.prepare(port);
      const command = this.buildCommand(port, paths, overrides);
      spawned = await supervisor.spawn(command, port);

      const session: Session = {
        port,
        processId: spawned.processId,
        state: spawned.ready ? 'ready' : 'starting',
        paths,
        createdAt: new Date(),
        proxyPath: proxyPathFor(port),
      };
      registry.insert(session);

      console.log(
        `[LaunchCoordinator] Session on port ${port} is ${session.state} (PID ${session.processId})`
      );
      return session;
    } catch (error) {
      await this.rollback(port, paths, spawned, error);
      throw error;
    }
  }

  private buildCommand(port: number, paths: SessionPaths, overrides: LaunchOverrides): LaunchCommand {
    const { settings } = this;
    return buildDisplayCommand({
      xpraPath: settings.xpraPath,
      xvfbPath: settings.xvfbPath,
      bindHost: settings.bindHost,
      port,
      child: {
        command: settings.applicationCommand,
        args: settings.applicationArgs(paths),
      },
      paths,
      features: { ...settings.features, ...overrides.features },
      screen: overrides.screen ?? settings.screen,
      environment: { ...settings.environment, ...overrides.environment },
    });
  }

  private async rollback(
    port: number,
    paths: SessionPaths | null,
    spawned: SpawnedProcess | null,
    error: unknown
  ): Promise<void> {
    console.warn(`[LaunchCoordinator] Rolling back launch on port ${port}`);

    // The display server died during startup; its children may still hold the group
    if (!spawned && error instanceof ProcessSpawnError && error.processId !== null) {
      try {
        this.deps.terminator.killProcessGroup(error.processId);
      } catch (groupError) {
        console.error(`[LaunchCoordinator] Failed to kill process group ${error.processId} during rollback:`, groupError);
      }
    }

    if (spawned) {
      try {
        await this.deps.terminator.terminateProcessTree(spawned.processId, { force: true });
      } catch (stopError) {
        console.error(`[LaunchCoordinator] Failed to stop PID ${spawned.processId} during rollback:`, stopError);
      }
    }

    if (paths) {
      try {
        await this.deps.directories.destroy(paths.root);
      } catch (removeError) {
        console.error(`[LaunchCoordinator] Failed to remove ${paths.root} during rollback:`, removeError);
      }
    }
  }
}
