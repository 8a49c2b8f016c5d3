/**
 * Process Supervisor
 * Spawns a session's display server and verifies it survives startup
 *
 * Startup is checked at a fixed schedule of checkpoints. At each one the
 * process must still be running; once it has been up for the minimum dwell
 * time the session port is probed with a TCP connect. A process that dies
 * during the checks fails the launch with whatever it printed.
 */

import { spawn, type ChildProcess } from 'child_process';
import * as net from 'net';
import { pollWithBackoff } from '../utils/backoff.js';
import { TypedEventEmitter } from '../utils/typed-event-emitter.js';
import type { LaunchCommand } from './display-command.js';
import { ProcessSpawnError } from './session-types.js';

// ============================================================================
// Types
// ============================================================================

export interface ProcessSupervisorOptions {
  /** Delay before each startup checkpoint, in ms */
  checkpointsMs: number[];
  /** Process must be up this long before the port probe is attempted */
  minDwellMs: number;
  /** Host the port probe connects to */
  probeHost: string;
  probeTimeoutMs: number;
  /** Per-stream cap on captured startup output, in bytes */
  outputLimitBytes: number;
  /** Log the full argv and each startup checkpoint */
  debug: boolean;
}

export const DEFAULT_SUPERVISOR_OPTIONS: ProcessSupervisorOptions = {
  checkpointsMs: [100, 200, 500],
  minDwellMs: 250,
  probeHost: '127.0.0.1',
  probeTimeoutMs: 200,
  outputLimitBytes: 8 * 1024,
  debug: false,
};

export interface SpawnedProcess {
  processId: number;
  port: number;
  /** Whether the port accepted a connection during startup */
  ready: boolean;
}

export interface ProcessExitEvent {
  port: number;
  processId: number;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export type ProcessSupervisorEvents = {
  'process:exit': [event: ProcessExitEvent];
};

// ============================================================================
// Output Capture
// ============================================================================

/**
 * Bounded byte collector for a child's startup output
 */
export class OutputCapture {
  private chunks: Buffer[] = [];
  private size = 0;
  private dropped = 0;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.dropped += chunk.length;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(kept);
    this.size += kept.length;
    this.dropped += chunk.length - kept.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString('utf8').trim();
    return this.dropped > 0 ? `${text}\n... (${this.dropped} bytes truncated)` : text;
  }
}

/**
 * Tracks one child from spawn to exit
 */
class ChildWatch {
  exitCode: number | null = null;
  signal: NodeJS.Signals | null = null;
  exited = false;
  spawnError: Error | null = null;
  readonly stdout: OutputCapture;
  readonly stderr: OutputCapture;
  readonly closed: Promise<void>;

  constructor(
    readonly child: ChildProcess,
    limit: number
  ) {
    this.stdout = new OutputCapture(limit);
    this.stderr = new OutputCapture(limit);

    child.stdout?.on('data', (data: Buffer) => this.stdout.append(data));
    child.stderr?.on('data', (data: Buffer) => this.stderr.append(data));

    child.once('exit', (code, signal) => {
      this.exited = true;
      this.exitCode = code;
      this.signal = signal;
    });
    child.once('error', (error) => {
      this.spawnError = error;
      this.exited = true;
    });

    // 'close' fires once the stdio streams are drained as well
    this.closed = new Promise((resolve) => {
      child.once('close', () => resolve());
      child.once('error', () => resolve());
    });
  }
}

// ============================================================================
// Process Supervisor
// ============================================================================

export class ProcessSupervisor extends TypedEventEmitter<ProcessSupervisorEvents> {
  private readonly options: ProcessSupervisorOptions;

  constructor(options: Partial<ProcessSupervisorOptions> = {}) {
    super();
    this.options = { ...DEFAULT_SUPERVISOR_OPTIONS, ...options };
  }

  /**
   * Spawn the display server for `port` and wait out the startup checks
   */
  async spawn(command: LaunchCommand, port: number): Promise<SpawnedProcess> {
    console.log(`[ProcessSupervisor] Starting ${command.command} for port ${port}`);
    if (this.options.debug) {
      console.log(`[ProcessSupervisor] ${command.command} ${command.args.join(' ')}`);
    }

    // Own process group so the tree can be signalled apart from this server
    const child = spawn(command.command, command.args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: command.env,
      detached: true,
    });
    const watch = new ChildWatch(child, this.options.outputLimitBytes);

    const processId = child.pid;
    if (processId === undefined) {
      await watch.closed;
      const reason = watch.spawnError?.message ?? 'no process id assigned';
      throw new ProcessSpawnError(`Failed to spawn ${command.command}: ${reason}`, null, '', '');
    }

    const startedAt = Date.now();
    const ready = await pollWithBackoff<boolean>(
      async ({ attempt }) => {
        if (watch.exited) {
          return { done: true, value: false };
        }
        if (this.options.debug) {
          console.log(`[ProcessSupervisor] Startup check ${attempt}/${this.options.checkpointsMs.length}: PID ${processId} running`);
        }
        if (Date.now() - startedAt >= this.options.minDwellMs && (await this.probePort(port))) {
          return { done: true, value: true };
        }
        return { done: false };
      },
      { intervals: this.options.checkpointsMs }
    );

    if (watch.exited) {
      await Promise.race([watch.closed, new Promise((resolve) => setTimeout(resolve, 1_000))]);
      const stdout = watch.stdout.toString();
      const stderr = watch.stderr.toString();
      console.error(
        `[ProcessSupervisor] Display server for port ${port} exited during startup (code: ${watch.exitCode}, signal: ${watch.signal})`
      );
      if (stderr) console.error(`[ProcessSupervisor] stderr:\n${stderr}`);
      throw new ProcessSpawnError(
        `Display server exited during startup with code ${watch.exitCode ?? 'null'}`,
        watch.exitCode,
        stdout,
        stderr,
        watch.signal,
        processId
      );
    }

    this.followAfterStartup(child, port, processId);

    if (ready) {
      console.log(`[ProcessSupervisor] PID ${processId} is accepting connections on port ${port}`);
    } else {
      console.log(`[ProcessSupervisor] PID ${processId} is running; port ${port} not accepting connections yet`);
    }
    return { processId, port, ready: ready === true };
  }

  /**
   * TCP connect probe; true when something accepts on the port
   */
  probePort(port: number, host = this.options.probeHost): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const socket = new net.Socket();
      const finish = (result: boolean): void => {
        socket.destroy();
        resolve(result);
      };
      socket.setTimeout(this.options.probeTimeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('error', () => finish(false));
      socket.once('timeout', () => finish(false));
      socket.connect(port, host);
    });
  }

  /**
   * Keep draining the child's output once it is a registered session
   */
  private followAfterStartup(child: ChildProcess, port: number, processId: number): void {
    child.stdout?.on('data', (data: Buffer) => {
      console.log(`[xpra:${port}] ${data.toString().trim()}`);
    });
    child.stderr?.on('data', (data: Buffer) => {
      console.error(`[xpra:${port}] ${data.toString().trim()}`);
    });
    child.once('exit', (exitCode, signal) => {
      console.log(`[ProcessSupervisor] Display server on port ${port} exited (code: ${exitCode}, signal: ${signal})`);
      this.emit('process:exit', { port, processId, exitCode, signal });
    });
  }
}
