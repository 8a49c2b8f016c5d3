/**
 * Session Directories
 * Creates and removes the per-session scratch area under the sessions root
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { SessionPaths } from './session-types.js';

const SESSION_DIR_PATTERN = /^session-(\d+)$/;

export interface SessionDirectoryEntry {
  port: number;
  root: string;
}

export class SessionDirectories {
  readonly sessionsRoot: string;

  constructor(sessionsRoot: string) {
    this.sessionsRoot = path.resolve(sessionsRoot);
  }

  pathsFor(port: number): SessionPaths {
    const root = path.join(this.sessionsRoot, `session-${port}`);
    return {
      root,
      sockets: path.join(root, 'sockets'),
      runtime: path.join(root, 'runtime'),
      profile: path.join(root, 'profile'),
      temp: path.join(root, 'temp'),
    };
  }

  /**
   * Create the scratch area for a port; safe to call again for the same port
   */
  async prepare(port: number): Promise<SessionPaths> {
    const paths = this.pathsFor(port);

    await fs.mkdir(paths.root, { recursive: true, mode: 0o755 });
    for (const dir of [paths.sockets, paths.profile, paths.temp]) {
      await fs.mkdir(dir, { recursive: true, mode: 0o755 });
      // mkdir's mode is filtered through the umask
      await fs.chmod(dir, 0o755);
    }
    await fs.mkdir(paths.runtime, { recursive: true, mode: 0o700 });
    await fs.chmod(paths.runtime, 0o700);

    console.log(`[SessionDirectories] Prepared ${paths.root}`);
    return paths;
  }

  /**
   * Recursively remove a session root. A missing directory is success.
   */
  async destroy(dir: string): Promise<void> {
    const target = path.resolve(dir);
    if (path.dirname(target) !== this.sessionsRoot || !SESSION_DIR_PATTERN.test(path.basename(target))) {
      throw new Error(`Refusing to remove ${target}: not a session directory under ${this.sessionsRoot}`);
    }

    await fs.rm(target, { recursive: true, force: true });
    console.log(`[SessionDirectories] Removed ${target}`);
  }

  /**
   * Existing `session-<port>` directories under the root
   */
  async listSessionDirectories(): Promise<SessionDirectoryEntry[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.sessionsRoot);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const entries: SessionDirectoryEntry[] = [];
    for (const name of names) {
      const match = SESSION_DIR_PATTERN.exec(name);
      if (!match?.[1]) continue;
      entries.push({ port: parseInt(match[1], 10), root: path.join(this.sessionsRoot, name) });
    }
    return entries.sort((a, b) => a.port - b.port);
  }
}
