/**
 * Dependency Probe
 * Resolves the executables a session needs before anything is spawned
 */

import { execFile } from 'child_process';
import { access, constants } from 'fs/promises';
import * as path from 'path';
import { promisify } from 'util';
import type { MissingDependency } from './session-types.js';

const execFileAsync = promisify(execFile);

export interface DependencySpec {
  /** Display name ("Xpra") */
  name: string;
  /** Command name or absolute path */
  executable: string;
  description: string;
  installCommands: string[];
}

export interface DependencyReport {
  allPresent: boolean;
  /** Dependency name -> absolute path */
  resolved: Record<string, string>;
  missing: MissingDependency[];
}

export interface DependencyProbe {
  check(): Promise<DependencyReport>;
}

export interface DependencyExecutables {
  xpra: string;
  application: string;
  xvfb: string;
}

/**
 * Dependencies of a display session: display server, application, virtual framebuffer
 */
export function defaultDependencySpecs(executables: DependencyExecutables): DependencySpec[] {
  return [
    {
      name: 'Xpra',
      executable: executables.xpra,
      description: 'Remote display server hosting each isolated session',
      installCommands: [
        '# Ubuntu/Debian:',
        'sudo apt update && sudo apt install -y xpra',
        '# RHEL/CentOS/Fedora:',
        'sudo dnf install -y xpra',
        '# Conda:',
        'conda install -c conda-forge xpra',
      ],
    },
    {
      name: 'Application',
      executable: executables.application,
      description: 'Client application started inside the session',
      installCommands: [
        '# Ubuntu/Debian:',
        `sudo apt update && sudo apt install -y ${path.basename(executables.application)}`,
        '# RHEL/CentOS/Fedora:',
        `sudo dnf install -y ${path.basename(executables.application)}`,
      ],
    },
    {
      name: 'Xvfb',
      executable: executables.xvfb,
      description: 'Virtual framebuffer for headless display',
      installCommands: [
        '# Ubuntu/Debian:',
        'sudo apt update && sudo apt install -y xvfb',
        '# RHEL/CentOS/Fedora:',
        'sudo dnf install -y xorg-x11-server-Xvfb',
      ],
    },
  ];
}

/**
 * Resolve a command on PATH, or check an absolute path is executable
 * Returns null when it cannot be found
 */
export async function resolveExecutable(executable: string): Promise<string | null> {
  if (path.isAbsolute(executable)) {
    try {
      await access(executable, constants.X_OK);
      return executable;
    } catch {
      return null;
    }
  }

  try {
    const { stdout } = await execFileAsync('which', [executable], { encoding: 'utf8', timeout: 5_000 });
    const resolved = stdout.trim().split('\n')[0];
    return resolved ? resolved : null;
  } catch {
    // which exits non-zero when the command is not on PATH
    return null;
  }
}

/**
 * DependencyProbe that looks executables up on PATH on every check
 */
export class PathDependencyProbe implements DependencyProbe {
  constructor(
    private readonly specs: DependencySpec[],
    private readonly resolve: (executable: string) => Promise<string | null> = resolveExecutable
  ) {}

  async check(): Promise<DependencyReport> {
    const results = await Promise.all(
      this.specs.map(async (spec) => ({ spec, resolvedPath: await this.resolve(spec.executable) }))
    );

    const resolved: Record<string, string> = {};
    const missing: MissingDependency[] = [];
    for (const { spec, resolvedPath } of results) {
      if (resolvedPath) {
        resolved[spec.name] = resolvedPath;
      } else {
        missing.push({
          name: spec.name,
          executable: spec.executable,
          description: spec.description,
          installCommands: spec.installCommands,
        });
      }
    }

    return { allPresent: missing.length === 0, resolved, missing };
  }
}
