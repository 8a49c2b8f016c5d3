/**
 * Runtime Config
 * Maps validated environment variables onto the options each service takes
 */

import * as path from 'path';
import type { Env } from './env-schema.js';
import type { DependencyExecutables } from '../services/dependency-probe.js';
import { defaultApplicationArgs, type LaunchSettings } from '../services/launch-coordinator.js';
import type { ProcessSupervisorOptions } from '../services/process-supervisor.js';
import type { ProxyRegistrarOptions } from '../services/proxy-registrar.js';
import type { SessionReaperOptions } from '../services/session-reaper.js';
import type { TerminationManagerOptions } from '../services/termination-manager.js';
import type { RelayConfig } from '../websocket/types.js';

export interface RuntimeConfig {
  sessionsRoot: string;
  executables: DependencyExecutables;
  launch: LaunchSettings;
  supervisor: Partial<ProcessSupervisorOptions>;
  termination: Partial<TerminationManagerOptions>;
  reaper: Partial<SessionReaperOptions>;
  relay: Partial<Omit<RelayConfig, 'isPortAllowed' | 'authorize'>>;
  registrar: Partial<ProxyRegistrarOptions>;
}

export function buildRuntimeConfig(env: Env): RuntimeConfig {
  const debug = env.LOG_LEVEL === 'debug';
  const applicationName = path.basename(env.APP_COMMAND);

  return {
    sessionsRoot: env.SESSIONS_ROOT,
    executables: {
      xpra: env.XPRA_PATH,
      application: env.APP_COMMAND,
      xvfb: env.XVFB_PATH,
    },
    launch: {
      xpraPath: env.XPRA_PATH,
      xvfbPath: env.XVFB_PATH,
      bindHost: env.BIND_HOST,
      applicationCommand: env.APP_COMMAND,
      applicationArgs: defaultApplicationArgs,
      features: {
        clipboard: env.ENABLE_CLIPBOARD,
        audio: env.ENABLE_AUDIO,
        compression: env.DISPLAY_COMPRESS,
        quality: env.DISPLAY_QUALITY,
        dpi: env.DISPLAY_DPI,
      },
      environment: {},
    },
    supervisor: {
      checkpointsMs: env.STARTUP_CHECKS_MS,
      minDwellMs: env.STARTUP_MIN_DWELL_MS,
      probeHost: env.BIND_HOST,
      debug,
    },
    termination: {
      timeoutMs: env.TERMINATE_TIMEOUT_MS,
      nuclearProcessNames: [...new Set([path.basename(env.XPRA_PATH), applicationName, path.basename(env.XVFB_PATH)])],
    },
    reaper: {
      intervalMs: env.REAPER_INTERVAL_MS,
      expectedProcessName: path.basename(env.XPRA_PATH),
    },
    relay: {
      connectTimeoutMs: env.RELAY_CONNECT_TIMEOUT_MS,
      allowedHosts: env.RELAY_ALLOWED_HOSTS,
    },
    registrar: {
      url: env.PROXY_REGISTRAR_URL,
    },
  };
}
