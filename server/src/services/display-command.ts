/**
 * Display Command Builder
 * Typed, validated Xpra configuration flattened into argv at the spawn boundary
 *
 * Sessions use the WebSocket binding profile: Xpra listens with --bind-ws on the
 * session port and browsers reach it through the relay, so no HTML client is
 * served by the display server itself.
 */

import { z } from 'zod';

// ============================================================================
// Schema
// ============================================================================

const ENV_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const displayFeaturesSchema = z.object({
  clipboard: z.boolean().default(true),
  audio: z.boolean().default(false),
  compression: z.enum(['none', 'lz4', 'zlib', 'brotli']).default('none'),
  quality: z.number().int().min(1).max(100).default(100),
  dpi: z.number().int().min(24).max(480).default(96),
});

export const displayServerConfigSchema = z.object({
  xpraPath: z.string().min(1),
  xvfbPath: z.string().min(1),
  bindHost: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  child: z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
  }),
  paths: z.object({
    root: z.string().min(1),
    sockets: z.string().min(1),
    runtime: z.string().min(1),
    profile: z.string().min(1),
    temp: z.string().min(1),
  }),
  features: displayFeaturesSchema.default({}),
  /** Xvfb screen geometry WxHxDepth, optionally +extra depth */
  screen: z.string().regex(/^\d+x\d+x\d+(\+\d+)?$/, 'Invalid screen geometry').default('1280x800x24+32'),
  /** Extra variables exported inside the session */
  environment: z
    .record(z.string())
    .refine((env) => Object.keys(env).every((key) => ENV_KEY.test(key)), 'Invalid environment variable name')
    .default({}),
});

export type DisplayFeatures = z.infer<typeof displayFeaturesSchema>;
export type DisplayServerConfigInput = z.input<typeof displayServerConfigSchema>;
export type DisplayServerConfig = z.infer<typeof displayServerConfigSchema>;

/**
 * What the process supervisor spawns
 */
export interface LaunchCommand {
  command: string;
  args: string[];
  env: Record<string, string>;
}

// ============================================================================
// Flattening
// ============================================================================

/**
 * Quote one word for Xpra's --start-child, which is parsed like a shell command
 */
export function quoteArg(arg: string): string {
  if (arg !== '' && /^[A-Za-z0-9_./:=@%+,-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

const yesNo = (value: boolean): string => (value ? 'yes' : 'no');

/**
 * Validate a display server configuration and produce the command to spawn
 * Throws ZodError when the configuration is invalid.
 */
export function buildDisplayCommand(
  input: DisplayServerConfigInput,
  baseEnv: NodeJS.ProcessEnv = process.env
): LaunchCommand {
  const config = displayServerConfigSchema.parse(input);
  const { features, paths, port } = config;

  const childCommand = [config.child.command, ...config.child.args].map(quoteArg).join(' ');

  const sessionEnv: Record<string, string> = {
    SESSION_DIR: paths.root,
    XDG_RUNTIME_DIR: paths.runtime,
    XAUTHORITY: `${paths.runtime}/.Xauth`,
    TMPDIR: paths.temp,
    PROFILE_DIR: paths.profile,
    ...config.environment,
  };

  const args = [
    'start',
    `--bind-ws=${config.bindHost}:${port}`,
    '--bind=none',
    '--html=off',
    '--daemon=no',
    '--exit-with-children=yes',
    '--start-via-proxy=no',
    '--start=',
    `--start-child=${childCommand}`,
    `--xvfb=${config.xvfbPath} +extension Composite -screen 0 ${config.screen} -nolisten tcp -noreset +extension GLX`,
    `--socket-dirs=${paths.sockets}`,
    '--mdns=no',
    `--pulseaudio=${yesNo(features.audio)}`,
    `--speaker=${features.audio ? 'on' : 'off'}`,
    '--microphone=off',
    '--webcam=no',
    '--notifications=no',
    `--clipboard=${yesNo(features.clipboard)}`,
    ...(features.clipboard ? ['--clipboard-direction=both'] : []),
    '--sharing=no',
    '--desktop-scaling=auto',
    '--resize-display=yes',
    '--cursors=yes',
    '--bell=no',
    '--system-tray=no',
    `--dpi=${features.dpi}`,
    `--compressors=${features.compression}`,
    `--quality=${features.quality}`,
    '--encoding=auto',
    '--min-quality=30',
    '--min-speed=30',
    '--use-display=no',
    `--session-name=Desktop-Session-${port}`,
    ...Object.entries(sessionEnv).map(([key, value]) => `--env=${key}=${value}`),
    '--dbus-launch=',
    '--dbus-proxy=no',
    '--remote-logging=no',
    '--bandwidth-detection=no',
    '--pings=yes',
  ];

  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) env[key] = value;
  }
  env.XPRA_CRASH_DEBUG = '1';

  return { command: config.xpraPath, args, env };
}
