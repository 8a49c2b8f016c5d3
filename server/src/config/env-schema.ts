/**
 * Environment variable schema
 * Kept apart from env.ts so it can be parsed without loading .env
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const msList = z
  .string()
  .regex(/^\d+(\s*,\s*\d+)*$/, 'Expected a comma-separated list of milliseconds')
  .transform((value) => value.split(',').map((part) => parseInt(part.trim(), 10)));

const hostList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
  )
  .pipe(z.array(z.string()).min(1));

export const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  API_KEY: z.string().min(32).optional(),

  SESSIONS_ROOT: z.string().min(1).default(join(homedir(), '.desktop-launcher', 'sessions')),
  XPRA_PATH: z.string().min(1).default('xpra'),
  APP_COMMAND: z.string().min(1).default('firefox'),
  XVFB_PATH: z.string().min(1).default('Xvfb'),
  BIND_HOST: z.string().min(1).default('127.0.0.1'),

  DISPLAY_QUALITY: z.coerce.number().int().min(1).max(100).default(100),
  DISPLAY_COMPRESS: z.enum(['none', 'lz4', 'zlib', 'brotli']).default('none'),
  DISPLAY_DPI: z.coerce.number().int().min(24).max(480).default(96),
  ENABLE_CLIPBOARD: booleanFlag.default('true'),
  ENABLE_AUDIO: booleanFlag.default('false'),

  STARTUP_CHECKS_MS: msList.default('100,200,500'),
  STARTUP_MIN_DWELL_MS: z.coerce.number().int().min(0).default(250),
  TERMINATE_TIMEOUT_MS: z.coerce.number().int().min(100).default(3000),
  REAPER_INTERVAL_MS: z.coerce.number().int().min(1000).default(30000),
  RELAY_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),
  RELAY_ALLOWED_HOSTS: hostList.default('127.0.0.1,localhost'),
  PROXY_REGISTRAR_URL: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;
