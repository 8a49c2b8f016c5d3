import { describe, it, expect } from 'vitest';
import { envSchema } from '../../src/config/env-schema.js';
import { buildRuntimeConfig } from '../../src/config/runtime.js';

describe('envSchema', () => {
  it('should apply defaults', () => {
    const env = envSchema.parse({});

    expect(env.PORT).toBe(3000);
    expect(env.BIND_HOST).toBe('127.0.0.1');
    expect(env.ENABLE_CLIPBOARD).toBe(true);
    expect(env.ENABLE_AUDIO).toBe(false);
    expect(env.STARTUP_CHECKS_MS).toEqual([100, 200, 500]);
    expect(env.RELAY_ALLOWED_HOSTS).toEqual(['127.0.0.1', 'localhost']);
    expect(env.API_KEY).toBeUndefined();
  });

  it('should parse lists and flags', () => {
    const env = envSchema.parse({
      STARTUP_CHECKS_MS: '50, 150,400',
      RELAY_ALLOWED_HOSTS: '127.0.0.1, ::1,',
      ENABLE_AUDIO: 'yes',
      ENABLE_CLIPBOARD: '0',
    });

    expect(env.STARTUP_CHECKS_MS).toEqual([50, 150, 400]);
    expect(env.RELAY_ALLOWED_HOSTS).toEqual(['127.0.0.1', '::1']);
    expect(env.ENABLE_AUDIO).toBe(true);
    expect(env.ENABLE_CLIPBOARD).toBe(false);
  });

  it('should reject invalid values', () => {
    expect(envSchema.safeParse({ DISPLAY_QUALITY: '0' }).success).toBe(false);
    expect(envSchema.safeParse({ STARTUP_CHECKS_MS: '100,abc' }).success).toBe(false);
    expect(envSchema.safeParse({ API_KEY: 'short' }).success).toBe(false);
    expect(envSchema.safeParse({ ENABLE_AUDIO: 'maybe' }).success).toBe(false);
  });
});

describe('buildRuntimeConfig', () => {
  it('should map environment onto service options', () => {
    const runtime = buildRuntimeConfig(
      envSchema.parse({
        SESSIONS_ROOT: '/tmp/sessions',
        XPRA_PATH: '/usr/bin/xpra',
        APP_COMMAND: '/opt/firefox/firefox',
        LOG_LEVEL: 'debug',
        TERMINATE_TIMEOUT_MS: '1500',
        PROXY_REGISTRAR_URL: 'http://127.0.0.1:9000/routes',
      })
    );

    expect(runtime.sessionsRoot).toBe('/tmp/sessions');
    expect(runtime.executables).toEqual({ xpra: '/usr/bin/xpra', application: '/opt/firefox/firefox', xvfb: 'Xvfb' });
    expect(runtime.launch.features).toEqual({
      clipboard: true,
      audio: false,
      compression: 'none',
      quality: 100,
      dpi: 96,
    });
    expect(runtime.supervisor.debug).toBe(true);
    expect(runtime.termination).toEqual({
      timeoutMs: 1500,
      nuclearProcessNames: ['xpra', 'firefox', 'Xvfb'],
    });
    expect(runtime.reaper.expectedProcessName).toBe('xpra');
    expect(runtime.registrar.url).toBe('http://127.0.0.1:9000/routes');
  });

  it('should leave debug off at the default log level', () => {
    const runtime = buildRuntimeConfig(envSchema.parse({}));

    expect(runtime.supervisor.debug).toBe(false);
    expect(runtime.registrar.url).toBeUndefined();
  });
});
