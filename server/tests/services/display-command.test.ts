import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  buildDisplayCommand,
  quoteArg,
  type DisplayServerConfigInput,
} from '../../src/services/display-command.js';

const paths = {
  root: '/tmp/sessions/session-40000',
  sockets: '/tmp/sessions/session-40000/sockets',
  runtime: '/tmp/sessions/session-40000/runtime',
  profile: '/tmp/sessions/session-40000/profile',
  temp: '/tmp/sessions/session-40000/temp',
};

const baseConfig = (): DisplayServerConfigInput => ({
  xpraPath: '/usr/bin/xpra',
  xvfbPath: 'Xvfb',
  bindHost: '127.0.0.1',
  port: 40000,
  child: { command: 'firefox', args: ['--no-remote', '--profile', paths.profile] },
  paths,
});

describe('quoteArg', () => {
  it('should leave safe words unquoted', () => {
    expect(quoteArg('--no-remote')).toBe('--no-remote');
    expect(quoteArg('/tmp/a/b')).toBe('/tmp/a/b');
  });

  it('should single-quote words with spaces or quotes', () => {
    expect(quoteArg('my profile')).toBe(`'my profile'`);
    expect(quoteArg(`it's`)).toBe(`'it'\\''s'`);
    expect(quoteArg('')).toBe(`''`);
  });
});

describe('buildDisplayCommand', () => {
  it('should spawn xpra start with the WebSocket binding', () => {
    const command = buildDisplayCommand(baseConfig(), {});

    expect(command.command).toBe('/usr/bin/xpra');
    expect(command.args[0]).toBe('start');
    expect(command.args).toContain('--bind-ws=127.0.0.1:40000');
    expect(command.args).toContain('--html=off');
    expect(command.args).toContain('--daemon=no');
  });

  it('should pass the child command and the session name', () => {
    const { args } = buildDisplayCommand(baseConfig(), {});

    expect(args).toContain('--start-child=firefox --no-remote --profile /tmp/sessions/session-40000/profile');
    expect(args).toContain('--session-name=Desktop-Session-40000');
    expect(args).toContain('--socket-dirs=/tmp/sessions/session-40000/sockets');
  });

  it('should apply default feature toggles', () => {
    const { args } = buildDisplayCommand(baseConfig(), {});

    expect(args).toContain('--clipboard=yes');
    expect(args).toContain('--clipboard-direction=both');
    expect(args).toContain('--pulseaudio=no');
    expect(args).toContain('--speaker=off');
    expect(args).toContain('--compressors=none');
    expect(args).toContain('--quality=100');
    expect(args).toContain('--dpi=96');
    expect(args).toContain(
      '--xvfb=Xvfb +extension Composite -screen 0 1280x800x24+32 -nolisten tcp -noreset +extension GLX'
    );
  });

  it('should honour explicit feature toggles', () => {
    const { args } = buildDisplayCommand(
      { ...baseConfig(), features: { clipboard: false, audio: true, compression: 'lz4', quality: 60, dpi: 120 } },
      {}
    );

    expect(args).toContain('--clipboard=no');
    expect(args).not.toContain('--clipboard-direction=both');
    expect(args).toContain('--pulseaudio=yes');
    expect(args).toContain('--speaker=on');
    expect(args).toContain('--compressors=lz4');
    expect(args).toContain('--quality=60');
    expect(args).toContain('--dpi=120');
  });

  it('should export the session environment to the child', () => {
    const { args } = buildDisplayCommand({ ...baseConfig(), environment: { MOZ_HEADLESS: '0' } }, {});
    const envArgs = args.filter((arg) => arg.startsWith('--env='));

    expect(envArgs).toEqual([
      '--env=SESSION_DIR=/tmp/sessions/session-40000',
      '--env=XDG_RUNTIME_DIR=/tmp/sessions/session-40000/runtime',
      '--env=XAUTHORITY=/tmp/sessions/session-40000/runtime/.Xauth',
      '--env=TMPDIR=/tmp/sessions/session-40000/temp',
      '--env=PROFILE_DIR=/tmp/sessions/session-40000/profile',
      '--env=MOZ_HEADLESS=0',
    ]);
  });

  it('should copy the defined base environment and enable crash debugging', () => {
    const { env } = buildDisplayCommand(baseConfig(), { PATH: '/usr/bin', UNSET: undefined });

    expect(env).toEqual({ PATH: '/usr/bin', XPRA_CRASH_DEBUG: '1' });
  });

  it('should reject an out-of-range port', () => {
    expect(() => buildDisplayCommand({ ...baseConfig(), port: 70000 }, {})).toThrow(ZodError);
  });

  it('should reject an invalid quality', () => {
    expect(() => buildDisplayCommand({ ...baseConfig(), features: { quality: 0 } }, {})).toThrow(ZodError);
  });

  it('should reject invalid environment variable names', () => {
    expect(() => buildDisplayCommand({ ...baseConfig(), environment: { 'BAD-NAME': 'x' } }, {})).toThrow(
      'Invalid environment variable name'
    );
  });
});
