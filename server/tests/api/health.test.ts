import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import express from 'express';
import { createServer, type Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import { createHealthRouter, type HealthResponse } from '../../src/api/health.js';
import type { DependencyReport } from '../../src/services/dependency-probe.js';

describe('Health Endpoint', () => {
  let server: HttpServer;
  let url: string;
  let check: () => Promise<DependencyReport>;
  let activeSessions: number;

  beforeEach(async () => {
    check = async () => ({ allPresent: true, resolved: {}, missing: [] });
    activeSessions = 0;

    const app = express();
    app.use('/api/health', createHealthRouter({ check: () => check() }, () => activeSessions));
    server = createServer(app);
    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', () => resolve());
    });
    url = `http://127.0.0.1:${(server.address() as AddressInfo).port}/api/health`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  const getHealth = async (): Promise<HealthResponse> => {
    const res = await fetch(url);
    expect(res.status).toBe(200);
    return (await res.json()) as HealthResponse;
  };

  it('should report healthy when every dependency is present', async () => {
    activeSessions = 2;

    const body = await getHealth();

    expect(body.status).toBe('healthy');
    expect(body.dependencies).toBe('available');
    expect(body.active_sessions).toBe(2);
    expect(body.version).toBe('0.1.0');
    expect(body.uptime).toBeGreaterThanOrEqual(0);
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it('should report degraded when a dependency is missing', async () => {
    check = async () => ({
      allPresent: false,
      resolved: {},
      missing: [{ name: 'Xvfb', executable: 'Xvfb', description: 'Virtual framebuffer', installCommands: [] }],
    });

    const body = await getHealth();

    expect(body.status).toBe('degraded');
    expect(body.dependencies).toBe('missing');
  });

  it('should report degraded when the dependency check throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    check = async () => {
      throw new Error('which failed');
    };

    const body = await getHealth();

    expect(body.status).toBe('degraded');
    expect(console.error).toHaveBeenCalledWith('[Health] Dependency check failed:', expect.any(Error));
  });
});
