import { Router, Request, Response } from 'express';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import type { DependencyProbe } from '../services/dependency-probe.js';

// Server start time for uptime calculation
const startTime = Date.now();

// Get package.json version at startup
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../../package.json');
let packageVersion = '0.1.0';
try {
  const pkg = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { version?: string };
  packageVersion = pkg.version ?? '0.1.0';
} catch {
  // Fall back to default version if package.json can't be read
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  uptime: number;
  version: string;
  dependencies: 'available' | 'missing';
  active_sessions: number;
  timestamp: string;
}

export function createHealthRouter(probe: DependencyProbe, activeSessions: () => number): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response<HealthResponse>): void => {
    void (async (): Promise<void> => {
      let dependencies: HealthResponse['dependencies'];
      try {
        dependencies = (await probe.check()).allPresent ? 'available' : 'missing';
      } catch (error) {
        console.error('[Health] Dependency check failed:', error);
        dependencies = 'missing';
      }

      res.json({
        status: dependencies === 'available' ? 'healthy' : 'degraded',
        uptime: Math.floor((Date.now() - startTime) / 1000),
        version: packageVersion,
        dependencies,
        active_sessions: activeSessions(),
        timestamp: new Date().toISOString(),
      });
    })();
  });

  return router;
}
