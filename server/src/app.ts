import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createHealthRouter } from './api/health.js';
import { createSessionsRouter } from './api/sessions.js';
import { createDependenciesRouter } from './api/dependencies.js';
import { createApiKeyAuth } from './middleware/api-key-auth.js';
import type { DependencyProbe } from './services/dependency-probe.js';
import type { SessionManager } from './services/session-manager.js';

export interface AppDeps {
  manager: SessionManager;
  dependencyProbe: DependencyProbe;
  apiKey?: string;
}

/**
 * Express application with every API route mounted
 */
export function createApp({ manager, dependencyProbe, apiKey }: AppDeps): Express {
  const app: Express = express();

  // Middleware
  app.use(cors({
    origin: [
      /^http:\/\/localhost:\d+$/,  // Any localhost port
      /^http:\/\/127\.0\.0\.1:\d+$/,
    ],
    credentials: true,
  }));
  app.use(express.json());

  // API Routes - Health endpoint (no auth required)
  app.use('/api/health', createHealthRouter(dependencyProbe, () => manager.status().activeSessions));

  // Apply API key auth to all other /api routes when API_KEY is configured
  app.use('/api', createApiKeyAuth(apiKey));

  // Protected API Routes
  app.use('/api', createSessionsRouter(manager));
  app.use('/api', createDependenciesRouter(dependencyProbe));

  // 404 handler
  app.use((_req: Request, res: Response): void => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    // body-parser errors carry their HTTP status (400 for malformed JSON)
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status < 500) {
      res.status(status).json({ error: err.message });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
