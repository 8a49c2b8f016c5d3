/**
 * Sessions API Router
 * Endpoints for launching, inspecting and cleaning up desktop sessions
 */

import express, { Router, Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  launchSessionSchema,
  statusQuerySchema,
  cleanupRequestSchema,
  portParamSchema,
  type SessionResponse,
  type AggregateStatusResponse,
  type PortStatusResponse,
  type CleanupResponse,
  type TerminationResponse,
  type MissingDependencyResponse,
  type ErrorResponse,
} from './sessions-schemas.js';
import type { SessionManager } from '../services/session-manager.js';
import type { CleanupResult } from '../services/termination-manager.js';
import {
  DependencyMissingError,
  PermissionDeniedError,
  PortAllocationError,
  ProcessSpawnError,
  SessionNotFoundError,
  SessionPortConflictError,
  type MissingDependency,
  type Session,
} from '../services/session-types.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Convert a Session to API response format
 */
export function toSessionResponse(session: Session): SessionResponse {
  return {
    port: session.port,
    process_id: session.processId,
    state: session.state,
    proxy_path: session.proxyPath,
    created_at: session.createdAt.toISOString(),
  };
}

export function toMissingDependencyResponse(dep: MissingDependency): MissingDependencyResponse {
  return {
    name: dep.name,
    description: dep.description,
    install_commands: dep.installCommands,
  };
}

function toCleanupResponse(result: CleanupResult): CleanupResponse {
  return {
    status: 'success',
    message: result.message,
    cleanup_type: result.scope,
    processes_affected: result.processesAffected,
    processes_affected_count: result.processesAffected.length,
    remaining_sessions: result.remainingSessions,
    warnings: result.warnings,
  };
}

/**
 * Format Zod validation errors
 */
function formatZodError(error: ZodError): ErrorResponse {
  const details: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.');
    details[path] ??= [];
    details[path].push(issue.message);
  }
  return {
    error: 'Validation error',
    details,
  };
}

/**
 * Error handler for session routes
 */
export function handleSessionError(err: Error, res: Response<ErrorResponse>): void {
  if (err instanceof ZodError) {
    res.status(400).json(formatZodError(err));
    return;
  }

  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Invalid JSON body' });
    return;
  }

  if (err instanceof DependencyMissingError) {
    res.status(503).json({
      error: err.message,
      code: err.code,
      missing_dependencies: err.missing.map(toMissingDependencyResponse),
    });
    return;
  }

  if (err instanceof PortAllocationError) {
    res.status(500).json({ error: err.message, code: err.code });
    return;
  }

  if (err instanceof ProcessSpawnError) {
    res.status(500).json({
      error: err.message,
      code: err.code,
      exit_code: err.exitCode,
      stdout: err.stdout,
      stderr: err.stderr,
    });
    return;
  }

  if (err instanceof PermissionDeniedError) {
    res.status(403).json({ error: err.message, code: err.code });
    return;
  }

  if (err instanceof SessionNotFoundError) {
    res.status(404).json({ error: err.message, code: err.code });
    return;
  }

  if (err instanceof SessionPortConflictError) {
    res.status(409).json({ error: err.message, code: err.code });
    return;
  }

  // Log unexpected errors
  console.error('Unexpected error in sessions API:', err);
  res.status(500).json({ error: 'Internal server error' });
}

/**
 * Async handler wrapper
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response<T>, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response<T>, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch((err: unknown) => {
      handleSessionError(err instanceof Error ? err : new Error(String(err)), res as Response<ErrorResponse>);
    });
  };
}

const CLEANUP_QUERY_KEYS = ['process_id', 'nuclear', 'confirm_nuclear', 'cleanup_dirs'] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Merge query-string fields with the body of a cleanup request
 * navigator.sendBeacon posts its JSON as text/plain.
 */
function readCleanupInput(req: Request): Record<string, unknown> {
  const input: Record<string, unknown> = {};
  for (const key of CLEANUP_QUERY_KEYS) {
    const value = req.query[key];
    if (typeof value === 'string') input[key] = value;
  }

  let body: unknown = req.body;
  if (typeof body === 'string') {
    body = body.trim() === '' ? {} : JSON.parse(body);
  }
  return isRecord(body) ? { ...input, ...body } : input;
}

// ============================================================================
// Router
// ============================================================================

export function createSessionsRouter(manager: SessionManager): Router {
  const router = Router();

  /**
   * GET /api/sessions/status
   * Aggregate status, or the status of one port
   *
   * Query params:
   * - port: Session port (optional)
   */
  router.get(
    '/sessions/status',
    asyncHandler<AggregateStatusResponse | PortStatusResponse | ErrorResponse>(async (req, res) => {
      const { port } = statusQuerySchema.parse(req.query);

      if (port === undefined) {
        const status = manager.status();
        res.json({ active_sessions: status.activeSessions, status: status.status });
        return;
      }

      const result = await manager.status(port);
      res.json({ port: result.port, status: result.status });
    })
  );

  /**
   * HEAD /api/sessions
   * 200 while at least one session is active, 503 otherwise
   */
  router.head('/sessions', (_req: Request, res: Response): void => {
    res.status(manager.status().activeSessions > 0 ? 200 : 503).end();
  });

  /**
   * GET /api/sessions
   * List managed sessions
   */
  router.get('/sessions', (_req: Request, res: Response<SessionResponse[]>): void => {
    res.json(manager.list().map(toSessionResponse));
  });

  /**
   * POST /api/sessions
   * Launch a new session
   *
   * Body (optional): clipboard, audio, compression, quality, dpi, screen
   */
  router.post(
    '/sessions',
    asyncHandler<SessionResponse | ErrorResponse>(async (req, res) => {
      const { screen, ...features } = launchSessionSchema.parse(req.body ?? {});

      const session = await manager.launch({ features, screen });

      res.status(201).json(toSessionResponse(session));
    })
  );

  /**
   * POST /api/sessions/cleanup
   * Terminate one session by root pid, or all of them
   *
   * Body: { process_id: number | "all", nuclear?, confirm_nuclear?, cleanup_dirs? }
   */
  router.post(
    '/sessions/cleanup',
    express.text({ type: 'text/plain' }),
    asyncHandler<CleanupResponse | ErrorResponse>(async (req, res) => {
      const input = cleanupRequestSchema.parse(readCleanupInput(req));

      const result = await manager.cleanup({
        target: input.process_id,
        nuclear: input.nuclear,
        confirmNuclear: input.confirm_nuclear,
        cleanupDirectories: input.cleanup_dirs,
      });

      res.json(toCleanupResponse(result));
    })
  );

  /**
   * DELETE /api/sessions
   * Stop every managed session
   */
  router.delete(
    '/sessions',
    asyncHandler<CleanupResponse | ErrorResponse>(async (_req, res) => {
      const result = await manager.stopAll();
      res.json(toCleanupResponse(result));
    })
  );

  /**
   * DELETE /api/sessions/:port
   * Terminate the session on one port
   */
  router.delete(
    '/sessions/:port',
    asyncHandler<TerminationResponse | ErrorResponse>(async (req, res) => {
      const { port } = portParamSchema.parse(req.params);

      const result = await manager.terminate(port);

      res.json({
        port: result.port,
        process_id: result.processId,
        outcome: result.outcome,
        directory_removed: result.directoryRemoved,
      });
    })
  );

  return router;
}
