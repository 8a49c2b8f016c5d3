/**
 * Dependencies API Router
 * Reports which session executables are missing, with install hints
 */

import { Router } from 'express';
import type { DependenciesResponse, ErrorResponse } from './sessions-schemas.js';
import { asyncHandler, toMissingDependencyResponse } from './sessions.js';
import type { DependencyProbe } from '../services/dependency-probe.js';

export function createDependenciesRouter(probe: DependencyProbe): Router {
  const router = Router();

  /**
   * GET /api/dependencies
   */
  router.get(
    '/dependencies',
    asyncHandler<DependenciesResponse | ErrorResponse>(async (_req, res) => {
      const report = await probe.check();
      res.json({
        all_present: report.allPresent,
        missing: report.missing.map(toMissingDependencyResponse),
      });
    })
  );

  return router;
}
