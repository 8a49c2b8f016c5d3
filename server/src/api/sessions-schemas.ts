/**
 * Sessions API Zod Schemas
 * Validation schemas for session-related API endpoints
 */

import { z } from 'zod';
import type { SessionState } from '../services/session-types.js';

// ============================================================================
// Input Schemas
// ============================================================================

/**
 * Query-string boolean ("true"/"1") or JSON boolean
 */
const flagSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1')])
  .optional();

/**
 * Schema for launching a session (all fields optional)
 */
export const launchSessionSchema = z
  .object({
    clipboard: z.boolean().optional(),
    audio: z.boolean().optional(),
    compression: z.enum(['none', 'lz4', 'zlib', 'brotli']).optional(),
    quality: z.number().int().min(1).max(100).optional(),
    dpi: z.number().int().min(24).max(480).optional(),
    screen: z
      .string()
      .regex(/^\d+x\d+x\d+(\+\d+)?$/, 'Invalid screen geometry')
      .optional(),
  })
  .strict();

/**
 * Schema for the status query
 */
export const statusQuerySchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
});

/**
 * Schema for a cleanup request
 * process_id is a session's root pid or "all"
 */
export const cleanupRequestSchema = z.object({
  process_id: z.union([z.literal('all'), z.coerce.number().int().positive('process_id must be a positive integer')]),
  nuclear: flagSchema,
  confirm_nuclear: flagSchema,
  cleanup_dirs: flagSchema,
});

/**
 * Schema for the :port route parameter
 */
export const portParamSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535),
});

// ============================================================================
// Input Types
// ============================================================================

export type LaunchSessionInput = z.infer<typeof launchSessionSchema>;
export type StatusQueryInput = z.infer<typeof statusQuerySchema>;
export type CleanupRequestInput = z.infer<typeof cleanupRequestSchema>;

// ============================================================================
// Response Types
// ============================================================================

/**
 * Session response format (snake_case for JSON)
 */
export interface SessionResponse {
  port: number;
  process_id: number;
  state: SessionState;
  proxy_path: string;
  created_at: string;
}

export interface AggregateStatusResponse {
  active_sessions: number;
  status: 'running' | 'stopped';
}

export interface PortStatusResponse {
  port: number;
  status: 'ready' | 'starting' | 'stopped' | 'notFound';
}

export interface CleanupResponse {
  status: 'success';
  message: string;
  cleanup_type: 'managed' | 'bulk-managed' | 'nuclear';
  processes_affected: string[];
  processes_affected_count: number;
  remaining_sessions: number;
  warnings: string[];
}

export interface TerminationResponse {
  port: number;
  process_id: number;
  outcome: 'terminated' | 'killed' | 'already-gone';
  directory_removed: boolean;
}

export interface MissingDependencyResponse {
  name: string;
  description: string;
  install_commands: string[];
}

export interface DependenciesResponse {
  all_present: boolean;
  missing: MissingDependencyResponse[];
}

/**
 * Error response format
 */
export interface ErrorResponse {
  error: string;
  code?: string;
  details?: Record<string, string[]>;
  missing_dependencies?: MissingDependencyResponse[];
  exit_code?: number | null;
  stdout?: string;
  stderr?: string;
}
