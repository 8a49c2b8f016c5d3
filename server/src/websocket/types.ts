/**
 * Relay Types
 * Configuration, target validation and close codes for the WebSocket relay
 */

import type { IncomingMessage } from 'http';
import { z } from 'zod';

// ============================================================================
// Target Schema (Zod validation)
// ============================================================================

/**
 * Query string of a relay upgrade: /api/relay?host=<h>&port=<p>
 */
export const relayTargetSchema = z.object({
  host: z.string({ required_error: 'host is required' }).min(1).max(253),
  port: z.coerce.number({ invalid_type_error: 'port must be a number' }).int().min(1).max(65535),
});

export type RelayTarget = z.infer<typeof relayTargetSchema>;

// ============================================================================
// Configuration
// ============================================================================

export interface RelayConfig {
  /** Upgrade path the relay answers on */
  path: string;
  /** Subprotocol the client must offer and the backend is opened with */
  subprotocol: string;
  /** Time allowed for the backend WebSocket to open, in ms */
  connectTimeoutMs: number;
  /** Hosts a client may ask to be relayed to */
  allowedHosts: string[];
  /** Largest frame accepted from either side, in bytes */
  maxPayload: number;
  /** Port policy; the server wires this to "is a managed session port" */
  isPortAllowed: (port: number) => boolean | Promise<boolean>;
  /** Upgrade authentication; false rejects with 401 */
  authorize: (req: IncomingMessage) => boolean;
}

export const DEFAULT_RELAY_CONFIG: Omit<RelayConfig, 'isPortAllowed'> = {
  path: '/api/relay',
  subprotocol: 'binary',
  connectTimeoutMs: 5_000,
  allowedHosts: ['127.0.0.1', 'localhost'],
  maxPayload: 64 * 1024 * 1024,
  authorize: () => true,
};

// ============================================================================
// Connections
// ============================================================================

export interface RelayConnectionInfo {
  id: string;
  targetHost: string;
  targetPort: number;
  connectedAt: Date;
}

/**
 * Close codes sent by the relay
 */
export const RELAY_CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  INTERNAL_ERROR: 1011,
} as const;

/** Close reasons are limited to 123 bytes of UTF-8 */
export const MAX_CLOSE_REASON_BYTES = 123;
