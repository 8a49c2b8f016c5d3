import type { IncomingMessage } from 'http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Check if a remote address string is localhost.
 * Supports IPv4 (127.0.0.1), IPv6 (::1), and IPv4-mapped IPv6 (::ffff:127.0.0.1).
 */
export function isLocalhostAddress(address: string | undefined): boolean {
  if (!address) return false;
  return (
    address === '127.0.0.1' ||
    address === '::1' ||
    address === '::ffff:127.0.0.1' ||
    address.startsWith('127.') ||
    address === 'localhost'
  );
}

/**
 * Whether a request may proceed: no key configured, a localhost client,
 * or a matching X-API-Key header.
 */
export function isAuthorized(
  apiKey: string | undefined,
  remoteAddress: string | undefined,
  header: string | string[] | undefined
): boolean {
  if (!apiKey) return true;
  if (isLocalhostAddress(remoteAddress)) return true;
  return header === apiKey;
}

/**
 * API key authentication middleware.
 *
 * Behavior:
 * - If no API key is configured: auth is skipped (development mode)
 * - If request is from localhost: auth is skipped
 * - Otherwise: requires valid X-API-Key header
 */
export function createApiKeyAuth(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!isAuthorized(apiKey, req.ip ?? req.socket.remoteAddress, req.headers['x-api-key'])) {
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Missing or invalid API key',
      });
      return;
    }
    next();
  };
}

/**
 * Same rules for a WebSocket upgrade request
 */
export function createUpgradeAuth(apiKey: string | undefined): (req: IncomingMessage) => boolean {
  return (req) => isAuthorized(apiKey, req.socket.remoteAddress, req.headers['x-api-key']);
}
