import { describe, it, expect, vi } from 'vitest';
import type { IncomingMessage } from 'http';
import type { Request, Response } from 'express';
import {
  createApiKeyAuth,
  createUpgradeAuth,
  isAuthorized,
  isLocalhostAddress,
} from '../../src/middleware/api-key-auth.js';

const API_KEY = 'test-secret-test-secret-test-secret';

describe('isLocalhostAddress', () => {
  it.each(['127.0.0.1', '127.0.1.1', '::1', '::ffff:127.0.0.1', 'localhost'])('should accept %s', (address) => {
    expect(isLocalhostAddress(address)).toBe(true);
  });

  it.each(['10.0.0.5', '::ffff:10.0.0.5', '', undefined])('should reject %s', (address) => {
    expect(isLocalhostAddress(address)).toBe(false);
  });
});

describe('isAuthorized', () => {
  it('should allow everything when no key is configured', () => {
    expect(isAuthorized(undefined, '10.0.0.5', undefined)).toBe(true);
  });

  it('should allow localhost without a key', () => {
    expect(isAuthorized(API_KEY, '127.0.0.1', undefined)).toBe(true);
  });

  it('should require a matching header from remote clients', () => {
    expect(isAuthorized(API_KEY, '10.0.0.5', API_KEY)).toBe(true);
    expect(isAuthorized(API_KEY, '10.0.0.5', 'wrong')).toBe(false);
    expect(isAuthorized(API_KEY, '10.0.0.5', undefined)).toBe(false);
    expect(isAuthorized(API_KEY, '10.0.0.5', [API_KEY])).toBe(false);
  });
});

describe('createApiKeyAuth', () => {
  const makeRes = () => {
    const json = vi.fn();
    const status = vi.fn(() => ({ json }));
    return { res: { status } as unknown as Response, status, json };
  };

  it('should call next for an authorized request', () => {
    const next = vi.fn();
    const { res, status } = makeRes();
    const req = { ip: '10.0.0.5', socket: {}, headers: { 'x-api-key': API_KEY } } as unknown as Request;

    createApiKeyAuth(API_KEY)(req, res, next);

    expect(next).toHaveBeenCalledOnce();
    expect(status).not.toHaveBeenCalled();
  });

  it('should answer 401 for a missing key', () => {
    const next = vi.fn();
    const { res, status, json } = makeRes();
    const req = { ip: '10.0.0.5', socket: {}, headers: {} } as unknown as Request;

    createApiKeyAuth(API_KEY)(req, res, next);

    expect(next).not.toHaveBeenCalled();
    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith({ error: 'Unauthorized', message: 'Missing or invalid API key' });
  });
});

describe('createUpgradeAuth', () => {
  it('should apply the same rules to upgrade requests', () => {
    const authorize = createUpgradeAuth(API_KEY);
    const upgrade = (remoteAddress: string, key?: string) =>
      ({ socket: { remoteAddress }, headers: key ? { 'x-api-key': key } : {} }) as unknown as IncomingMessage;

    expect(authorize(upgrade('127.0.0.1'))).toBe(true);
    expect(authorize(upgrade('10.0.0.5'))).toBe(false);
    expect(authorize(upgrade('10.0.0.5', API_KEY))).toBe(true);
  });
});
