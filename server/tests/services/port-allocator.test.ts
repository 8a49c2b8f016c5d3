import { describe, it, expect } from 'vitest';
import { createServer } from 'net';
import { allocatePort } from '../../src/services/port-allocator.js';

describe('allocatePort', () => {
  it('should return a port that can be bound', async () => {
    const port = await allocatePort('127.0.0.1');

    expect(port).toBeGreaterThan(0);
    expect(port).toBeLessThanOrEqual(65535);

    const server = createServer();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, '127.0.0.1', () => resolve());
    });
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });
});
