/**
 * Port Allocator
 * Hands out a port that was unbound at the moment of allocation
 *
 * The port is released again before the display server binds it, so another
 * process may grab it in between. The launch then fails at startup and the
 * caller re-issues it.
 */

import { getRandomPort } from 'get-port-please';
import { PortAllocationError } from './session-types.js';

export type PortAllocator = (host: string) => Promise<number>;

/**
 * Bind port 0 on `host`, read back the port the OS picked, release it
 */
export async function allocatePort(host = '127.0.0.1'): Promise<number> {
  let port: number;
  try {
    port = await getRandomPort(host);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new PortAllocationError(`Could not allocate a free port on ${host}: ${cause.message}`, cause);
  }

  if (!Number.isInteger(port) || port <= 0) {
    throw new PortAllocationError(`Could not allocate a free port on ${host}: got ${port}`);
  }
  return port;
}
