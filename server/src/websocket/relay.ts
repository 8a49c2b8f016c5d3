/**
 * WebSocket Relay
 * Forwards frames between a browser client and a session's display server
 *
 * Upgrade sequence:
 * 1. Authenticate, validate host/port and the `binary` subprotocol offer
 * 2. Open the backend WebSocket (same subprotocol) within the connect timeout
 * 3. Only then complete the client upgrade, so no client frame is ever buffered
 *
 * Each direction holds at most one frame in flight: the source is paused
 * until the frame is written to the other side.
 */

import { STATUS_CODES, type IncomingMessage, type Server as HttpServer } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { v4 as uuid } from 'uuid';
import { RelayIOError, SubprotocolNegotiationError } from '../services/session-types.js';
import {
  DEFAULT_RELAY_CONFIG,
  MAX_CLOSE_REASON_BYTES,
  RELAY_CLOSE_CODES,
  relayTargetSchema,
  type RelayConfig,
  type RelayConnectionInfo,
} from './types.js';

interface RelayConnection {
  info: RelayConnectionInfo;
  client: WebSocket;
  backend: WebSocket;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse a Sec-WebSocket-Protocol header into its tokens
 */
export function parseSubprotocols(header: string | undefined): string[] {
  if (!header) return [];
  return header
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/**
 * Cut a close reason down to what fits in a close frame
 */
export function truncateCloseReason(reason: string): string {
  let result = reason;
  while (Buffer.byteLength(result, 'utf8') > MAX_CLOSE_REASON_BYTES) {
    result = result.slice(0, -1);
  }
  return result;
}

/**
 * Map a received close code to one that may be sent in a close frame
 */
export function toSendableCloseCode(code: number): number {
  // 1005 means "no status received"
  if (code === 1005) return RELAY_CLOSE_CODES.NORMAL;
  if ((code >= 1000 && code <= 1003) || (code >= 1007 && code <= 1014) || (code >= 3000 && code <= 4999)) {
    return code;
  }
  return RELAY_CLOSE_CODES.INTERNAL_ERROR;
}

function closeSocket(ws: WebSocket, code: number, reason: string): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.close(code, truncateCloseReason(reason));
  } else if (ws.readyState === WebSocket.CONNECTING) {
    ws.terminate();
  }
}

function rejectUpgrade(socket: Duplex, status: number, message: string): void {
  if (!socket.writable) {
    socket.destroy();
    return;
  }
  const body = `${message}\n`;
  socket.end(
    `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ''}\r\n` +
      'Connection: close\r\n' +
      'Content-Type: text/plain; charset=utf-8\r\n' +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      '\r\n' +
      body
  );
}

const formatHost = (host: string): string => (host.includes(':') ? `[${host}]` : host);

// ============================================================================
// Relay Server
// ============================================================================

export class RelayServer {
  private wss: WebSocketServer | null = null;
  private httpServer: HttpServer | null = null;
  private connections = new Map<string, RelayConnection>();
  private readonly config: RelayConfig;

  constructor(config: Partial<RelayConfig> & Pick<RelayConfig, 'isPortAllowed'>) {
    this.config = { ...DEFAULT_RELAY_CONFIG, ...config };
  }

  /**
   * Answer WebSocket upgrades on the relay path of an HTTP server
   */
  attach(httpServer: HttpServer): void {
    this.wss = new WebSocketServer({
      noServer: true,
      maxPayload: this.config.maxPayload,
      handleProtocols: (protocols) => (protocols.has(this.config.subprotocol) ? this.config.subprotocol : false),
    });
    this.httpServer = httpServer;
    httpServer.on('upgrade', this.handleUpgrade);
    console.log(`[Relay] Listening for upgrades on ${this.config.path}`);
  }

  close(): void {
    this.httpServer?.off('upgrade', this.handleUpgrade);
    this.httpServer = null;

    for (const { client, backend } of this.connections.values()) {
      closeSocket(client, RELAY_CLOSE_CODES.GOING_AWAY, 'Server shutting down');
      closeSocket(backend, RELAY_CLOSE_CODES.GOING_AWAY, 'Server shutting down');
    }
    this.connections.clear();

    this.wss?.close();
    this.wss = null;
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  getConnections(): RelayConnectionInfo[] {
    return [...this.connections.values()].map(({ info }) => ({ ...info }));
  }

  // ==========================================================================
  // Upgrade Handling
  // ==========================================================================

  private handleUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== this.config.path) {
      rejectUpgrade(socket, 404, 'Not found');
      return;
    }

    socket.on('error', (error) => {
      console.warn(`[Relay] Client socket error during upgrade: ${error.message}`);
    });

    this.negotiate(req, socket, head, url).catch((error) => {
      console.error('[Relay] Upgrade failed:', error);
      socket.destroy();
    });
  };

  private async negotiate(req: IncomingMessage, socket: Duplex, head: Buffer, url: URL): Promise<void> {
    const wss = this.wss;
    if (!wss) {
      rejectUpgrade(socket, 503, 'Relay is shutting down');
      return;
    }

    if (!this.config.authorize(req)) {
      rejectUpgrade(socket, 401, 'Missing or invalid API key');
      return;
    }

    const target = relayTargetSchema.safeParse({
      host: url.searchParams.get('host') ?? undefined,
      port: url.searchParams.get('port') ?? undefined,
    });
    if (!target.success) {
      const details = target.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      rejectUpgrade(socket, 400, `Invalid relay target: ${details}`);
      return;
    }
    const { host, port } = target.data;

    const offered = parseSubprotocols(req.headers['sec-websocket-protocol']);
    if (!offered.includes(this.config.subprotocol)) {
      const error = new SubprotocolNegotiationError(this.config.subprotocol, offered);
      console.warn(`[Relay] ${error.message}`);
      rejectUpgrade(socket, 400, error.message);
      return;
    }

    if (!this.config.allowedHosts.includes(host)) {
      console.warn(`[Relay] Rejected relay to disallowed host ${host}`);
      rejectUpgrade(socket, 403, `Host ${host} is not allowed`);
      return;
    }
    if (!(await this.config.isPortAllowed(port))) {
      console.warn(`[Relay] Rejected relay to port ${port}: not a managed session`);
      rejectUpgrade(socket, 403, `Port ${port} is not allowed`);
      return;
    }

    let backend: WebSocket;
    try {
      backend = await this.connectBackend(host, port);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Relay] ${message}`);
      wss.handleUpgrade(req, socket, head, (client) => {
        closeSocket(client, RELAY_CLOSE_CODES.INTERNAL_ERROR, message);
      });
      return;
    }

    if (socket.destroyed) {
      console.log(`[Relay] Client left before ${host}:${port} was reached`);
      closeSocket(backend, RELAY_CLOSE_CODES.NORMAL, 'Client disconnected');
      return;
    }

    wss.handleUpgrade(req, socket, head, (client) => this.bridge(client, backend, host, port));
  }

  /**
   * Open the backend WebSocket offering the same subprotocol
   */
  private connectBackend(host: string, port: number): Promise<WebSocket> {
    return new Promise<WebSocket>((resolve, reject) => {
      const backend = new WebSocket(`ws://${formatHost(host)}:${port}/`, [this.config.subprotocol], {
        maxPayload: this.config.maxPayload,
      });

      const timer = setTimeout(() => {
        reject(new RelayIOError(`Timed out connecting to backend ${host}:${port}`));
        backend.terminate();
      }, this.config.connectTimeoutMs);

      backend.once('open', () => {
        clearTimeout(timer);
        resolve(backend);
      });
      // Stays attached for the life of the socket; later errors are handled by the bridge
      backend.once('error', (error) => {
        clearTimeout(timer);
        reject(new RelayIOError(`Cannot reach backend ${host}:${port}: ${error.message}`, error));
      });
    });
  }

  // ==========================================================================
  // Forwarding
  // ==========================================================================

  private bridge(client: WebSocket, backend: WebSocket, host: string, port: number): void {
    if (backend.readyState !== WebSocket.OPEN) {
      closeSocket(client, RELAY_CLOSE_CODES.INTERNAL_ERROR, `Backend ${host}:${port} closed during upgrade`);
      return;
    }

    const id = uuid();
    const info: RelayConnectionInfo = { id, targetHost: host, targetPort: port, connectedAt: new Date() };
    this.connections.set(id, { info, client, backend });
    console.log(`[Relay] ${id} connected to ${host}:${port}`);

    let closed = false;
    const teardown = (origin: 'client' | 'backend', code: number, reason: string): void => {
      if (closed) return;
      closed = true;
      this.connections.delete(id);

      const peer = origin === 'client' ? backend : client;
      closeSocket(peer, toSendableCloseCode(code), reason);
      console.log(`[Relay] ${id} closed by ${origin} (code: ${code}${reason ? `, reason: ${reason}` : ''})`);
    };

    this.pipe(client, backend, id);
    this.pipe(backend, client, id);

    client.on('close', (code, reason) => teardown('client', code, reason.toString()));
    backend.on('close', (code, reason) => teardown('backend', code, reason.toString()));

    client.on('error', (error) => {
      console.warn(`[Relay] ${id} client error: ${error.message}`);
      teardown('client', RELAY_CLOSE_CODES.INTERNAL_ERROR, 'Client connection error');
      client.terminate();
    });
    backend.on('error', (error) => {
      console.warn(`[Relay] ${id} backend error: ${error.message}`);
      teardown('backend', RELAY_CLOSE_CODES.INTERNAL_ERROR, 'Backend connection error');
      backend.terminate();
    });
  }

  /**
   * Write each frame of `source` to `target` unchanged, one at a time
   */
  private pipe(source: WebSocket, target: WebSocket, id: string): void {
    source.on('message', (data: RawData, isBinary: boolean) => {
      if (target.readyState !== WebSocket.OPEN) {
        return;
      }
      source.pause();
      target.send(data, { binary: isBinary }, (error) => {
        if (error) {
          console.warn(`[Relay] ${id} write failed: ${error.message}`);
        }
        source.resume();
      });
    });
  }
}
