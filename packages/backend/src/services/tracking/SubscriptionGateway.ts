/**
 * Subscription Gateway
 *
 * WebSocket endpoint for live map updates. Each accepted socket is registered
 * with the ConnectionRegistry under the viewer scope of the authenticated
 * user; clients only listen, anything they send is ignored.
 */

import { EventEmitter } from 'events';
import { IncomingMessage, Server } from 'http';
import { Duplex } from 'stream';
import WebSocket, { WebSocketServer } from 'ws';
import { CLOSE_CODES } from '@safetrail/shared';
import { IdentityResolver, SubscriberTransport, Viewer } from '../../types/tracking';
import { ConnectionRegistry } from './ConnectionRegistry';
import { LocationIngestService } from './LocationIngestService';

export interface GatewayOptions {
  path: string;
  allowedOrigins: string[];
}

export interface HandshakeRequest {
  url: string;
  origin?: string;
  host?: string;
  cookie?: string;
  authorization?: string;
}

export type HandshakeOutcome =
  | { accepted: true; viewer: Viewer }
  | { accepted: false; code: number; reason: string };

export const ACCESS_TOKEN_COOKIE = 'access_token';

/**
 * Same-host origins are always allowed, plus the configured list. Requests
 * without an Origin header (native clients) are not browser-initiated.
 */
export function isOriginAllowed(origin: string | undefined, host: string | undefined, allowedOrigins: string[]): boolean {
  if (!origin) return true;

  const allowed = host ? [`http://${host}`, `https://${host}`, ...allowedOrigins] : allowedOrigins;
  return allowed.includes(origin);
}

function readCookie(header: string | undefined, name: string): string | null {
  if (!header) return null;

  for (const part of header.split(';')) {
    const separator = part.indexOf('=');
    if (separator === -1) continue;
    if (part.slice(0, separator).trim() === name) {
      const value = part.slice(separator + 1).trim();
      return value.length > 0 ? decodeCookieValue(value) : null;
    }
  }
  return null;
}

// A value that is not valid percent-encoding carries no usable token
function decodeCookieValue(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

/**
 * Path part of a request target, without the query string. Raw targets such
 * as `//` are not valid relative URLs, so they are split rather than parsed.
 */
export function requestPath(url: string): string {
  const query = url.indexOf('?');
  return query === -1 ? url : url.slice(0, query);
}

function queryParam(url: string, name: string): string | null {
  const query = url.indexOf('?');
  return query === -1 ? null : new URLSearchParams(url.slice(query + 1)).get(name);
}

/**
 * Cookie first, then the `token` query parameter, then a bearer header
 */
export function extractToken(request: HandshakeRequest): string | null {
  const fromCookie = readCookie(request.cookie, ACCESS_TOKEN_COOKIE);
  if (fromCookie) return fromCookie;

  const fromQuery = queryParam(request.url, 'token');
  if (fromQuery) return fromQuery;

  const match = request.authorization?.match(/^Bearer\s+(.+)$/i);
  return match ? match[1].trim() : null;
}

function toHandshakeRequest(request: IncomingMessage): HandshakeRequest {
  return {
    url: request.url ?? '/',
    origin: request.headers.origin,
    host: request.headers.host,
    cookie: request.headers.cookie,
    authorization: request.headers.authorization,
  };
}

class WebSocketTransport implements SubscriberTransport {
  constructor(private socket: WebSocket) {}

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error('Socket is not open'));
        return;
      }
      this.socket.send(data, error => (error ? reject(error) : resolve()));
    });
  }

  close(code: number, reason: string): void {
    this.socket.close(code, reason);
  }
}

export class SubscriptionGateway extends EventEmitter {
  private server: WebSocketServer;

  constructor(
    private ingest: LocationIngestService,
    private registry: ConnectionRegistry,
    private identities: IdentityResolver,
    private options: GatewayOptions
  ) {
    super();
    this.server = new WebSocketServer({ noServer: true });
    this.server.on('connection', (socket: WebSocket, request: IncomingMessage) => {
      this.handleConnection(socket, request).catch(error => {
        console.error('WebSocket handshake error:', error);
        socket.close(CLOSE_CODES.INTERNAL_ERROR, 'Internal error');
      });
    });
  }

  /**
   * Take over HTTP upgrades on the configured path
   */
  attach(httpServer: Server): void {
    httpServer.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      if (requestPath(request.url ?? '/') !== this.options.path) {
        socket.destroy();
        return;
      }

      this.server.handleUpgrade(request, socket, head, ws => {
        this.server.emit('connection', ws, request);
      });
    });

    console.log(`Subscription gateway listening on ${this.options.path}`);
  }

  async authorize(request: HandshakeRequest): Promise<HandshakeOutcome> {
    if (!isOriginAllowed(request.origin, request.host, this.options.allowedOrigins)) {
      return { accepted: false, code: CLOSE_CODES.POLICY_VIOLATION, reason: 'Origin not allowed' };
    }

    const token = extractToken(request);
    const identity = token ? await this.identities.resolve(token) : null;
    if (!identity) {
      return { accepted: false, code: CLOSE_CODES.POLICY_VIOLATION, reason: 'Authentication required' };
    }

    return { accepted: true, viewer: await this.ingest.buildViewer(identity) };
  }

  async close(): Promise<void> {
    this.registry.closeAll(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
    await new Promise<void>((resolve, reject) => {
      this.server.close(error => (error ? reject(error) : resolve()));
    });
  }

  private async handleConnection(socket: WebSocket, request: IncomingMessage): Promise<void> {
    const outcome = await this.authorize(toHandshakeRequest(request));

    if (!outcome.accepted) {
      console.warn(`Rejected subscriber from ${request.socket.remoteAddress ?? 'unknown'}: ${outcome.reason}`);
      socket.close(outcome.code, outcome.reason);
      this.emit('handshakeRejected', outcome);
      return;
    }

    // Client went away while we were authorizing
    if (socket.readyState !== WebSocket.OPEN) return;

    const handle = this.registry.register(new WebSocketTransport(socket), outcome.viewer);
    socket.on('close', () => this.registry.unregister(handle));
    socket.on('error', error => {
      console.warn(`Subscriber ${handle} socket error:`, error);
      this.registry.unregister(handle);
    });

    this.emit('subscriberConnected', { handle, viewer: outcome.viewer });
  }
}
