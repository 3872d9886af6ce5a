import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AgentCard } from '../types/agent-card.js';
import type { Logger } from '../types/logger.js';
import type { RequestHandler } from '../server/RequestHandler.js';
import { AgentError } from '../errors/AgentError.js';
import { Canonicalizer } from '../crypto/Canonicalizer.js';

export const WELL_KNOWN_PATH = '/.well-known/agent-card.json';
export const HEALTH_PATH = '/health';

export interface HttpTransportConfig {
  /** Port to listen on (default: 8000). 0 picks a free port. */
  port?: number;
  /** Hostname to bind to (default: '0.0.0.0'). */
  host?: string;
  /** URL path of the JSON-RPC endpoint (default: '/'). */
  path?: string;
  /** Largest accepted request body in bytes (default: 1 MiB). */
  maxBodyBytes?: number;
  /** Optional logger for diagnostic events. */
  logger?: Logger;
}

interface ServedCard {
  card: AgentCard;
  body: string;
  etag: string;
}

/**
 * HTTP server for the agent: agent card discovery, health check, and the
 * JSON-RPC endpoint (plain POST, or SSE for `message/stream`).
 */
export class HttpTransport {
  private readonly config: Required<Omit<HttpTransportConfig, 'logger'>> & { logger?: Logger };
  private server: Server | null = null;
  private handler: RequestHandler | null = null;
  private servedCard: ServedCard | null = null;

  constructor(config?: HttpTransportConfig) {
    this.config = {
      port: config?.port ?? 8000,
      host: config?.host ?? '0.0.0.0',
      path: config?.path ?? '/',
      maxBodyBytes: config?.maxBodyBytes ?? 1024 * 1024,
      logger: config?.logger,
    };
  }

  /** Start the HTTP server and route JSON-RPC calls to the handler. */
  async listen(handler: RequestHandler): Promise<void> {
    this.handler = handler;
    if (this.server) return;

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err) => {
        this.config.logger?.('error', 'HTTP request handler error', err);
        if (!res.headersSent) {
          sendJson(res, 500, { error: 'Internal server error' });
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
  }

  /** Stop the HTTP server. */
  async close(): Promise<void> {
    if (this.server) {
      const server = this.server;
      this.server = null;
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
  }

  /** The port the server is listening on (undefined if not started). */
  get port(): number | undefined {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return undefined;
  }

  /**
   * Set the agent card served at GET /.well-known/agent-card.json.
   * The ETag is the SHA-256 of the card's canonical JSON.
   */
  setAgentCard(card: AgentCard): void {
    this.servedCard = {
      card,
      body: JSON.stringify(card),
      etag: `"${Canonicalizer.digest(card)}"`,
    };
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = (req.url ?? '/').split('?')[0];

    if (path === WELL_KNOWN_PATH) {
      this.handleAgentCard(req, res);
      return;
    }

    if (req.method === 'GET' && path === HEALTH_PATH) {
      sendJson(res, 200, { status: 'healthy', agent: this.servedCard?.card.name ?? null });
      return;
    }

    if (req.method !== 'POST' || path !== this.config.path || !this.handler) {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }

    const body = await this.readBody(req);
    if (body === null) {
      sendJson(res, 413, { error: 'Request body too large' });
      return;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(body);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      sendJson(res, 200, { jsonrpc: '2.0', id: null, error: AgentError.parseError(reason).toJSON() });
      return;
    }

    if (isStreamRequest(decoded)) {
      res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });

      for await (const frame of this.handler.handleStream(decoded)) {
        if (res.destroyed) break;
        res.write(`data: ${JSON.stringify(frame)}\n\n`);
      }

      res.end();
      return;
    }

    sendJson(res, 200, await this.handler.handle(decoded));
  }

  private handleAgentCard(req: IncomingMessage, res: ServerResponse): void {
    if (req.method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type, If-None-Match',
        'Access-Control-Max-Age': '86400',
      });
      res.end();
      return;
    }

    if (req.method !== 'GET') {
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    if (!this.servedCard) {
      sendJson(res, 404, { error: 'Agent card not configured' });
      return;
    }

    const headers = {
      'Access-Control-Allow-Origin': '*',
      'Cache-Control': 'public, max-age=300',
      ETag: this.servedCard.etag,
    };

    if (req.headers['if-none-match'] === this.servedCard.etag) {
      res.writeHead(304, headers);
      res.end();
      return;
    }

    res.writeHead(200, { ...headers, 'Content-Type': 'application/json' });
    res.end(this.servedCard.body);
  }

  /** Resolves with the body, or null once it exceeds `maxBodyBytes`. */
  private readBody(req: IncomingMessage): Promise<string | null> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let tooLarge = false;
      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > this.config.maxBodyBytes) {
          tooLarge = true;
          chunks.length = 0;
          return;
        }
        if (!tooLarge) chunks.push(chunk);
      });
      req.on('end', () => resolve(tooLarge ? null : Buffer.concat(chunks).toString('utf-8')));
      req.on('error', reject);
    });
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function isStreamRequest(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'method' in body && body.method === 'message/stream';
}
