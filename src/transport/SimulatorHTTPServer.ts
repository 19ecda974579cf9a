import * as http from 'http';
import { EventEmitter } from 'events';
import { NodeSnapshotSource, WELCOME_MESSAGE, toWireNodeRecord } from '../types';
import { SimulatorLogger, createLogger } from '../common/logger';

export interface SimulatorHTTPServerConfig {
  port?: number;
  host?: string;
  keepAliveTimeout?: number;
  headersTimeout?: number;
  requestTimeout?: number;
  startTimeout?: number;
  logger?: SimulatorLogger;
}

export interface SimulatorHTTPServerStats {
  isRunning: boolean;
  host: string;
  port: number;
  requestsHandled: number;
  errors: number;
}

type RouteHandler = (res: http.ServerResponse) => Promise<void>;

/**
 * HTTP front end of the simulator. Reads node state through the snapshot
 * source only; it never writes.
 */
export class SimulatorHTTPServer extends EventEmitter {
  private readonly config: Required<SimulatorHTTPServerConfig>;
  private readonly routes: Map<string, RouteHandler>;
  private server: http.Server | null = null;
  private isRunning = false;
  private isStarting = false;
  private boundPort: number;
  private stats = {
    requestsHandled: 0,
    errors: 0
  };

  constructor(
    private readonly source: NodeSnapshotSource,
    config: SimulatorHTTPServerConfig = {}
  ) {
    super();

    this.config = {
      port: config.port ?? 8080,
      host: config.host ?? '0.0.0.0',
      keepAliveTimeout: config.keepAliveTimeout ?? 5000,
      headersTimeout: config.headersTimeout ?? 10000,
      requestTimeout: config.requestTimeout ?? 30000,
      startTimeout: config.startTimeout ?? 5000,
      logger: config.logger ?? createLogger()
    };
    this.boundPort = this.config.port;

    this.routes = new Map<string, RouteHandler>([
      ['/', res => this.handleRoot(res)],
      ['/nodes', res => this.handleNodes(res)]
    ]);
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('HTTP server is already running');
    }
    if (this.isStarting) {
      throw new Error('HTTP server is already starting');
    }
    this.isStarting = true;

    const server = http.createServer((req, res) => this.handleRequest(req, res));
    server.keepAliveTimeout = this.config.keepAliveTimeout;
    server.headersTimeout = this.config.headersTimeout;
    server.requestTimeout = this.config.requestTimeout;

    try {
      await this.listen(server);
    } finally {
      this.isStarting = false;
    }

    const address = server.address();
    if (address && typeof address === 'object') {
      this.boundPort = address.port;
    }

    this.server = server;
    this.isRunning = true;
    this.config.logger.server(`Listening on ${this.config.host}:${this.boundPort}`);
    this.emit('started', { host: this.config.host, port: this.boundPort });
  }

  private async listen(server: http.Server): Promise<void> {
    try {
      await new Promise<void>((resolve, reject) => {
        const timeout = setTimeout(() => {
          reject(new Error('HTTP server start timeout'));
        }, this.config.startTimeout);

        server.once('error', (error) => {
          clearTimeout(timeout);
          reject(error);
        });

        server.listen(this.config.port, this.config.host, () => {
          clearTimeout(timeout);
          resolve();
        });
      });
    } catch (error) {
      this.stats.errors++;
      server.close();
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to start HTTP server: ${errorMessage}`);
    }
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!this.isRunning || !server) {
      return;
    }

    this.isRunning = false;
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close(() => {
        resolve();
      });
      server.closeIdleConnections();
    });

    this.config.logger.server('HTTP server stopped');
    this.emit('stopped');
  }

  /**
   * Address actually bound; differs from the configured port when that was 0
   */
  getAddress(): { host: string; port: number } {
    return { host: this.config.host, port: this.boundPort };
  }

  getStats(): SimulatorHTTPServerStats {
    return {
      isRunning: this.isRunning,
      host: this.config.host,
      port: this.boundPort,
      requestsHandled: this.stats.requestsHandled,
      errors: this.stats.errors
    };
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    this.stats.requestsHandled++;

    res.on('error', (error) => {
      this.stats.errors++;
      this.config.logger.error('Failed to write response', error);
    });

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const route = this.routes.get(url.pathname);

    if (!route) {
      this.sendText(res, 404, '404 page not found');
      return;
    }

    if (req.method !== 'GET') {
      res.setHeader('Allow', 'GET');
      this.sendText(res, 405, 'Method Not Allowed');
      return;
    }

    route(res).catch((error: unknown) => {
      this.stats.errors++;
      this.config.logger.error(`Unhandled error serving ${url.pathname}`, error);
      if (!res.headersSent) {
        this.sendText(res, 500, 'Internal Server Error');
      }
    });
  }

  private async handleRoot(res: http.ServerResponse): Promise<void> {
    let body: string;
    try {
      body = JSON.stringify({ message: WELCOME_MESSAGE });
    } catch (error) {
      this.stats.errors++;
      this.config.logger.error('Failed to marshal message', error);
      this.sendText(res, 500, 'Failed to marshal message');
      return;
    }

    this.sendJson(res, body);
  }

  private async handleNodes(res: http.ServerResponse): Promise<void> {
    let body: string;
    try {
      const nodes = await this.source.snapshot();
      body = JSON.stringify(nodes.map(toWireNodeRecord));
    } catch (error) {
      this.stats.errors++;
      this.config.logger.error('Failed to marshal data', error);
      this.sendText(res, 500, 'Failed to marshal data');
      return;
    }

    this.sendJson(res, body);
  }

  private sendJson(res: http.ServerResponse, body: string): void {
    res.writeHead(200, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body)
    });
    res.end(body);
  }

  private sendText(res: http.ServerResponse, status: number, body: string): void {
    res.writeHead(status, {
      'Content-Type': 'text/plain; charset=utf-8',
      'X-Content-Type-Options': 'nosniff'
    });
    res.end(`${body}\n`);
  }
}
