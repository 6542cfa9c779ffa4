/**
 * HTTP transport
 *
 * Express server hosting the chat API and health endpoints, with
 * origin-checked CORS for browser callers.
 */

import express, { Express, Request, Response, NextFunction, Router } from 'express';
import { createServer, Server } from 'node:http';
import { createErrorHandler, notFoundHandler } from '../api/errors.js';
import { rootLogger, type StructuredLogger } from '../observability/logger.js';

// =============================================================================
// Types
// =============================================================================

export interface HttpTransportOptions {
  /**
   * Port to listen on. 0 picks a free port.
   */
  port: number;

  /**
   * Host to bind to. Default: '0.0.0.0'
   */
  host?: string;

  /**
   * Allowed origins for CORS. If empty, no CORS headers are sent.
   * ['*'] allows all origins.
   */
  allowedOrigins?: string[];

  /**
   * Routers mounted at the root, in order (health, API)
   */
  routers?: Router[];

  logger?: StructuredLogger;
}

// =============================================================================
// HTTP Transport Error
// =============================================================================

/**
 * Listen and close failures; `cause` holds the socket error when there is one
 */
export class HttpTransportError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'HttpTransportError';
  }
}

// =============================================================================
// HTTP Transport Class
// =============================================================================

export class HttpTransport {
  private readonly app: Express;
  private readonly port: number;
  private readonly host: string;
  private readonly allowedOrigins: string[];
  private readonly logger: StructuredLogger;
  private server: Server | null = null;

  constructor(options: HttpTransportOptions) {
    this.port = options.port;
    this.host = options.host ?? '0.0.0.0';
    this.allowedOrigins = options.allowedOrigins ?? [];
    this.logger = options.logger ?? rootLogger.child('http');
    this.app = express();

    this.app.disable('x-powered-by');
    this.app.use(this.corsMiddleware.bind(this));
    for (const router of options.routers ?? []) {
      this.app.use(router);
    }
    this.app.use(notFoundHandler);
    this.app.use(createErrorHandler(this.logger));
  }

  /**
   * Port actually bound (differs from the option when it was 0)
   */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.port;
  }

  isListening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new HttpTransportError('Server already started');
    }

    const server = createServer(this.app);
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', (err: NodeJS.ErrnoException) => {
        this.server = null;
        reject(new HttpTransportError(`Failed to start server: ${err.message}`, err));
      });

      server.listen(this.port, this.host, () => {
        this.logger.info('HTTP server listening', { host: this.host, port: this.getPort() });
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server
   */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(new HttpTransportError(`Failed to close server: ${err.message}`, err));
        } else {
          this.server = null;
          this.logger.info('HTTP server closed');
          resolve();
        }
      });
      server.closeIdleConnections();
    });
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * CORS middleware: reflects allowed origins and answers preflight requests
   */
  private corsMiddleware(req: Request, res: Response, next: NextFunction): void {
    const origin = req.get('Origin');

    if (origin && this.isOriginAllowed(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Accept, Authorization');
      res.setHeader('Access-Control-Allow-Credentials', 'true');
      res.setHeader('Vary', 'Origin');
    }

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  }

  private isOriginAllowed(origin: string): boolean {
    if (this.allowedOrigins.includes('*')) {
      return true;
    }
    return this.allowedOrigins.includes(origin);
  }
}
