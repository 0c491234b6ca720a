/**
 * HTTP server hosting the account link callback
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { createServer, Server as HttpServer } from 'node:http';
import helmet from 'helmet';
import type { LinkCallbackHandler } from '@account-link/auth';
import { logger } from '@account-link/observability';
import { setupCallbackRoutes, INTERNAL_ERROR_TEXT } from './routes/callback-routes.js';
import { setupSuccessRoutes } from './routes/success-routes.js';
import { setupHealthRoutes, type HealthRoutesOptions } from './routes/health-routes.js';

export interface LinkHttpServerOptions {
  port: number;
  host: string;
  /** Absolute URL or path the browser is sent to after linking */
  successUrl: string;
  serviceName?: string;
  storage?: HealthRoutesOptions['storage'];
  /** Invoked after the listener closes, to release stores and clients */
  onStop?: () => Promise<void>;
}

export class LinkHttpServer {
  private app: Express;
  private server?: HttpServer;

  constructor(
    private readonly callbackHandler: Pick<LinkCallbackHandler, 'handle'>,
    private readonly options: LinkHttpServerOptions
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Set up Express middleware for security and request logging
   */
  private setupMiddleware(): void {
    this.app.use(helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          upgradeInsecureRequests: null, // Disable for localhost development
        },
      },
      strictTransportSecurity: false, // Disable HSTS for localhost development
    }));

    this.app.disable('x-powered-by');

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug('Incoming request', { method: req.method, path: req.path });
      next();
    });
  }

  private setupRoutes(): void {
    const router = express.Router();

    setupHealthRoutes(router, {
      serviceName: this.options.serviceName ?? 'account-link',
      storage: this.options.storage,
    });
    setupCallbackRoutes(router, this.callbackHandler, { successUrl: this.options.successUrl });
    setupSuccessRoutes(router);

    this.app.use(router);

    this.app.use((req: Request, res: Response) => {
      res.status(404).type('text/plain').send('Not found');
    });

    this.app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
      logger.error('Express error', error);
      res.status(500).type('text/plain').send(INTERNAL_ERROR_TEXT);
    });
  }

  /**
   * Get the Express app (tests drive it with supertest without binding a port)
   */
  getApp(): Express {
    return this.app;
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer(this.app);

      this.server.on('error', (error: Error) => {
        logger.error('HTTP server error', error);
        reject(error);
      });

      this.server.listen(this.options.port, this.options.host, () => {
        logger.info('Account link server listening', {
          host: this.options.host,
          port: this.options.port
        });
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server and release the resources behind it
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error?: Error) => (error ? reject(error) : resolve()));
      });
      this.server = undefined;
      logger.info('Account link server stopped');
    }

    if (this.options.onStop) {
      await this.options.onStop();
    }
  }
}
