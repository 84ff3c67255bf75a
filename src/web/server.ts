/**
 * Relay Web Server - Express HTTP server
 *
 * Provides:
 * - Queue Store endpoints over the command/ and result/ collections
 * - Bearer-token gate on everything except the dashboard assets
 * - Static dashboard under /ui and /static
 * - Relay log, buffered (/logs) and live over SSE (/logs/stream)
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import { RelayLogger } from '../logging';
import { IQueueStore } from '../queue/queue-store';
import { createLogRoutes } from './routes/logs';
import { createQueueRoutes } from './routes/queue';

/**
 * Path prefixes served without a token
 */
export const PUBLIC_PATH_PREFIXES: readonly string[] = ['/ui', '/static'];

/**
 * Web Server configuration
 */
export interface WebServerConfig {
  /** Port number (default: 8000) */
  port?: number;
  /** Host (default: 0.0.0.0) */
  host?: string;
  /** Backing store, normally a FileQueueStore */
  queueStore: IQueueStore;
  /** Token clients must present as "Authorization: Bearer <token>" */
  apiToken: string;
  /** Directory with the dashboard's index.html and assets */
  staticDir: string;
  logger: RelayLogger;
}

/**
 * Web Server state
 */
export interface WebServerState {
  isRunning: boolean;
  port: number;
  host: string;
}

export function isPublicPath(requestPath: string): boolean {
  return PUBLIC_PATH_PREFIXES.some(prefix => requestPath.startsWith(prefix));
}

/**
 * Create configured Express app
 */
export function createApp(config: WebServerConfig): Express {
  const app = express();
  const { queueStore, apiToken, staticDir, logger } = config;
  const expectedAuthorization = `Bearer ${apiToken}`;

  app.use(express.json({ limit: '50mb' }));

  // CORS headers
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  // Auth gate
  app.use((req: Request, res: Response, next: NextFunction) => {
    if (isPublicPath(req.path)) {
      next();
      return;
    }
    if (req.headers.authorization !== expectedAuthorization) {
      logger.warn('SERVER', `Rejected ${req.method} ${req.path}: unauthorized`);
      res.status(401).json({ success: false, error: 'Unauthorized access' });
      return;
    }
    next();
  });

  // Dashboard
  app.use('/ui', express.static(staticDir));
  app.use('/static', express.static(staticDir));

  app.use('/', createQueueRoutes(queueStore, logger));
  app.use('/', createLogRoutes(logger));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // Malformed JSON bodies and other middleware errors
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('SERVER', `${req.method} ${req.path} failed: ${err.message}`);
    res.status(400).json({ success: false, error: err.message });
  });

  return app;
}

/**
 * Web Server
 */
export class WebServer {
  private readonly app: Express;
  private readonly port: number;
  private readonly host: string;
  private readonly logger: RelayLogger;
  private server: Server | null = null;

  constructor(config: WebServerConfig) {
    this.port = config.port ?? 8000;
    this.host = config.host ?? '0.0.0.0';
    this.logger = config.logger;
    this.app = createApp(config);
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.server = this.app.listen(this.port, this.host, () => {
          this.logger.info('SERVER', `Listening on ${this.getUrl()}`);
          resolve();
        });
        this.server.on('error', reject);
      } catch (error) {
        reject(error);
      }
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close(err => {
        if (err) {
          reject(err);
        } else {
          this.server = null;
          resolve();
        }
      });
    });
  }

  getState(): WebServerState {
    return {
      isRunning: this.server !== null,
      port: this.port,
      host: this.host,
    };
  }

  /**
   * Get Express app (for testing)
   */
  getApp(): Express {
    return this.app;
  }

  getUrl(): string {
    return 'http://' + this.host + ':' + this.port;
  }
}
