import { createServer, type Server } from 'node:http';
import { DEVICE_POLL_PATH, SNAPSHOT_FEED_PATH } from '@tagfield/shared';
import express, { type Express } from 'express';
import { type WebSocket, WebSocketServer } from 'ws';
import { Coordinator } from './game/Coordinator.js';
import { SnapshotFeed } from './realtime/SnapshotFeed.js';
import { createDeviceRouter } from './routes/device.js';
import { errorHandler } from './routes/errorHandler.js';
import { createGameRouter } from './routes/game.js';
import { createReportsRouter } from './routes/reports.js';
import { logger } from './utils/logger.js';

export function createApp(coordinator: Coordinator): Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Device polls
  app.use(DEVICE_POLL_PATH, createDeviceRouter(coordinator));

  // Operator actions and reports
  app.use('/api/game', createGameRouter(coordinator));
  app.use('/api', createReportsRouter(coordinator));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(errorHandler);

  return app;
}

export interface ServerOptions {
  port: number;
  host?: string;
  coordinator?: Coordinator;
}

/**
 * HTTP server for polls and operator actions, with the snapshot feed on the same port.
 */
export class TagfieldServer {
  readonly coordinator: Coordinator;
  private readonly httpServer: Server;
  private readonly wss: WebSocketServer;
  private readonly feed: SnapshotFeed;
  private readonly options: ServerOptions;

  constructor(options: ServerOptions) {
    this.options = options;
    this.coordinator = options.coordinator ?? new Coordinator();
    this.httpServer = createServer(createApp(this.coordinator));
    this.wss = new WebSocketServer({ server: this.httpServer, path: SNAPSHOT_FEED_PATH });
    this.feed = new SnapshotFeed(this.coordinator);

    this.setupWebSocketHandlers();
  }

  private setupWebSocketHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      logger.info('Operator console connected');

      this.feed.addConnection(ws).catch((error: unknown) => {
        logger.error('Failed to send initial snapshot', {
          error: error instanceof Error ? error.message : String(error),
        });
      });

      ws.on('close', () => {
        this.feed.removeConnection(ws);
      });

      ws.on('error', (error: Error) => {
        logger.error('WebSocket error', { error: error.message });
      });
    });
  }

  /**
   * Start listening.
   * @returns the bound port (useful when configured with port 0)
   */
  start(): Promise<number> {
    const host = this.options.host ?? '0.0.0.0';
    return new Promise((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(this.options.port, host, () => {
        this.httpServer.off('error', reject);
        const address = this.httpServer.address();
        const port = typeof address === 'object' && address ? address.port : this.options.port;
        logger.info('Server started', { port, host });
        resolve(port);
      });
    });
  }

  close(): Promise<void> {
    this.feed.close();
    for (const client of this.wss.clients) {
      client.terminate();
    }
    this.wss.close();
    return new Promise((resolve, reject) => {
      this.httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('Server closed');
        resolve();
      });
    });
  }
}

export { Coordinator, type CoordinatorOptions } from './game/Coordinator.js';
export type { PollResult } from './game/views.js';
