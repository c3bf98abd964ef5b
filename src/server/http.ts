import http from 'node:http';
import type { DetectionCoordinator } from '../coordinator.js';
import type { MotionEventStore } from '../db.js';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { StateChannel } from '../stateChannel.js';
import { createControlRouter } from './routes/control.js';

export interface HttpServerOptions {
  port?: number;
  host?: string;
  coordinator: DetectionCoordinator;
  channel: StateChannel;
  store?: MotionEventStore | null;
  metrics?: MetricsRegistry;
  heartbeatMs?: number;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 8080;
  const host = options.host ?? '127.0.0.1';

  const router = createControlRouter({
    coordinator: options.coordinator,
    channel: options.channel,
    store: options.store,
    metrics: options.metrics ?? metrics,
    heartbeatMs: options.heartbeatMs
  });

  const server = http.createServer((req, res) => {
    try {
      if (router.handle(req, res)) {
        return;
      }

      res.statusCode = 404;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  server.on('close', () => {
    router.close();
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'Control panel listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        router.close();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      })
  };
}
