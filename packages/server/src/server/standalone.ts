import { createServer, type Server } from 'http';
import { NoOpLogger, type StructuredLogger } from '@callgate/core';
import type { GatewayMiddleware } from './gateway.js';

export interface StartServerOptions {
  handler: GatewayMiddleware;
  host?: string;
  /** 0 picks a free port. */
  port?: number;
  logger?: StructuredLogger;
}

export interface RunningServer {
  server: Server;
  /** Bound port, resolved when `port` was 0. */
  port: number;
  close(): Promise<void>;
}

export async function startServer(
  options: StartServerOptions,
): Promise<RunningServer> {
  const host = options.host ?? '0.0.0.0';
  const logger = options.logger ?? new NoOpLogger();

  const server = createServer((req, res) => {
    options.handler(req, res);
  });

  return new Promise((resolve, reject) => {
    server.on('error', reject);

    server.listen(options.port ?? 8080, host, () => {
      const addr = server.address();
      const port = typeof addr === 'object' && addr ? addr.port : 0;

      logger.info('HTTP server listening', { host, port });

      resolve({
        server,
        port,
        async close() {
          return new Promise<void>((res, rej) => {
            server.close((err) => {
              if (err) rej(err);
              else res();
            });
          });
        },
      });
    });
  });
}
