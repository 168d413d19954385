import { type Server, createServer } from 'node:http';
import type { Logger } from 'pino';
import { createLogger } from '../logger/logger.js';

export interface HealthServerOptions {
  /** Readiness check; a false or rejected result answers 503. */
  check?: () => Promise<boolean>;
  logger?: Logger;
}

export function startHealthServer(port = 8080, options: HealthServerOptions = {}): Server {
  const logger = options.logger ?? createLogger('health');
  const check = options.check ?? (async () => true);

  const server = createServer((req, res) => {
    if (req.url !== '/health') {
      res.writeHead(404);
      res.end();
      return;
    }
    void check()
      .catch((err: unknown) => {
        logger.warn({ err }, 'Health check failed');
        return false;
      })
      .then((healthy) => {
        res.writeHead(healthy ? 200 : 503, { 'Content-Type': 'application/json' });
        res.end(
          JSON.stringify({
            status: healthy ? 'ok' : 'unavailable',
            timestamp: new Date().toISOString(),
          }),
        );
      });
  });
  server.listen(port, () => {
    logger.info({ port }, 'Health check server started');
  });
  return server;
}
