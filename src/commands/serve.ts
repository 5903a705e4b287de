import { getPort } from '../config.js';
import { closeStore, getStore } from '../db/client.js';
import { logger } from '../logger.js';
import { startServer } from '../server/index.js';

/**
 * Start the dashboard server. Resolves once the server has shut down and
 * rejects when it cannot bind.
 */
export function runServe(options: { port?: number; host?: string }): Promise<void> {
  const server = startServer(getStore(), getPort(options.port), options.host);

  return new Promise((resolve, reject) => {
    const shutdown = () => {
      logger.server('stopping');
      server.close((err) => {
        closeStore();
        if (err) reject(err);
        else resolve();
      });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    server.once('error', (err) => {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      closeStore();
      reject(err);
    });
  });
}
