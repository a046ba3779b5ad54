import { buildServer } from './app.js';
import { config } from './config.js';
import { createContainer } from './container.js';
import { logger } from './logger.js';

const start = async () => {
  const container = createContainer();
  const app = await buildServer(container, { logger, requestTimeoutMs: config.requestTimeoutMs });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    await container.close();
    process.exit(0);
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  try {
    await app.listen({ port: config.apiPort, host: config.apiHost });
  } catch (err) {
    app.log.error({ err }, 'Server failed to start');
    process.exit(1);
  }
};

void start();
