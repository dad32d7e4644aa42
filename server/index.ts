import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig } from '../src/config/loader.js';
import { createLogger, setupLogging } from '../src/logging-config.js';
import { createExtractionService } from '../src/service-factory.js';
import { createApp } from './api-server.js';

const logger = createLogger('structura.server');

export async function startServer() {
  const config = await loadConfig();
  setupLogging({ logLevel: config.logging.level });
  const service = await createExtractionService(config);
  const app = createApp(service, { verboseErrors: config.server.verboseErrors });

  const server = app.listen(config.server.port, () => {
    logger.info(`Structura API listening on port ${config.server.port}`);
    logger.info(`Health check: http://localhost:${config.server.port}/health`);
  });

  const shutdown = () => {
    logger.info('Shutting down');
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  return server;
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server', error);
    process.exit(1);
  });
}
