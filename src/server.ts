import { createServer } from 'http';
import { App } from './app';
import { config, validateEnvironment } from './config/environment';
import { Logger } from './utils/logger';

const logger = new Logger('Server');

function start(): void {
  validateEnvironment().forEach(warning => logger.warn(warning));

  const { app } = new App();
  const server = createServer(app);

  server.listen(config.server.port, () => {
    logger.info('Server started', {
      port: config.server.port,
      environment: config.server.nodeEnv,
      externalSources: config.priceSources.enabled
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  start();
} catch (error) {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
}
