import { createApp } from './app.js';
import { ConfigError, getConfig } from './config/env.js';
import { createServices } from './container.js';
import { logger } from './lib/logger/structured-logger.js';

function loadConfig() {
  try {
    return getConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'Invalid configuration');
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

const server = app.listen(config.port, () => {
  logger.info(`Server listening on http://localhost:${config.port}`);
});

function shutdown(signal: NodeJS.Signals) {
  logger.info(`Received ${signal}. Shutting down gracefully...`);
  services.jobStore.shutdown();
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
