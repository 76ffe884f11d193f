import dotenv from 'dotenv';

// Load environment variables before anything reads them
dotenv.config();

import logger from './utils/logger';
import { loadConfig } from './utils/config';
import { JsonDataStore } from './utils/datastore';
import { createContext } from './context';
import { createApp } from './app';

const main = async () => {
  const config = loadConfig();
  const store = await JsonDataStore.open({ dataFile: config.dataFile, seedFile: config.seedFile });
  const context = createContext(store, { childAgeThreshold: config.childAgeThreshold });
  const app = createApp(context, config);

  const server = app.listen(config.port, () => {
    logger.info(`SafetyNet API listening on http://localhost:${config.port}`, { dataFile: config.dataFile });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      store.close()
        .then(() => {
          logger.info('Graceful shutdown completed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error during shutdown', { error });
          process.exit(1);
        });
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
};

main().catch((error: unknown) => {
  logger.error('Startup failed', { error });
  process.exit(1);
});
