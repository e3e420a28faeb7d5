import { createApp } from './app';
import { createPgServices } from './container';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, pool } from './connections';
import { logger, toError } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  logger.info('Connecting to database...');
  await connectDatabase();

  const app = createApp(createPgServices(pool));

  app.listen(PORT, () => {
    logger.info(`Server is running on port ${PORT}`);
    logger.info(`Environment: ${appConfig.nodeEnv}`);
  });
};

startServer().catch((error: unknown) => {
  const cause = toError(error);
  logger.error('Failed to start server:', { error: cause.message, stack: cause.stack });
  process.exit(1);
});
