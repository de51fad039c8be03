import 'dotenv/config';
import app from './app';
import { config } from './config';
import { getDb, closeDb, isDbEnabled } from './db';
import { errorMessage } from './errors';
import { logger } from './logger';

async function main(): Promise<void> {
  if (isDbEnabled()) {
    try {
      await getDb();
    } catch (err) {
      logger.warn('MongoDB not connected at startup', { message: errorMessage(err) });
    }
  }

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Listening on http://${config.host}:${config.port}`, { env: config.env });
  });

  const shutdown = (signal: string) => () => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      closeDb()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('Failed to close MongoDB', err);
          process.exit(1);
        });
    });
    setTimeout(() => process.exit(1), 10000).unref();
  };

  process.on('SIGTERM', shutdown('SIGTERM'));
  process.on('SIGINT', shutdown('SIGINT'));
}

main().catch((err) => {
  logger.error('Server failed to start', err);
  process.exit(1);
});
