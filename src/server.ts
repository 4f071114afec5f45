import { closeDb, config, logger } from '@officehours/shared';

import { createApp } from './app';

const app = createApp();

const server = app.listen(config.PORT, () => {
  logger.info(
    { port: config.PORT, persistence: config.PERSISTENCE_DRIVER, timeZone: config.SCHEDULE_TIME_ZONE },
    'Appointments service listening'
  );
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    closeDb()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Failed to close database pool');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
