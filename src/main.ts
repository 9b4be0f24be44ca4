import 'reflect-metadata';
import { Logger } from '@nestjs/common';

import { CompositionRoot } from './composition/root';
import { DbContext } from './core/base/context';
import { loadConfig, toDbContextOptions } from './core/config';
import { createApp } from './express/app';

const logger = new Logger('Main');

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  Logger.overrideLogger(config.LOG_LEVELS);

  const root = new CompositionRoot(new DbContext(toDbContextOptions(config)), {
    transaction: { isolationLevel: config.TRANSACTION_ISOLATION_LEVEL },
    seedFile: config.DATABASE_SEED_FILE
  });
  await root.initialize();

  const server = createApp(root).listen(config.PORT, () => {
    logger.log(`Listening on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.log(`Received ${signal}, shutting down`);
    server.close(() => {
      root
        .dispose()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Failed to dispose composition root', error instanceof Error ? error.stack : String(error));
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

bootstrap().catch(error => {
  logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
