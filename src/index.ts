import { Logger, createApp, logger as defaultLogger, runDeadlineWatchdog } from '@escrow-ledger/backend';
import { loadConfig } from './config.js';
import { buildContext } from './lib/context.js';

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger({ level: config.logLevel });
  const context = await buildContext(config, logger);

  logger.info('Starting escrow ledger', {
    port: config.port,
    store: config.useMemoryStore ? 'memory' : config.dataFilePath,
    custody: context.transfers.custodyAddress,
    primaryToken: context.primaryToken.get(),
  });

  const app = createApp({
    escrowService: context.escrowService,
    notificationLog: context.notificationLog,
    logger: logger.child('http'),
  });
  const server = app.listen(config.port, () => {
    logger.info('Escrow ledger listening', { port: config.port });
  });

  let watchdog: NodeJS.Timeout | undefined;
  if (config.watchdogIntervalSeconds > 0) {
    const watchdogLogger = logger.child('watchdog');
    watchdog = setInterval(() => {
      runDeadlineWatchdog({
        store: context.store,
        notificationLog: context.notificationLog,
        logger: watchdogLogger,
        dispatchReminder: async ({ escrow, hoursBefore }) => {
          watchdogLogger.info('Escrow deadline approaching', { escrowId: escrow.id, owner: escrow.owner, hoursBefore });
        },
      }).catch((error) => {
        watchdogLogger.error('Deadline watchdog failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, config.watchdogIntervalSeconds * 1000);
  }

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    if (watchdog) clearInterval(watchdog);
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  });
}

bootstrap().catch((error) => {
  defaultLogger.error('Failed to bootstrap escrow ledger', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
