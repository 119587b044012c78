import { formatRaceSummary } from '@race/bench/application/use-cases/report-race/summary-formatter';
import { createChildLogger } from '@race/bench/infrastructure/logging/pino-logger';
import { toError } from '@race/domain';
import { Core } from './application/orchestrator/core';

const log = createChildLogger('main');

async function main(): Promise<void> {
  log.info('slot-race starting...');

  let core: Core;
  try {
    core = new Core();
  } catch (error) {
    log.fatal('Invalid configuration', toError(error));
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully...`);
    await core.stop();
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT').catch((error) => {
      log.error('Shutdown failed', toError(error));
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM').catch((error) => {
      log.error('Shutdown failed', toError(error));
      process.exit(1);
    });
  });

  const finalSnapshot = await core.start();
  await core.stop();

  for (const line of formatRaceSummary(finalSnapshot)) {
    log.info(line);
  }
  log.info('Shutdown complete');
  process.exit(0);
}

main().catch((error) => {
  log.error('Unhandled error', toError(error));
  process.exit(1);
});
