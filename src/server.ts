import { loadConfig } from './config/index.js';
import { createLogger, logger as bootLogger } from './logger.js';
import { createBrainRuntime } from './runtime.js';
import { buildServer } from './app.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logging.level });

  logger.info('Brain gateway starting...');

  const runtime = createBrainRuntime(config, { logger });
  const app = await buildServer(runtime);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    try {
      await app.close();
      await runtime.close();
      process.exit(0);
    } catch (err) {
      logger.error(err, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Brain gateway listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
}

main().catch(err => {
  bootLogger.fatal(err, 'Brain gateway failed to start');
  process.exit(1);
});
