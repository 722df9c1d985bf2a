import { mkdir } from 'node:fs/promises';
import type { Logger } from 'pino';

import { loadServerConfig, type ServerConfig } from './config/serverConfig';
import { createLogger } from './logging/logger';
import { buildApp } from './server/app';
import { createAudioOutput, createSoundboard } from './server/soundboard';

async function start(config: ServerConfig, logger: Logger): Promise<void> {
  const soundboard = createSoundboard(config, logger, createAudioOutput(config, logger));

  try {
    await mkdir(config.dataDir, { recursive: true });
    await soundboard.assets.ensureDirectories();
    await soundboard.playback.initialize();
    await soundboard.registry.load();
  } catch (error) {
    logger.fatal({ err: error }, 'Startup failed');
    await soundboard.playback.shutdown();
    process.exit(1);
  }

  const app = await buildApp({
    config,
    services: soundboard,
    logger,
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    app
      .close()
      .then(() => soundboard.playback.shutdown())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen({ host: config.host, port: config.port });
}

const config = loadServerConfig();
const logger = createLogger(config.logLevel);

start(config, logger).catch((error: unknown) => {
  logger.fatal({ err: error }, 'Server failed');
  process.exit(1);
});
