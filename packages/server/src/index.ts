import { loadServerConfig } from './config/serverConfig.js';
import { Coordinator } from './game/Coordinator.js';
import { TagfieldServer } from './server.js';
import { logger, setLogLevel } from './utils/logger.js';

const config = loadServerConfig();
setLogLevel(config.logging.level);

logger.info('Starting game coordinator...', { settings: config.game });

const server = new TagfieldServer({
  port: config.server.port,
  host: config.server.host,
  coordinator: new Coordinator({ settings: config.game }),
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down...`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
}

server.start().catch((error: unknown) => {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});

// Graceful shutdown
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
