import { createServer } from 'http';
import { createApp } from './app.js';
import { getChannelRouter } from './channels/router.js';
import { config, validateConfig } from './config/env.js';
import { closePool, db, testConnection } from './db/index.js';
import { DrizzleChannelMappingRepository } from './modules/mappings/repository.js';
import { DrizzleChatMessageRepository } from './modules/messages/repository.js';
import { DrizzleChatThreadRepository } from './modules/threads/repository.js';
import { initializeSocket, SocketNotifier } from './realtime/socket.js';
import { createRelayServices } from './services/container.js';
import { ExpiryPatternTable } from './services/reference-validator.js';
import { logger } from './utils/logger.js';

const log = logger.child({ module: 'Server' });

// ============================================
// STARTUP
// ============================================

async function start(): Promise<void> {
  log.info('Starting COBRA relay API');

  // Validate configuration
  validateConfig(message => log.warn(message));

  // Test database connection
  const dbConnected = await testConnection();
  if (!dbConnected && config.isProd) {
    log.fatal('Database connection failed. Exiting.');
    process.exit(1);
  }

  const expiryPatterns = new ExpiryPatternTable(config.relay.expiryPatternsFile);
  await expiryPatterns.load();

  const httpServer = createServer();
  const io = initializeSocket(httpServer, {
    jwtSecret: config.jwtSecret,
    corsOrigin: config.corsOrigin,
  });

  const services = createRelayServices({
    repositories: {
      mappings: new DrizzleChannelMappingRepository(db),
      messages: new DrizzleChatMessageRepository(db),
      threads: new DrizzleChatThreadRepository(db),
    },
    router: getChannelRouter(),
    notifier: new SocketNotifier(io),
    expiryPatterns,
    relay: config.relay,
  });

  const app = createApp({
    services,
    jwtSecret: config.jwtSecret,
    inboundApiKey: config.inboundApiKey,
    corsOrigin: config.corsOrigin,
    staleAfterDays: config.relay.staleAfterDays,
    checkDatabase: testConnection,
  });
  httpServer.on('request', app);

  httpServer.listen(config.port, () => {
    log.info(
      { port: config.port, env: config.nodeEnv, platforms: services.router.getSupportedPlatforms() },
      'Server listening'
    );
  });

  // ============================================
  // GRACEFUL SHUTDOWN
  // ============================================

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });
    await closePool();

    log.info('Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

start().catch((error: unknown) => {
  log.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
