import { Server } from 'http';
import { createContainer, Container } from './container';
import { createApp } from './app';

async function startServer(): Promise<{ server: Server; container: Container }> {
  // Create and initialize dependency container
  const container = await createContainer();
  await container.initialize();

  const { config, logger } = container;
  logger.debug(config.toString());

  const app = createApp(container);

  // Start HTTP server
  const server = app.listen(config.port, config.host, () => {
    logger.info(`Handoff server listening on http://${config.host}:${config.port}`);
  });

  // Graceful shutdown
  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      process.exit(1);
    }
    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    const forceExitTimeout = setTimeout(() => {
      logger.warn('Forcing exit after shutdown timeout');
      process.exit(1);
    }, 5000);

    try {
      await container.shutdown();

      // Pending long-polls are dropped; their listeners see the socket close
      server.closeAllConnections();
      server.close(() => {
        clearTimeout(forceExitTimeout);
        process.exit(0);
      });
    } catch (err) {
      logger.error('Error during shutdown:', err instanceof Error ? err : new Error(String(err)));
      clearTimeout(forceExitTimeout);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  return { server, container };
}

// Start server
startServer().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
