import { getLogger } from '../logging/logger.js';

const logger = getLogger('lifecycle:shutdown');

export type ShutdownHook = () => Promise<void>;

const hooks: ShutdownHook[] = [];
let isShuttingDown = false;

export function registerShutdownHook(hook: ShutdownHook): void {
  hooks.push(hook);
}

/**
 * Close the HTTP server, run the registered hooks in order, then exit.
 * A hung hook cannot keep the process alive past `timeoutMs`.
 */
export function setupGracefulShutdown(server: { close: (callback: () => void) => void }, timeoutMs = 10000): void {
  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown`, { timeoutMs });

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, timeoutMs);
    timer.unref();

    await new Promise<void>(resolve => server.close(() => resolve()));
    logger.info('HTTP server closed');

    for (const hook of hooks) {
      try {
        await hook();
      } catch (error) {
        logger.error('Shutdown hook failed', { error: error instanceof Error ? error.message : String(error) });
      }
    }

    clearTimeout(timer);
    logger.info('Graceful shutdown completed');
    process.exit(0);
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));
}
