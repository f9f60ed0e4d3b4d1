import { logger } from './logger.js';

type ShutdownHandler = () => Promise<void> | void;

interface CleanupOperation {
  name: string;
  handler: ShutdownHandler;
}

/**
 * Runs registered cleanup steps in registration order on shutdown.
 * A failing step is logged and the remaining steps still run.
 */
export class ShutdownCoordinator {
  private cleanupOperations: CleanupOperation[] = [];
  private isShuttingDown = false;

  constructor(private readonly shutdownTimeoutMs: number = 30000) {}

  register(name: string, handler: ShutdownHandler): void {
    this.cleanupOperations.push({ name, handler });
  }

  /**
   * @returns false when a shutdown was already in progress
   */
  async shutdown(signal?: string): Promise<boolean> {
    if (this.isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return false;
    }
    this.isShuttingDown = true;
    logger.info({ signal, operationsCount: this.cleanupOperations.length }, 'Starting graceful shutdown');

    const forceExit = setTimeout(() => {
      logger.error({ timeoutMs: this.shutdownTimeoutMs }, 'Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, this.shutdownTimeoutMs);
    forceExit.unref();

    for (const operation of this.cleanupOperations) {
      try {
        await operation.handler();
        logger.debug({ operation: operation.name }, 'Cleanup operation completed');
      } catch (error) {
        logger.error({ error, operation: operation.name }, 'Cleanup operation failed (continuing with shutdown)');
      }
    }

    clearTimeout(forceExit);
    logger.info('Graceful shutdown completed');
    return true;
  }

  isShuttingDownStatus(): boolean {
    return this.isShuttingDown;
  }
}
