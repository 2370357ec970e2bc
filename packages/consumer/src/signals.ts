import type { HitBridge } from '@hitboard/core';
import type { Logger } from './logger';

interface ClosableServer {
  close(callback: (err?: Error) => void): unknown;
}

/** What a graceful stop has to wind down, in order. */
export interface ShutdownTargets {
  bridge: Pick<HitBridge, 'stop' | 'getStats'>;
  health?: ClosableServer;
  mongo: { disconnect(): Promise<void> };
  logger: Logger;
}

/**
 * Stop reading the stream and let the bridge's final flush land before
 * closing the health port and MongoDB; the flush still needs the store.
 */
export async function shutdown({ bridge, health, mongo, logger }: ShutdownTargets): Promise<void> {
  await bridge.stop();

  const { eventsProcessed, flushCount, pendingMessages } = bridge.getStats();
  // Events still buffered here failed their last flush and stay pending in Redis
  logger.info('Bridge drained', { eventsProcessed, flushCount, unflushedEvents: pendingMessages });

  if (health) {
    await new Promise<void>((resolve, reject) => {
      health.close((err) => (err ? reject(err) : resolve()));
    });
  }

  await mongo.disconnect();
}

/**
 * Handler for SIGTERM/SIGINT: the first signal shuts down, a second one
 * forces exit while the final flush is still running.
 */
export function createSignalHandler(
  targets: ShutdownTargets,
  exit: (code: number) => void = (code) => process.exit(code)
): (signal: NodeJS.Signals) => Promise<void> {
  const { logger } = targets;
  let shuttingDown = false;

  return async (signal) => {
    if (shuttingDown) {
      logger.warn('Forced exit on second signal', { signal });
      exit(1);
      return;
    }

    shuttingDown = true;
    logger.info('Received shutdown signal', { signal });

    try {
      await shutdown(targets);
      logger.info('Shutdown complete');
      exit(0);
    } catch (err) {
      logger.error('Error during shutdown', err, { signal });
      exit(1);
    }
  };
}

export function setupSignalHandlers(targets: ShutdownTargets): void {
  const handler = createSignalHandler(targets);
  process.on('SIGTERM', () => void handler('SIGTERM'));
  process.on('SIGINT', () => void handler('SIGINT'));
}
