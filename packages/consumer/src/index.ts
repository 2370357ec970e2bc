import mongoose from 'mongoose';
import { HitBridge } from '@hitboard/core';
import { MongoCounterStore } from '@hitboard/store-mongo';
import { loadConfig } from './config';
import { Logger } from './logger';
import { createHealthServer } from './health';
import { setupSignalHandlers } from './signals';

async function main(): Promise<void> {
  const config = loadConfig(process.argv[2]);
  const logger = new Logger(config.logging.level);

  logger.info('Starting hit ingestion consumer', {
    streamKey: config.stream.key,
    consumerGroup: config.stream.consumerGroup,
    consumerId: config.stream.consumerId,
    partitions: config.mongodb.partitions,
  });

  const storeLog = logger.child({ component: 'store' });
  mongoose.connection.on('disconnected', () => storeLog.warn('MongoDB disconnected'));
  mongoose.connection.on('reconnected', () => storeLog.info('MongoDB reconnected'));

  await mongoose.connect(config.mongodb.uri);
  storeLog.info('Connected to MongoDB');

  const store = new MongoCounterStore({
    collectionName: config.mongodb.collectionName,
    partitions: config.mongodb.partitions,
  });

  const bridge = new HitBridge({
    redis: config.redis.url,
    store,
    streamKey: config.stream.key,
    consumerGroup: config.stream.consumerGroup,
    consumerId: config.stream.consumerId,
    claimIdleMs: config.stream.claimIdleMs,
    batching: {
      maxWaitMs: config.batching.maxWaitMs,
      maxMessages: config.batching.maxMessages,
    },
  });

  const bridgeLog = logger.child({ component: 'bridge' });
  bridge.on('started', () => bridgeLog.info('Bridge started'));
  bridge.on('stopped', () => bridgeLog.info('Bridge stopped'));
  bridge.on('flush', (stats) => bridgeLog.debug('Flush completed', stats));
  bridge.on('recovery', (info) => bridgeLog.info('PEL recovery', info));
  bridge.on('error', (err: unknown) => bridgeLog.error('Bridge error', err));
  bridge.on('warn', (detail) => bridgeLog.warn('Bridge warning', { detail }));

  let healthServer: ReturnType<typeof createHealthServer> | undefined;
  if (config.health.enabled) {
    healthServer = createHealthServer({
      port: config.health.port,
      bridge,
      storeReady: () => mongoose.connection.readyState === mongoose.ConnectionStates.connected,
    });
    logger.child({ component: 'health' }).info('Health server listening', { port: config.health.port });
  }

  setupSignalHandlers({ bridge, health: healthServer, mongo: mongoose, logger });

  await bridge.start();
  logger.info('Hit ingestion consumer is running');
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
