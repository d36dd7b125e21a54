import { pino } from 'pino';
import { TopicDecoder } from './application/topic-decoder.js';
import { DualSinkWriter } from './application/dual-sink-writer.js';
import { CommitPool } from './application/commit-pool.js';
import { BridgePipeline } from './application/bridge-pipeline.js';
import {
  checkLaunchPrecondition,
  loadBridgeConfig,
  loadDeviceClasses,
} from './infrastructure/config/index.js';
import { createDbClient, ensureReadingsTable, TimeseriesSink } from './infrastructure/db/index.js';
import { DocumentSink, openMongoConnection, readingDocumentModel } from './infrastructure/documents/index.js';
import {
  buildReadingNotification,
  createRedisClient,
  publishReadingCommitted,
} from './infrastructure/redis/index.js';
import { MqttTransport, SubscriptionManager } from './infrastructure/mqtt/index.js';
import { buildOpsServer, createPipelineMetrics } from './infrastructure/observability/index.js';

/**
 * Bridge worker: subscribes to sensor topics, aggregates records into
 * readings and commits each reading to MongoDB and Postgres.
 *
 * Runs independently of the query service. The launch precondition is
 * checked before any broker or database connection is opened.
 */
async function main(): Promise<void> {
  const launch = checkLaunchPrecondition();
  if (!launch.ok) {
    pino().fatal({ diagnostic: launch.diagnostic }, 'Launch precondition not met');
    process.exit(1);
  }

  const config = loadBridgeConfig();
  const log = pino({ level: config.logLevel });

  const metrics = createPipelineMetrics({ collectDefaults: true });
  const deviceClasses = loadDeviceClasses(config.deviceClassesPath, log);

  // --- Sinks ---
  const { sql, db } = createDbClient(config.databaseUrl);
  await ensureReadingsTable(sql, log);

  const mongo = await openMongoConnection({ uri: config.mongo.uri, dbName: config.mongo.dbName }, log);

  const redis = createRedisClient(config.redisUrl);
  await redis.connect();
  log.info('Redis connected');

  // --- Pipeline ---
  const decoder = new TopicDecoder({
    topicPrefix: config.mqtt.topicPrefix,
    legacyTopic: config.mqtt.legacyTopic,
    legacyDeviceId: config.mqtt.legacyDeviceId,
  });

  const writer = new DualSinkWriter(
    new DocumentSink(readingDocumentModel(mongo, config.mongo.collection)),
    new TimeseriesSink(db),
    { ...config.sinks, log: log.child({ component: 'writer' }), metrics },
  );

  const pipeline = new BridgePipeline({
    decoder,
    writer,
    pool: new CommitPool(config.commitConcurrency, log.child({ component: 'commit-pool' })),
    window: { ...config.aggregation, deviceClasses },
    log,
    metrics,
    onCommitted: async (entry, result) => {
      // The query service reads Postgres; announce only what it can serve.
      if (result.timeseries.status !== 'written') return;
      await publishReadingCommitted(redis, log, buildReadingNotification(entry, result));
    },
  });

  const manager = new SubscriptionManager({
    transport: new MqttTransport(
      {
        url: config.mqtt.url,
        clientId: config.mqtt.clientId,
        username: config.mqtt.username,
        password: config.mqtt.password,
      },
      log.child({ component: 'mqtt' }),
    ),
    topics: decoder.subscriptionTopics(),
    qos: config.mqtt.qos,
    reconnectBaseMs: config.mqtt.reconnectBaseMs,
    reconnectMaxMs: config.mqtt.reconnectMaxMs,
    log: log.child({ component: 'subscription' }),
    onMessage: (topic, payload) => {
      pipeline.handleMessage(topic, payload);
    },
    onStateChange: (state) => metrics.subscriptionState(state),
    metrics,
  });
  metrics.subscriptionState(manager.state);

  // --- Operations endpoints ---
  const ops = buildOpsServer({
    registry: metrics.registry,
    status: () => ({
      subscription: manager.state,
      openEntries: pipeline.openEntries,
      pendingCommits: pipeline.pendingCommits,
    }),
    log,
  });
  await ops.listen({ host: config.ops.host, port: config.ops.port });

  // --- Graceful shutdown ---
  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down worker...');

    await manager.stop();
    const report = await pipeline.shutdown(config.shutdownGraceMs);
    log.info(report, 'Pipeline drained');

    await ops.close();
    await redis.quit();
    await mongo.close();
    await sql.end({ timeout: 5 });
    log.info('Worker stopped');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }

  await manager.start();
}

main().catch((err: unknown) => {
  pino().fatal({ err }, 'Worker crashed');
  process.exit(1);
});
