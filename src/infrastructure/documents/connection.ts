import { createConnection } from 'mongoose';
import type { Connection } from 'mongoose';
import type { Logger } from 'pino';

export interface MongoConnectionOptions {
  uri: string;
  dbName: string;
  serverSelectionTimeoutMs?: number;
}

/**
 * Opens a dedicated mongoose connection (not the global default one) and
 * pings the server so a bad URI fails at startup instead of on the
 * first commit.
 */
export async function openMongoConnection(
  options: MongoConnectionOptions,
  log: Logger,
): Promise<Connection> {
  const connection = createConnection(options.uri, {
    dbName: options.dbName,
    serverSelectionTimeoutMS: options.serverSelectionTimeoutMs ?? 5000,
  });

  await connection.asPromise();
  await connection.db?.admin().command({ ping: 1 });
  log.info({ dbName: options.dbName }, 'MongoDB connected');

  return connection;
}
