import type { PoolClient } from 'pg';
import {
  createPostgresPool,
  type PostgresAcquireOptions,
  type PostgresHelpers,
  type PostgresPoolOptions
} from '@nightlight/shared';
import { loadServiceConfig, type ServiceConfig } from '../config/serviceConfig';

/** The slice of the pool helpers the stores depend on. */
export type Database = Pick<PostgresHelpers, 'withConnection' | 'withTransaction'>;

export function postgresPoolOptions(config: ServiceConfig, onPoolError?: (err: Error) => void): PostgresPoolOptions {
  return {
    connectionString: config.database.url,
    max: config.database.maxConnections,
    idleTimeoutMillis: config.database.idleTimeoutMs,
    connectionTimeoutMillis: config.database.connectionTimeoutMs,
    schema: config.database.schema,
    statementTimeoutMs: config.database.statementTimeoutMs,
    onPoolError
  };
}

let poolHelpers: PostgresHelpers | null = null;
let poolErrorHandler: ((err: Error) => void) | undefined;

function helpers(): PostgresHelpers {
  if (!poolHelpers) {
    poolHelpers = createPostgresPool(postgresPoolOptions(loadServiceConfig(), poolErrorHandler));
  }
  return poolHelpers;
}

export function setPoolErrorHandler(handler: (err: Error) => void): void {
  poolErrorHandler = handler;
}

export function getDatabase(): Database {
  return { withConnection, withTransaction };
}

export function withConnection<T>(
  fn: (client: PoolClient) => Promise<T>,
  options?: PostgresAcquireOptions
): Promise<T> {
  return helpers().withConnection(fn, options);
}

export function withTransaction<T>(
  fn: (client: PoolClient) => Promise<T>,
  options?: PostgresAcquireOptions
): Promise<T> {
  return helpers().withTransaction(fn, options);
}

export async function closePool(): Promise<void> {
  if (!poolHelpers) {
    return;
  }
  const current = poolHelpers;
  poolHelpers = null;
  await current.closePool();
}
