import pg, { Pool, type PoolClient, type PoolConfig } from 'pg';

let int8Configured = false;

function configureGlobalParsers(): void {
  if (int8Configured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  // DATE columns stay as 'YYYY-MM-DD' strings; months are compared as calendar values, not instants.
  pg.types.setTypeParser(pg.types.builtins.DATE, (value: string) => value);
  int8Configured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export interface PostgresAcquireOptions {
  setSearchPath?: boolean;
}

export interface PostgresPoolOptions extends PoolConfig {
  schema?: string;
  statementTimeoutMs?: number;
  onPoolError?: (err: Error) => void;
}

export interface PostgresHelpers {
  withConnection<T>(fn: (client: PoolClient) => Promise<T>, options?: PostgresAcquireOptions): Promise<T>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>, options?: PostgresAcquireOptions): Promise<T>;
  closePool(): Promise<void>;
}

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  configureGlobalParsers();
  const { schema, statementTimeoutMs, onPoolError, ...poolConfig } = options;
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    if (onPoolError) {
      onPoolError(err);
      return;
    }
    console.error('[postgres] unexpected error on idle client', err);
  });

  async function prepareClient(client: PoolClient, setSearchPath: boolean | undefined): Promise<void> {
    if (schema && setSearchPath !== false) {
      await client.query(`SET search_path TO ${quoteIdentifier(schema)}, public`);
    }
    if (statementTimeoutMs && statementTimeoutMs > 0) {
      await client.query(`SET statement_timeout TO ${Math.floor(statementTimeoutMs)}`);
    }
  }

  async function getClient(acquireOptions?: PostgresAcquireOptions): Promise<PoolClient> {
    const client = await pool.connect();
    try {
      await prepareClient(client, acquireOptions?.setSearchPath);
    } catch (err) {
      client.release();
      throw err;
    }
    return client;
  }

  async function withConnection<T>(
    fn: (client: PoolClient) => Promise<T>,
    acquireOptions?: PostgresAcquireOptions
  ): Promise<T> {
    const client = await getClient(acquireOptions);
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(
    fn: (client: PoolClient) => Promise<T>,
    acquireOptions?: PostgresAcquireOptions
  ): Promise<T> {
    return withConnection(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          console.error('[postgres] failed to rollback transaction', rollbackErr);
        }
        throw err;
      }
    }, acquireOptions);
  }

  async function closePool(): Promise<void> {
    await pool.end();
  }

  return {
    withConnection,
    withTransaction,
    closePool
  };
}
