import { quoteIdentifier } from '@nightlight/shared';
import { withConnection } from './client';

export async function ensureSchemaExists(schemaName: string): Promise<void> {
  await withConnection(async (client) => {
    await client.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(schemaName)}`);
  }, { setSearchPath: false });
}
