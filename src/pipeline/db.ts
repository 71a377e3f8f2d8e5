import pg from 'pg';
import { errorMessage } from './errors';
import { debug, warn } from './log';

export type PgClient = pg.Client;

/** Connects, runs `fn`, always closes the connection */
export async function withPg<T>(databaseUrl: string, fn: (c: PgClient) => Promise<T>): Promise<T> {
  const client = new pg.Client({ connectionString: databaseUrl });
  try {
    await client.connect();
  } catch (e) {
    warn('db.connect.fail', { error: errorMessage(e) });
    throw e;
  }
  try {
    return await fn(client);
  } finally {
    await client.end().catch((e: unknown) => debug('db.end.fail', { error: errorMessage(e) }));
  }
}

export async function inTransaction<T>(client: PgClient, fn: () => Promise<T>): Promise<T> {
  await client.query('BEGIN');
  try {
    const result = await fn();
    await client.query('COMMIT');
    return result;
  } catch (e) {
    await client.query('ROLLBACK');
    throw e;
  }
}
