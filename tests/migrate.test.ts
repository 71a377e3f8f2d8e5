import { describe, it, expect, vi, beforeEach } from 'vitest';
import path from 'path';
import pg from 'pg';
import { migrate } from '../src/db/migrate';

const pgState = vi.hoisted(() => {
  const queries: { sql: string; params: unknown[] }[] = [];
  const applied: string[] = [];
  return { queries, applied };
});

vi.mock('pg', () => {
  class FakeClient {
    async connect() {}
    async query(sql: string, params: unknown[] = []) {
      pgState.queries.push({ sql, params });
      if (sql.startsWith('SELECT name FROM _migrations')) return { rows: pgState.applied.map((name) => ({ name })) };
      return { rows: [] };
    }
    async end() {}
  }
  return { default: { Client: FakeClient } };
});

const migrationsDir = path.resolve('db/migrations');

describe('migrate', () => {
  beforeEach(() => {
    pgState.queries = [];
    pgState.applied = [];
  });

  it('should apply pending migrations in a transaction', async () => {
    const client = new pg.Client({ connectionString: 'postgres://test' });
    expect(await migrate(client, migrationsDir)).toEqual(['001_batch_ledger.sql']);
    const statements = pgState.queries.map((q) => q.sql.trim().split(/\s+/)[0]);
    expect(statements).toEqual(['CREATE', 'SELECT', 'BEGIN', 'CREATE', 'INSERT', 'COMMIT']);
    expect(pgState.queries[4].params).toEqual(['001_batch_ledger.sql']);
  });

  it('should skip migrations already applied', async () => {
    pgState.applied = ['001_batch_ledger.sql'];
    const client = new pg.Client({ connectionString: 'postgres://test' });
    expect(await migrate(client, migrationsDir)).toEqual([]);
    expect(pgState.queries).toHaveLength(2);
  });
});
