import fs from 'fs-extra';
import path from 'path';
import { inTransaction, withPg } from './db';
import { debug } from './log';
import { BatchJob } from './types';

export type LedgerStatus = 'done' | 'failed';

export interface LedgerRecord {
  path: string;
  status: LedgerStatus;
  reason?: string;
  attempts: number;
  updatedAt: string;
}

export interface LedgerStore {
  load(jobId: string): Promise<LedgerRecord[]>;
  save(jobId: string, records: readonly LedgerRecord[]): Promise<void>;
  clear(jobId: string): Promise<void>;
}

function toRecord(v: unknown): LedgerRecord | null {
  if (typeof v !== 'object' || v === null) return null;
  const filePath: unknown = Reflect.get(v, 'path');
  const status: unknown = Reflect.get(v, 'status');
  const reason: unknown = Reflect.get(v, 'reason');
  const attempts: unknown = Reflect.get(v, 'attempts');
  const updatedAt: unknown = Reflect.get(v, 'updatedAt');
  if (typeof filePath !== 'string' || (status !== 'done' && status !== 'failed')) return null;
  return {
    path: filePath,
    status,
    reason: typeof reason === 'string' ? reason : undefined,
    attempts: typeof attempts === 'number' ? attempts : 0,
    updatedAt: typeof updatedAt === 'string' ? updatedAt : new Date(0).toISOString(),
  };
}

/** One JSON file per job: `<stateDir>/<jobId>.ledger.json` */
export class FileLedgerStore implements LedgerStore {
  constructor(readonly stateDir: string) {}

  fileFor(jobId: string): string {
    return path.join(this.stateDir, `${jobId}.ledger.json`);
  }

  async load(jobId: string): Promise<LedgerRecord[]> {
    const file = this.fileFor(jobId);
    if (!(await fs.pathExists(file))) return [];
    const raw: unknown = await fs.readJson(file);
    const files: unknown = typeof raw === 'object' && raw !== null ? Reflect.get(raw, 'files') : undefined;
    if (!Array.isArray(files)) return [];
    return files.map(toRecord).filter((r): r is LedgerRecord => r !== null);
  }

  async save(jobId: string, records: readonly LedgerRecord[]): Promise<void> {
    const file = this.fileFor(jobId);
    const tmp = `${file}.tmp`;
    await fs.outputJson(tmp, { jobId, updatedAt: new Date().toISOString(), files: records }, { spaces: 2 });
    await fs.move(tmp, file, { overwrite: true });
  }

  async clear(jobId: string): Promise<void> {
    await fs.remove(this.fileFor(jobId));
  }
}

interface BatchFileRow {
  path: string;
  status: string;
  reason: string | null;
  attempts: number;
  updated_at: Date | string;
}

/** Rows of the `batch_files` table, see db/migrations */
export class PgLedgerStore implements LedgerStore {
  constructor(private readonly databaseUrl: string) {}

  async load(jobId: string): Promise<LedgerRecord[]> {
    return withPg(this.databaseUrl, async (c) => {
      const res = await c.query<BatchFileRow>(
        `SELECT path, status, reason, attempts, updated_at FROM batch_files WHERE job_id=$1 ORDER BY path`,
        [jobId]
      );
      return res.rows
        .map((r) =>
          toRecord({
            path: r.path,
            status: r.status,
            reason: r.reason ?? undefined,
            attempts: r.attempts,
            updatedAt: r.updated_at instanceof Date ? r.updated_at.toISOString() : r.updated_at,
          })
        )
        .filter((r): r is LedgerRecord => r !== null);
    });
  }

  async save(jobId: string, records: readonly LedgerRecord[]): Promise<void> {
    await withPg(this.databaseUrl, (c) =>
      inTransaction(c, async () => {
        for (const r of records) {
          await c.query(
            `INSERT INTO batch_files (job_id, path, status, reason, attempts, updated_at)
             VALUES ($1,$2,$3,$4,$5,$6)
             ON CONFLICT (job_id, path) DO UPDATE
             SET status=EXCLUDED.status, reason=EXCLUDED.reason, attempts=EXCLUDED.attempts, updated_at=EXCLUDED.updated_at`,
            [jobId, r.path, r.status, r.reason ?? null, r.attempts, r.updatedAt]
          );
        }
      })
    );
  }

  async clear(jobId: string): Promise<void> {
    await withPg(this.databaseUrl, (c) => c.query(`DELETE FROM batch_files WHERE job_id=$1`, [jobId]));
  }
}

/**
 * Single writer over a LedgerStore. Writes are applied in call order; a failed
 * write rejects the call that made it.
 */
export class JobLedger {
  private records = new Map<string, LedgerRecord>();
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: LedgerStore,
    readonly jobId: string
  ) {}

  async load(): Promise<LedgerRecord[]> {
    const loaded = await this.store.load(this.jobId);
    this.records = new Map(loaded.map((r) => [r.path, r]));
    debug('ledger.load', { jobId: this.jobId, records: loaded.length });
    return loaded;
  }

  async reset(): Promise<void> {
    this.records.clear();
    await this.store.clear(this.jobId);
  }

  get(filePath: string): LedgerRecord | undefined {
    return this.records.get(filePath);
  }

  all(): LedgerRecord[] {
    return [...this.records.values()];
  }

  record(entry: Omit<LedgerRecord, 'updatedAt'>): Promise<void> {
    this.records.set(entry.path, { ...entry, updatedAt: new Date().toISOString() });
    const write = () => this.store.save(this.jobId, this.all());
    const next = this.writes.then(write, write);
    this.writes = next.catch(() => undefined);
    return next;
  }
}

/** Job state from the ledger: done files are completed, failed ones will be retried */
export function createBatchJob(id: string, files: readonly string[], records: readonly LedgerRecord[]): BatchJob {
  const wanted = new Set(files);
  const job: BatchJob = {
    id,
    files: [...files],
    completed: new Set(),
    failed: new Map(),
    inProgress: new Set(),
  };
  for (const r of records) {
    if (!wanted.has(r.path)) continue;
    if (r.status === 'done') job.completed.add(r.path);
    else job.failed.set(r.path, r.reason ?? 'unknown');
  }
  return job;
}
