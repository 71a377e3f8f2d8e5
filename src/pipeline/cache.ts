import crypto from 'crypto';
import fs from 'fs-extra';
import path from 'path';
import { errorMessage } from './errors';
import { debug, warn } from './log';

export interface CacheEntry {
  sourceFingerprint: string;
  sourcePath: string;
  audioArtifactPath: string;
  createdAt: string;
}

export interface AcquireResult {
  audioPath: string;
  hit: boolean;
}

/**
 * Identity of a source file: absolute path, size and mtime. Content is not read.
 */
export async function fingerprintFile(filePath: string): Promise<string> {
  const abs = path.resolve(filePath);
  const stat = await fs.stat(abs);
  return crypto
    .createHash('sha256')
    .update(`${abs}\0${stat.size}\0${Math.floor(stat.mtimeMs)}`)
    .digest('hex');
}

function isCacheEntry(v: unknown): v is CacheEntry {
  if (typeof v !== 'object' || v === null) return false;
  return ['sourceFingerprint', 'sourcePath', 'audioArtifactPath', 'createdAt'].every(
    (k) => typeof Reflect.get(v, k) === 'string'
  );
}

/**
 * Maps source fingerprints to extracted audio, persisted in `<cacheDir>/index.json`.
 */
export class AudioCache {
  readonly indexPath: string;
  private entries: Map<string, CacheEntry> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(readonly cacheDir: string) {
    this.indexPath = path.join(cacheDir, 'index.json');
  }

  /** Where extractors should place artifacts */
  get artifactDir(): string {
    return path.join(this.cacheDir, 'audio');
  }

  private async load(): Promise<Map<string, CacheEntry>> {
    if (this.entries) return this.entries;
    const entries = new Map<string, CacheEntry>();
    if (await fs.pathExists(this.indexPath)) {
      try {
        const raw: unknown = await fs.readJson(this.indexPath);
        const list: unknown[] = Array.isArray(raw) ? raw : [];
        for (const e of list) {
          if (isCacheEntry(e)) entries.set(e.sourceFingerprint, e);
        }
      } catch (e) {
        warn('cache.index.corrupt', { indexPath: this.indexPath, err: errorMessage(e) });
      }
    }
    // Another caller may have loaded concurrently; keep the first map
    this.entries = this.entries ?? entries;
    return this.entries;
  }

  private persist(): Promise<void> {
    const run = async () => {
      const entries = await this.load();
      const tmp = `${this.indexPath}.${process.pid}.tmp`;
      await fs.outputJson(tmp, [...entries.values()], { spaces: 2 });
      await fs.move(tmp, this.indexPath, { overwrite: true });
    };
    const next = this.writes.then(run, run);
    this.writes = next.catch(() => undefined);
    return next;
  }

  async get(fingerprint: string): Promise<string | undefined> {
    const entries = await this.load();
    const entry = entries.get(fingerprint);
    if (!entry) return undefined;
    const usable = await fs
      .stat(entry.audioArtifactPath)
      .then((s) => s.isFile() && s.size > 0)
      .catch(() => false);
    if (!usable) {
      debug('cache.entry.stale', { fingerprint, audioArtifactPath: entry.audioArtifactPath });
      entries.delete(fingerprint);
      await this.persist();
      return undefined;
    }
    return entry.audioArtifactPath;
  }

  async put(fingerprint: string, audioArtifactPath: string, sourcePath: string): Promise<void> {
    const entries = await this.load();
    const source = path.resolve(sourcePath);
    for (const [key, entry] of entries) {
      if (entry.sourcePath === source && key !== fingerprint) entries.delete(key);
    }
    entries.set(fingerprint, {
      sourceFingerprint: fingerprint,
      sourcePath: source,
      audioArtifactPath,
      createdAt: new Date().toISOString(),
    });
    await this.persist();
  }

  async acquire(inputPath: string, extract: (inputPath: string) => Promise<string>): Promise<AcquireResult> {
    const fingerprint = await fingerprintFile(inputPath);
    const cached = await this.get(fingerprint);
    if (cached) {
      debug('cache.hit', { inputPath, fingerprint });
      return { audioPath: cached, hit: true };
    }
    const audioPath = await extract(inputPath);
    await this.put(fingerprint, audioPath, inputPath);
    return { audioPath, hit: false };
  }

  async size(): Promise<number> {
    return (await this.load()).size;
  }
}
