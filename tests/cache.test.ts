import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { AudioCache, fingerprintFile } from '../src/pipeline/cache';

describe('AudioCache', () => {
  let dir: string;
  let source: string;
  let cache: AudioCache;

  const extractor = () =>
    vi.fn(async (input: string) => {
      const out = path.join(dir, 'audio', `${path.basename(input)}.wav`);
      await fs.outputFile(out, 'RIFF');
      return out;
    });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cache-'));
    source = path.join(dir, 'talk.mp3');
    await fs.outputFile(source, 'not really audio');
    cache = new AudioCache(path.join(dir, 'cache'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should extract once for two acquisitions', async () => {
    const extract = extractor();
    const first = await cache.acquire(source, extract);
    const second = await cache.acquire(source, extract);
    expect(extract).toHaveBeenCalledTimes(1);
    expect(first.hit).toBe(false);
    expect(second).toEqual({ audioPath: first.audioPath, hit: true });
  });

  it('should persist the index across instances', async () => {
    const extract = extractor();
    await cache.acquire(source, extract);
    const reopened = new AudioCache(path.join(dir, 'cache'));
    expect((await reopened.acquire(source, extract)).hit).toBe(true);
    expect(extract).toHaveBeenCalledTimes(1);
  });

  it('should re-extract when the artifact is gone', async () => {
    const extract = extractor();
    const { audioPath } = await cache.acquire(source, extract);
    await fs.remove(audioPath);
    expect((await cache.acquire(source, extract)).hit).toBe(false);
    expect(extract).toHaveBeenCalledTimes(2);
  });

  it('should treat an empty artifact as a miss', async () => {
    const extract = extractor();
    const { audioPath } = await cache.acquire(source, extract);
    await fs.writeFile(audioPath, '');
    expect(await cache.get(await fingerprintFile(source))).toBeUndefined();
  });

  it('should start empty from a corrupt index', async () => {
    await fs.outputFile(cache.indexPath, '{ not json');
    expect(await cache.size()).toBe(0);
    const extract = extractor();
    expect((await cache.acquire(source, extract)).hit).toBe(false);
    expect(await fs.readJson(cache.indexPath)).toHaveLength(1);
  });

  it('should drop the older entry for the same source', async () => {
    await cache.put('old', path.join(dir, 'a.wav'), source);
    await cache.put('new', path.join(dir, 'b.wav'), source);
    expect(await cache.size()).toBe(1);
    expect(await cache.get('old')).toBeUndefined();
  });

  it('should change the fingerprint when the file changes', async () => {
    const before = await fingerprintFile(source);
    expect(await fingerprintFile(source)).toBe(before);
    await fs.utimes(source, new Date('2020-01-01'), new Date('2020-01-01'));
    expect(await fingerprintFile(source)).not.toBe(before);
  });

  it('should keep the index valid under concurrent writes', async () => {
    await Promise.all(
      Array.from({ length: 10 }, (_, i) => cache.put(`fp-${i}`, path.join(dir, `${i}.wav`), path.join(dir, `${i}.mp3`)))
    );
    const index: unknown = await fs.readJson(cache.indexPath);
    expect(Array.isArray(index) && index.length).toBe(10);
  });
});
