import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig, parseFormats } from '../src/pipeline/env';
import { ConfigError } from '../src/pipeline/errors';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});
    expect(config.outDir).toBe(path.resolve('artifacts/documents'));
    expect(config.cacheDir).toBe(path.resolve('artifacts/cache'));
    expect(config.formats).toEqual(['markdown', 'json']);
    expect(config.model).toBeUndefined();
    expect(config.concurrency).toBeUndefined();
    expect(config.resume).toBe(true);
    expect(config.chunking.strategy).toBe('semantic');
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60000, jitter: true });
    expect(config.ledger).toBe('file');
    expect(config.runner.localBin).toBe('whisperx-runner');
  });

  it('should read the environment', () => {
    const config = loadConfig({
      ARTIFACTS_ROOT: '/data',
      OUTPUT_FORMAT: 'md',
      WHISPER_MODEL: 'small',
      CONCURRENCY: '3',
      CHUNK_STRATEGY: 'fixed',
      CHUNK_SIZE: '500',
      CHUNK_OVERLAP: '50',
      DOCKER_ADDITIONAL_ARGS: '--device /dev/dri  --group-add video',
      TRANSCRIBE_TIMEOUT_SEC: '90',
      LEDGER: 'pg',
    });
    expect(config.outDir).toBe('/data/documents');
    expect(config.formats).toEqual(['markdown']);
    expect(config.model).toBe('small');
    expect(config.concurrency).toBe(3);
    expect(config.chunking).toMatchObject({ strategy: 'fixed', targetSize: 500, overlap: 50 });
    expect(config.runner.dockerArgs).toEqual(['--device', '/dev/dri', '--group-add', 'video']);
    expect(config.runner.timeoutMs).toBe(90000);
    expect(config.ledger).toBe('pg');
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { CHUNK_SIZE: '500', WHISPER_MODEL: 'small', RESUME: 'true' },
      { targetSize: 300, overlap: 10, model: 'tiny', resume: false, inputDir: '/media' }
    );
    expect(config.chunking.targetSize).toBe(300);
    expect(config.model).toBe('tiny');
    expect(config.resume).toBe(false);
    expect(config.inputDir).toBe('/media');
  });

  it('should let an explicit auto model override a pinned tier', () => {
    expect(loadConfig({ WHISPER_MODEL: 'small' }, { model: 'auto' }).model).toBeUndefined();
    expect(loadConfig({ WHISPER_MODEL: 'small' }).model).toBe('small');
  });

  it('should fall back to the file ledger when the database is disabled', () => {
    expect(loadConfig({ LEDGER: 'pg', DISABLE_DB: '1' }).ledger).toBe('file');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ CHUNK_SIZE: 'big' })).toThrow(ConfigError);
    expect(() => loadConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(ConfigError);
    expect(() => loadConfig({ WHISPER_MODEL: 'huge' })).toThrow(ConfigError);
    expect(() => loadConfig({ CHUNK_STRATEGY: 'random' })).toThrow(ConfigError);
    expect(() => loadConfig({ RESUME: 'maybe' })).toThrow(ConfigError);
    expect(() => loadConfig({ LEDGER: 'redis' })).toThrow(ConfigError);
    expect(() => loadConfig({ TRANSCRIBE_RETRY_BASE_MS: '5000', TRANSCRIBE_RETRY_MAX_MS: '100' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadConfig({}, { concurrency: 0 })).toThrow(ConfigError);
  });

  it('should be frozen', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.chunking)).toBe(true);
    expect(Object.isFrozen(config.formats)).toBe(true);
  });
});

describe('parseFormats', () => {
  it('should accept the short names', () => {
    expect(parseFormats('json')).toEqual(['json']);
    expect(parseFormats(' Markdown ')).toEqual(['markdown']);
    expect(parseFormats('both')).toEqual(['markdown', 'json']);
    expect(() => parseFormats('pdf')).toThrow(ConfigError);
  });
});
