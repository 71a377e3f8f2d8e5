import { describe, it, expect } from 'vitest';
import { toChunkId, toJobId, toSourceId } from '../src/pipeline/ids';

describe('ids', () => {
  it('should build a readable, path-unique source id', () => {
    const a = toSourceId('/media/one/My Talk (2024).mp3');
    const b = toSourceId('/media/two/My Talk (2024).mp3');
    expect(a).toMatch(/^my-talk-2024-[A-Za-z0-9_-]{8}$/);
    expect(a).not.toBe(b);
    expect(toSourceId('/media/one/My Talk (2024).mp3')).toBe(a);
  });

  it('should fall back when the name has no usable characters', () => {
    expect(toSourceId('/media/___.wav')).toMatch(/^source-/);
  });

  it('should pad chunk indexes', () => {
    expect(toChunkId('talk', 7)).toBe('talk-0007');
  });

  it('should derive a stable job id from the input directory', () => {
    expect(toJobId('/media/in')).toBe(toJobId('/media/in/'));
    expect(toJobId('/media/in')).toMatch(/^job-[A-Za-z0-9_-]{12}$/);
  });
});
