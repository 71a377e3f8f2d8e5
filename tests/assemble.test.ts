import { describe, it, expect } from 'vitest';
import { assemble, buildDocument, DocumentSource, summarize } from '../src/pipeline/assemble';
import { chunkTranscript } from '../src/pipeline/chunk';
import { InvariantViolationError } from '../src/pipeline/errors';
import { Transcript } from '../src/pipeline/types';

const source: DocumentSource = {
  filePath: '/media/talk.mp3',
  sourceType: 'audio',
  duration: 6,
  model: 'medium',
  language: 'en',
  transcribedAt: '2024-05-01T10:00:00.000Z',
  strategy: 'sentence',
};

const transcript: Transcript = {
  segments: [
    { start: 0, end: 2, text: 'Hello world.', confidence: 0.9 },
    { start: 2, end: 4, text: 'This is a test.', confidence: 0.8 },
    { start: 4, end: 6, text: 'Goodbye now.', confidence: 0.95 },
  ],
  language: 'en',
  sourceDuration: 6,
};

describe('summarize', () => {
  it('should append the second sentence when the first is short', () => {
    expect(summarize('Short one. Second sentence here. Third.')).toBe('Short one. Second sentence here.');
  });

  it('should truncate long summaries', () => {
    const summary = summarize('A'.repeat(250) + '.');
    expect(summary).toBe('A'.repeat(200) + '...');
  });

  it('should handle text without sentence marks', () => {
    expect(summarize('just words without end')).toBe('just words without end');
    expect(summarize('')).toBe('');
  });
});

describe('assemble', () => {
  const options = { strategy: 'sentence' as const, targetSize: 20, overlap: 0, idPrefix: 'talk' };

  it('should build the document with a summary', () => {
    const doc = assemble(source, chunkTranscript(transcript, options));
    expect(doc.filePath).toBe('/media/talk.mp3');
    expect(doc.chunks).toHaveLength(2);
    expect(doc.summary).toBe('Hello world. This is a test.');
  });

  it('should reject chunks out of time order', () => {
    const chunks = chunkTranscript(transcript, options);
    chunks[1].startTime = -1;
    expect(() => assemble(source, chunks)).toThrow(InvariantViolationError);
  });

  it('should reject links that disagree with the order', () => {
    const chunks = chunkTranscript(transcript, options);
    chunks[0].nextChunkId = 'elsewhere';
    expect(() => assemble(source, chunks)).toThrow(InvariantViolationError);
  });
});

describe('buildDocument', () => {
  it('should chunk, score and tag', () => {
    const doc = buildDocument(source, transcript, {
      chunking: { strategy: 'sentence', targetSize: 20, overlap: 0, idPrefix: 'talk' },
    });
    expect(doc.chunks.map((c) => c.id)).toEqual(['talk-0000', 'talk-0001']);
    expect(doc.chunks[0].qualityScore).toBeCloseTo(0.8444, 3);
    expect(doc.chunks[1].qualityScore).toBeCloseTo(0.95, 10);
    expect(doc.chunks[0].keywords).toEqual(['hello', 'world', 'test']);
    expect(doc.chunks[0].reviewSpans).toEqual([]);
  });

  it('should flag low-confidence spans for review', () => {
    const murky: Transcript = {
      ...transcript,
      segments: transcript.segments.map((s, i) => (i === 1 ? { ...s, confidence: 0.3 } : s)),
    };
    const doc = buildDocument(source, murky, {
      chunking: { strategy: 'sentence', targetSize: 20, overlap: 0 },
    });
    expect(doc.chunks[0].reviewSpans).toEqual([
      { startTime: 2, endTime: 4, segmentRange: [1, 1], confidence: 0.3 },
    ]);
  });
});
