import { ChunkOptions, chunkTranscript, reconstructText } from './chunk';
import { InvariantViolationError } from './errors';
import { applyMetadata, MetadataOptions } from './metadata';
import { DEFAULT_REVIEW_THRESHOLD, findReviewSpans, scoreChunk } from './quality';
import { Chunk, Transcript, TranscriptDocument } from './types';

export type DocumentSource = Omit<TranscriptDocument, 'summary' | 'chunks'>;

export interface BuildOptions {
  chunking: ChunkOptions;
  metadata?: MetadataOptions;
  reviewThreshold?: number;
}

const SUMMARY_MAX_CHARS = 200;
const SHORT_SENTENCE_CHARS = 50;

function sentences(text: string): string[] {
  return (text.match(/[^.?!]+(?:[.?!]+|$)/g) || []).map((s) => s.trim()).filter(Boolean);
}

/**
 * First sentence of the text, with the second appended when the first is short.
 */
export function summarize(text: string): string {
  const parts = sentences(text);
  if (parts.length === 0) return '';
  let summary = parts[0];
  if (summary.length < SHORT_SENTENCE_CHARS && parts.length > 1) {
    summary = `${summary} ${parts[1]}`;
  }
  return summary.length > SUMMARY_MAX_CHARS ? `${summary.slice(0, SUMMARY_MAX_CHARS)}...` : summary;
}

function validateChunks(filePath: string, chunks: readonly Chunk[]): void {
  const ids = new Set<string>();
  chunks.forEach((chunk, i) => {
    if (ids.has(chunk.id)) {
      throw new InvariantViolationError(`Duplicate chunk id ${chunk.id}`, { filePath, index: i });
    }
    ids.add(chunk.id);

    const prev = i > 0 ? chunks[i - 1] : undefined;
    const next = i < chunks.length - 1 ? chunks[i + 1] : undefined;
    if (prev && chunk.startTime < prev.startTime) {
      throw new InvariantViolationError(`Chunk ${chunk.id} starts before ${prev.id}`, {
        filePath,
        index: i,
      });
    }
    if (chunk.prevChunkId !== prev?.id || chunk.nextChunkId !== next?.id) {
      throw new InvariantViolationError(`Chunk ${chunk.id} is linked out of order`, {
        filePath,
        index: i,
        prevChunkId: chunk.prevChunkId,
        nextChunkId: chunk.nextChunkId,
      });
    }
  });
}

/**
 * Builds the document from finished chunks. Throws InvariantViolationError
 * when the chunks are out of order or their links disagree with the order.
 */
export function assemble(source: DocumentSource, chunks: Chunk[]): TranscriptDocument {
  validateChunks(source.filePath, chunks);
  return {
    ...source,
    summary: summarize(reconstructText(chunks)),
    chunks,
  };
}

export function buildDocument(
  source: DocumentSource,
  transcript: Transcript,
  options: BuildOptions
): TranscriptDocument {
  const chunks = chunkTranscript(transcript, options.chunking);
  for (const chunk of chunks) {
    scoreChunk(chunk, transcript.segments);
    chunk.reviewSpans = findReviewSpans(
      chunk,
      transcript.segments,
      options.reviewThreshold ?? DEFAULT_REVIEW_THRESHOLD
    );
    applyMetadata(chunk, options.metadata);
  }
  return assemble(source, chunks);
}
