export type ISO8601 = string;

export type ModelTier = 'tiny' | 'base' | 'small' | 'medium' | 'large-v3';

export type SourceType = 'audio' | 'video';

export type ChunkStrategy = 'semantic' | 'sentence' | 'fixed';

export type OutputFormat = 'markdown' | 'json';

export interface Segment {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly confidence: number;
}

export interface Transcript {
  segments: Segment[];
  language: string;
  sourceDuration: number;
}

export interface ReviewSpan {
  startTime: number;
  endTime: number;
  segmentRange: [number, number];
  /** Lowest segment confidence inside the span */
  confidence: number;
}

export interface Chunk {
  id: string;
  startTime: number;
  endTime: number;
  text: string;
  sourceSegmentRange: [number, number];
  overlapWithPrev: number;
  qualityScore: number;
  keywords: string[];
  topics: string[];
  entities: string[];
  reviewSpans: ReviewSpan[];
  prevChunkId?: string;
  nextChunkId?: string;
}

export interface TranscriptDocument {
  filePath: string;
  sourceType: SourceType;
  duration: number;
  model: string;
  language: string;
  transcribedAt: ISO8601;
  strategy: ChunkStrategy;
  summary: string;
  chunks: Chunk[];
}

export type FileState =
  | 'pending'
  | 'extracting'
  | 'transcribing'
  | 'chunking'
  | 'done'
  | 'failed';

export interface BatchJob {
  id: string;
  files: string[];
  completed: Set<string>;
  failed: Map<string, string>;
  inProgress: Set<string>;
}

export interface BatchResult {
  succeeded: TranscriptDocument[];
  failed: Record<string, string>;
  skipped: string[];
  pending: string[];
  cancelled: boolean;
}
