import { Chunk, ReviewSpan, Segment } from './types';

export const DEFAULT_REVIEW_THRESHOLD = 0.5;

function clampConfidence(c: number): number {
  if (!Number.isFinite(c)) return 0;
  return Math.min(1, Math.max(0, c));
}

function spannedSegments(chunk: Chunk, segments: readonly Segment[]): Array<[number, Segment]> {
  const [first, last] = chunk.sourceSegmentRange;
  if (first < 0 || last < first || last >= segments.length) return [];
  const out: Array<[number, Segment]> = [];
  for (let i = first; i <= last; i++) out.push([i, segments[i]]);
  return out;
}

/**
 * Confidence of the segments a chunk spans, weighted by their text length.
 * Sets `chunk.qualityScore` and returns it. Missing or empty spans score 0.
 */
export function scoreChunk(chunk: Chunk, segments: readonly Segment[]): number {
  let weighted = 0;
  let total = 0;
  for (const [, seg] of spannedSegments(chunk, segments)) {
    const weight = seg.text.trim().length;
    weighted += weight * clampConfidence(seg.confidence);
    total += weight;
  }
  const score = total > 0 ? weighted / total : 0;
  chunk.qualityScore = score;
  return score;
}

/**
 * Runs of consecutive low-confidence segments inside the chunk. Does not touch the chunk.
 */
export function findReviewSpans(
  chunk: Chunk,
  segments: readonly Segment[],
  threshold: number = DEFAULT_REVIEW_THRESHOLD
): ReviewSpan[] {
  const spans: ReviewSpan[] = [];
  let open: ReviewSpan | null = null;
  for (const [index, seg] of spannedSegments(chunk, segments)) {
    const confidence = clampConfidence(seg.confidence);
    if (confidence >= threshold || !seg.text.trim()) {
      open = null;
      continue;
    }
    if (open) {
      open.endTime = Math.max(open.endTime, seg.end);
      open.segmentRange[1] = index;
      open.confidence = Math.min(open.confidence, confidence);
    } else {
      open = { startTime: seg.start, endTime: seg.end, segmentRange: [index, index], confidence };
      spans.push(open);
    }
  }
  return spans;
}
