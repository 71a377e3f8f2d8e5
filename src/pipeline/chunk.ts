import { ConfigError } from './errors';
import { toChunkId } from './ids';
import { DISCOURSE_MARKERS } from './lexicon';
import { Chunk, ChunkStrategy, Segment, Transcript } from './types';

export interface ChunkOptions {
    strategy: ChunkStrategy;
    /** Target chunk size in characters */
    targetSize: number;
    /** Characters of the previous chunk carried as a prefix */
    overlap: number;
    idPrefix?: string;
    /** Semantic: smallest chunk, as a share of targetSize, that a natural break may close */
    minChunkRatio?: number;
    /** How far past targetSize a chunk may grow while waiting for a boundary */
    lookAheadRatio?: number;
    /** Semantic: a silence longer than this starts a new chunk. 0 disables. */
    pauseBreakSec?: number;
    discourseMarkers?: readonly string[];
}

export const CHUNK_STRATEGIES: readonly ChunkStrategy[] = ['semantic', 'sentence', 'fixed'];

export function isChunkStrategy(value: string): value is ChunkStrategy {
    return CHUNK_STRATEGIES.some((s) => s === value);
}

export const DEFAULT_CHUNK_OPTIONS: Required<Omit<ChunkOptions, 'idPrefix'>> = {
    strategy: 'semantic',
    targetSize: 1000,
    overlap: 100,
    minChunkRatio: 0.25,
    lookAheadRatio: 0.2,
    pauseBreakSec: 2,
    discourseMarkers: DISCOURSE_MARKERS,
};

const AVERAGE_SENTENCE_CHARS = 80;
const MIN_SENTENCES_PER_CHUNK = 2;

type SegmentRange = [number, number];

interface Accumulator {
    first: number;
    size: number;
    sentences: number;
}

interface BreakRules {
    /** Close the running chunk before segment i is added */
    before(i: number, text: string, acc: Accumulator): boolean;
    /** Close the running chunk right after segment i was added */
    after(i: number, text: string, acc: Accumulator): boolean;
}

function countSentenceMarks(text: string): number {
    return (text.match(/[.?!]+(?=["')\]]*(?:\s|$))/g) || []).length;
}

export function endsSentence(text: string): boolean {
    return /[.?!]["')\]]*$/.test(text);
}

function normalizeLead(text: string): string {
    return text
        .toLowerCase()
        .replace(/[‘’]/g, "'")
        .replace(/^[^a-z0-9']+/, '');
}

export function startsWithMarker(text: string, markers: readonly string[]): boolean {
    const lead = normalizeLead(text);
    return markers.some((m) => {
        const marker = normalizeLead(m);
        return marker.length > 0 && lead.startsWith(marker) && !/[a-z0-9]/.test(lead.charAt(marker.length));
    });
}

/**
 * Trailing `overlap` characters of `text`, moved forward to a word start.
 * Empty when no whole word fits.
 */
export function overlapSuffix(text: string, overlap: number): string {
    if (overlap <= 0 || !text) return '';
    if (overlap >= text.length) return text;
    let cut = text.length - overlap;
    if (!/\s/.test(text[cut - 1])) {
        const gap = text.slice(cut).search(/\s/);
        if (gap < 0) return '';
        cut += gap;
    }
    while (cut < text.length && /\s/.test(text[cut])) cut++;
    return text.slice(cut);
}

function groupSegments(texts: readonly string[], rules: BreakRules): SegmentRange[] {
    const ranges: SegmentRange[] = [];
    let acc: Accumulator | null = null;
    for (let i = 0; i < texts.length; i++) {
        const text = texts[i];
        if (acc && text && acc.size > 0 && rules.before(i, text, acc)) {
            ranges.push([acc.first, i - 1]);
            acc = null;
        }
        if (!acc) acc = { first: i, size: 0, sentences: 0 };
        if (!text) continue;
        acc.size += (acc.size > 0 ? 1 : 0) + text.length;
        acc.sentences += countSentenceMarks(text);
        if (rules.after(i, text, acc)) {
            ranges.push([acc.first, i]);
            acc = null;
        }
    }
    if (acc) {
        const last = ranges[ranges.length - 1];
        if (acc.size === 0 && last) {
            // Trailing segments without text belong to the last chunk
            last[1] = texts.length - 1;
        } else {
            ranges.push([acc.first, texts.length - 1]);
        }
    }
    return ranges;
}

function fixedRules(target: number): BreakRules {
    return {
        before: (_i, text, acc) => acc.size + 1 + text.length > target,
        after: () => false,
    };
}

function sentenceRules(target: number, hardLimit: number): BreakRules {
    const sentenceLimit = Math.max(MIN_SENTENCES_PER_CHUNK, Math.ceil(target / AVERAGE_SENTENCE_CHARS));
    return {
        before: () => false,
        after: (_i, text, acc) => {
            if (acc.size >= hardLimit) return true;
            if (!endsSentence(text) || acc.size < target * 0.5) return false;
            return acc.size >= target || acc.sentences >= sentenceLimit;
        },
    };
}

function semanticRules(
    segments: readonly Segment[],
    texts: readonly string[],
    opts: ResolvedChunkOptions,
    hardLimit: number
): BreakRules {
    const minSize = opts.targetSize * opts.minChunkRatio;

    const naturalBreak = (i: number): boolean => {
        if (startsWithMarker(texts[i], opts.discourseMarkers)) return true;
        if (opts.pauseBreakSec > 0 && i > 0) {
            return segments[i].start - segments[i - 1].end > opts.pauseBreakSec;
        }
        return false;
    };

    // Is there a natural break the chunk can reach without passing hardLimit?
    const breakAhead = (i: number, size: number): boolean => {
        let projected = size;
        for (let j = i + 1; j < texts.length; j++) {
            if (!texts[j]) continue;
            if (naturalBreak(j)) return true;
            projected += 1 + texts[j].length;
            if (projected > hardLimit) return false;
        }
        return false;
    };

    return {
        before: (i, _text, acc) => acc.size >= minSize && naturalBreak(i),
        after: (i, text, acc) => {
            if (acc.size >= hardLimit) return true;
            if (acc.size < opts.targetSize) return false;
            if (breakAhead(i, acc.size)) return false;
            return endsSentence(text);
        },
    };
}

type ResolvedChunkOptions = Required<ChunkOptions>;

function resolveOptions(opts: ChunkOptions): ResolvedChunkOptions {
    const resolved: ResolvedChunkOptions = {
        strategy: opts.strategy,
        targetSize: opts.targetSize,
        overlap: opts.overlap,
        idPrefix: opts.idPrefix ?? 'chunk',
        minChunkRatio: opts.minChunkRatio ?? DEFAULT_CHUNK_OPTIONS.minChunkRatio,
        lookAheadRatio: opts.lookAheadRatio ?? DEFAULT_CHUNK_OPTIONS.lookAheadRatio,
        pauseBreakSec: opts.pauseBreakSec ?? DEFAULT_CHUNK_OPTIONS.pauseBreakSec,
        discourseMarkers: opts.discourseMarkers ?? DEFAULT_CHUNK_OPTIONS.discourseMarkers,
    };
    if (!Number.isFinite(resolved.targetSize) || resolved.targetSize < 1) {
        throw new ConfigError(`targetSize must be a positive number of characters, got ${resolved.targetSize}`);
    }
    if (!Number.isFinite(resolved.overlap) || resolved.overlap < 0) {
        throw new ConfigError(`overlap must be zero or more characters, got ${resolved.overlap}`);
    }
    if (resolved.lookAheadRatio < 0 || resolved.minChunkRatio < 0) {
        throw new ConfigError('lookAheadRatio and minChunkRatio must not be negative');
    }
    return resolved;
}

function segmentTexts(segments: readonly Segment[]): string[] {
    return segments.map((s) => s.text.trim());
}

export function transcriptText(transcript: Transcript): string {
    return segmentTexts(transcript.segments).filter(Boolean).join(' ');
}

/** Chunk text without the prefix it shares with the previous chunk */
export function coreText(chunk: Chunk): string {
    // The prefix is followed by one separating space
    return chunk.overlapWithPrev > 0 ? chunk.text.slice(chunk.overlapWithPrev + 1) : chunk.text;
}

export function reconstructText(chunks: readonly Chunk[]): string {
    return chunks.map(coreText).join(' ');
}

export function linkChunks(chunks: Chunk[]): Chunk[] {
    chunks.forEach((c, i) => {
        c.prevChunkId = i > 0 ? chunks[i - 1].id : undefined;
        c.nextChunkId = i < chunks.length - 1 ? chunks[i + 1].id : undefined;
    });
    return chunks;
}

export function chunkTranscript(transcript: Transcript, options: ChunkOptions): Chunk[] {
    const opts = resolveOptions(options);
    const segments = transcript.segments;
    const texts = segmentTexts(segments);
    if (!texts.some(Boolean)) return [];

    const hardLimit = opts.targetSize * (1 + opts.lookAheadRatio);
    let rules: BreakRules;
    switch (opts.strategy) {
        case 'fixed':
            rules = fixedRules(opts.targetSize);
            break;
        case 'sentence':
            rules = sentenceRules(opts.targetSize, hardLimit);
            break;
        case 'semantic':
            rules = semanticRules(segments, texts, opts, hardLimit);
            break;
        default: {
            const unknown: never = opts.strategy;
            throw new ConfigError(`Unknown chunking strategy: ${String(unknown)}`);
        }
    }

    // Anything that fits the target stays whole, whatever the strategy
    const ranges: SegmentRange[] =
        transcriptText(transcript).length <= opts.targetSize
            ? [[0, segments.length - 1]]
            : groupSegments(texts, rules);

    const chunks: Chunk[] = [];
    let prevCore = '';
    ranges.forEach(([first, last], index) => {
        const core = texts.slice(first, last + 1).filter(Boolean).join(' ');
        const prefix = index > 0 ? overlapSuffix(prevCore, opts.overlap) : '';
        let endTime = segments[first].end;
        for (let i = first + 1; i <= last; i++) endTime = Math.max(endTime, segments[i].end);
        chunks.push({
            id: toChunkId(opts.idPrefix, index),
            startTime: segments[first].start,
            endTime,
            text: prefix ? `${prefix} ${core}` : core,
            sourceSegmentRange: [first, last],
            overlapWithPrev: prefix.length,
            qualityScore: 0,
            keywords: [],
            topics: [],
            entities: [],
            reviewSpans: [],
        });
        prevCore = core;
    });
    return linkChunks(chunks);
}
