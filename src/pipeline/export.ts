import fs from 'fs-extra';
import path from 'path';
import { InvariantViolationError } from './errors';
import {
  Chunk,
  ChunkStrategy,
  OutputFormat,
  ReviewSpan,
  SourceType,
  TranscriptDocument,
} from './types';

export const OUTPUT_EXTENSIONS: Record<OutputFormat, string> = {
  markdown: '.md',
  json: '.json',
};

export function formatTimestamp(sec: number): string {
  const total = Math.max(0, Math.floor(sec));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const mmss = `${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`;
  return h > 0 ? `${h}:${mmss}` : mmss;
}

// '>' only occurs inside JSON strings, so escaping it keeps '-->' out of comments
function encodeValue(value: unknown): string {
  return JSON.stringify(value).replace(/>/g, '\\u003e');
}

function fieldLines(fields: Array<[string, unknown]>): string[] {
  return fields.filter(([, v]) => v !== undefined).map(([k, v]) => `${k}: ${encodeValue(v)}`);
}

function parseFieldLines(block: string, where: string): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const line of block.split('\n')) {
    if (!line.trim()) continue;
    const sep = line.indexOf(': ');
    if (sep <= 0) throw malformed(`bad field line in ${where}: ${line}`);
    try {
      out[line.slice(0, sep)] = JSON.parse(line.slice(sep + 2));
    } catch (e) {
      throw malformed(`bad value for ${line.slice(0, sep)} in ${where}`, e);
    }
  }
  return out;
}

function malformed(message: string, cause?: unknown): InvariantViolationError {
  const err = new InvariantViolationError(`Malformed document: ${message}`);
  if (cause !== undefined) err.cause = cause;
  return err;
}

function chunkHeading(chunk: Chunk, index: number): string {
  const parts = [
    `[${formatTimestamp(chunk.startTime)} – ${formatTimestamp(chunk.endTime)}] Chunk ${index + 1}`,
    `quality ${chunk.qualityScore.toFixed(2)}`,
  ];
  if (chunk.topics.length) parts.push(`topics: ${chunk.topics.join(', ')}`);
  if (chunk.entities.length) parts.push(`entities: ${chunk.entities.join(', ')}`);
  return `## ${parts.join(' · ')}`;
}

function toMarkdown(doc: TranscriptDocument): string {
  const lines: string[] = ['---'];
  lines.push(
    ...fieldLines([
      ['filePath', doc.filePath],
      ['sourceType', doc.sourceType],
      ['duration', doc.duration],
      ['model', doc.model],
      ['language', doc.language],
      ['transcribedAt', doc.transcribedAt],
      ['strategy', doc.strategy],
      ['summary', doc.summary],
      ['chunkCount', doc.chunks.length],
    ])
  );
  lines.push('---', '', `# ${path.basename(doc.filePath)}`, '');
  if (doc.summary) lines.push(`> ${doc.summary}`, '');

  doc.chunks.forEach((chunk, i) => {
    lines.push(chunkHeading(chunk, i), '');
    for (const span of chunk.reviewSpans) {
      lines.push(
        `> Review ${formatTimestamp(span.startTime)} – ${formatTimestamp(span.endTime)} (confidence ${span.confidence.toFixed(2)})`
      );
    }
    if (chunk.reviewSpans.length) lines.push('');
    lines.push(
      '<!-- chunk',
      ...fieldLines([
        ['id', chunk.id],
        ['startTime', chunk.startTime],
        ['endTime', chunk.endTime],
        ['sourceSegmentRange', chunk.sourceSegmentRange],
        ['overlapWithPrev', chunk.overlapWithPrev],
        ['qualityScore', chunk.qualityScore],
        ['keywords', chunk.keywords],
        ['topics', chunk.topics],
        ['entities', chunk.entities],
        ['reviewSpans', chunk.reviewSpans],
        ['prevChunkId', chunk.prevChunkId],
        ['nextChunkId', chunk.nextChunkId],
      ]),
      '-->',
      '',
      chunk.text,
      ''
    );
  });
  return lines.join('\n');
}

/* ---------- validation of parsed values ---------- */

type Fields = Record<string, unknown>;

function isRecord(v: unknown): v is Fields {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function str(f: Fields, key: string): string {
  const v = f[key];
  if (typeof v !== 'string') throw malformed(`${key} must be a string`);
  return v;
}

function optStr(f: Fields, key: string): string | undefined {
  return f[key] === undefined || f[key] === null ? undefined : str(f, key);
}

function num(f: Fields, key: string): number {
  const v = f[key];
  if (typeof v !== 'number' || !Number.isFinite(v)) throw malformed(`${key} must be a number`);
  return v;
}

function strList(f: Fields, key: string): string[] {
  const v = f[key];
  if (!Array.isArray(v) || !v.every((x): x is string => typeof x === 'string')) {
    throw malformed(`${key} must be a list of strings`);
  }
  return v;
}

function range(f: Fields, key: string): [number, number] {
  const v = f[key];
  if (!Array.isArray(v) || v.length !== 2) throw malformed(`${key} must be a [first, last] pair`);
  const [a, b]: unknown[] = v;
  if (typeof a !== 'number' || typeof b !== 'number') throw malformed(`${key} must hold numbers`);
  return [a, b];
}

function sourceType(f: Fields): SourceType {
  const v = str(f, 'sourceType');
  if (v !== 'audio' && v !== 'video') throw malformed(`unknown sourceType ${v}`);
  return v;
}

function strategy(f: Fields): ChunkStrategy {
  const v = str(f, 'strategy');
  if (v !== 'semantic' && v !== 'sentence' && v !== 'fixed') throw malformed(`unknown strategy ${v}`);
  return v;
}

function reviewSpans(f: Fields): ReviewSpan[] {
  const v = f.reviewSpans ?? [];
  if (!Array.isArray(v)) throw malformed('reviewSpans must be a list');
  return v.map((item: unknown) => {
    if (!isRecord(item)) throw malformed('review span must be an object');
    return {
      startTime: num(item, 'startTime'),
      endTime: num(item, 'endTime'),
      segmentRange: range(item, 'segmentRange'),
      confidence: num(item, 'confidence'),
    };
  });
}

function toChunk(f: Fields, text: string): Chunk {
  const chunk: Chunk = {
    id: str(f, 'id'),
    startTime: num(f, 'startTime'),
    endTime: num(f, 'endTime'),
    text,
    sourceSegmentRange: range(f, 'sourceSegmentRange'),
    overlapWithPrev: num(f, 'overlapWithPrev'),
    qualityScore: num(f, 'qualityScore'),
    keywords: strList(f, 'keywords'),
    topics: strList(f, 'topics'),
    entities: strList(f, 'entities'),
    reviewSpans: reviewSpans(f),
  };
  const prev = optStr(f, 'prevChunkId');
  const next = optStr(f, 'nextChunkId');
  if (prev !== undefined) chunk.prevChunkId = prev;
  if (next !== undefined) chunk.nextChunkId = next;
  return chunk;
}

function toDocument(f: Fields, chunks: Chunk[]): TranscriptDocument {
  return {
    filePath: str(f, 'filePath'),
    sourceType: sourceType(f),
    duration: num(f, 'duration'),
    model: str(f, 'model'),
    language: str(f, 'language'),
    transcribedAt: str(f, 'transcribedAt'),
    strategy: strategy(f),
    summary: str(f, 'summary'),
    chunks,
  };
}

function fromMarkdown(text: string): TranscriptDocument {
  const src = text.replace(/\r\n/g, '\n');
  const header = /^---\n([\s\S]*?)\n---\n/.exec(src);
  if (!header) throw malformed('missing front matter');
  const meta = parseFieldLines(header[1], 'front matter');

  const chunks: Chunk[] = [];
  const body = src.slice(header[0].length);
  const section = /<!-- chunk\n([\s\S]*?)\n-->\n([\s\S]*?)(?=\n## \[|$)/g;
  for (const m of body.matchAll(section)) {
    chunks.push(toChunk(parseFieldLines(m[1], `chunk ${chunks.length + 1}`), m[2].trim()));
  }
  if (meta.chunkCount !== undefined && num(meta, 'chunkCount') !== chunks.length) {
    throw malformed(`expected ${String(meta.chunkCount)} chunks, found ${chunks.length}`);
  }
  return toDocument(meta, chunks);
}

function fromJson(text: string): TranscriptDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw malformed('invalid JSON', e);
  }
  if (!isRecord(raw)) throw malformed('document must be an object');
  const list = raw.chunks;
  if (!Array.isArray(list)) throw malformed('chunks must be a list');
  const chunks = list.map((c: unknown) => {
    if (!isRecord(c)) throw malformed('chunk must be an object');
    return toChunk(c, str(c, 'text'));
  });
  return toDocument(raw, chunks);
}

export function serializeDocument(doc: TranscriptDocument, format: OutputFormat): string {
  switch (format) {
    case 'markdown':
      return toMarkdown(doc);
    case 'json':
      return JSON.stringify(doc, null, 2) + '\n';
  }
}

export function parseDocument(text: string, format: OutputFormat): TranscriptDocument {
  switch (format) {
    case 'markdown':
      return fromMarkdown(text);
    case 'json':
      return fromJson(text);
  }
}

export function formatFromPath(filePath: string): OutputFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.md' || ext === '.markdown') return 'markdown';
  if (ext === '.json') return 'json';
  throw malformed(`cannot tell the format of ${filePath}`);
}

export async function readDocument(filePath: string): Promise<TranscriptDocument> {
  return parseDocument(await fs.readFile(filePath, 'utf8'), formatFromPath(filePath));
}

export interface DocumentSink {
  /** Resolves to the written paths */
  write(doc: TranscriptDocument): Promise<string[]>;
}

export interface FileSinkOptions {
  outDir: string;
  formats: readonly OutputFormat[];
  /** Input directory; its layout is mirrored below outDir */
  inputRoot?: string;
}

export class FileDocumentSink implements DocumentSink {
  constructor(private readonly opts: FileSinkOptions) {}

  /** `<outDir>/<relative dir>/<file name>`; the source extension stays so `talk.mp3` and `talk.wav` do not collide */
  outputBase(filePath: string): string {
    const name = path.basename(filePath);
    let rel = '';
    if (this.opts.inputRoot) {
      rel = path.relative(path.resolve(this.opts.inputRoot), path.dirname(path.resolve(filePath)));
      if (rel.startsWith('..') || path.isAbsolute(rel)) rel = '';
    }
    return path.join(this.opts.outDir, rel, name);
  }

  async write(doc: TranscriptDocument): Promise<string[]> {
    const base = this.outputBase(doc.filePath);
    const written: string[] = [];
    for (const format of this.opts.formats) {
      const target = base + OUTPUT_EXTENSIONS[format];
      const tmp = `${target}.tmp`;
      await fs.outputFile(tmp, serializeDocument(doc, format));
      await fs.move(tmp, target, { overwrite: true });
      written.push(target);
    }
    return written;
  }
}
