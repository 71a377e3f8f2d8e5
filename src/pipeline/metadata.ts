import { STOP_WORDS, TOPIC_KEYWORDS } from './lexicon';
import { Chunk } from './types';

export interface MetadataOptions {
  topK?: number;
  /** Distinct topic keywords that must occur before a topic is assigned; inclusive, so 2 means two or more */
  minTopicOverlap?: number;
}

export interface ChunkMetadata {
  keywords: string[];
  entities: string[];
  topics: string[];
}

export type EntityKind = 'time' | 'date' | 'number' | 'proper';

export interface EntityMatch {
  text: string;
  kind: EntityKind;
  start: number;
  end: number;
}

const MONTH =
  '(?:Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)';
const MERIDIEM = '(?:[AaPp]\\.[Mm]\\.|[AaPp][Mm]\\b)';

// Earlier kinds claim their span first
const ENTITY_PATTERNS: ReadonlyArray<[EntityKind, readonly RegExp[]]> = [
  [
    'time',
    [
      new RegExp(`\\b\\d{1,2}:\\d{2}(?::\\d{2})?(?:\\s?${MERIDIEM})?`, 'g'),
      new RegExp(`\\b\\d{1,2}\\s?${MERIDIEM}`, 'g'),
    ],
  ],
  [
    'date',
    [
      new RegExp(`\\b${MONTH}\\.? \\d{1,2}(?:st|nd|rd|th)?(?:,? \\d{4})?\\b`, 'g'),
      new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)? (?:of )?${MONTH}(?:,? \\d{4})?\\b`, 'g'),
      new RegExp(`\\b${MONTH} \\d{4}\\b`, 'g'),
      /\b\d{4}-\d{2}-\d{2}\b/g,
      /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/g,
    ],
  ],
  ['number', [/\b\d+(?:,\d{3})*(?:\.\d+)?(?:%|\b)/g]],
  ['proper', [/\b[A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)*\b/g]],
];

// Capitalized only because they open a sentence or clause
const FUNCTION_WORDS = new Set([
  'The', 'This', 'That', 'These', 'Those', 'And', 'But', 'Or', 'So', 'Now', 'Then',
  'However', 'Also', 'If', 'When', 'While', 'In', 'On', 'At', 'Our', 'We', 'It',
  'They', 'You', 'My', 'Yes', 'No', 'Well', 'Okay', 'Ok', 'Next', 'Finally',
]);

function atSentenceStart(text: string, index: number): boolean {
  const before = text.slice(0, index).trimEnd();
  return before === '' || /[.?!]["')\]]*$/.test(before);
}

function properNoun(text: string, value: string, index: number): EntityMatch | null {
  const words = value.split(/[ \t]+/);
  let start = index;
  while (words.length > 0 && FUNCTION_WORDS.has(words[0])) {
    const dropped = words.shift() ?? '';
    start = text.indexOf(words[0] ?? '', start + dropped.length);
  }
  if (words.length === 0) return null;
  // A lone capitalized word at a sentence start is just a sentence start
  if (words.length === 1 && atSentenceStart(text, start)) return null;
  const name = words.join(' ');
  return { text: name, kind: 'proper', start, end: start + name.length };
}

/** Time, date, numeric and capitalized expressions ordered by position */
export function findEntities(text: string): EntityMatch[] {
  const found: EntityMatch[] = [];
  const overlaps = (start: number, end: number) => found.some((e) => start < e.end && e.start < end);

  for (const [kind, patterns] of ENTITY_PATTERNS) {
    for (const pattern of patterns) {
      for (const match of text.matchAll(new RegExp(pattern.source, pattern.flags))) {
        const start = match.index ?? 0;
        const candidate =
          kind === 'proper'
            ? properNoun(text, match[0], start)
            : { text: match[0].trim(), kind, start, end: start + match[0].trimEnd().length };
        if (!candidate || !candidate.text || overlaps(candidate.start, candidate.end)) continue;
        found.push(candidate);
      }
    }
  }
  return found.sort((a, b) => a.start - b.start);
}

function tokenize(text: string): string[] {
  const normalized = text
    .toLowerCase()
    .replace(/['’]s\b/g, '')
    .replace(/['’]/g, '');
  return normalized.match(/[a-z0-9]+/g) || [];
}

export function extractKeywords(text: string, topK = 10): string[] {
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    if (token.length <= 2 || /^\d+$/.test(token) || STOP_WORDS.has(token)) continue;
    // Map preserves insertion order, which is first occurrence
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  const order = [...counts.keys()];
  return order
    .map((word, position) => ({ word, position, count: counts.get(word) ?? 0 }))
    .sort((a, b) => b.count - a.count || a.position - b.position)
    .slice(0, Math.max(0, topK))
    .map((k) => k.word);
}

export function classifyTopics(text: string, minTopicOverlap = 2): string[] {
  const haystack = ` ${tokenize(text).join(' ')} `;
  const topics: string[] = [];
  for (const [topic, keywords] of Object.entries(TOPIC_KEYWORDS)) {
    const hits = keywords.filter((k) => haystack.includes(` ${tokenize(k).join(' ')} `)).length;
    if (hits >= minTopicOverlap) topics.push(topic);
  }
  return topics.sort();
}

export function extractMetadata(text: string, options: MetadataOptions = {}): ChunkMetadata {
  const entities: string[] = [];
  for (const e of findEntities(text)) {
    if (!entities.includes(e.text)) entities.push(e.text);
  }
  return {
    keywords: extractKeywords(text, options.topK ?? 10),
    entities,
    topics: classifyTopics(text, options.minTopicOverlap ?? 2),
  };
}

/** Tags the chunk in place */
export function applyMetadata(chunk: Chunk, options: MetadataOptions = {}): Chunk {
  const meta = extractMetadata(chunk.text, options);
  chunk.keywords = meta.keywords;
  chunk.entities = meta.entities;
  chunk.topics = meta.topics;
  return chunk;
}
