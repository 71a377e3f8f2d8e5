import fs from 'fs-extra';
import { fileURLToPath } from 'url';

function readLexicon(name: string): unknown {
  return fs.readJsonSync(fileURLToPath(new URL(`./lexicon/${name}`, import.meta.url)));
}

function asStringList(value: unknown, name: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`Lexicon ${name} must be an array of strings`);
  }
  return value;
}

function asTopicTable(value: unknown, name: string): Record<string, string[]> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Lexicon ${name} must map topic names to keyword arrays`);
  }
  const table: Record<string, string[]> = {};
  for (const [topic, keywords] of Object.entries(value)) {
    table[topic] = asStringList(keywords, `${name}#${topic}`);
  }
  return table;
}

export const STOP_WORDS: ReadonlySet<string> = new Set(
  asStringList(readLexicon('stopwords.json'), 'stopwords.json')
);

export const TOPIC_KEYWORDS: Readonly<Record<string, readonly string[]>> = asTopicTable(
  readLexicon('topics.json'),
  'topics.json'
);

export const DISCOURSE_MARKERS: readonly string[] = asStringList(
  readLexicon('discourse-markers.json'),
  'discourse-markers.json'
);
