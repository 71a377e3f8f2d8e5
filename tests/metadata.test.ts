import { describe, it, expect } from 'vitest';
import {
  applyMetadata,
  classifyTopics,
  extractKeywords,
  extractMetadata,
  findEntities,
} from '../src/pipeline/metadata';
import { Chunk } from '../src/pipeline/types';

describe('extractKeywords', () => {
  const text = 'The budget grew. Budget cuts hurt the budget team, and the team grew.';

  it('should rank by frequency and break ties by first occurrence', () => {
    expect(extractKeywords(text)).toEqual(['budget', 'grew', 'team', 'cuts', 'hurt']);
  });

  it('should keep only the top K', () => {
    expect(extractKeywords(text, 2)).toEqual(['budget', 'grew']);
  });

  it('should skip numbers, short tokens and stop words', () => {
    expect(extractKeywords('In 2024 the ai and ml sales rose; 2024 sales were fine.')).toEqual([
      'sales',
      'rose',
      'fine',
    ]);
  });
});

describe('classifyTopics', () => {
  it('should need at least two topic keywords', () => {
    expect(classifyTopics('The software team wrote code for the data system.')).toEqual(['technology']);
    expect(classifyTopics('We bought software.')).toEqual([]);
    expect(classifyTopics('We bought software.', 1)).toEqual(['technology']);
  });

  it('should return topics sorted', () => {
    expect(classifyTopics('Patients at the hospital paid for treatment with money from the budget.')).toEqual([
      'finance',
      'health',
    ]);
  });

  it('should match multi-word keywords', () => {
    expect(classifyTopics('Machine learning models need data.')).toEqual(['technology']);
  });
});

describe('findEntities', () => {
  it('should let times and dates claim their spans before numbers and names', () => {
    const text = 'The meeting with Alice Johnson is at 3:30 pm on March 5, 2024 and costs 1,200 dollars.';
    expect(findEntities(text).map((e) => [e.text, e.kind])).toEqual([
      ['Alice Johnson', 'proper'],
      ['3:30 pm', 'time'],
      ['March 5, 2024', 'date'],
      ['1,200', 'number'],
    ]);
  });

  it('should ignore capitalized sentence starts', () => {
    expect(findEntities('Budget talks went well. Later, Alice left.').map((e) => e.text)).toEqual(['Alice']);
  });

  it('should strip leading function words', () => {
    expect(findEntities('We met The Beatles.').map((e) => e.text)).toEqual(['Beatles']);
  });

  it('should read percentages as numbers', () => {
    expect(findEntities('Growth hit 12.5% this year.').map((e) => e.text)).toEqual(['12.5%']);
  });
});

describe('extractMetadata', () => {
  it('should de-duplicate entities', () => {
    expect(extractMetadata('We met Alice and Alice waved.').entities).toEqual(['Alice']);
  });

  it('should tag a chunk in place', () => {
    const chunk: Chunk = {
      id: 'c-0000',
      startTime: 0,
      endTime: 5,
      text: 'The software team wrote code for the data system on May 2.',
      sourceSegmentRange: [0, 0],
      overlapWithPrev: 0,
      qualityScore: 1,
      keywords: [],
      topics: [],
      entities: [],
      reviewSpans: [],
    };
    applyMetadata(chunk, { topK: 3 });
    expect(chunk.keywords).toEqual(['software', 'team', 'wrote']);
    expect(chunk.topics).toEqual(['technology']);
    expect(chunk.entities).toEqual(['May 2']);
  });
});
