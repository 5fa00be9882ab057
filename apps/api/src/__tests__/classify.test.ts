import { describe, it, expect } from 'vitest';
import { classifyColumn, classifyText, topResponses } from '../canon/classify';
import { distributionToRecord } from '../canon/distribution';
import type { ClassificationRule } from '../types/survey';

const feedback: ClassificationRule = {
  field: 'suggestions',
  negativeTokens: ['none', 'no', 'n/a', 'nothing'],
  negativeCategory: 'No suggestions',
  groups: [
    { category: 'More training/guidance', patterns: ['training', 'guidance'] },
    { category: 'Cost reduction', patterns: ['cost', 'cheap', 'licen[cs]e'] }
  ],
  catchAll: 'Other'
};

describe('classifyText', () => {
  it('uses the first matching group', () => {
    expect(classifyText('Needs better TRAINING', feedback)).toBe('More training/guidance');
    expect(classifyText('cheaper licence', feedback)).toBe('Cost reduction');
    expect(classifyText('training would cut cost', feedback)).toBe('More training/guidance');
  });

  it('checks negative tokens before any keyword group', () => {
    expect(classifyText('no thanks', feedback)).toBe('No suggestions');
    expect(classifyText('No', feedback)).toBe('No suggestions');
    expect(classifyText(' N/A ', feedback)).toBe('No suggestions');
    expect(classifyText('none, training was fine', feedback)).toBe('No suggestions');
    expect(classifyText('nothing.', feedback)).toBe('No suggestions');
  });

  it('does not treat words that merely start with a token as negative', () => {
    expect(classifyText('notes on training', feedback)).toBe('More training/guidance');
    expect(classifyText('nonetheless cheaper plans', feedback)).toBe('Cost reduction');
  });

  it('routes unmatched, empty and non-text entries to the catch-all', () => {
    expect(classifyText('love it', feedback)).toBe('Other');
    expect(classifyText('', feedback)).toBe('Other');
    expect(classifyText(null, feedback)).toBe('Other');
    expect(classifyText(42, feedback)).toBe('Other');
    expect(classifyText({ text: 'training' }, feedback)).toBe('Other');
  });
});

describe('classifyColumn', () => {
  it('builds a distribution that sums to 100', () => {
    const result = classifyColumn(['needs better training', 'more training docs', 'cheaper license'], feedback);
    expect(result.categories).toEqual(['More training/guidance', 'More training/guidance', 'Cost reduction']);
    expect(distributionToRecord(result.distribution)).toEqual({
      'More training/guidance': 66.7,
      'Cost reduction': 33.3
    });
    expect(result.distribution.total).toBe(3);
  });

  it('lists categories in declaration order with the catch-all last', () => {
    const result = classifyColumn(['whatever', 'cost', 'none', 'guidance please'], feedback);
    expect(result.distribution.entries.map(e => e.label)).toEqual([
      'No suggestions',
      'More training/guidance',
      'Cost reduction',
      'Other'
    ]);
  });

  it('keeps going past malformed entries and counts them as unclassified', () => {
    const result = classifyColumn(['training', 7, undefined, 'love it'], feedback);
    expect(result.categories).toEqual(['More training/guidance', 'Other', 'Other', 'Other']);
    expect(result.unclassified).toBe(2);
    expect(result.unclassifiedSamples).toEqual(['7', 'love it']);
    expect(result.distribution.entries).toEqual([
      { label: 'More training/guidance', count: 1, percentage: 25 },
      { label: 'Other', count: 3, percentage: 75 }
    ]);
  });

  it('returns an empty distribution for an empty column', () => {
    const result = classifyColumn([], feedback);
    expect(result.distribution).toEqual({ total: 0, entries: [] });
    expect(result.topResponses).toEqual([]);
  });
});

describe('topResponses', () => {
  it('groups by case-folded text and keeps the first casing', () => {
    const values = ['More Training', 'cheaper', ' more training ', 'Cheaper', 'faster', 'MORE TRAINING', '', null];
    expect(topResponses(values)).toEqual([
      { text: 'More Training', count: 3 },
      { text: 'cheaper', count: 2 },
      { text: 'faster', count: 1 }
    ]);
  });

  it('breaks ties by first appearance and honours the limit', () => {
    expect(topResponses(['b', 'a', 'c', 'a', 'b'], 2)).toEqual([
      { text: 'b', count: 2 },
      { text: 'a', count: 2 }
    ]);
  });
});
