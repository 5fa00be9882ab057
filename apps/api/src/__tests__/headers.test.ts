import { describe, it, expect } from 'vitest';
import { canonicalizeHeader, canonicalizeHeaders, normalizeHeader } from '../canon/headers';
import type { AliasTable } from '../types/survey';

const surveyAliases: AliasTable = {
  matchMode: 'substring',
  fields: [
    { name: 'timestamp', aliases: ['date'] },
    { name: 'ai_tool', aliases: ['ai tool used'] },
    { name: 'usage_frequency', aliases: ['usage frequency'] }
  ]
};

describe('normalizeHeader', () => {
  it('lower-cases and drops separators and punctuation', () => {
    expect(normalizeHeader('AI Tool-Used')).toBe('aitoolused');
    expect(normalizeHeader('ai_tool_used')).toBe('aitoolused');
    expect(normalizeHeader('  Usage (Frequency)? ')).toBe('usagefrequency');
  });

  it('folds full-width characters and keeps non-latin letters', () => {
    expect(normalizeHeader('ＡＩ　Ｔｏｏｌ')).toBe('aitool');
    expect(normalizeHeader('Fréquence d’usage')).toBe('fréquencedusage');
  });
});

describe('canonicalizeHeaders', () => {
  it('maps aliases and passes unknown headers through verbatim', () => {
    const matches = canonicalizeHeaders(['Date', 'AI Tool Used', 'Favourite Colour'], surveyAliases);
    expect(matches.map(m => m.canonical)).toEqual(['timestamp', 'ai_tool', 'Favourite Colour']);
    expect(matches[2]).toEqual({ original: 'Favourite Colour', canonical: 'Favourite Colour', field: null, pattern: null });
  });

  it('is tolerant of casing and separators', () => {
    const matches = canonicalizeHeaders(['USAGE_FREQUENCY', 'usage-frequency (per week)'], surveyAliases);
    expect(matches.map(m => m.canonical)).toEqual(['usage_frequency', 'usage_frequency']);
  });

  it('maps canonical names onto themselves', () => {
    const matches = canonicalizeHeaders(['timestamp', 'ai_tool', 'usage_frequency'], surveyAliases);
    expect(matches.map(m => m.canonical)).toEqual(['timestamp', 'ai_tool', 'usage_frequency']);
  });

  it('prefers field declaration order over a longer, more specific alias', () => {
    const table: AliasTable = {
      matchMode: 'substring',
      fields: [
        { name: 'tool', aliases: ['tool'] },
        { name: 'ai_tool', aliases: ['ai tool used'] }
      ]
    };
    expect(canonicalizeHeader('AI Tool Used', table)).toMatchObject({ canonical: 'tool', pattern: 'tool' });
  });

  it('records which pattern matched, in pattern order within a field', () => {
    const table: AliasTable = {
      matchMode: 'substring',
      fields: [{ name: 'department', aliases: ['team', 'dept'] }]
    };
    expect(canonicalizeHeader('Dept / Team', table)).toMatchObject({ field: 'department', pattern: 'team' });
  });

  it('supports regular expressions against the normalized header', () => {
    const table: AliasTable = {
      matchMode: 'regex',
      fields: [{ name: 'usage_frequency', aliases: ['^how(often|frequently)'] }]
    };
    expect(canonicalizeHeader('How often do you use AI?', table).canonical).toBe('usage_frequency');
    expect(canonicalizeHeader('Tell us how often', table).canonical).toBe('Tell us how often');
  });

  it('supports exact normalized keys', () => {
    const table: AliasTable = {
      matchMode: 'exact',
      fields: [{ name: 'job_role', aliases: ['role'] }]
    };
    expect(canonicalizeHeader('Role', table).canonical).toBe('job_role');
    expect(canonicalizeHeader('Role in team', table).canonical).toBe('Role in team');
  });

  it('leaves headers with no letters or digits untouched', () => {
    expect(canonicalizeHeader('---', surveyAliases).canonical).toBe('---');
  });
});
