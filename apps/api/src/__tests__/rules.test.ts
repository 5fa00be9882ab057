import { describe, it, expect } from 'vitest';
import { findClassificationRule, findNormalizationRule, loadRuleSet, parseRuleSet } from '../config/rules';
import { InvalidRuleSetError } from '../errors';

const minimal = {
  aliasTable: { fields: [{ name: 'ai_tool', aliases: ['tool'] }] }
};

describe('loadRuleSet', () => {
  it('loads the bundled survey rules', () => {
    const rules = loadRuleSet();
    expect(rules.aliasTable.matchMode).toBe('substring');
    expect(rules.aliasTable.fields.map(f => f.name)).toEqual([
      'timestamp',
      'department',
      'job_role',
      'purpose',
      'usage_frequency',
      'ease_of_use',
      'efficiency',
      'suggestions',
      'ai_tool'
    ]);
    expect(findNormalizationRule(rules, 'usage_frequency')?.displayOrder).toEqual([
      'Daily',
      'Weekly',
      'Monthly',
      'Rarely',
      'Never'
    ]);
    expect(findClassificationRule(rules, 'suggestions')?.negativeCategory).toBe('No suggestions');
  });

  it('reports a missing rule file', () => {
    expect(() => loadRuleSet('/nonexistent/rules.json')).toThrow(InvalidRuleSetError);
  });
});

describe('parseRuleSet', () => {
  it('fills in defaults', () => {
    const rules = parseRuleSet(minimal);
    expect(rules).toEqual({
      aliasTable: { matchMode: 'substring', fields: [{ name: 'ai_tool', aliases: ['tool'] }] },
      normalization: [],
      classification: []
    });
  });

  it('rejects duplicate canonical fields', () => {
    const data = { aliasTable: { fields: [{ name: 'a', aliases: [] }, { name: 'a', aliases: ['x'] }] } };
    expect(() => parseRuleSet(data)).toThrow('Canonical field declared more than once: a');
  });

  it('rejects invalid value patterns', () => {
    const data = {
      ...minimal,
      normalization: [{ field: 'ai_tool', rules: [{ pattern: '(unclosed', label: 'X' }] }]
    };
    expect(() => parseRuleSet(data)).toThrow(/Invalid pattern: \(unclosed/);
  });

  it('rejects invalid alias patterns in regex mode', () => {
    const data = { aliasTable: { matchMode: 'regex', fields: [{ name: 'a', aliases: ['[oops'] }] } };
    expect(() => parseRuleSet(data)).toThrow('Invalid alias pattern: [oops');
  });

  it('rejects regex aliases that need a space or underscore', () => {
    const data = { aliasTable: { matchMode: 'regex', fields: [{ name: 'ai_tool', aliases: ['^ai tool used'] }] } };
    expect(() => parseRuleSet(data)).toThrow(
      'Alias pattern "^ai tool used" can never match: headers are compared with spaces and punctuation removed'
    );
  });

  it('allows optional separators inside character classes', () => {
    const data = { aliasTable: { matchMode: 'regex', fields: [{ name: 'ai_tool', aliases: ['^(ai)?tool', 'tool[ _]?name'] }] } };
    expect(parseRuleSet(data).aliasTable.fields[0].aliases).toEqual(['^(ai)?tool', 'tool[ _]?name']);
  });

  it('only accepts case-insensitive matching', () => {
    const data = { aliasTable: { ...minimal.aliasTable, caseSensitive: true } };
    expect(() => parseRuleSet(data)).toThrow(InvalidRuleSetError);
  });

  it('rejects two rules for the same field', () => {
    const data = {
      ...minimal,
      normalization: [{ field: 'ai_tool', rules: [] }],
      classification: [{ field: 'ai_tool', groups: [] }]
    };
    expect(() => parseRuleSet(data)).toThrow('More than one value rule for field: ai_tool');
  });
});
