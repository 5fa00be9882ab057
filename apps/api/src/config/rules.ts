import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { InvalidRuleSetError } from '../errors';
import type { ClassificationRule, NormalizationRule, RuleSet } from '../types/survey';
import { isValidPattern } from '../utils/patterns';

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../config/survey-rules.json', import.meta.url));

const pattern = z.string().min(1).refine(isValidPattern, value => ({ message: `Invalid pattern: ${value}` }));

const aliasTableSchema = z.object({
  matchMode: z.enum(['substring', 'regex', 'exact']).default('substring'),
  // Matching is never case sensitive; the option is accepted only so configs can say so.
  caseSensitive: z.literal(false).optional(),
  fields: z
    .array(z.object({ name: z.string().min(1), aliases: z.array(z.string().min(1)).default([]) }))
    .min(1)
});

const normalizationSchema = z.object({
  field: z.string().min(1),
  rules: z.array(z.object({ pattern, label: z.string().min(1) })),
  fallbackLabel: z.string().min(1).default('Other'),
  emptyLabel: z.string().min(1).default('Not specified'),
  displayOrder: z.array(z.string()).optional(),
  numeric: z
    .object({
      ordinals: z.record(z.string()).default({}),
      template: z.string().default('{n} times')
    })
    .optional(),
  aliases: z.record(z.string()).optional(),
  passthroughUnmatched: z.boolean().optional()
});

const classificationSchema = z.object({
  field: z.string().min(1),
  negativeTokens: z.array(z.string().min(1)).default([]),
  negativeCategory: z.string().min(1).default('No suggestions'),
  groups: z.array(z.object({ category: z.string().min(1), patterns: z.array(pattern).min(1) })),
  catchAll: z.string().min(1).default('Other')
});

const ruleSetSchema = z.object({
  aliasTable: aliasTableSchema,
  normalization: z.array(normalizationSchema).default([]),
  classification: z.array(classificationSchema).default([])
});

// Literal whitespace or underscore outside escapes and character classes.
const hasSeparatorLiteral = (alias: string) => /[\s_]/.test(alias.replace(/\\./g, '').replace(/\[[^\]]*\]/g, ''));

const duplicates = (names: string[]) => names.filter((name, index) => names.indexOf(name) !== index);

export const parseRuleSet = (data: unknown): RuleSet => {
  const parsed = ruleSetSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidRuleSetError(`Invalid rule set at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }

  const { aliasTable, normalization, classification } = parsed.data;
  const dupFields = duplicates(aliasTable.fields.map(f => f.name));
  if (dupFields.length) {
    throw new InvalidRuleSetError(`Canonical field declared more than once: ${dupFields.join(', ')}`);
  }
  if (aliasTable.matchMode === 'regex') {
    const aliases = aliasTable.fields.flatMap(f => f.aliases);
    const bad = aliases.find(alias => !isValidPattern(alias));
    if (bad) throw new InvalidRuleSetError(`Invalid alias pattern: ${bad}`);
    const unmatchable = aliases.find(hasSeparatorLiteral);
    if (unmatchable) {
      throw new InvalidRuleSetError(
        `Alias pattern "${unmatchable}" can never match: headers are compared with spaces and punctuation removed`
      );
    }
  }
  const dupRules = duplicates([...normalization, ...classification].map(r => r.field));
  if (dupRules.length) {
    throw new InvalidRuleSetError(`More than one value rule for field: ${dupRules.join(', ')}`);
  }

  return {
    aliasTable: { matchMode: aliasTable.matchMode, fields: aliasTable.fields },
    normalization,
    classification
  };
};

export const loadRuleSet = (filePath: string = DEFAULT_RULES_PATH): RuleSet => {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidRuleSetError(`Cannot read rule file ${filePath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidRuleSetError(`Rule file ${filePath} is not valid JSON: ${reason}`);
  }
  return parseRuleSet(data);
};

export const findNormalizationRule = (rules: RuleSet, field: string): NormalizationRule | undefined =>
  rules.normalization.find(rule => rule.field === field);

export const findClassificationRule = (rules: RuleSet, field: string): ClassificationRule | undefined =>
  rules.classification.find(rule => rule.field === field);
