import type { CategoryDistribution, ClassificationRule } from '../types/survey';
import { toPattern } from '../utils/patterns';
import { buildDistribution } from './distribution';

const DEFAULT_TOP_LIMIT = 10;

const asText = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : '');

// "no", "no thanks", "none." and "n/a - all good" lead with a negative token; "notes on x" does not.
const startsWithToken = (text: string, token: string) => {
  const normalized = token.trim().toLowerCase();
  if (!normalized || !text.startsWith(normalized)) return false;
  const next = text.charAt(normalized.length);
  return next === '' || !/[\p{L}\p{N}]/u.test(next);
};

export const isNegativeResponse = (value: unknown, rule: ClassificationRule) => {
  const text = asText(value);
  return Boolean(text) && rule.negativeTokens.some(token => startsWithToken(text, token));
};

/**
 * Assigns exactly one category. Negative tokens are checked before any pattern
 * group; anything that is not a non-empty string lands in the catch-all.
 */
export const classifyText = (value: unknown, rule: ClassificationRule): string => {
  const text = asText(value);
  if (!text) return rule.catchAll;
  if (isNegativeResponse(text, rule)) return rule.negativeCategory;

  const group = rule.groups.find(g => g.patterns.some(pattern => toPattern(pattern).test(text)));
  return group ? group.category : rule.catchAll;
};

export type TopResponse = {
  text: string;
  count: number;
};

/**
 * Most frequent raw responses, grouped by their case-folded trimmed form. The casing
 * shown is the first one seen; ties keep first-seen order.
 */
export const topResponses = (values: unknown[], limit = DEFAULT_TOP_LIMIT): TopResponse[] => {
  const groups = new Map<string, { text: string; count: number; firstSeen: number }>();
  values.forEach((value, index) => {
    if (typeof value !== 'string') return;
    const display = value.trim();
    if (!display) return;
    const key = display.toLowerCase();
    const group = groups.get(key);
    if (group) group.count += 1;
    else groups.set(key, { text: display, count: 1, firstSeen: index });
  });

  return Array.from(groups.values())
    .sort((a, b) => b.count - a.count || a.firstSeen - b.firstSeen)
    .slice(0, limit)
    .map(({ text, count }) => ({ text, count }));
};

export type ClassifiedColumn = {
  field: string;
  categories: string[];
  distribution: CategoryDistribution;
  unclassified: number;
  unclassifiedSamples: string[];
  topResponses: TopResponse[];
};

export const classifyColumn = (
  values: unknown[],
  rule: ClassificationRule,
  options: { topLimit?: number } = {}
): ClassifiedColumn => {
  const categories = values.map(value => classifyText(value, rule));

  const unclassifiedSamples: string[] = [];
  let unclassified = 0;
  categories.forEach((category, index) => {
    const raw = values[index];
    if (category !== rule.catchAll || raw === null || raw === undefined) return;
    const text = typeof raw === 'string' ? raw.trim() : String(raw);
    if (!text) return;
    unclassified += 1;
    if (unclassifiedSamples.length < 5 && !unclassifiedSamples.includes(text)) unclassifiedSamples.push(text);
  });

  const distribution = buildDistribution(categories, {
    order: [rule.negativeCategory, ...rule.groups.map(g => g.category)],
    trailing: [rule.catchAll]
  });

  return {
    field: rule.field,
    categories,
    distribution,
    unclassified,
    unclassifiedSamples,
    topResponses: topResponses(values, options.topLimit ?? DEFAULT_TOP_LIMIT)
  };
};
