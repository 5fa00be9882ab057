import type { CategoryDistribution, CellValue, NormalizationRule, NumericHandling } from '../types/survey';
import { toPattern } from '../utils/patterns';
import { buildDistribution } from './distribution';

const NUMERIC = /^\d+(\.\d+)?$/;

export const cellText = (value: CellValue | undefined) =>
  value === null || value === undefined ? '' : String(value).trim();

const numericLabel = (text: string, numeric: NumericHandling) => {
  if (!NUMERIC.test(text)) return null;
  const key = String(Number(text));
  return numeric.ordinals[key] ?? numeric.template.replace('{n}', key);
};

const applyAliases = (label: string, aliases?: Record<string, string>) => {
  if (!aliases) return label;
  const key = label.toLowerCase();
  for (const [alias, canonical] of Object.entries(aliases)) {
    if (alias.toLowerCase() === key) return canonical;
  }
  return label;
};

const lookupLabel = (text: string, rule: NormalizationRule) => {
  const value = text.toLowerCase();
  if (rule.numeric) {
    const label = numericLabel(value, rule.numeric);
    if (label) return { label, matched: true };
  }
  for (const { pattern, label } of rule.rules) {
    if (toPattern(pattern).test(value)) return { label, matched: true };
  }
  return { label: rule.passthroughUnmatched ? text : rule.fallbackLabel, matched: false };
};

/**
 * Maps one cell onto the rule's vocabulary. Empty cells get `emptyLabel`, cells that
 * match nothing get `fallbackLabel` (or their trimmed text under `passthroughUnmatched`).
 */
export const normalizeValue = (value: CellValue | undefined, rule: NormalizationRule): string => {
  const text = cellText(value);
  if (!text) return rule.emptyLabel;
  return applyAliases(lookupLabel(text, rule).label, rule.aliases);
};

export type NormalizedColumn = {
  field: string;
  labels: string[];
  // distinct trimmed raw value -> label
  mapping: Record<string, string>;
  distribution: CategoryDistribution;
  unmatched: string[];
  unmatchedCount: number;
};

const ruleLabels = (rule: NormalizationRule) => {
  if (rule.displayOrder?.length) return rule.displayOrder;
  return Array.from(new Set(rule.rules.map(r => applyAliases(r.label, rule.aliases))));
};

export const normalizeColumn = (values: Array<CellValue | undefined>, rule: NormalizationRule): NormalizedColumn => {
  const unmatched: string[] = [];
  const mapping = new Map<string, string>();
  let unmatchedCount = 0;
  const labels = values.map(value => {
    const text = cellText(value);
    const label = normalizeValue(value, rule);
    if (!text) return label;
    mapping.set(text, label);
    if (!lookupLabel(text, rule).matched) {
      unmatchedCount += 1;
      if (!unmatched.includes(text)) unmatched.push(text);
    }
    return label;
  });

  const distribution = buildDistribution(labels, {
    order: ruleLabels(rule),
    trailing: rule.passthroughUnmatched ? [rule.emptyLabel] : [rule.fallbackLabel, rule.emptyLabel],
    includeZero: Boolean(rule.displayOrder?.length)
  });

  return { field: rule.field, labels, mapping: Object.fromEntries(mapping), distribution, unmatched, unmatchedCount };
};
