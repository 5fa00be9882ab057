import { buildDistribution } from '../canon/distribution';
import { cellText } from '../canon/values';
import type { NormalizedColumn } from '../canon/values';
import type { CanonicalTable, CategoryDistribution, CellValue, Diagnostic } from '../types/survey';
import { missingField } from './diagnostics';

export type SurveySummary = {
  totalResponses: number;
  uniqueTools: number | null;
  averageEaseOfUse: number | null;
  averageEfficiency: number | null;
  usageFrequency: CategoryDistribution | null;
  toolPopularity: CategoryDistribution | null;
};

type Feature = {
  name: keyof Omit<SurveySummary, 'totalResponses'>;
  field: string;
};

export const SUMMARY_FEATURES: Feature[] = [
  { name: 'uniqueTools', field: 'ai_tool' },
  { name: 'averageEaseOfUse', field: 'ease_of_use' },
  { name: 'averageEfficiency', field: 'efficiency' },
  { name: 'usageFrequency', field: 'usage_frequency' },
  { name: 'toolPopularity', field: 'ai_tool' }
];

const toNumber = (value: CellValue) => {
  if (typeof value === 'number') return value;
  if (typeof value !== 'string' || !value.trim()) return NaN;
  return Number(value.trim());
};

export const averageOf = (values: CellValue[]) => {
  const nums = values.map(toNumber).filter(n => Number.isFinite(n));
  if (!nums.length) return null;
  const mean = nums.reduce((acc, n) => acc + n, 0) / nums.length;
  return Math.round(mean * 10) / 10;
};

// Most used first; equal counts keep the order tools first appeared in.
export const popularity = (labels: string[]): CategoryDistribution => {
  const distribution = buildDistribution(labels);
  return { ...distribution, entries: [...distribution.entries].sort((a, b) => b.count - a.count) };
};

export const buildSummary = (
  table: CanonicalTable,
  normalized: Record<string, NormalizedColumn>
): { summary: SurveySummary; diagnostics: Diagnostic[] } => {
  const diagnostics: Diagnostic[] = [];
  const summary: SurveySummary = {
    totalResponses: table.rows.length,
    uniqueTools: null,
    averageEaseOfUse: null,
    averageEfficiency: null,
    usageFrequency: null,
    toolPopularity: null
  };

  const column = (field: string) => table.rows.map(row => row[field] ?? null);
  // Labels of the non-empty cells; raw text when the field has no value rule.
  const labelsOf = (field: string) => {
    const cells = column(field);
    const labels = normalized[field]?.labels ?? cells.map(cellText);
    return labels.filter((_label, index) => cellText(cells[index]) !== '');
  };

  // Recognised tools count once per label; unrecognised ones once per distinct name.
  const distinctTools = (field: string) => {
    const rule = normalized[field];
    const unmatched = new Set(rule?.unmatched ?? []);
    const keys = column(field).flatMap((cell, index) => {
      const text = cellText(cell);
      if (!text) return [];
      return [(rule && !unmatched.has(text) ? rule.labels[index] : text).toLowerCase()];
    });
    return new Set(keys).size;
  };

  SUMMARY_FEATURES.forEach(feature => {
    if (!table.columns.includes(feature.field)) {
      diagnostics.push(missingField(feature.name, feature.field, table.columns));
      return;
    }

    switch (feature.name) {
      case 'uniqueTools':
        summary.uniqueTools = distinctTools(feature.field);
        break;
      case 'averageEaseOfUse':
        summary.averageEaseOfUse = averageOf(column(feature.field));
        break;
      case 'averageEfficiency':
        summary.averageEfficiency = averageOf(column(feature.field));
        break;
      case 'usageFrequency':
        summary.usageFrequency = normalized[feature.field]?.distribution ?? buildDistribution(labelsOf(feature.field));
        break;
      case 'toolPopularity':
        summary.toolPopularity = popularity(labelsOf(feature.field));
        break;
    }
  });

  return { summary, diagnostics };
};
