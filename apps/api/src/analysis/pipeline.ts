import { classifyColumn } from '../canon/classify';
import type { ClassifiedColumn } from '../canon/classify';
import { canonicalizeTable } from '../canon/table';
import type { CanonicalizationDebug } from '../canon/table';
import { normalizeColumn } from '../canon/values';
import type { NormalizedColumn } from '../canon/values';
import { EmptyInputError } from '../errors';
import type { CanonicalTable, Diagnostic, RawTable, RuleSet } from '../types/survey';
import { missingField, unclassifiable } from './diagnostics';
import { buildSummary } from './summary';
import type { SurveySummary } from './summary';

export type AnalysisOptions = {
  topLimit?: number;
};

export type AnalysisResult = {
  source?: string;
  fileName?: string;
  rowCount: number;
  table: CanonicalTable;
  normalized: Record<string, NormalizedColumn>;
  feedback: Record<string, ClassifiedColumn>;
  summary: SurveySummary;
  diagnostics: Diagnostic[];
  debug: CanonicalizationDebug;
};

/**
 * Runs one table through header canonicalization, value normalization and feedback
 * classification. Only an empty table is fatal; a missing field skips the features
 * that need it and is reported in `diagnostics`.
 */
export const analyzeTable = (raw: RawTable, rules: RuleSet, options: AnalysisOptions = {}): AnalysisResult => {
  if (!raw.rows.length) throw new EmptyInputError();

  const { table, debug } = canonicalizeTable(raw, rules.aliasTable);
  const diagnostics: Diagnostic[] = [];
  const column = (field: string) => table.rows.map(row => row[field] ?? null);

  const normalized: Record<string, NormalizedColumn> = {};
  rules.normalization.forEach(rule => {
    if (!table.columns.includes(rule.field)) {
      diagnostics.push(missingField(`normalize:${rule.field}`, rule.field, table.columns));
      return;
    }
    const result = normalizeColumn(column(rule.field), rule);
    normalized[rule.field] = result;
    if (result.unmatchedCount) {
      const bucket = rule.passthroughUnmatched ? 'their own value' : rule.fallbackLabel;
      diagnostics.push(unclassifiable('UnclassifiableValue', rule.field, result.unmatchedCount, result.unmatched, bucket));
    }
  });

  const feedback: Record<string, ClassifiedColumn> = {};
  rules.classification.forEach(rule => {
    if (!table.columns.includes(rule.field)) {
      diagnostics.push(missingField(`classify:${rule.field}`, rule.field, table.columns));
      return;
    }
    const result = classifyColumn(column(rule.field), rule, { topLimit: options.topLimit });
    feedback[rule.field] = result;
    if (result.unclassified) {
      diagnostics.push(
        unclassifiable('UnclassifiableText', rule.field, result.unclassified, result.unclassifiedSamples, rule.catchAll)
      );
    }
  });

  const { summary, diagnostics: summaryDiagnostics } = buildSummary(table, normalized);

  return {
    source: raw.source,
    fileName: raw.fileName,
    rowCount: table.rows.length,
    table,
    normalized,
    feedback,
    summary,
    diagnostics: [...diagnostics, ...summaryDiagnostics],
    debug
  };
};
