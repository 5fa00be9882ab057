export type CellValue = string | number | boolean | null;

// Every mode compares against the normalized header (letters and digits only), so a
// regex alias that needs a space or underscore can never match.
export type AliasMatchMode = 'substring' | 'regex' | 'exact';

export type AliasField = {
  name: string;
  aliases: string[];
};

export type AliasTable = {
  matchMode: AliasMatchMode;
  fields: AliasField[];
};

export type LabelRule = {
  pattern: string;
  label: string;
};

export type NumericHandling = {
  ordinals: Record<string, string>;
  template: string; // "{n}" is replaced by the number
};

export type NormalizationRule = {
  field: string;
  rules: LabelRule[];
  fallbackLabel: string;
  emptyLabel: string;
  displayOrder?: string[];
  numeric?: NumericHandling;
  aliases?: Record<string, string>;
  passthroughUnmatched?: boolean;
};

export type CategoryGroup = {
  category: string;
  patterns: string[];
};

export type ClassificationRule = {
  field: string;
  negativeTokens: string[];
  negativeCategory: string;
  groups: CategoryGroup[];
  catchAll: string;
};

export type RuleSet = {
  aliasTable: AliasTable;
  normalization: NormalizationRule[];
  classification: ClassificationRule[];
};

export type RawTable = {
  headers: string[];
  rows: CellValue[][];
  source?: string; // csv|excel|json|records
  fileName?: string;
};

export type CanonicalRow = Record<string, CellValue>;

export type CanonicalTable = {
  columns: string[];
  rows: CanonicalRow[];
};

export type HeaderMatch = {
  original: string;
  canonical: string;
  field: string | null;
  pattern: string | null;
};

export type DistributionEntry = {
  label: string;
  count: number;
  percentage: number; // one decimal
};

export type CategoryDistribution = {
  total: number;
  entries: DistributionEntry[];
};

export type Diagnostic =
  | {
      kind: 'MissingRequiredField';
      feature: string;
      field: string;
      availableFields: string[];
      suggestions: string[];
      message: string;
    }
  | {
      kind: 'UnclassifiableValue' | 'UnclassifiableText';
      field: string;
      count: number;
      samples: string[];
      message: string;
    };
