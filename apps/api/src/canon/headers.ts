import type { AliasField, AliasMatchMode, AliasTable, HeaderMatch } from '../types/survey';
import { escapePattern, toPattern } from '../utils/patterns';

/**
 * Folds a header (or alias) to the key used for matching: NFKC, lower-case,
 * letters and digits only. "AI Tool-Used", "ai_tool_used" and "AI　TOOL USED"
 * all become "aitoolused".
 */
export const normalizeHeader = (value: string) =>
  value
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]/gu, '');

// The canonical name always matches its own field, so canonical headers stay put.
const fieldPatterns = (field: AliasField, mode: AliasMatchMode) => {
  const self = mode === 'regex' ? escapePattern(normalizeHeader(field.name)) : field.name;
  return [self, ...field.aliases];
};

const matchesAlias = (normalized: string, pattern: string, mode: AliasMatchMode) => {
  if (mode === 'regex') return toPattern(pattern).test(normalized);
  const key = normalizeHeader(pattern);
  if (!key) return false;
  return mode === 'exact' ? normalized === key : normalized.includes(key);
};

export const canonicalizeHeader = (header: string, table: AliasTable): HeaderMatch => {
  const normalized = normalizeHeader(header);
  if (normalized) {
    for (const field of table.fields) {
      for (const pattern of fieldPatterns(field, table.matchMode)) {
        if (matchesAlias(normalized, pattern, table.matchMode)) {
          return { original: header, canonical: field.name, field: field.name, pattern };
        }
      }
    }
  }
  return { original: header, canonical: header, field: null, pattern: null };
};

export const canonicalizeHeaders = (headers: string[], table: AliasTable): HeaderMatch[] =>
  headers.map(header => canonicalizeHeader(header, table));
