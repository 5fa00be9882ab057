import type { AliasTable, CanonicalRow, CanonicalTable, HeaderMatch, RawTable } from '../types/survey';
import { canonicalizeHeaders } from './headers';
import { dedupeColumns, resolveCollisions } from './collisions';

const PREVIEW_LIMIT = 5;

export type CanonicalizationDebug = {
  originalHeaders: string[];
  canonicalHeaders: string[];
  mapping: HeaderMatch[];
  sampleRows: CanonicalRow[];
};

export type CanonicalizationResult = {
  table: CanonicalTable;
  debug: CanonicalizationDebug;
};

export const canonicalizeTable = (raw: RawTable, aliasTable: AliasTable): CanonicalizationResult => {
  const matches = canonicalizeHeaders(raw.headers, aliasTable);
  const finalNames = resolveCollisions(matches.map(m => m.canonical));

  const columns = dedupeColumns(finalNames.map((name, index) => ({ name, index })));
  const mapping = finalNames.map((canonical, index) => ({ ...matches[index], canonical }));

  // fromEntries defines own keys, so a column named "__proto__" keeps its cells.
  const rows = raw.rows.map(
    (cells): CanonicalRow => Object.fromEntries(columns.map(column => [column.name, cells[column.index] ?? null]))
  );

  return {
    table: { columns: columns.map(c => c.name), rows },
    debug: {
      originalHeaders: [...raw.headers],
      canonicalHeaders: columns.map(c => c.name),
      mapping,
      sampleRows: rows.slice(0, PREVIEW_LIMIT)
    }
  };
};

export const toRawTable = (table: CanonicalTable): RawTable => ({
  headers: [...table.columns],
  rows: table.rows.map(row => table.columns.map(column => row[column] ?? null))
});
