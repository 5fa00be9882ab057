import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { EmptyInputError, UnreadableSourceError, errorMessage } from '../errors';
import type { CellValue, RawTable } from '../types/survey';

const isMissing = (value: unknown) => value === null || value === undefined || String(value).trim() === '';

// Anything that is not a scalar is unreadable as a cell and is treated as empty.
export const toCell = (value: unknown): CellValue => {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  return null;
};

const headerName = (value: unknown, index: number) =>
  isMissing(value) ? `unnamed_${index + 1}` : String(value).trim();

export const tableFromMatrix = (headers: unknown[], rows: unknown[][], source: string): RawTable => {
  if (!headers.length) throw new EmptyInputError('Uploaded table has no header row.');

  const body = rows.filter(row => row.some(cell => !isMissing(cell)));
  if (!body.length) throw new EmptyInputError();

  return {
    headers: headers.map(headerName),
    rows: body.map(row => headers.map((_header, index) => toCell(row[index]))),
    source
  };
};

export const tableFromRecords = (records: Record<string, unknown>[], source = 'records'): RawTable => {
  const headers: string[] = [];
  records.forEach(record => {
    Object.keys(record).forEach(key => {
      if (!headers.includes(key)) headers.push(key);
    });
  });
  return tableFromMatrix(
    headers,
    records.map(record => headers.map(header => record[header])),
    source
  );
};

const recordsSchema = z.array(z.record(z.unknown()));
const matrixSchema = z.object({
  headers: z.array(z.string()),
  rows: z.array(z.array(z.unknown()))
});

/** Accepts either an array of records or `{ headers, rows }`. */
export const tableFromJson = (data: unknown, source = 'json'): RawTable => {
  const records = recordsSchema.safeParse(data);
  if (records.success) return tableFromRecords(records.data, source);

  const matrix = matrixSchema.safeParse(data);
  if (matrix.success) return tableFromMatrix(matrix.data.headers, matrix.data.rows, source);

  throw new UnreadableSourceError('Expected an array of records or an object with headers and rows.');
};

const parseCsv = (buffer: Buffer) => {
  const text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
  const parsed = Papa.parse<unknown[]>(text, {
    header: false,
    skipEmptyLines: 'greedy',
    dynamicTyping: false
  });

  // A single-column file has no delimiter to detect; papaparse reports that but parses fine.
  const fatal = parsed.errors.filter(e => e.type !== 'Delimiter');
  if (fatal.length) {
    throw new UnreadableSourceError(`CSV parse error: ${fatal[0].message}`);
  }
  return parsed.data || [];
};

const parseWorkbook = (buffer: Buffer) => {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer' });
  } catch (err) {
    throw new UnreadableSourceError(`Spreadsheet parse error: ${errorMessage(err, 'unknown error')}`);
  }
  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!worksheet) throw new UnreadableSourceError('Spreadsheet has no sheets.');
  return XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, defval: null, blankrows: false });
};

const parseJson = (buffer: Buffer) => {
  try {
    const data: unknown = JSON.parse(buffer.toString('utf-8'));
    return data;
  } catch (err) {
    throw new UnreadableSourceError(`JSON parse error: ${errorMessage(err, 'unknown error')}`);
  }
};

/**
 * Reads an uploaded file into a raw table: first row (or record keys) as headers,
 * duplicate headers kept as they are.
 */
export const ingestBuffer = (buffer: Buffer, filename: string): RawTable => {
  const lower = filename.toLowerCase();

  let table: RawTable;
  if (lower.endsWith('.xlsx') || lower.endsWith('.xls')) {
    const [headers = [], ...rows] = parseWorkbook(buffer);
    table = tableFromMatrix(headers, rows, 'excel');
  } else if (lower.endsWith('.csv') || lower.endsWith('.txt')) {
    const [headers = [], ...rows] = parseCsv(buffer);
    table = tableFromMatrix(headers, rows, 'csv');
  } else if (lower.endsWith('.json')) {
    table = tableFromJson(parseJson(buffer), 'json');
  } else {
    throw new UnreadableSourceError('Unsupported file format. Please upload CSV, Excel or JSON.');
  }

  return { ...table, fileName: filename };
};
