import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { CallRecord } from '../types/index.js';
import { COLUMNS, COLUMN_NAMES, csvRowSchema } from './schema.js';

/**
 * One data row of the table. Rows that fail validation are kept as their
 * raw cells so rewriting the file leaves them as they were.
 */
export type TableRow =
  | { kind: 'record'; record: CallRecord }
  | { kind: 'raw'; row: number; reason: string; cells: Record<string, string> };

export interface ParsedTable {
  records: CallRecord[];
  /** Rows that failed validation, with their 1-based data row number. */
  rejected: Array<{ row: number; reason: string }>;
}

function cell(value: CallRecord[keyof CallRecord]): string {
  if (value === undefined) {
    return '';
  }
  return String(value);
}

export function rowFilename(row: TableRow): string {
  return row.kind === 'record' ? row.record.filename : (row.cells.filename ?? '');
}

export function serializeTable(rows: readonly TableRow[]): string {
  const cells = rows.map((row) => {
    if (row.kind === 'record') {
      const { record } = row;
      return COLUMNS.map(([field]) => cell(record[field]));
    }
    const { cells: raw } = row;
    return COLUMN_NAMES.map((column) => raw[column] ?? '');
  });
  return stringify(cells, { header: true, columns: COLUMN_NAMES });
}

export function serializeRecords(records: readonly CallRecord[]): string {
  return serializeTable(records.map((record) => ({ kind: 'record', record })));
}

export function parseTable(content: string): TableRow[] {
  if (!content.trim()) {
    return [];
  }

  const rows: Record<string, string>[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    bom: true,
  });

  return rows.map((cells, index): TableRow => {
    const parsed = csvRowSchema.safeParse(cells);
    if (parsed.success) {
      return { kind: 'record', record: parsed.data };
    }
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return { kind: 'raw', row: index + 1, reason, cells };
  });
}

export function parseRecords(content: string): ParsedTable {
  const records: CallRecord[] = [];
  const rejected: ParsedTable['rejected'] = [];
  for (const row of parseTable(content)) {
    if (row.kind === 'record') {
      records.push(row.record);
    } else {
      rejected.push({ row: row.row, reason: row.reason });
    }
  }
  return { records, rejected };
}
