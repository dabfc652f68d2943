import { serializeRecords } from '../store/csvCodec.js';
import type { CallRecord } from '../types/index.js';

export type ExportFormat = 'csv' | 'json';

export interface ExportFile {
  filename: string;
  contentType: string;
  body: string;
}

/**
 * Render records as a downloadable file. CSV keeps the store's column
 * layout; JSON wraps the records as `{ data, count }`.
 */
export function exportRecords(records: CallRecord[], format: ExportFormat, now: Date = new Date()): ExportFile {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  if (format === 'csv') {
    return {
      filename: `transcriptions_${stamp}.csv`,
      contentType: 'text/csv; charset=utf-8',
      body: serializeRecords(records),
    };
  }
  return {
    filename: `transcriptions_${stamp}.json`,
    contentType: 'application/json; charset=utf-8',
    body: JSON.stringify({ data: records, count: records.length }, null, 2),
  };
}
