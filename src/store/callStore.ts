import type { CallRecord } from '../types/index.js';

/**
 * Persistent table of call records keyed by filename.
 */
export interface CallStore {
  /** Insert, or overwrite the row with the same filename. */
  upsert(record: CallRecord): Promise<void>;
  get(filename: string): Promise<CallRecord | undefined>;
  /** Every record, most recent timestamp first. */
  list(): Promise<CallRecord[]>;
  /** False when no row existed. */
  delete(filename: string): Promise<boolean>;
  /**
   * Case-insensitive substring match over transcription, summary, intent,
   * agent name and filename.
   */
  search(query: string): Promise<CallRecord[]>;
  ping(): Promise<boolean>;
  /** Create the backing table if it does not exist yet. */
  initialize(): Promise<void>;
}

export function sortNewestFirst(records: CallRecord[]): CallRecord[] {
  return [...records].sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp));
}

export function matchesQuery(record: CallRecord, query: string): boolean {
  const needle = query.trim().toLowerCase();
  if (!needle) {
    return false;
  }
  return [record.transcription, record.summary, record.intent, record.agentName, record.filename].some(
    (value) => value !== undefined && value.toLowerCase().includes(needle)
  );
}
