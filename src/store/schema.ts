/**
 * Column layout of the call table. The order is what the dashboard reads;
 * new columns are only ever appended.
 */
import { z } from 'zod';
import { CALL_STATUSES, type CallRecord } from '../types/index.js';

export const COLUMNS = [
  ['timestamp', 'timestamp'],
  ['filename', 'filename'],
  ['callDate', 'call_date'],
  ['callTime', 'call_time'],
  ['callDatetime', 'call_datetime'],
  ['phoneNumber', 'phone_number'],
  ['callStatus', 'call_status'],
  ['agentName', 'agent_name'],
  ['estimatedDurationSeconds', 'estimated_duration_seconds'],
  ['fileSize', 'file_size'],
  ['durationSeconds', 'duration'],
  ['transcription', 'transcription'],
  ['diarizedTranscription', 'diarized_transcription'],
  ['speakerCount', 'speaker_count'],
  ['summary', 'summary'],
  ['intent', 'intent'],
  ['subIntent', 'sub_intent'],
  ['primaryDisposition', 'primary_disposition'],
  ['secondaryDisposition', 'secondary_disposition'],
  ['status', 'status'],
  ['processingTimeSeconds', 'processing_time'],
  ['errorMessage', 'error_message'],
  ['warningMessage', 'warning_message'],
] as const satisfies ReadonlyArray<readonly [keyof CallRecord, string]>;

export const COLUMN_NAMES: string[] = COLUMNS.map(([, column]) => column);

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

const numeric = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === '') {
      return 0;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${value}` });
      return z.NEVER;
    }
    return parsed;
  });

/**
 * One CSV row (column name -> raw cell) validated into a CallRecord.
 * Missing trailing columns are tolerated so older files still load.
 */
export const csvRowSchema = z
  .object({
    timestamp: z.string().min(1),
    filename: z.string().min(1),
    call_date: optionalText,
    call_time: optionalText,
    call_datetime: optionalText,
    phone_number: optionalText,
    call_status: optionalText,
    agent_name: optionalText,
    estimated_duration_seconds: numeric,
    file_size: numeric,
    duration: numeric,
    transcription: optionalText,
    diarized_transcription: optionalText,
    speaker_count: numeric,
    summary: optionalText,
    intent: optionalText,
    sub_intent: optionalText,
    primary_disposition: optionalText,
    secondary_disposition: optionalText,
    status: z.enum(['pending', 'processing', 'completed', 'failed']),
    processing_time: numeric,
    error_message: optionalText,
    warning_message: optionalText,
  })
  .transform(
    (row): CallRecord => ({
      timestamp: row.timestamp,
      filename: row.filename,
      callDate: row.call_date,
      callTime: row.call_time,
      callDatetime: row.call_datetime,
      phoneNumber: row.phone_number,
      callStatus: row.call_status,
      agentName: row.agent_name,
      estimatedDurationSeconds: row.estimated_duration_seconds,
      fileSize: row.file_size,
      durationSeconds: row.duration,
      transcription: row.transcription,
      diarizedTranscription: row.diarized_transcription,
      speakerCount: row.speaker_count,
      summary: row.summary,
      intent: row.intent,
      subIntent: row.sub_intent,
      primaryDisposition: row.primary_disposition,
      secondaryDisposition: row.secondary_disposition,
      status: row.status,
      processingTimeSeconds: row.processing_time,
      errorMessage: row.error_message,
      warningMessage: row.warning_message,
    })
  );

/**
 * Record-level invariants checked before anything is written.
 * Returns a description of the first violation, or undefined.
 */
export function recordViolation(record: CallRecord): string | undefined {
  if (!record.filename) {
    return 'filename is required';
  }
  if (!CALL_STATUSES.includes(record.status)) {
    return `unknown status "${record.status}"`;
  }
  const hasError = Boolean(record.errorMessage && record.errorMessage.trim());
  if (record.status === 'failed' && !hasError) {
    return 'failed records must carry an error message';
  }
  if (record.status !== 'failed' && hasError) {
    return `error message set on a ${record.status} record`;
  }
  return undefined;
}
