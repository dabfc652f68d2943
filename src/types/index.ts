/**
 * Type definitions for the call analytics pipeline
 */

export type CallStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const CALL_STATUSES: readonly CallStatus[] = ['pending', 'processing', 'completed', 'failed'];

/**
 * One row of the tabular store. `filename` is the unique key.
 */
export interface CallRecord {
  timestamp: string;
  filename: string;
  callDate?: string;
  callTime?: string;
  callDatetime?: string;
  phoneNumber?: string;
  callStatus?: string;
  agentName?: string;
  estimatedDurationSeconds: number;
  fileSize: number;
  durationSeconds: number;
  transcription?: string;
  diarizedTranscription?: string;
  speakerCount: number;
  summary?: string;
  intent?: string;
  subIntent?: string;
  primaryDisposition?: string;
  secondaryDisposition?: string;
  status: CallStatus;
  processingTimeSeconds: number;
  errorMessage?: string;
  warningMessage?: string;
}

export interface FilenameMetadata {
  callDate?: string;
  callTime?: string;
  callDatetime?: string;
  phoneNumber?: string;
  callStatus?: string;
  agentName?: string;
  estimatedDurationSeconds: number;
}

export interface SpeakerToken {
  text: string;
  speaker: string;
  startTime?: number;
  endTime?: number;
  isFinal?: boolean;
}

export interface TranscriptionOutput {
  transcript: string;
  diarizedTranscript: string;
  speakerCount: number;
  durationSeconds: number;
}

export interface ClassificationFields {
  summary: string;
  intent: string;
  subIntent: string;
  primaryDisposition?: string;
  secondaryDisposition?: string;
}

/**
 * Outcome of reading structured fields out of free-form model text.
 */
export type Classification =
  | { kind: 'parsed'; fields: ClassificationFields }
  | { kind: 'partial'; fields: ClassificationFields; warning: string }
  | { kind: 'unparsed'; raw: string; warning: string };

export interface Disposition {
  primary: string;
  secondary: string;
}

/**
 * Tagged result every vendor adapter returns instead of throwing.
 */
export type AdapterResult<T> =
  | { ok: true; value: T }
  | { ok: false; retryable: boolean; error: string };

export interface RemoteObjectRef {
  key: string;
  filename: string;
  size: number;
  lastModified: Date;
  downloaded: boolean;
}

export interface SyncReport {
  downloaded: number;
  skipped: number;
  failed: number;
}

export type PipelineStage =
  | 'discovered'
  | 'downloading'
  | 'transcribing'
  | 'classifying'
  | 'persisting'
  | 'completed'
  | 'failed'
  | 'abandoned';

export type JobOutcomeStatus = 'completed' | 'failed' | 'abandoned';

export interface JobOutcome {
  filename: string;
  status: JobOutcomeStatus;
  record?: CallRecord;
  error?: string;
}

export interface JobRequest {
  filename: string;
  remoteKey?: string;
}

export interface DateRange {
  startDate?: string;
  endDate?: string;
}

/**
 * Speech-to-text vendor as the pipeline sees it.
 */
export interface Transcriber {
  transcribe(audioFilePath: string): Promise<AdapterResult<TranscriptionOutput>>;
}

/**
 * LLM-backed classifier as the pipeline sees it.
 */
export interface Classifier {
  classify(transcript: string): Promise<AdapterResult<Classification>>;
  classifyDisposition(transcript: string, summary?: string): Promise<AdapterResult<Disposition>>;
}
