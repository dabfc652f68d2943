import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type {
  AdapterResult,
  CallRecord,
  Classification,
  Classifier,
  Disposition,
  Transcriber,
  TranscriptionOutput,
} from '../src/types/index.js';

export interface Workspace {
  root: string;
  intake: string;
  processed: string;
  csvFile: string;
  cleanup: () => Promise<void>;
}

/** Temp folder with intake/ and processed/ subfolders. */
export async function makeWorkspace(): Promise<Workspace> {
  const root = await mkdtemp(join(tmpdir(), 'call-pipeline-'));
  const intake = join(root, 'intake');
  const processed = join(root, 'processed');
  await mkdir(intake);
  await mkdir(processed);
  return {
    root,
    intake,
    processed,
    csvFile: join(root, 'transcriptions.csv'),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

export async function writeAudio(dir: string, filename: string, bytes = 128): Promise<string> {
  const path = join(dir, filename);
  await writeFile(path, Buffer.alloc(bytes, 1));
  return path;
}

/** Creates a complete CallRecord fixture. */
export function makeRecord(overrides?: Partial<CallRecord>): CallRecord {
  return {
    timestamp: '2024-03-10T12:00:00.000Z',
    filename: 'call.mp3',
    estimatedDurationSeconds: 0,
    fileSize: 2048,
    durationSeconds: 90,
    transcription: 'Hello, I need a roof repair quote.',
    speakerCount: 2,
    summary: 'Customer asked about a roof repair.',
    intent: 'ROOFING',
    subIntent: 'ROOF_REPAIR',
    status: 'completed',
    processingTimeSeconds: 4.2,
    ...overrides,
  };
}

export function transcriptOf(transcript: string, overrides?: Partial<TranscriptionOutput>): TranscriptionOutput {
  return {
    transcript,
    diarizedTranscript: transcript ? `Speaker 1: ${transcript}` : '',
    speakerCount: transcript ? 1 : 0,
    durationSeconds: 42.5,
    ...overrides,
  };
}

export function parsed(intent: string, subIntent: string, summary = 'Caller needs help.'): Classification {
  return {
    kind: 'parsed',
    fields: { summary, intent, subIntent, primaryDisposition: 'APPOINTMENT_SET', secondaryDisposition: 'IMMEDIATE' },
  };
}

export const retryable = (error: string) => ({ ok: false, retryable: true, error }) as const;
export const fatal = (error: string) => ({ ok: false, retryable: false, error }) as const;

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Transcriber that replays queued results, then repeats the default. An
 * optional gate holds every call until it is released.
 */
export class FakeTranscriber implements Transcriber {
  readonly calls: string[] = [];
  gate?: Promise<void>;
  private readonly queued: AdapterResult<TranscriptionOutput>[] = [];

  constructor(private readonly fallback: AdapterResult<TranscriptionOutput> = { ok: true, value: transcriptOf('Hello there.') }) {}

  enqueue(...results: AdapterResult<TranscriptionOutput>[]): this {
    this.queued.push(...results);
    return this;
  }

  async transcribe(path: string): Promise<AdapterResult<TranscriptionOutput>> {
    this.calls.push(path);
    if (this.gate) {
      await this.gate;
    }
    return this.queued.shift() ?? this.fallback;
  }
}

export class FakeClassifier implements Classifier {
  readonly classifyCalls: string[] = [];
  readonly dispositionCalls: Array<{ transcription: string; summary?: string }> = [];
  private readonly queued: AdapterResult<Classification>[] = [];
  dispositionResult: AdapterResult<Disposition> = { ok: true, value: { primary: 'CALLBACK_REQUESTED', secondary: 'FOLLOW_UP_REQUIRED' } };

  constructor(private readonly fallback: AdapterResult<Classification> = { ok: true, value: parsed('ROOFING', 'ROOF_REPAIR') }) {}

  enqueue(...results: AdapterResult<Classification>[]): this {
    this.queued.push(...results);
    return this;
  }

  async classify(transcription: string): Promise<AdapterResult<Classification>> {
    this.classifyCalls.push(transcription);
    return this.queued.shift() ?? this.fallback;
  }

  async classifyDisposition(transcription: string, summary?: string): Promise<AdapterResult<Disposition>> {
    this.dispositionCalls.push({ transcription, summary });
    return this.dispositionResult;
  }
}
