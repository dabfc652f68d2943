/**
 * Call processor - Orchestrates the processing pipeline
 *
 * Each file moves through discovered -> (downloading) -> transcribing ->
 * classifying -> persisting -> completed, or ends failed/abandoned. At most
 * one job per filename is in flight; jobs wait in a FIFO queue for one of
 * `concurrency` worker slots.
 */
import { EventEmitter } from 'events';
import { join } from 'path';
import { isSupportedAudioFile } from '../config/env.js';
import type { CallStore } from '../store/callStore.js';
import { filterByDateRange } from '../services/analytics.js';
import {
  FALLBACK_INTENT,
  UNKNOWN_SUB_INTENT,
} from '../services/taxonomy.js';
import { firstSentence } from '../services/classificationParser.js';
import type {
  AdapterResult,
  CallRecord,
  Classification,
  Classifier,
  DateRange,
  JobOutcome,
  JobRequest,
  PipelineStage,
  Transcriber,
} from '../types/index.js';
import { FileManager } from '../utils/fileManager.js';
import { NotFoundError, ValidationError, errorMessage } from '../utils/errors.js';
import { parseFilenameMetadata } from '../utils/filenameMetadata.js';
import { formatFileSize, round } from '../utils/format.js';
import { logger as rootLogger } from '../utils/logger.js';
import { sleep as defaultSleep, withRetry, type Sleep } from '../utils/retry.js';

const logger = rootLogger.child('pipeline');

export const EMPTY_TRANSCRIPT_SUMMARY = 'No transcription available for analysis';

export interface RemoteDownloader {
  download(key: string): Promise<AdapterResult<string>>;
}

export interface ProcessorSettings {
  intakeDir: string;
  processedDir: string;
  /** Attempts per adapter call, including the first. */
  maxRetries: number;
  retryDelayMs: number;
  maxFileSizeBytes: number;
  concurrency: number;
  storeWriteAttempts?: number;
}

export interface ProcessorDeps {
  store: CallStore;
  transcriber: Transcriber;
  classifier: Classifier;
  downloader?: RemoteDownloader;
  settings: ProcessorSettings;
  sleep?: Sleep;
}

export interface JobHandle {
  filename: string;
  done: Promise<JobOutcome>;
}

export type SubmitResult =
  | { accepted: true; job: JobHandle }
  | { accepted: false; reason: 'in-flight'; job: JobHandle };

export type ReprocessOutcome = 'accepted' | 'queued';

export interface JobStatus {
  filename: string;
  stage: PipelineStage;
  startedAt: string;
  remoteKey?: string;
  rerunRequested: boolean;
}

export interface PipelineStatus {
  inFlight: JobStatus[];
  queueLength: number;
  activeWorkers: number;
  concurrency: number;
}

export interface StageEvent {
  filename: string;
  stage: PipelineStage;
}

interface PipelineJob {
  filename: string;
  remoteKey?: string;
  stage: PipelineStage;
  startedAt: Date;
  abandoned: boolean;
  rerunRequested: boolean;
  done: Promise<JobOutcome>;
  resolve: (outcome: JobOutcome) => void;
}

/** Thrown inside a run to end it as failed with this message. */
class JobFailure extends Error {}

export class CallProcessor extends EventEmitter {
  private readonly store: CallStore;
  private readonly transcriber: Transcriber;
  private readonly classifier: Classifier;
  private readonly downloader?: RemoteDownloader;
  private readonly settings: Required<ProcessorSettings>;
  private readonly sleep: Sleep;

  private readonly inFlight = new Map<string, PipelineJob>();
  private readonly queue: PipelineJob[] = [];
  private active = 0;

  constructor(deps: ProcessorDeps) {
    super();
    this.store = deps.store;
    this.transcriber = deps.transcriber;
    this.classifier = deps.classifier;
    this.downloader = deps.downloader;
    this.settings = {
      ...deps.settings,
      concurrency: Math.max(1, deps.settings.concurrency),
      storeWriteAttempts: deps.settings.storeWriteAttempts ?? 3,
    };
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Queue a file for processing unless a job for it is already in flight.
   */
  submit(request: JobRequest): SubmitResult {
    assertPlainFilename(request.filename);
    const existing = this.inFlight.get(request.filename);
    if (existing) {
      logger.debug(`${request.filename} is already in flight`);
      return { accepted: false, reason: 'in-flight', job: this.handle(existing) };
    }
    const job = this.reserve(request);
    this.enqueue(job);
    return { accepted: true, job: this.handle(job) };
  }

  isInFlight(filename: string): boolean {
    return this.inFlight.has(filename);
  }

  /**
   * Run a file through the pipeline again. While a job for it is in flight,
   * a single rerun is scheduled for when that job ends.
   */
  async reprocess(filename: string): Promise<ReprocessOutcome> {
    assertPlainFilename(filename);
    if (this.requestRerun(filename)) {
      return 'queued';
    }

    const intakePath = join(this.settings.intakeDir, filename);
    const processedPath = join(this.settings.processedDir, filename);
    const [existing, inIntake, inProcessed] = await Promise.all([
      this.store.get(filename),
      FileManager.fileExists(intakePath),
      FileManager.fileExists(processedPath),
    ]);

    if (!existing && !inIntake && !inProcessed) {
      throw new NotFoundError(`No record or source file for ${filename}`);
    }
    if (this.requestRerun(filename)) {
      return 'queued';
    }

    const job = this.reserve({ filename });
    try {
      if (!inIntake && inProcessed) {
        await FileManager.moveFile(processedPath, intakePath);
      }
      if (existing) {
        await this.store.upsert({
          ...existing,
          timestamp: new Date().toISOString(),
          status: 'pending',
          errorMessage: undefined,
          warningMessage: undefined,
        });
      }
    } catch (error) {
      this.settle(job, { filename, status: 'failed', error: errorMessage(error) });
      throw error;
    }

    this.enqueue(job);
    logger.info(`Reprocessing ${filename}`);
    return 'accepted';
  }

  /**
   * Remove a file's row. An in-flight job is abandoned at its next stage
   * boundary and allowed to settle first. A source file still in the intake
   * folder is moved to the processed folder so the watcher does not pick it
   * up again. Returns false when no row existed.
   */
  async delete(filename: string): Promise<boolean> {
    assertPlainFilename(filename);
    let job = this.inFlight.get(filename);
    while (job) {
      logger.info(`Abandoning in-flight job for ${filename}`);
      job.abandoned = true;
      job.rerunRequested = false;
      await job.done;
      job = this.inFlight.get(filename);
    }
    const removed = await this.store.delete(filename);
    if (removed) {
      logger.info(`Deleted record for ${filename}`);
      await this.archive(join(this.settings.intakeDir, filename), filename);
    }
    return removed;
  }

  /**
   * Fill in missing dispositions for transcribed rows that aren't in flight.
   * Returns how many rows were updated.
   */
  async backfillDispositions(range?: DateRange): Promise<number> {
    const candidates = filterByDateRange(await this.store.list(), range).filter(
      (record) =>
        record.status === 'completed' &&
        record.transcription &&
        (!record.primaryDisposition || !record.secondaryDisposition)
    );

    if (candidates.length === 0) {
      logger.info('No calls need disposition classification');
      return 0;
    }
    logger.info(`Classifying dispositions for ${candidates.length} call(s)...`);

    let updated = 0;
    for (const candidate of candidates) {
      if (this.inFlight.has(candidate.filename)) {
        continue;
      }
      const result = await this.retrying('disposition', candidate.filename, () =>
        this.classifier.classifyDisposition(candidate.transcription ?? '', candidate.summary)
      );
      if (!result.ok) {
        logger.warn(`Disposition classification failed for ${candidate.filename}: ${result.error}`);
        continue;
      }

      const current = await this.store.get(candidate.filename);
      if (!current || current.status !== 'completed' || this.inFlight.has(candidate.filename)) {
        continue;
      }
      await this.store.upsert({
        ...current,
        primaryDisposition: result.value.primary,
        secondaryDisposition: result.value.secondary,
      });
      updated += 1;
    }

    logger.info(`Completed disposition classification for ${updated} call(s)`);
    return updated;
  }

  status(): PipelineStatus {
    return {
      inFlight: [...this.inFlight.values()].map((job) => ({
        filename: job.filename,
        stage: job.stage,
        startedAt: job.startedAt.toISOString(),
        remoteKey: job.remoteKey,
        rerunRequested: job.rerunRequested,
      })),
      queueLength: this.queue.length,
      activeWorkers: this.active,
      concurrency: this.settings.concurrency,
    };
  }

  /**
   * Resolves once nothing is in flight, including reruns scheduled meanwhile.
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()].map((job) => job.done));
    }
  }

  private handle(job: PipelineJob): JobHandle {
    return { filename: job.filename, done: job.done };
  }

  private requestRerun(filename: string): boolean {
    const job = this.inFlight.get(filename);
    if (!job) {
      return false;
    }
    job.rerunRequested = true;
    logger.info(`${filename} is in flight; rerun queued`);
    return true;
  }

  private reserve(request: JobRequest): PipelineJob {
    let resolve: (outcome: JobOutcome) => void = () => undefined;
    const done = new Promise<JobOutcome>((res) => {
      resolve = res;
    });
    const job: PipelineJob = {
      filename: request.filename,
      remoteKey: request.remoteKey,
      stage: 'discovered',
      startedAt: new Date(),
      abandoned: false,
      rerunRequested: false,
      done,
      resolve,
    };
    this.inFlight.set(job.filename, job);
    this.emitStage(job, 'discovered');
    return job;
  }

  private enqueue(job: PipelineJob): void {
    this.queue.push(job);
    this.drain();
  }

  private drain(): void {
    while (this.active < this.settings.concurrency) {
      const job = this.queue.shift();
      if (!job) {
        return;
      }
      this.active += 1;
      void this.run(job)
        .catch((error) => logger.error(`Worker error on ${job.filename}:`, errorMessage(error)))
        .finally(() => {
          this.active -= 1;
          this.drain();
        });
    }
  }

  private async run(job: PipelineJob): Promise<void> {
    let outcome: JobOutcome;
    try {
      outcome = await this.execute(job);
    } catch (error) {
      logger.error(`Unexpected failure processing ${job.filename}:`, errorMessage(error));
      outcome = { filename: job.filename, status: 'failed', error: errorMessage(error) };
    }

    this.inFlight.delete(job.filename);
    if (job.rerunRequested && !job.abandoned) {
      try {
        await this.reprocess(job.filename);
      } catch (error) {
        logger.error(`Queued rerun of ${job.filename} could not start:`, errorMessage(error));
      }
    }
    this.settle(job, outcome);
  }

  private settle(job: PipelineJob, outcome: JobOutcome): void {
    if (this.inFlight.get(job.filename) === job) {
      this.inFlight.delete(job.filename);
    }
    job.resolve(outcome);
    this.emit('job:done', outcome);
  }

  private emitStage(job: PipelineJob, stage: PipelineStage): void {
    job.stage = stage;
    const event: StageEvent = { filename: job.filename, stage };
    this.emit('job:stage', event);
  }

  private async execute(job: PipelineJob): Promise<JobOutcome> {
    const { filename } = job;
    const startedMs = Date.now();
    const sourcePath = join(this.settings.intakeDir, filename);

    if (job.abandoned) {
      return this.abandon(job);
    }

    const record: CallRecord = {
      timestamp: new Date().toISOString(),
      filename,
      ...parseFilenameMetadata(filename),
      fileSize: 0,
      durationSeconds: 0,
      speakerCount: 0,
      status: 'processing',
      processingTimeSeconds: 0,
    };

    logger.info(`Processing ${filename}`);

    try {
      await this.persist(record);

      if (job.remoteKey && !(await FileManager.fileExists(sourcePath))) {
        this.emitStage(job, 'downloading');
        await this.download(job.remoteKey, filename);
        if (job.abandoned) return this.abandon(job);
      }

      record.fileSize = await this.precheck(sourcePath, filename);
      if (job.abandoned) return this.abandon(job);

      this.emitStage(job, 'transcribing');
      const transcription = await this.retrying('transcription', filename, () =>
        this.transcriber.transcribe(sourcePath)
      );
      if (!transcription.ok) {
        throw new JobFailure(transcription.error);
      }
      record.transcription = transcription.value.transcript || undefined;
      record.diarizedTranscription = transcription.value.diarizedTranscript || undefined;
      record.speakerCount = transcription.value.speakerCount;
      record.durationSeconds = round(transcription.value.durationSeconds, 2);
      if (job.abandoned) return this.abandon(job);

      this.emitStage(job, 'classifying');
      await this.classifyInto(record, filename);
      if (job.abandoned) return this.abandon(job);

      this.emitStage(job, 'persisting');
      record.status = 'completed';
      record.processingTimeSeconds = round((Date.now() - startedMs) / 1000, 2);
      await this.persist(record);
    } catch (error) {
      if (!(error instanceof JobFailure)) {
        throw error;
      }
      return this.fail(job, record, error.message, startedMs);
    }

    await this.archive(sourcePath, filename);
    this.emitStage(job, 'completed');
    logger.success(
      `Completed ${filename}: ${record.intent ?? FALLBACK_INTENT}/${record.subIntent ?? UNKNOWN_SUB_INTENT} in ${record.processingTimeSeconds}s`
    );
    return { filename, status: 'completed', record };
  }

  private async download(key: string, filename: string): Promise<void> {
    if (!this.downloader) {
      throw new JobFailure('Remote download requested but remote sync is not configured');
    }
    const downloader = this.downloader;
    const result = await this.retrying('download', filename, () => downloader.download(key));
    if (!result.ok) {
      throw new JobFailure(result.error);
    }
  }

  private async precheck(sourcePath: string, filename: string): Promise<number> {
    if (!isSupportedAudioFile(filename)) {
      throw new JobFailure(`Unsupported file type: ${filename}`);
    }
    const size = await FileManager.fileSize(sourcePath);
    if (size === undefined) {
      throw new JobFailure(`File not found: ${filename}`);
    }
    if (size === 0) {
      throw new JobFailure(`File is empty: ${filename}`);
    }
    if (size > this.settings.maxFileSizeBytes) {
      throw new JobFailure(
        `File too large: ${formatFileSize(size)} exceeds ${formatFileSize(this.settings.maxFileSizeBytes)}`
      );
    }
    return size;
  }

  private async classifyInto(record: CallRecord, filename: string): Promise<void> {
    if (!record.transcription) {
      record.summary = EMPTY_TRANSCRIPT_SUMMARY;
      record.intent = FALLBACK_INTENT;
      record.subIntent = UNKNOWN_SUB_INTENT;
      record.warningMessage = 'Empty transcription; classification skipped';
      logger.warn(`${filename}: empty transcription, classification skipped`);
      return;
    }

    const transcript = record.transcription;
    const result = await this.retrying('classification', filename, () =>
      this.classifier.classify(transcript)
    );
    if (!result.ok) {
      throw new JobFailure(result.error);
    }
    applyClassification(record, result.value);
  }

  private async fail(job: PipelineJob, record: CallRecord, error: string, startedMs: number): Promise<JobOutcome> {
    logger.error(`Failed ${job.filename}: ${error}`);
    if (job.abandoned) {
      return this.abandon(job);
    }
    const failed: CallRecord = {
      ...record,
      status: 'failed',
      errorMessage: error,
      processingTimeSeconds: round((Date.now() - startedMs) / 1000, 2),
    };
    await this.persist(failed);
    this.emitStage(job, 'failed');
    return { filename: job.filename, status: 'failed', record: failed, error };
  }

  private abandon(job: PipelineJob): JobOutcome {
    logger.info(`Abandoned ${job.filename} at ${job.stage}`);
    this.emitStage(job, 'abandoned');
    return { filename: job.filename, status: 'abandoned' };
  }

  private async archive(sourcePath: string, filename: string): Promise<void> {
    try {
      await FileManager.moveFile(sourcePath, join(this.settings.processedDir, filename));
    } catch (error) {
      logger.warn(`Could not move ${filename} to the processed folder: ${errorMessage(error)}`);
    }
  }

  /**
   * Upsert with bounded retries; validation failures are not retried.
   */
  private async persist(record: CallRecord): Promise<void> {
    const result = await withRetry<void>(
      async () => {
        try {
          await this.store.upsert(record);
          return { ok: true, value: undefined };
        } catch (error) {
          return { ok: false, retryable: !(error instanceof ValidationError), error: errorMessage(error) };
        }
      },
      {
        attempts: this.settings.storeWriteAttempts,
        baseDelayMs: this.settings.retryDelayMs,
        sleep: this.sleep,
        onRetry: (attempt, error) =>
          logger.warn(`Store write for ${record.filename} failed (attempt ${attempt}): ${error}`),
      }
    );
    if (!result.ok) {
      throw new JobFailure(`Could not persist ${record.filename}: ${result.error}`);
    }
  }

  private retrying<T>(
    step: string,
    filename: string,
    call: () => Promise<AdapterResult<T>>
  ): Promise<AdapterResult<T>> {
    return withRetry(call, {
      attempts: this.settings.maxRetries,
      baseDelayMs: this.settings.retryDelayMs,
      sleep: this.sleep,
      onRetry: (attempt, error, delayMs) =>
        logger.warn(
          `${filename}: ${step} attempt ${attempt}/${this.settings.maxRetries} failed (${error}); retrying in ${delayMs}ms`
        ),
    });
  }
}

function assertPlainFilename(filename: string): void {
  if (!FileManager.isPlainFilename(filename)) {
    throw new ValidationError(`Invalid filename: ${filename}`);
  }
}

/**
 * Copy classifier output onto a record. Unparsed replies fall back to
 * OTHER/UNKNOWN with the reply's first sentence as the summary.
 */
export function applyClassification(record: CallRecord, classification: Classification): void {
  switch (classification.kind) {
    case 'parsed':
    case 'partial':
      record.summary = classification.fields.summary;
      record.intent = classification.fields.intent;
      record.subIntent = classification.fields.subIntent;
      record.primaryDisposition = classification.fields.primaryDisposition;
      record.secondaryDisposition = classification.fields.secondaryDisposition;
      record.warningMessage = classification.kind === 'partial' ? classification.warning : undefined;
      break;
    case 'unparsed':
      record.summary = firstSentence(classification.raw) || 'Call analysis unavailable';
      record.intent = FALLBACK_INTENT;
      record.subIntent = UNKNOWN_SUB_INTENT;
      record.warningMessage = classification.warning;
      break;
  }
}
