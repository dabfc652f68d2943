/**
 * Soniox service - Async transcription with speaker diarization
 * Uses Soniox Async API: upload, create job, poll, fetch tokens, clean up.
 */
import axios, { type AxiosInstance } from 'axios';
import { createReadStream } from 'fs';
import FormData from 'form-data';
import { z } from 'zod';
import { logger as rootLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { sleep as defaultSleep, type Sleep } from '../utils/retry.js';
import type {
  AdapterResult,
  SpeakerToken,
  Transcriber,
  TranscriptionOutput,
} from '../types/index.js';

const logger = rootLogger.child('soniox');

const SONIOX_API_BASE_URL = 'https://api.soniox.com';

const RETRYABLE_STATUS = new Set([408, 429]);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const idResponse = z.object({ id: z.string() });

const statusResponse = z.object({
  status: z.string(),
  error_message: z.string().nullish(),
});

const transcriptResponse = z.object({
  tokens: z
    .array(
      z.object({
        text: z.string().optional(),
        speaker: z.union([z.string(), z.number()]).nullish(),
        start_ms: z.number().nullish(),
        end_ms: z.number().nullish(),
        is_final: z.boolean().optional(),
      })
    )
    .default([]),
});

/**
 * Failure raised inside the transcription flow, carrying whether another
 * attempt might succeed.
 */
export class TranscriptionError extends Error {
  constructor(
    message: string,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = 'TranscriptionError';
  }
}

export interface SonioxOptions {
  timeoutMs: number;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  model?: string;
  /** Preconfigured HTTP client; defaults to one pointed at the Soniox API. */
  http?: AxiosInstance;
  sleep?: Sleep;
}

/**
 * Map an error from the flow to a failed AdapterResult.
 * Timeouts, dropped connections, 408, 429 and 5xx are retryable.
 */
export function classifyHttpError(error: unknown): { ok: false; retryable: boolean; error: string } {
  if (error instanceof TranscriptionError) {
    return { ok: false, retryable: error.retryable, error: error.message };
  }

  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return { ok: false, retryable: true, error: `Soniox request timed out: ${error.message}` };
    }
    if (!error.response) {
      return { ok: false, retryable: true, error: `Soniox unreachable: ${error.message}` };
    }
    const status = error.response.status;
    const detail =
      typeof error.response.data === 'string'
        ? error.response.data
        : JSON.stringify(error.response.data ?? {});
    return {
      ok: false,
      retryable: RETRYABLE_STATUS.has(status) || status >= 500,
      error: `Soniox HTTP ${status}: ${detail}`,
    };
  }

  return { ok: false, retryable: false, error: `Transcription failed: ${errorMessage(error)}` };
}

/**
 * Plain transcript, `Speaker N:` lines, distinct speakers and duration from
 * Soniox tokens. Duration uses the last token's end time, else its start.
 */
export function buildTranscripts(tokens: SpeakerToken[]): TranscriptionOutput {
  const transcript = tokens
    .map((token) => token.text)
    .join('')
    .replace(/\s+/g, ' ')
    .trim();

  const lines: string[] = [];
  const speakers = new Set<string>();
  let currentSpeaker: string | undefined;
  let currentText = '';

  const flush = () => {
    const text = currentText.replace(/\s+/g, ' ').trim();
    if (currentSpeaker !== undefined && text) {
      lines.push(`Speaker ${currentSpeaker}: ${text}`);
      speakers.add(currentSpeaker);
    }
  };

  for (const token of tokens) {
    if (token.speaker !== currentSpeaker) {
      flush();
      currentSpeaker = token.speaker;
      currentText = '';
    }
    currentText += token.text;
  }
  flush();

  return {
    transcript,
    diarizedTranscript: lines.join('\n'),
    speakerCount: speakers.size,
    durationSeconds: calculateDuration(tokens),
  };
}

function calculateDuration(tokens: SpeakerToken[]): number {
  const lastToken = tokens[tokens.length - 1];
  if (!lastToken) return 0;
  if (lastToken.endTime != null && lastToken.endTime > 0) {
    return lastToken.endTime;
  }
  if (lastToken.startTime != null && lastToken.startTime > 0) {
    return lastToken.startTime;
  }
  return 0;
}

export class SonioxService implements Transcriber {
  private http: AxiosInstance;
  private pollInterval: number;
  private maxPollAttempts: number;
  private model: string;
  private sleep: Sleep;

  constructor(
    apiKey: string,
    private readonly options: SonioxOptions
  ) {
    this.http =
      options.http ??
      axios.create({
        baseURL: SONIOX_API_BASE_URL,
        headers: { Authorization: `Bearer ${apiKey}` },
      });
    this.pollInterval = options.pollIntervalMs ?? 1000;
    this.maxPollAttempts = options.maxPollAttempts ?? 300;
    this.model = options.model ?? 'stt-async-v4';
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Transcribe audio file with speaker diarization
   */
  async transcribe(audioFilePath: string): Promise<AdapterResult<TranscriptionOutput>> {
    let fileId: string | undefined;
    let transcriptionId: string | undefined;

    try {
      logger.info(`Starting Soniox transcription of ${audioFilePath}`);

      fileId = await this.uploadFile(audioFilePath);
      transcriptionId = await this.createTranscription(fileId);
      await this.waitForCompletion(transcriptionId);
      const tokens = await this.getTranscript(transcriptionId);

      const output = buildTranscripts(tokens);
      logger.success(
        `Transcription completed: ${output.transcript.length} chars, ${output.speakerCount} speaker(s)`
      );
      return { ok: true, value: output };
    } catch (error) {
      const failure = classifyHttpError(error);
      logger.warn(`${failure.error}${failure.retryable ? ' (retryable)' : ''}`);
      return failure;
    } finally {
      if (transcriptionId) {
        await this.deleteTranscription(transcriptionId);
      }
      if (fileId) {
        await this.deleteFile(fileId);
      }
    }
  }

  /**
   * Upload audio file to Soniox Files API
   */
  private async uploadFile(audioFilePath: string): Promise<string> {
    logger.debug('Uploading audio file to Soniox...');

    const stream = createReadStream(audioFilePath);
    const form = new FormData();
    form.append('file', stream);

    try {
      const response = await this.http.post<unknown>('/v1/files', form, {
        headers: form.getHeaders(),
        timeout: this.options.timeoutMs,
      });
      const { id } = this.read(idResponse, response.data, 'file upload');
      logger.debug(`File uploaded with ID: ${id}`);
      return id;
    } finally {
      stream.destroy();
    }
  }

  /**
   * Create transcription job
   */
  private async createTranscription(fileId: string): Promise<string> {
    const response = await this.http.post<unknown>(
      '/v1/transcriptions',
      {
        model: this.model,
        file_id: fileId,
        language_hints: ['en'],
        enable_speaker_diarization: true,
        context: {
          general: [
            { key: 'domain', value: 'Home improvement' },
            { key: 'topic', value: 'Inbound sales and service calls' },
          ],
        },
      },
      {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.options.timeoutMs,
      }
    );

    const { id } = this.read(idResponse, response.data, 'create transcription');
    logger.debug(`Transcription created with ID: ${id}`);
    return id;
  }

  /**
   * Wait for transcription to complete
   */
  private async waitForCompletion(transcriptionId: string): Promise<void> {
    for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
      const response = await this.http.get<unknown>(`/v1/transcriptions/${transcriptionId}`, {
        timeout: this.options.timeoutMs,
      });
      const { status, error_message } = this.read(statusResponse, response.data, 'transcription status');

      if (status === 'completed') {
        return;
      }

      if (status === 'error') {
        throw new TranscriptionError(`Soniox transcription error: ${error_message || 'Unknown error'}`, false);
      }

      if (attempt % 10 === 0) {
        logger.debug(`Still processing... (${attempt} polls)`);
      }

      await this.sleep(this.pollInterval);
    }

    throw new TranscriptionError('Transcription timeout - exceeded maximum wait time', true);
  }

  /**
   * Get transcription result
   * Soniox API returns start_ms/end_ms (milliseconds); we normalize to startTime/endTime (seconds).
   */
  private async getTranscript(transcriptionId: string): Promise<SpeakerToken[]> {
    const response = await this.http.get<unknown>(`/v1/transcriptions/${transcriptionId}/transcript`, {
      timeout: this.options.timeoutMs,
    });
    const { tokens } = this.read(transcriptResponse, response.data, 'transcript');

    return tokens.map((t) => ({
      text: t.text ?? '',
      speaker: t.speaker != null ? String(t.speaker) : '0',
      startTime: t.start_ms != null ? t.start_ms / 1000 : undefined,
      endTime: t.end_ms != null ? t.end_ms / 1000 : undefined,
      isFinal: t.is_final,
    }));
  }

  private async deleteTranscription(transcriptionId: string): Promise<void> {
    try {
      await this.http.delete(`/v1/transcriptions/${transcriptionId}`, { timeout: 10000 });
      logger.debug(`Deleted transcription: ${transcriptionId}`);
    } catch (error) {
      logger.warn(`Failed to delete transcription (non-fatal): ${errorMessage(error)}`);
    }
  }

  private async deleteFile(fileId: string): Promise<void> {
    try {
      await this.http.delete(`/v1/files/${fileId}`, { timeout: 10000 });
      logger.debug(`Deleted file: ${fileId}`);
    } catch (error) {
      logger.warn(`Failed to delete file (non-fatal): ${errorMessage(error)}`);
    }
  }

  private read<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, step: string): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new TranscriptionError(`Unexpected Soniox ${step} response`, false);
    }
    return parsed.data;
  }
}
