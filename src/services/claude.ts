/**
 * Claude classification service - intent, sub-intent, summary and dispositions
 * for a call transcript, through any TextModel (Bedrock in production).
 */
import { logger as rootLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type {
  AdapterResult,
  Classification,
  Classifier,
  Disposition,
} from '../types/index.js';
import type { TextModel } from './bedrockModel.js';
import { parseClassification, parseDisposition } from './classificationParser.js';
import { primaryDispositionGuide, secondaryDispositionGuide, type Taxonomy } from './taxonomy.js';

const logger = rootLogger.child('claude');

const MAX_TRANSCRIPT_CHARS = 15000;

const CLASSIFIER_SYSTEM_PROMPT =
  'You are an expert call analyst for a home improvement company. Always respond with valid JSON only.';

const DISPOSITION_SYSTEM_PROMPT = 'You are a call disposition classifier for home improvement leads.';

const RETRYABLE_ERROR_NAMES = new Set([
  'ThrottlingException',
  'ServiceUnavailableException',
  'ModelTimeoutException',
  'ModelNotReadyException',
  'InternalServerException',
  'TimeoutError',
  'AbortError',
]);

const RETRYABLE_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

/**
 * Throttling, timeouts, server-side faults and dropped connections are worth
 * another attempt; validation and access errors are not.
 */
export function isRetryableModelError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (RETRYABLE_ERROR_NAMES.has(error.name)) {
    return true;
  }
  if ('$fault' in error && error.$fault === 'server') {
    return true;
  }
  if ('code' in error && typeof error.code === 'string' && RETRYABLE_NETWORK_CODES.has(error.code)) {
    return true;
  }
  return false;
}

function truncate(text: string): string {
  return text.length > MAX_TRANSCRIPT_CHARS ? `${text.slice(0, MAX_TRANSCRIPT_CHARS)}...` : text;
}

export interface ClaudeServiceOptions {
  promptTemplate: string;
  timeoutMs: number;
}

export class ClaudeService implements Classifier {
  constructor(
    private readonly model: TextModel,
    private readonly taxonomy: Taxonomy,
    private readonly options: ClaudeServiceOptions
  ) {}

  /**
   * Fill the prompt template. `{transcription}` is required; the label
   * placeholders are optional.
   */
  buildPrompt(transcript: string): string {
    return this.options.promptTemplate
      .replaceAll('{intents}', this.taxonomy.intents.join(', '))
      .replaceAll('{primaryDispositions}', Object.keys(this.taxonomy.primaryDispositions).join(', '))
      .replaceAll('{secondaryDispositions}', Object.keys(this.taxonomy.secondaryDispositions).join(', '))
      .replaceAll('{transcription}', truncate(transcript));
  }

  async classify(transcript: string): Promise<AdapterResult<Classification>> {
    logger.debug(`Classifying transcript (${transcript.length} chars)`);

    let reply: string;
    try {
      reply = await this.model.complete(this.buildPrompt(transcript), {
        system: CLASSIFIER_SYSTEM_PROMPT,
        maxTokens: 500,
        temperature: 0.3,
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      return this.failure('Classification', error);
    }

    const classification = parseClassification(reply, this.taxonomy);
    if (classification.kind === 'parsed') {
      logger.debug(
        `Intent: ${classification.fields.intent}, sub-intent: ${classification.fields.subIntent}`
      );
    } else {
      logger.warn(`Classifier reply ${classification.kind}: ${classification.warning}`);
    }
    return { ok: true, value: classification };
  }

  async classifyDisposition(transcript: string, summary = ''): Promise<AdapterResult<Disposition>> {
    const prompt = `Based on the call transcription, classify this call with a PRIMARY and SECONDARY disposition.

PRIMARY DISPOSITIONS:
${primaryDispositionGuide(this.taxonomy)}

SECONDARY DISPOSITIONS:
${secondaryDispositionGuide(this.taxonomy)}

Respond with only: PRIMARY_DISPOSITION|SECONDARY_DISPOSITION

Call Content:
Transcription: ${truncate(transcript)}

Summary: ${summary}`;

    let reply: string;
    try {
      reply = await this.model.complete(prompt, {
        system: DISPOSITION_SYSTEM_PROMPT,
        maxTokens: 50,
        temperature: 0.1,
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      return this.failure('Disposition classification', error);
    }

    const disposition = parseDisposition(reply, this.taxonomy);
    if (!disposition) {
      logger.warn(`Unexpected disposition reply: ${reply.slice(0, 100)}`);
      return { ok: true, value: { primary: 'OTHER', secondary: 'OTHER' } };
    }
    return { ok: true, value: disposition };
  }

  private failure(operation: string, error: unknown): { ok: false; retryable: boolean; error: string } {
    const retryable = isRetryableModelError(error);
    const message = `${operation} failed: ${errorMessage(error)}`;
    logger.warn(`${message}${retryable ? ' (retryable)' : ''}`);
    return { ok: false, retryable, error: message };
  }
}
