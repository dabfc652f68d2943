/**
 * Environment configuration loader
 */
import { config as loadDotenv } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { LogLevel, parseLogLevel } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const SUPPORTED_AUDIO_FORMATS = ['.mp3', '.wav', '.m4a', '.flac', '.ogg'] as const;

export const DEFAULT_CLASSIFIER_PROMPT =
  'Analyze the following call transcription and return ONLY valid JSON with exactly these fields:\n' +
  '- summary: A brief 1-2 sentence summary of the call\n' +
  '- intent: One of {intents}\n' +
  '- sub_intent: A specific subcategory of the intent in UPPER_SNAKE_CASE\n' +
  '- primary_disposition: One of {primaryDispositions}\n' +
  '- secondary_disposition: One of {secondaryDispositions}\n\n' +
  'Example response format:\n' +
  '{"summary": "Customer called about roof leak repair", "intent": "ROOFING", "sub_intent": "ROOF_REPAIR", ' +
  '"primary_disposition": "APPOINTMENT_SET", "secondary_disposition": "IMMEDIATE"}\n\n' +
  'Transcription: {transcription}\n\n' +
  'Response (JSON only):';

export interface Config {
  // Soniox
  sonioxApiKey: string;

  // AWS (Bedrock + S3)
  awsAccessKeyId: string;
  awsSecretAccessKey: string;
  awsSessionToken?: string;
  awsRegion: string;
  bedrockModelId: string;
  classifierPrompt: string;

  // Folders and store
  audioFolder: string;
  processedFolder: string;
  csvFile: string;

  // HTTP
  host: string;
  port: number;

  // Processing options
  maxFileSizeBytes: number;
  apiTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxConcurrentProcesses: number;

  // Remote sync
  enableS3Sync: boolean;
  awsBucketName?: string;
  awsPrefix: string;
  syncIntervalMs: number;
  lookbackDays: number;

  logLevel: LogLevel;
}

const requiredString = (key: string) =>
  z.string({ required_error: `${key} is required` }).trim().min(1, `${key} is required`);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : value.trim().toLowerCase() === 'true'));

const envSchema = z
  .object({
    SONIOX_API_KEY: requiredString('SONIOX_API_KEY'),
    AWS_ACCESS_KEY_ID: requiredString('AWS_ACCESS_KEY_ID'),
    AWS_SECRET_ACCESS_KEY: requiredString('AWS_SECRET_ACCESS_KEY'),
    AWS_SESSION_TOKEN: optionalString,
    AWS_REGION: z.string().trim().min(1).default('us-east-1'),
    BEDROCK_MODEL_ID: z.string().trim().min(1).default('anthropic.claude-3-5-haiku-20241022-v1:0'),
    CLASSIFIER_PROMPT: z
      .string()
      .refine((prompt) => prompt.includes('{transcription}'), {
        message: 'must contain the {transcription} placeholder',
      })
      .default(DEFAULT_CLASSIFIER_PROMPT),

    AUDIO_FOLDER: z.string().trim().min(1).default('data/audio'),
    PROCESSED_FOLDER: z.string().trim().min(1).default('data/processed'),
    CSV_FILE: z.string().trim().min(1).default('data/transcriptions.csv'),

    HOST: z.string().trim().min(1).default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),

    MAX_FILE_SIZE_MB: positiveInt(100),
    API_TIMEOUT: positiveInt(60),
    MAX_RETRIES: positiveInt(3),
    RETRY_DELAY: z.coerce.number().min(0).default(5),
    MAX_CONCURRENT_PROCESSES: positiveInt(3),

    ENABLE_S3_SYNC: envBoolean(true),
    AWS_BUCKET_NAME: optionalString,
    AWS_PREFIX: z.string().default(''),
    S3_SYNC_INTERVAL_SECONDS: positiveInt(300),
    PROCESSING_DAYS_LOOKBACK: positiveInt(7),

    LOG_LEVEL: z
      .string()
      .default('info')
      .refine((value) => parseLogLevel(value) !== undefined, {
        message: 'must be one of debug, info, warn, error, silent',
      }),
  })
  .superRefine((env, ctx) => {
    if (env.ENABLE_S3_SYNC && !env.AWS_BUCKET_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AWS_BUCKET_NAME'],
        message: 'AWS_BUCKET_NAME is required when ENABLE_S3_SYNC is true',
      });
    }
  });

function describeIssue(issue: z.ZodIssue): string {
  const key = issue.path.join('.');
  return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
}

/**
 * Validate configuration from an environment map. Every problem is collected
 * into a single ConfigError so the operator sees the whole list at once.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(describeIssue));
  }

  const env = parsed.data;
  return {
    sonioxApiKey: env.SONIOX_API_KEY,
    awsAccessKeyId: env.AWS_ACCESS_KEY_ID,
    awsSecretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    awsSessionToken: env.AWS_SESSION_TOKEN,
    awsRegion: env.AWS_REGION,
    bedrockModelId: env.BEDROCK_MODEL_ID,
    classifierPrompt: env.CLASSIFIER_PROMPT,

    audioFolder: resolve(env.AUDIO_FOLDER),
    processedFolder: resolve(env.PROCESSED_FOLDER),
    csvFile: resolve(env.CSV_FILE),

    host: env.HOST,
    port: env.PORT,

    maxFileSizeBytes: env.MAX_FILE_SIZE_MB * 1024 * 1024,
    apiTimeoutMs: env.API_TIMEOUT * 1000,
    maxRetries: env.MAX_RETRIES,
    retryDelayMs: env.RETRY_DELAY * 1000,
    maxConcurrentProcesses: env.MAX_CONCURRENT_PROCESSES,

    enableS3Sync: env.ENABLE_S3_SYNC,
    awsBucketName: env.AWS_BUCKET_NAME,
    awsPrefix: env.AWS_PREFIX,
    syncIntervalMs: env.S3_SYNC_INTERVAL_SECONDS * 1000,
    lookbackDays: env.PROCESSING_DAYS_LOOKBACK,

    logLevel: parseLogLevel(env.LOG_LEVEL) ?? LogLevel.INFO,
  };
}

/**
 * Load the project's .env file into process.env (existing variables win).
 */
export function loadEnvFile(): void {
  loadDotenv({ path: join(__dirname, '../../.env') });
}

export function isSupportedAudioFile(filename: string): boolean {
  const dot = filename.lastIndexOf('.');
  if (dot < 0) {
    return false;
  }
  const extension = filename.slice(dot).toLowerCase();
  return SUPPORTED_AUDIO_FORMATS.some((format) => format === extension);
}
