/**
 * Builds every long-lived component once and hands them around explicitly.
 */
import { readFileSync } from 'fs';
import { z } from 'zod';
import type { Config } from './config/env.js';
import { CallProcessor } from './processors/callProcessor.js';
import { BedrockClaudeModel } from './services/bedrockModel.js';
import { ClaudeService } from './services/claude.js';
import { RemoteSync } from './services/remoteSync.js';
import { S3ObjectBucket } from './services/s3Bucket.js';
import { SonioxService } from './services/soniox.js';
import { loadTaxonomy } from './services/taxonomy.js';
import type { CallStore } from './store/callStore.js';
import type { AdapterResult } from './types/index.js';
import { CsvCallStore } from './store/csvCallStore.js';
import { IntakeWatcher } from './watchers/intakeWatcher.js';
import { SyncScheduler } from './watchers/syncScheduler.js';

export interface AppContext {
  config: Config;
  version: string;
  store: CallStore;
  pipeline: CallProcessor;
  watcher: IntakeWatcher;
  /** Present only when remote sync is enabled. */
  remote?: RemoteSync;
  scheduler?: SyncScheduler;
}

/** What the HTTP layer needs from the context. */
export type ApiContext = Pick<AppContext, 'config' | 'version' | 'store' | 'pipeline' | 'remote' | 'scheduler'>;

const packageSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  const parsed = packageSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : '0.0.0';
}

export interface ContextOptions {
  /** Turn remote sync off even when the configuration enables it. */
  disableSync?: boolean;
}

export function createAppContext(config: Config, options: ContextOptions = {}): AppContext {
  const credentials = {
    accessKeyId: config.awsAccessKeyId,
    secretAccessKey: config.awsSecretAccessKey,
    sessionToken: config.awsSessionToken,
  };

  const store = new CsvCallStore(config.csvFile);

  const transcriber = new SonioxService(config.sonioxApiKey, { timeoutMs: config.apiTimeoutMs });
  const classifier = new ClaudeService(
    new BedrockClaudeModel(config.awsRegion, credentials, config.bedrockModelId),
    loadTaxonomy(),
    { promptTemplate: config.classifierPrompt, timeoutMs: config.apiTimeoutMs }
  );

  let remote: RemoteSync | undefined;
  let scheduler: SyncScheduler | undefined;

  const syncEnabled = config.enableS3Sync && !options.disableSync && config.awsBucketName !== undefined;
  const bucket =
    syncEnabled && config.awsBucketName
      ? new S3ObjectBucket({
          region: config.awsRegion,
          bucket: config.awsBucketName,
          prefix: config.awsPrefix,
          timeoutMs: config.apiTimeoutMs,
          credentials,
        })
      : undefined;

  const pipeline = new CallProcessor({
    store,
    transcriber,
    classifier,
    downloader: {
      download: async (key): Promise<AdapterResult<string>> => {
        if (!remote) {
          return { ok: false, retryable: false, error: 'Remote sync is disabled' };
        }
        return remote.download(key);
      },
    },
    settings: {
      intakeDir: config.audioFolder,
      processedDir: config.processedFolder,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      maxFileSizeBytes: config.maxFileSizeBytes,
      concurrency: config.maxConcurrentProcesses,
    },
  });

  if (bucket) {
    remote = new RemoteSync(bucket, store, config.audioFolder, config.lookbackDays, (filename) => {
      pipeline.submit({ filename });
    });
    const sync = remote;
    scheduler = new SyncScheduler(() => sync.sync(), config.syncIntervalMs);
  }

  const watcher = new IntakeWatcher(config.audioFolder, store, pipeline);

  return {
    config,
    version: readVersion(),
    store,
    pipeline,
    watcher,
    remote,
    scheduler,
  };
}
