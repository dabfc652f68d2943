/**
 * Watches the intake folder and submits new audio files to the pipeline.
 */
import { watch, type FSWatcher } from 'chokidar';
import { basename } from 'path';
import { isSupportedAudioFile } from '../config/env.js';
import type { CallProcessor } from '../processors/callProcessor.js';
import type { CallStore } from '../store/callStore.js';
import { errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('watcher');

export type HandleResult = 'submitted' | 'in-flight' | 'unsupported' | 'already-processed';

export interface IntakeWatcherOptions {
  /** How long a file's size must stay unchanged before it counts as written. */
  stabilityThresholdMs?: number;
}

export class IntakeWatcher {
  private watcher?: FSWatcher;

  constructor(
    private readonly intakeDir: string,
    private readonly store: CallStore,
    private readonly pipeline: Pick<CallProcessor, 'submit'>,
    private readonly options: IntakeWatcherOptions = {}
  ) {}

  /**
   * Start watching. Files already in the folder are picked up too.
   */
  start(): void {
    if (this.watcher) {
      return;
    }
    this.watcher = watch(this.intakeDir, {
      depth: 0,
      ignoreInitial: false,
      awaitWriteFinish: {
        stabilityThreshold: this.options.stabilityThresholdMs ?? 2000,
        pollInterval: 100,
      },
    });

    this.watcher.on('add', (path: string) => {
      this.handleFile(path).catch((error) =>
        logger.error(`Failed to handle ${path}:`, errorMessage(error))
      );
    });
    this.watcher.on('error', (error) => logger.error('Watcher error:', errorMessage(error)));
    logger.info(`Watching ${this.intakeDir}`);
  }

  async stop(): Promise<void> {
    if (!this.watcher) {
      return;
    }
    await this.watcher.close();
    this.watcher = undefined;
    logger.info('Stopped watching intake folder');
  }

  /**
   * Submit one file unless it is unsupported or already has a final row.
   */
  async handleFile(path: string): Promise<HandleResult> {
    const filename = basename(path);
    if (!isSupportedAudioFile(filename)) {
      logger.debug(`Ignoring ${filename}`);
      return 'unsupported';
    }

    const existing = await this.store.get(filename);
    if (existing && (existing.status === 'completed' || existing.status === 'failed')) {
      logger.debug(`${filename} already ${existing.status}; skipping`);
      return 'already-processed';
    }

    const result = this.pipeline.submit({ filename });
    if (!result.accepted) {
      return 'in-flight';
    }
    logger.info(`New file detected: ${filename}`);
    return 'submitted';
  }
}
