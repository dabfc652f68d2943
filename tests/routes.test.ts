import type { Express } from 'express';
import { join } from 'path';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/api/app.js';
import { loadConfig } from '../src/config/env.js';
import { CallProcessor } from '../src/processors/callProcessor.js';
import { RemoteSync } from '../src/services/remoteSync.js';
import type { BucketObject, BucketPage, ObjectBucket } from '../src/services/s3Bucket.js';
import { CsvCallStore } from '../src/store/csvCallStore.js';
import type { SyncReport } from '../src/types/index.js';
import { FileManager } from '../src/utils/fileManager.js';
import { SyncScheduler } from '../src/watchers/syncScheduler.js';
import {
  FakeClassifier,
  FakeTranscriber,
  deferred,
  makeRecord,
  makeWorkspace,
  writeAudio,
  type Workspace,
} from './helpers.js';

const NOW = Date.parse('2024-05-10T12:00:00.000Z');

class SinglePageBucket implements ObjectBucket {
  readonly location = 's3://recordings/calls/';

  constructor(private readonly objects: BucketObject[]) {}

  async listPage(): Promise<BucketPage> {
    return { objects: this.objects, nextToken: undefined };
  }

  async getObject(key: string): Promise<Uint8Array> {
    return new TextEncoder().encode(`audio:${key}`);
  }
}

interface Harness {
  app: Express;
  store: CsvCallStore;
  pipeline: CallProcessor;
  scheduler?: SyncScheduler;
  /** Replaces what the scheduler runs on each tick. */
  setSyncTask: (task: () => Promise<SyncReport>) => void;
}

function buildHarness(ws: Workspace, withRemote: boolean): Harness {
  const config = loadConfig({
    SONIOX_API_KEY: 'test-secret',
    AWS_ACCESS_KEY_ID: 'test-access-key',
    AWS_SECRET_ACCESS_KEY: 'test-secret',
    ENABLE_S3_SYNC: withRemote ? 'true' : 'false',
    AWS_BUCKET_NAME: withRemote ? 'recordings' : undefined,
    AUDIO_FOLDER: ws.intake,
    PROCESSED_FOLDER: ws.processed,
    CSV_FILE: ws.csvFile,
    MAX_FILE_SIZE_MB: '1',
  });
  const store = new CsvCallStore(config.csvFile);

  let remote: RemoteSync | undefined;
  const pipeline = new CallProcessor({
    store,
    transcriber: new FakeTranscriber(),
    classifier: new FakeClassifier(),
    downloader: {
      download: async (key) =>
        remote ? remote.download(key) : { ok: false, retryable: false, error: 'Remote sync is disabled' },
    },
    settings: {
      intakeDir: config.audioFolder,
      processedDir: config.processedFolder,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      maxFileSizeBytes: config.maxFileSizeBytes,
      concurrency: config.maxConcurrentProcesses,
    },
    sleep: async () => undefined,
  });

  let syncTask: () => Promise<SyncReport> = async () => ({ downloaded: 0, skipped: 0, failed: 0 });
  let scheduler: SyncScheduler | undefined;
  if (withRemote) {
    const bucket = new SinglePageBucket([
      { key: 'calls/new.mp3', size: 100, lastModified: new Date('2024-05-09T00:00:00.000Z') },
      { key: 'calls/old.wav', size: 200, lastModified: new Date('2024-04-01T00:00:00.000Z') },
    ]);
    remote = new RemoteSync(bucket, store, config.audioFolder, config.lookbackDays, (filename) => {
      pipeline.submit({ filename });
    }, () => NOW);
    scheduler = new SyncScheduler(() => syncTask(), config.syncIntervalMs);
  }

  const app = createApp({ config, version: 'test-version', store, pipeline, remote, scheduler });
  return {
    app,
    store,
    pipeline,
    scheduler,
    setSyncTask: (task) => {
      syncTask = task;
    },
  };
}

const ROOF = makeRecord({ filename: 'roof.mp3', timestamp: '2024-03-10T12:00:00.000Z' });
const FURNACE = makeRecord({
  filename: 'furnace.mp3',
  timestamp: '2024-03-11T08:00:00.000Z',
  intent: 'HVAC',
  subIntent: 'FURNACE_REPAIR',
  transcription: 'My furnace stopped working.',
  summary: 'Furnace is broken.',
});

describe('API', () => {
  let ws: Workspace;
  let harness: Harness;

  afterEach(async () => {
    await harness.scheduler?.stop();
    await harness.pipeline.idle();
    await ws.cleanup();
  });

  describe('with remote sync disabled', () => {
    beforeEach(async () => {
      ws = await makeWorkspace();
      harness = buildHarness(ws, false);
      await harness.store.upsert(ROOF);
      await harness.store.upsert(FURNACE);
    });

    it('reports health', async () => {
      const res = await request(harness.app).get('/api/health');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'healthy',
        version: 'test-version',
        components: {
          store: true,
          audioFolder: true,
          processedFolder: true,
          transcriptionApi: true,
          classificationApi: true,
        },
        remoteSync: 'disabled',
      });
    });

    it('lists records newest first with formatted fields', async () => {
      const res = await request(harness.app).get('/api/data');

      expect(res.status).toBe(200);
      expect(res.body.total).toBe(2);
      expect(res.body.data.map((row: { filename: string }) => row.filename)).toEqual(['furnace.mp3', 'roof.mp3']);
      expect(res.body.data[1]).toMatchObject({
        filename: 'roof.mp3',
        fileSize: 2048,
        fileSizeFormatted: '2 KB',
        durationFormatted: '1m 30s',
      });
    });

    it('returns the latest N records and validates N', async () => {
      const latest = await request(harness.app).get('/api/latest/1');
      expect(latest.body.total).toBe(1);
      expect(latest.body.data[0].filename).toBe('furnace.mp3');

      const invalid = await request(harness.app).get('/api/latest/0');
      expect(invalid.status).toBe(400);
      expect(invalid.body.error).toBe('Invalid count');
    });

    it('returns one record or 404', async () => {
      const found = await request(harness.app).get('/api/file/roof.mp3');
      expect(found.status).toBe(200);
      expect(found.body.data.intent).toBe('ROOFING');

      const missing = await request(harness.app).get('/api/file/missing.mp3');
      expect(missing.status).toBe(404);
      expect(missing.body).toEqual({ error: 'No record for missing.mp3' });
    });

    it('searches text fields', async () => {
      const res = await request(harness.app).get('/api/search').query({ q: 'Furnace' });

      expect(res.body.total).toBe(1);
      expect(res.body.query).toBe('Furnace');
      expect(res.body.data[0].filename).toBe('furnace.mp3');
    });

    it('summarizes processing', async () => {
      const stats = await request(harness.app).get('/api/stats');
      expect(stats.body).toMatchObject({ totalFiles: 2, successful: 2, successRate: 100, successRateFormatted: '100%' });

      const status = await request(harness.app).get('/api/processing/status');
      expect(status.body.pipeline).toEqual({ inFlight: [], queueLength: 0, activeWorkers: 0, concurrency: 3 });
      expect(status.body.sync).toEqual({ enabled: false, running: false });
    });

    it('filters analytics by date and rejects malformed dates', async () => {
      const intents = await request(harness.app).get('/api/analytics/intents').query({ start_date: '2024-03-11' });
      expect(intents.body).toEqual({
        intents: [{ intent: 'HVAC', label: 'Hvac', count: 1, percentage: 100 }],
        total: 1,
        uniqueIntents: 1,
      });

      const invalid = await request(harness.app).get('/api/analytics/overview').query({ start_date: '03/11/2024' });
      expect(invalid.status).toBe(400);
      expect(invalid.body).toEqual({ error: 'Invalid date range', details: 'start_date: expected YYYY-MM-DD' });
    });

    it('serves the extended analytics', async () => {
      const matrix = await request(harness.app).get('/api/analytics/intent-matrix');
      expect(matrix.body).toEqual({
        matrix: { ROOFING: { ROOF_REPAIR: 1 }, HVAC: { FURNACE_REPAIR: 1 } },
        intents: ['Hvac', 'Roofing'],
        subIntents: ['Furnace Repair', 'Roof Repair'],
        totalCombinations: 2,
      });

      const speakers = await request(harness.app)
        .get('/api/analytics/speaker-distribution')
        .query({ start_date: '2024-03-11' });
      expect(speakers.body.speakerCounts).toEqual([
        {
          speakerCount: 2,
          label: '2 Speakers (Normal)',
          description: 'Standard agent-customer conversations',
          calls: 1,
          percentage: 100,
        },
      ]);

      const hourly = await request(harness.app).get('/api/analytics/hourly');
      expect(hourly.body.calls[8]).toBe(1);
      expect(hourly.body.calls[12]).toBe(1);

      const statuses = await request(harness.app).get('/api/analytics/call-status');
      expect(statuses.body).toEqual({ statuses: [], total: 2, uniqueStatuses: 0 });
    });

    it('validates the trend window', async () => {
      const trends = await request(harness.app).get('/api/analytics/trends').query({ days: 3 });
      expect(trends.status).toBe(200);
      expect(trends.body.dates).toHaveLength(4);

      const invalid = await request(harness.app).get('/api/analytics/intent-trends').query({ days: 0 });
      expect(invalid.status).toBe(400);
      expect(invalid.body.error).toBe('Invalid intent trends query');
    });

    it('refuses filenames that point outside the intake folder', async () => {
      await writeAudio(ws.root, 'secret.mp3');

      const reprocess = await request(harness.app).post('/api/reprocess/..%2Fsecret.mp3');
      expect(reprocess.status).toBe(400);
      expect(reprocess.body).toEqual({ error: 'Invalid filename: ../secret.mp3' });

      const removal = await request(harness.app).delete('/api/delete/..%2Fsecret.mp3');
      expect(removal.status).toBe(400);

      expect(await FileManager.fileExists(join(ws.root, 'secret.mp3'))).toBe(true);
      expect(await harness.store.get('../secret.mp3')).toBeUndefined();
    });

    it('saves uploads under a safe unique name and processes them', async () => {
      await writeAudio(ws.intake, 'new_call.mp3');

      const res = await request(harness.app)
        .post('/api/upload')
        .attach('files', Buffer.from('audio bytes'), 'new call.mp3')
        .attach('files', Buffer.from('text'), 'notes.txt');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        message: 'Uploaded 1 of 2 file(s)',
        uploadedCount: 1,
        results: [
          { originalFilename: 'new call.mp3', savedFilename: 'new_call_1.mp3', success: true },
          { originalFilename: 'notes.txt', success: false, error: 'Unsupported file type' },
        ],
        errors: ['notes.txt: Unsupported file type'],
      });

      await harness.pipeline.idle();
      expect((await harness.store.get('new_call_1.mp3'))?.status).toBe('completed');
      expect(await FileManager.fileExists(join(ws.processed, 'new_call_1.mp3'))).toBe(true);
    });

    it('rejects uploads of already processed files', async () => {
      const res = await request(harness.app).post('/api/upload').attach('files', Buffer.from('again'), 'roof.mp3');

      expect(res.status).toBe(400);
      expect(res.body.results).toEqual([{ originalFilename: 'roof.mp3', success: false, error: 'Already processed' }]);
    });

    it('rejects an upload without files', async () => {
      const res = await request(harness.app).post('/api/upload');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'No files provided' });
    });

    it('reprocesses an archived file', async () => {
      await writeAudio(ws.processed, 'roof.mp3');

      const res = await request(harness.app).post('/api/reprocess/roof.mp3');

      expect(res.status).toBe(202);
      expect(res.body).toEqual({ filename: 'roof.mp3', outcome: 'accepted' });
      await harness.pipeline.idle();
      const record = await harness.store.get('roof.mp3');
      expect(record?.status).toBe('completed');
      expect(record?.transcription).toBe('Hello there.');
    });

    it('returns 404 when there is nothing to reprocess', async () => {
      const res = await request(harness.app).post('/api/reprocess/ghost.mp3');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'No record or source file for ghost.mp3' });
    });

    it('deletes a record once', async () => {
      const first = await request(harness.app).delete('/api/delete/roof.mp3');
      expect(first.status).toBe(200);
      expect(first.body).toEqual({ success: true, message: 'Deleted roof.mp3' });

      const second = await request(harness.app).delete('/api/delete/roof.mp3');
      expect(second.status).toBe(404);
      expect(second.body).toEqual({ error: 'No record for roof.mp3' });
    });

    it('exports CSV and JSON as attachments', async () => {
      const csv = await request(harness.app).get('/api/export');
      expect(csv.status).toBe(200);
      expect(csv.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(csv.headers['content-disposition']).toMatch(/^attachment; filename="transcriptions_\d{8}_\d{6}\.csv"$/);
      expect(csv.text.startsWith('timestamp,filename,')).toBe(true);

      const json = await request(harness.app).get('/api/export').query({ format: 'json' });
      expect(json.headers['content-type']).toBe('application/json; charset=utf-8');
      expect(json.body.count).toBe(2);

      const invalid = await request(harness.app).get('/api/export').query({ format: 'xml' });
      expect(invalid.status).toBe(400);
      expect(invalid.body.error).toBe('Invalid export query');
    });

    it('backfills missing dispositions in a date range', async () => {
      const res = await request(harness.app).post('/api/classify-dispositions').send({ start_date: '2024-03-11' });

      expect(res.body).toEqual({ success: true, updated: 1 });
      expect(await harness.store.get('furnace.mp3')).toMatchObject({
        primaryDisposition: 'CALLBACK_REQUESTED',
        secondaryDisposition: 'FOLLOW_UP_REQUIRED',
      });
      expect((await harness.store.get('roof.mp3'))?.primaryDisposition).toBeUndefined();
    });

    it('answers 503 for remote endpoints', async () => {
      const res = await request(harness.app).get('/api/s3/recordings');

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ error: 'Remote sync is disabled' });
    });

    it('answers 404 for unknown routes and 400 for malformed JSON', async () => {
      const unknown = await request(harness.app).get('/api/nope');
      expect(unknown.status).toBe(404);
      expect(unknown.body).toEqual({ error: 'Route not found: GET /api/nope' });

      const malformed = await request(harness.app)
        .post('/api/classify-dispositions')
        .set('Content-Type', 'application/json')
        .send('{bad');
      expect(malformed.status).toBe(400);
      expect(malformed.body).toEqual({ error: 'Malformed JSON body' });
    });
  });

  describe('with remote sync enabled', () => {
    beforeEach(async () => {
      ws = await makeWorkspace();
      harness = buildHarness(ws, true);
    });

    it('lists remote recordings', async () => {
      const res = await request(harness.app).get('/api/s3/recordings').query({ limit: 1 });

      expect(res.body).toEqual({
        recordings: [
          {
            key: 'calls/new.mp3',
            filename: 'new.mp3',
            size: 100,
            lastModified: '2024-05-09T00:00:00.000Z',
            downloaded: false,
            sizeFormatted: '100 B',
          },
        ],
        total: 1,
      });

      const recent = await request(harness.app).get('/api/s3/recordings').query({ since_hours: 48 });
      expect(recent.body.total).toBe(1);
    });

    it('summarizes the bucket', async () => {
      const res = await request(harness.app).get('/api/s3/stats');

      expect(res.body).toMatchObject({ location: 's3://recordings/calls/', totalObjects: 2, totalSizeFormatted: '300 B' });
    });

    it('runs a sync on demand', async () => {
      harness.setSyncTask(async () => ({ downloaded: 2, skipped: 1, failed: 0 }));

      const res = await request(harness.app).post('/api/s3/sync');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, downloaded: 2, skipped: 1, failed: 0 });
    });

    it('answers 409 while a sync is running', async () => {
      const gate = deferred<SyncReport>();
      harness.setSyncTask(() => gate.promise);
      const running = harness.scheduler?.tick();

      const res = await request(harness.app).post('/api/s3/sync');

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: 'A sync is already running' });
      gate.resolve({ downloaded: 0, skipped: 0, failed: 0 });
      await running;
    });

    it('answers 502 when the sync fails', async () => {
      harness.setSyncTask(async () => {
        throw new Error('bucket unreachable');
      });

      const res = await request(harness.app).post('/api/s3/sync');

      expect(res.status).toBe(502);
      expect(res.body).toEqual({ error: 'Sync failed: bucket unreachable' });
    });

    it('queues a remote download through the pipeline', async () => {
      const res = await request(harness.app).post('/api/s3/download').send({ key: 'calls/new.mp3' });

      expect(res.status).toBe(202);
      expect(res.body).toEqual({ filename: 'new.mp3', key: 'calls/new.mp3', accepted: true });
      await harness.pipeline.idle();
      expect((await harness.store.get('new.mp3'))?.status).toBe('completed');
    });

    it('validates download requests', async () => {
      const unsupported = await request(harness.app).post('/api/s3/download').send({ key: 'calls/notes.txt' });
      expect(unsupported.status).toBe(400);
      expect(unsupported.body).toEqual({ error: 'Unsupported file type: notes.txt' });

      const missing = await request(harness.app).post('/api/s3/download').send({});
      expect(missing.status).toBe(400);
      expect(missing.body).toEqual({ error: 'Invalid download request', details: 'key: Required' });
    });
  });
});
