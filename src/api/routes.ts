// API routes for the call analytics dashboard

import { Router, type Request, type Response } from 'express';
import multer from 'multer';
import { join } from 'path';
import { z } from 'zod';
import { isSupportedAudioFile } from '../config/env.js';
import type { ApiContext } from '../context.js';
import {
  agentPerformance,
  callStatusDistribution,
  dailyTrends,
  dispositionDistribution,
  dropOffAnalysis,
  durationDistribution,
  filterByDateRange,
  hourlyDistribution,
  intentDistribution,
  intentSubIntentBreakdown,
  intentSubIntentMatrix,
  intentTrends,
  overviewStats,
  performanceMetrics,
  processingStats,
  speakerDistribution,
  subIntentDistribution,
  topInsights,
} from '../services/analytics.js';
import { exportRecords } from '../services/exporter.js';
import { filenameFromKey, type RemoteSync } from '../services/remoteSync.js';
import type { CallRecord, DateRange } from '../types/index.js';
import {
  ConflictError,
  NotFoundError,
  ServiceUnavailableError,
  UpstreamError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import { FileManager } from '../utils/fileManager.js';
import { formatDuration, formatFileSize } from '../utils/format.js';
import { logger as rootLogger } from '../utils/logger.js';
import { asyncHandler } from './middleware.js';

const logger = rootLogger.child('api');

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const dateRangeSchema = z.object({
  start_date: isoDate.optional(),
  end_date: isoDate.optional(),
});

function daysQuerySchema(fallback: number) {
  return z.object({ days: z.coerce.number().int().min(1).max(365).default(fallback) });
}

const countSchema = z.coerce.number().int().min(1).max(1000);

const exportQuerySchema = z.object({
  format: z.enum(['csv', 'json']).default('csv'),
});

const recordingsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50),
  since_hours: z.coerce.number().positive().optional(),
});

const downloadBodySchema = z.object({
  key: z.string().trim().min(1, 'key is required'),
});

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${what}`, details);
  }
  return parsed.data;
}

function dateRange(input: unknown): DateRange {
  const query = parseInput(dateRangeSchema, input, 'date range');
  return { startDate: query.start_date, endDate: query.end_date };
}

/** Record plus the human-readable size and duration the dashboard shows. */
function present(record: CallRecord) {
  return {
    ...record,
    fileSizeFormatted: formatFileSize(record.fileSize),
    durationFormatted: formatDuration(record.durationSeconds),
  };
}

export interface UploadResult {
  originalFilename: string;
  savedFilename?: string;
  success: boolean;
  error?: string;
}

export function createRouter(ctx: ApiContext): Router {
  const { config, store, pipeline } = ctx;
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxFileSizeBytes },
  });

  function requireRemote(): { remote: RemoteSync } {
    if (!ctx.remote) {
      throw new ServiceUnavailableError('Remote sync is disabled');
    }
    return { remote: ctx.remote };
  }

  /**
   * GET /api/health
   */
  router.get(
    '/health',
    asyncHandler(async (_req: Request, res: Response) => {
      const [storeOk, intakeOk, processedOk] = await Promise.all([
        store.ping(),
        FileManager.fileExists(config.audioFolder),
        FileManager.fileExists(config.processedFolder),
      ]);
      const components = {
        store: storeOk,
        audioFolder: intakeOk,
        processedFolder: processedOk,
        transcriptionApi: config.sonioxApiKey.length > 0,
        classificationApi: config.awsAccessKeyId.length > 0,
      };
      const healthy = Object.values(components).every(Boolean);
      res.json({
        status: healthy ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        version: ctx.version,
        components,
        remoteSync: ctx.remote ? 'enabled' : 'disabled',
      });
    })
  );

  /**
   * GET /api/data
   * Every record, newest first
   */
  router.get(
    '/data',
    asyncHandler(async (_req, res) => {
      const records = await store.list();
      res.json({ data: records.map(present), total: records.length });
    })
  );

  /**
   * GET /api/latest/:count
   */
  router.get(
    '/latest/:count',
    asyncHandler(async (req, res) => {
      const count = parseInput(countSchema, req.params.count, 'count');
      const records = (await store.list()).slice(0, count);
      res.json({ data: records.map(present), total: records.length });
    })
  );

  /**
   * GET /api/file/:filename
   */
  router.get(
    '/file/:filename',
    asyncHandler(async (req, res) => {
      const filename = req.params.filename ?? '';
      const record = await store.get(filename);
      if (!record) {
        throw new NotFoundError(`No record for ${filename}`);
      }
      res.json({ data: present(record) });
    })
  );

  /**
   * GET /api/search?q=
   */
  router.get(
    '/search',
    asyncHandler(async (req, res) => {
      const query = typeof req.query.q === 'string' ? req.query.q.trim() : '';
      const records = query ? await store.search(query) : [];
      res.json({ data: records.map(present), total: records.length, query });
    })
  );

  /**
   * GET /api/stats
   */
  router.get(
    '/stats',
    asyncHandler(async (_req, res) => {
      const stats = processingStats(await store.list());
      res.json({ ...stats, successRateFormatted: `${stats.successRate}%` });
    })
  );

  /**
   * GET /api/processing/status
   * Pipeline state plus the sync scheduler's last run
   */
  router.get(
    '/processing/status',
    asyncHandler(async (_req, res) => {
      res.json({
        pipeline: pipeline.status(),
        stats: processingStats(await store.list()),
        sync: {
          enabled: ctx.scheduler !== undefined,
          running: ctx.scheduler?.isRunning ?? false,
          last: ctx.scheduler?.last,
        },
      });
    })
  );

  // Analytics: every endpoint takes optional start_date / end_date

  router.get(
    '/analytics/overview',
    asyncHandler(async (req, res) => {
      const range = dateRange(req.query);
      res.json(overviewStats(filterByDateRange(await store.list(), range)));
    })
  );

  router.get(
    '/analytics/intents',
    asyncHandler(async (req, res) => {
      const range = dateRange(req.query);
      res.json(intentDistribution(filterByDateRange(await store.list(), range)));
    })
  );

  router.get(
    '/analytics/sub-intents',
    asyncHandler(async (req, res) => {
      const range = dateRange(req.query);
      res.json(subIntentDistribution(filterByDateRange(await store.list(), range)));
    })
  );

  router.get(
    '/analytics/duration-distribution',
    asyncHandler(async (req, res) => {
      const range = dateRange(req.query);
      res.json(durationDistribution(filterByDateRange(await store.list(), range)));
    })
  );

  router.get(
    '/analytics/disposition-distribution',
    asyncHandler(async (req, res) => {
      const range = dateRange(req.query);
      res.json(dispositionDistribution(filterByDateRange(await store.list(), range)));
    })
  );

  const rangedAnalytics: Array<[string, (records: CallRecord[]) => unknown]> = [
    ['/analytics/hourly', hourlyDistribution],
    ['/analytics/performance', performanceMetrics],
    ['/analytics/insights', topInsights],
    ['/analytics/intent-matrix', intentSubIntentMatrix],
    ['/analytics/intent-sub-intent-breakdown', intentSubIntentBreakdown],
    ['/analytics/speaker-distribution', speakerDistribution],
    ['/analytics/drop-off-analysis', dropOffAnalysis],
    ['/analytics/agents', agentPerformance],
    ['/analytics/call-status', callStatusDistribution],
  ];
  for (const [path, aggregate] of rangedAnalytics) {
    router.get(
      path,
      asyncHandler(async (req, res) => {
        const range = dateRange(req.query);
        res.json(aggregate(filterByDateRange(await store.list(), range)));
      })
    );
  }

  /**
   * GET /api/analytics/trends?days=30
   */
  router.get(
    '/analytics/trends',
    asyncHandler(async (req, res) => {
      const { days } = parseInput(daysQuerySchema(30), req.query, 'trends query');
      res.json(dailyTrends(await store.list(), days));
    })
  );

  /**
   * GET /api/analytics/intent-trends?days=7
   */
  router.get(
    '/analytics/intent-trends',
    asyncHandler(async (req, res) => {
      const { days } = parseInput(daysQuerySchema(7), req.query, 'intent trends query');
      res.json(intentTrends(await store.list(), days));
    })
  );

  /**
   * POST /api/upload
   * Multipart field `files`. Each file is saved to the intake folder under a
   * sanitized, non-colliding name and submitted to the pipeline.
   */
  router.post(
    '/upload',
    upload.array('files'),
    asyncHandler(async (req, res) => {
      const files = Array.isArray(req.files) ? req.files : [];
      if (files.length === 0) {
        throw new ValidationError('No files provided');
      }

      const results: UploadResult[] = [];
      for (const file of files) {
        const originalFilename = file.originalname;
        if (!isSupportedAudioFile(originalFilename)) {
          results.push({ originalFilename, success: false, error: 'Unsupported file type' });
          continue;
        }

        const sanitized = FileManager.sanitizeFilename(originalFilename);
        const existing = await store.get(sanitized);
        if (existing?.status === 'completed') {
          results.push({ originalFilename, success: false, error: 'Already processed' });
          continue;
        }

        try {
          const savedFilename = await FileManager.uniqueFilename(config.audioFolder, sanitized);
          await FileManager.writeFileAtomic(join(config.audioFolder, savedFilename), file.buffer);
          pipeline.submit({ filename: savedFilename });
          results.push({ originalFilename, savedFilename, success: true });
        } catch (error) {
          logger.error(`Failed to save upload ${originalFilename}:`, errorMessage(error));
          results.push({ originalFilename, success: false, error: 'Failed to save file' });
        }
      }

      const uploadedCount = results.filter((result) => result.success).length;
      res.status(uploadedCount > 0 ? 200 : 400).json({
        success: uploadedCount > 0,
        message: `Uploaded ${uploadedCount} of ${results.length} file(s)`,
        uploadedCount,
        results,
        errors: results.filter((result) => !result.success).map((result) => `${result.originalFilename}: ${result.error}`),
      });
    })
  );

  /**
   * POST /api/reprocess/:filename
   */
  router.post(
    '/reprocess/:filename',
    asyncHandler(async (req, res) => {
      const filename = req.params.filename ?? '';
      const outcome = await pipeline.reprocess(filename);
      res.status(202).json({ filename, outcome });
    })
  );

  /**
   * DELETE /api/delete/:filename
   */
  router.delete(
    '/delete/:filename',
    asyncHandler(async (req, res) => {
      const filename = req.params.filename ?? '';
      const deleted = await pipeline.delete(filename);
      if (!deleted) {
        throw new NotFoundError(`No record for ${filename}`);
      }
      res.json({ success: true, message: `Deleted ${filename}` });
    })
  );

  /**
   * GET /api/export?format=csv|json
   */
  router.get(
    '/export',
    asyncHandler(async (req, res) => {
      const { format } = parseInput(exportQuerySchema, req.query, 'export query');
      const file = exportRecords(await store.list(), format);
      res.attachment(file.filename);
      res.type(file.contentType);
      res.send(file.body);
    })
  );

  /**
   * GET /api/s3/recordings?limit=&since_hours=
   */
  router.get(
    '/s3/recordings',
    asyncHandler(async (req, res) => {
      const { remote } = requireRemote();
      const query = parseInput(recordingsQuerySchema, req.query, 'recordings query');
      const recordings = await remote.list({
        limit: query.limit,
        sinceMs: query.since_hours === undefined ? undefined : query.since_hours * 60 * 60 * 1000,
      });
      res.json({
        recordings: recordings.map((recording) => ({
          ...recording,
          sizeFormatted: formatFileSize(recording.size),
          lastModified: recording.lastModified.toISOString(),
        })),
        total: recordings.length,
      });
    })
  );

  /**
   * GET /api/s3/stats
   */
  router.get(
    '/s3/stats',
    asyncHandler(async (_req, res) => {
      const { remote } = requireRemote();
      const stats = await remote.bucketStats();
      res.json({ ...stats, totalSizeFormatted: formatFileSize(stats.totalSizeBytes) });
    })
  );

  /**
   * POST /api/s3/sync
   * Runs one sync now; 409 while another is running
   */
  router.post(
    '/s3/sync',
    asyncHandler(async (_req, res) => {
      requireRemote();
      if (!ctx.scheduler) {
        throw new ServiceUnavailableError('Remote sync is disabled');
      }
      const result = await ctx.scheduler.tick();
      if (result.status === 'skipped') {
        throw new ConflictError('A sync is already running');
      }
      if (result.status === 'failed') {
        throw new UpstreamError(`Sync failed: ${result.error}`);
      }
      res.json({ success: true, ...result.report });
    })
  );

  /**
   * POST /api/s3/download { key }
   * Queues one remote object; the pipeline downloads it
   */
  router.post(
    '/s3/download',
    asyncHandler(async (req, res) => {
      requireRemote();
      const { key } = parseInput(downloadBodySchema, req.body, 'download request');
      const filename = filenameFromKey(key);
      if (!isSupportedAudioFile(filename)) {
        throw new ValidationError(`Unsupported file type: ${filename}`);
      }
      const result = pipeline.submit({ filename, remoteKey: key });
      res.status(202).json({ filename, key, accepted: result.accepted });
    })
  );

  /**
   * POST /api/classify-dispositions { start_date?, end_date? }
   * Fills dispositions on completed records that lack them
   */
  router.post(
    '/classify-dispositions',
    asyncHandler(async (req, res) => {
      const range = dateRange(req.body ?? {});
      const updated = await pipeline.backfillDispositions(range);
      res.json({ success: true, updated });
    })
  );

  return router;
}
