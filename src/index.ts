#!/usr/bin/env node
/**
 * Main entry point: folder watcher, remote sync and dashboard API
 */
import type { Server } from 'http';
import { parseArgs } from 'node:util';
import { dirname } from 'path';
import { createApp } from './api/app.js';
import { loadConfig, loadEnvFile, type Config } from './config/env.js';
import { createAppContext, type AppContext } from './context.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { FileManager } from './utils/fileManager.js';
import { formatFileSize } from './utils/format.js';
import { LogLevel, logger } from './utils/logger.js';

async function main() {
  // Parse command line arguments
  const { values: args } = parseArgs({
    options: {
      port: {
        type: 'string',
      },
      'dashboard-only': {
        type: 'boolean',
      },
      'no-sync': {
        type: 'boolean',
      },
      verbose: {
        type: 'boolean',
      },
      help: {
        type: 'boolean',
      },
    },
  });

  if (args.help) {
    showHelp();
    return;
  }

  loadEnvFile();
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  logger.setLevel(args.verbose ? LogLevel.DEBUG : config.logLevel);

  if (args.port !== undefined) {
    const port = Number.parseInt(args.port, 10);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      logger.error(`Invalid --port: ${args.port}`);
      process.exitCode = 1;
      return;
    }
    config = { ...config, port };
  }

  const dashboardOnly = args['dashboard-only'] === true;

  // Show configuration
  const separator = '='.repeat(60);
  logger.info(separator);
  logger.info('CALL ANALYTICS PIPELINE');
  logger.info(separator);
  logger.info(`Intake folder: ${config.audioFolder}`);
  logger.info(`Processed folder: ${config.processedFolder}`);
  logger.info(`Store: ${config.csvFile}`);
  logger.info(`Max file size: ${formatFileSize(config.maxFileSizeBytes)}`);
  logger.info(`Max concurrent processes: ${config.maxConcurrentProcesses}`);
  logger.info(`Remote sync: ${config.enableS3Sync && !args['no-sync'] && !dashboardOnly ? 'enabled' : 'disabled'}`);
  logger.info(separator);

  for (const dir of [config.audioFolder, config.processedFolder, dirname(config.csvFile)]) {
    await FileManager.assertWritableDir(dir);
  }

  const ctx = createAppContext(config, { disableSync: args['no-sync'] === true || dashboardOnly });
  await ctx.store.initialize();

  if (!dashboardOnly) {
    ctx.watcher.start();
    ctx.scheduler?.start({ immediate: true });
  }

  const app = createApp(ctx);
  const server = app.listen(config.port, config.host, () => {
    logger.success(`Dashboard API listening on http://${config.host}:${config.port}/api`);
  });

  registerShutdown(ctx, server);
}

function registerShutdown(ctx: AppContext, server: Server) {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down...`);

    await ctx.watcher.stop();
    await ctx.scheduler?.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));

    const { inFlight } = ctx.pipeline.status();
    if (inFlight.length > 0) {
      logger.info(`Waiting for ${inFlight.length} in-flight job(s)`);
    }
    await ctx.pipeline.idle();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error('Shutdown failed:', errorMessage(error));
        process.exitCode = 1;
      });
    });
  }
}

function showHelp() {
  console.log(`
Call Analytics Pipeline

Watches an intake folder (and optionally an S3 bucket) for call recordings,
transcribes and classifies each call, and serves the results over HTTP.

Usage:
  npm start                      Run watcher, remote sync and dashboard API
  npm start -- [options]         Run with specific options

Options:
  --port <number>                Override PORT
  --dashboard-only               Serve the API only; no watcher or remote sync
  --no-sync                      Disable remote sync for this run
  --verbose                      Enable verbose logging
  --help                         Show this help message

Examples:
  # Serve on another port with debug logs
  npm start -- --port 9000 --verbose

  # Local folder only
  npm start -- --no-sync

Environment Variables:
  See .env.example for required environment variables
`);
}

main().catch((error) => {
  logger.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
