#!/usr/bin/env node
import dotenv from "dotenv";
import { loadConfig } from "./utils/config";
import { errorMessage } from "./utils/errors";
import logger from "./utils/logger";
import { DownloadSession } from "./services/session.service";
import { formatSize } from "./services/state.service";
import type { ProgressEvent } from "./models/event.model";

// Load environment variables
dotenv.config();

let session: DownloadSession | null = null;
let running: Promise<void> | null = null;

function logEvent(event: ProgressEvent): void {
  switch (event.kind) {
    case "overall_progress":
      if (event.completed % 100 === 0 || event.completed === event.total) {
        logger.info(`Progress ${event.percent}% (${event.completed}/${event.total})`);
      }
      break;
    case "file_completed":
      if (!event.success) {
        logger.warn(`${event.filename}: ${event.message}`);
      }
      break;
    case "verify_finished":
      logger.info("Verification summary", {
        verified: event.verified,
        mismatched: event.mismatched,
        errors: event.errors,
      });
      break;
    default:
      break;
  }
}

async function startSync(): Promise<void> {
  const config = loadConfig();
  const current = new DownloadSession({
    settings: config.settings,
    statePath: config.stateFile,
    outputDir: config.outputDir,
  });
  session = current;
  current.subscribe(logEvent);

  logger.info(`Starting session ${current.id}`, {
    assetBaseUrl: config.settings.assetBaseUrl,
    stateFile: config.stateFile,
  });

  await current.loadState();
  if (config.manifestPath) {
    await current.loadManifest(config.manifestPath);
  }
  if (current.files.length === 0) {
    logger.warn("Nothing to download: set MANIFEST_PATH or provide a saved state");
    return;
  }

  await current.download();
  if (config.verifyAfterDownload && !current.downloader.isCancelled) {
    await current.verify();
  }
  await current.save();

  const stats = current.statistics();
  const sizes = current.stateService.getTotalSize(current.files);
  logger.info("Sync finished", {
    total: stats.total,
    completed: stats.completed,
    failed: stats.failed,
    verifyFailed: stats.verify_failed,
    pending: stats.pending,
    downloaded: formatSize(sizes.downloadedBytes),
  });
  current.close();
}

// The run saves state itself once the cancelled batch has unwound.
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, saving state and shutting down...`);
  session?.cancel();
  if (running) {
    await running;
  }
  process.exit(0);
}

// Graceful shutdown
process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch((error) => {
    logger.error("Error during shutdown:", error);
    process.exit(1);
  });
});

process.on("SIGINT", () => {
  shutdown("SIGINT").catch((error) => {
    logger.error("Error during shutdown:", error);
    process.exit(1);
  });
});

running = startSync().catch((error: unknown) => {
  logger.error(`Sync failed: ${errorMessage(error)}`, error);
  process.exitCode = 1;
});
