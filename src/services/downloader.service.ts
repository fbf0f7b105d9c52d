import fs from "fs/promises";
import { constants as fsConstants } from "fs";
import path from "path";
import pLimit from "p-limit";
import logger from "../utils/logger";
import { chunk, sleep, yieldToEventLoop } from "../utils/async";
import type { FileBloomFilter } from "../utils/bloomFilter";
import {
  CancelledError,
  DirectoryError,
  IntegrityError,
  errorMessage,
  isRetryable,
} from "../utils/errors";
import {
  localName,
  markCompleted,
  markFailed,
  resetForRedownload,
  updateDiskMetadata,
} from "../models/file.model";
import type { FileRecord } from "../models/file.model";
import type { DownloadSummary } from "../models/event.model";
import type { DownloadSettings } from "../models/settings.model";
import type { BrokerService } from "./broker.service";
import { ExistenceService } from "./existence.service";
import { HttpService } from "./http.service";
import { PlannerService, existingMarkBatchSize } from "./planner.service";
import { ResumeService, partPathOf } from "./resume.service";
import type { StateService } from "./state.service";

type TaskOutcome = "success" | "failed" | "cancelled";

export interface DownloadOptions {
  /** Records the Bloom filter is rebuilt from after the run. Defaults to the input. */
  indexRecords?: readonly FileRecord[];
  /** Awaited after every batch, e.g. to checkpoint state. */
  onBatchComplete?: (batchIndex: number, batchCount: number) => Promise<void>;
}

export type DownloadResults = Record<string, boolean>;

export class DownloaderService {
  readonly http: HttpService;
  readonly planner: PlannerService;
  readonly resume: ResumeService;
  readonly existence: ExistenceService;

  private controller = new AbortController();
  private cancelled = false;
  private inFlight = 0;
  private maxInFlight = 0;

  constructor(
    private readonly settings: DownloadSettings,
    stateService: StateService,
    private readonly bloomFilter: FileBloomFilter,
    private readonly broker: BrokerService,
  ) {
    this.http = new HttpService(Math.max(settings.concurrentRequests, 10));
    this.planner = new PlannerService(settings);
    this.resume = new ResumeService(settings, this.http, this.planner);
    this.existence = new ExistenceService(settings, stateService, bloomFilter, broker);
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Highest number of file tasks that were running at the same time. */
  get peakConcurrency(): number {
    return this.maxInFlight;
  }

  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.controller.abort();
    this.broker.log("warn", "Cancelling download");
  }

  async downloadFiles(
    records: readonly FileRecord[],
    outputDir: string,
    options: DownloadOptions = {},
  ): Promise<DownloadResults> {
    this.cancelled = false;
    this.controller = new AbortController();
    this.maxInFlight = 0;

    await ensureWritableDirectory(outputDir);

    const results: DownloadResults = {};
    const summary: DownloadSummary = { success: 0, failed: 0, skipped: 0 };
    const candidates = records.filter((record) => record.status !== "skipped");
    summary.skipped = records.length - candidates.length;

    this.broker.publishEvent({
      kind: "download_started",
      totalFiles: records.length,
      outputDir,
    });

    const { existingFiles, filesToDownload, tier } =
      await this.existence.checkExisting(candidates, outputDir);
    await this.markExisting(existingFiles, outputDir, results);
    summary.success += existingFiles.length;

    const plan = this.planner.plan(candidates.length, filesToDownload);
    this.broker.log(
      "info",
      `${existingFiles.length} files present (${tier}), ${filesToDownload.length} to download ` +
        `with concurrency ${plan.concurrency} in batches of ${plan.batchSize}`,
    );

    const total = candidates.length;
    let done = existingFiles.length;
    const limit = pLimit(plan.concurrency);
    const batches = chunk(filesToDownload, plan.batchSize);

    for (let index = 0; index < batches.length; index++) {
      if (this.cancelled) {
        break;
      }
      const batch = batches[index];
      const outcomes = await Promise.all(
        batch.map((record) =>
          limit(async () => {
            const outcome = await this.downloadOne(record, outputDir);
            if (outcome !== "cancelled") {
              done += 1;
              this.broker.publishEvent({
                kind: "overall_progress",
                percent: total > 0 ? Math.round((done / total) * 100) : 100,
                completed: done,
                total,
              });
            }
            return outcome;
          }),
        ),
      );

      batch.forEach((record, i) => {
        const outcome = outcomes[i];
        results[record.filename] = outcome === "success";
        if (outcome === "success") {
          summary.success += 1;
        } else if (outcome === "failed") {
          summary.failed += 1;
        }
      });

      if (options.onBatchComplete) {
        await options.onBatchComplete(index, batches.length);
      }
      if (index < batches.length - 1 && !this.cancelled) {
        await sleep(this.settings.retryDelayMs);
      }
    }

    const info = this.bloomFilter.buildFromCompletedFiles(options.indexRecords ?? records);
    logger.debug("Rebuilt bloom filter after download run", info);

    if (this.cancelled) {
      this.broker.publishEvent({ kind: "download_cancelled", ...summary });
      this.broker.log("warn", `Download cancelled: ${summary.success} succeeded, ${summary.failed} failed`);
    } else {
      this.broker.publishEvent({ kind: "download_finished", ...summary });
      this.broker.log(
        "info",
        `Download finished: ${summary.success} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`,
      );
    }
    return results;
  }

  /** Deletes and re-fetches every record whose hash check failed. */
  async redownloadVerifyFailed(
    records: readonly FileRecord[],
    outputDir: string,
    options: DownloadOptions = {},
  ): Promise<DownloadResults> {
    const targets = records.filter((record) => record.status === "verify_failed");
    if (targets.length === 0) {
      logger.info("No verify-failed files to download again");
      return {};
    }
    for (const record of targets) {
      const localPath = path.join(outputDir, localName(record));
      await fs.rm(localPath, { force: true });
      await fs.rm(partPathOf(localPath), { force: true });
      resetForRedownload(record);
    }
    this.broker.log("info", `Downloading ${targets.length} verify-failed files again`);
    return this.downloadFiles(targets, outputDir, {
      ...options,
      indexRecords: options.indexRecords ?? records,
    });
  }

  private async markExisting(
    existing: readonly FileRecord[],
    outputDir: string,
    results: DownloadResults,
  ): Promise<void> {
    for (const batch of chunk(existing, existingMarkBatchSize(existing.length))) {
      for (const record of batch) {
        markCompleted(record, path.join(outputDir, localName(record)), record.sizeBytes);
        results[record.filename] = true;
      }
      await yieldToEventLoop();
    }
  }

  private async downloadOne(record: FileRecord, outputDir: string): Promise<TaskOutcome> {
    if (this.cancelled) {
      return "cancelled";
    }
    const name = localName(record);
    const url = `${this.settings.assetBaseUrl}/${encodeURIComponent(name)}`;
    const localPath = path.join(outputDir, name);

    record.downloadUrl = url;
    record.status = "downloading";
    record.errorMessage = undefined;
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      if (!(await this.alreadyOnDisk(record, localPath))) {
        await this.transferWithRetry(record, url, localPath);
      }
      const stat = await fs.stat(localPath);
      markCompleted(record, localPath, stat.size);
      updateDiskMetadata(record, stat);
      this.broker.publishEvent({
        kind: "file_completed",
        filename: record.filename,
        success: true,
        message: "Downloaded",
      });
      return "success";
    } catch (error) {
      if (error instanceof CancelledError || this.cancelled) {
        record.status = "pending";
        logger.debug(`Download of ${record.filename} cancelled`);
        return "cancelled";
      }
      const message = errorMessage(error);
      if (error instanceof IntegrityError) {
        record.status = "verify_failed";
        record.hashVerifyStatus = "verified_failed";
        record.errorMessage = message;
      } else {
        markFailed(record, message);
      }
      logger.error(`Download failed for ${record.filename}: ${message}`);
      this.broker.publishEvent({
        kind: "file_completed",
        filename: record.filename,
        success: false,
        message,
      });
      return "failed";
    } finally {
      this.inFlight -= 1;
    }
  }

  private async alreadyOnDisk(record: FileRecord, localPath: string): Promise<boolean> {
    if (record.sizeBytes === undefined) {
      return false;
    }
    try {
      const stat = await fs.stat(localPath);
      return stat.isFile() && stat.size === record.sizeBytes;
    } catch {
      return false;
    }
  }

  /**
   * Network errors are retried with a fixed delay. An integrity failure gets
   * one fresh download; anything else fails the file at once.
   */
  private async transferWithRetry(
    record: FileRecord,
    url: string,
    localPath: string,
  ): Promise<void> {
    const maxRetries = this.settings.maxRetries;
    let redownloaded = false;
    let attempt = 1;

    for (;;) {
      if (this.cancelled) {
        throw new CancelledError();
      }
      try {
        await this.resume.smartDownload(record, url, localPath, {
          signal: this.controller.signal,
          onProgress: (downloaded, totalBytes) => this.reportProgress(record, downloaded, totalBytes),
        });
        return;
      } catch (error) {
        if (error instanceof IntegrityError && !redownloaded) {
          redownloaded = true;
          logger.warn(`${record.filename} failed integrity check, downloading again`);
          continue;
        }
        if (!isRetryable(error) || attempt >= maxRetries || this.cancelled) {
          throw error;
        }
        logger.warn(
          `Attempt ${attempt}/${maxRetries} failed for ${record.filename}: ${errorMessage(error)}`,
        );
        attempt += 1;
        await sleep(this.settings.retryDelayMs);
      }
    }
  }

  private reportProgress(record: FileRecord, downloaded: number, totalBytes?: number): void {
    record.downloadedBytes = downloaded;
    if (!totalBytes) {
      return;
    }
    const percent = Math.min(100, Math.floor((downloaded / totalBytes) * 100));
    if (percent !== record.progress) {
      record.progress = percent;
      this.broker.publishEvent({
        kind: "file_progress",
        filename: record.filename,
        percent,
        downloadedBytes: downloaded,
      });
    }
  }
}

export async function ensureWritableDirectory(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.access(dir, fsConstants.W_OK);
  } catch (error) {
    throw new DirectoryError(`Output directory is not writable (${errorMessage(error)})`, dir);
  }
}
