import path from "path";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import { ConfigError } from "../utils/errors";
import { FileBloomFilter } from "../utils/bloomFilter";
import { markSkipped } from "../models/file.model";
import type { FileRecord } from "../models/file.model";
import type { VerifySummary } from "../models/event.model";
import { resolveSettings } from "../models/settings.model";
import type { DownloadSettings } from "../models/settings.model";
import { BrokerService } from "./broker.service";
import type { ProgressListener } from "./broker.service";
import { DownloaderService } from "./downloader.service";
import type { DownloadResults } from "./downloader.service";
import manifestService from "./manifest.service";
import type { DiffCounts } from "./manifest.service";
import { StateService } from "./state.service";
import type { FileStatistics } from "./state.service";
import { VerifierService } from "./verifier.service";
import type { VerifyResultCallback } from "./verifier.service";

export interface SessionOptions {
  settings?: Partial<DownloadSettings>;
  statePath: string;
  outputDir?: string;
  /** Save state after every N download batches; 0 disables checkpoints. */
  checkpointEveryBatches?: number;
}

/**
 * Everything one download run owns: records, output directory, settings,
 * Bloom filter, state store, event channel and cancellation.
 */
export class DownloadSession {
  readonly id = uuidv4();
  readonly settings: DownloadSettings;
  readonly bloomFilter: FileBloomFilter;
  readonly stateService: StateService;
  readonly broker: BrokerService;
  readonly downloader: DownloaderService;
  readonly verifier: VerifierService;

  private records: FileRecord[] = [];
  private dir: string | null;
  private readonly checkpointEvery: number;

  constructor(options: SessionOptions) {
    this.settings = resolveSettings(options.settings);
    this.bloomFilter = new FileBloomFilter(this.settings.bloomFalsePositiveRate);
    this.stateService = new StateService(options.statePath, this.bloomFilter);
    this.broker = new BrokerService(this.id);
    this.downloader = new DownloaderService(
      this.settings,
      this.stateService,
      this.bloomFilter,
      this.broker,
    );
    this.verifier = new VerifierService(this.broker);
    this.dir = options.outputDir ? path.resolve(options.outputDir) : null;
    this.checkpointEvery = options.checkpointEveryBatches ?? 10;
  }

  get files(): readonly FileRecord[] {
    return this.records;
  }

  get outputDir(): string | null {
    return this.dir;
  }

  setOutputDir(dir: string): void {
    this.dir = path.resolve(dir);
  }

  async loadState(): Promise<number> {
    const { records, outputDir } = await this.stateService.load();
    this.records = records;
    if (!this.dir && outputDir) {
      this.dir = outputDir;
    }
    return records.length;
  }

  async loadManifest(manifestPath: string): Promise<DiffCounts> {
    const { records, diff } = await manifestService.loadMappingWithDiff(
      manifestPath,
      this.records,
    );
    this.records = records;
    this.broker.log(
      "info",
      `Manifest loaded: ${diff.new} new, ${diff.updated} updated, ` +
        `${diff.existing} unchanged, ${diff.removed} removed`,
    );
    return diff;
  }

  /** Skips pending or failed records by filename; returns how many changed. */
  skip(filenames: readonly string[], reason: string): number {
    const wanted = new Set(filenames);
    let count = 0;
    for (const record of this.records) {
      if (wanted.has(record.filename) && (record.status === "pending" || record.status === "failed")) {
        markSkipped(record, reason);
        count += 1;
      }
    }
    return count;
  }

  async download(): Promise<DownloadResults> {
    const dir = this.requireOutputDir();
    return this.downloader.downloadFiles(this.records, dir, {
      indexRecords: this.records,
      onBatchComplete: (index) => this.checkpoint(index),
    });
  }

  async redownloadVerifyFailed(): Promise<DownloadResults> {
    const dir = this.requireOutputDir();
    return this.downloader.redownloadVerifyFailed(this.records, dir, {
      indexRecords: this.records,
      onBatchComplete: (index) => this.checkpoint(index),
    });
  }

  async verify(onResult?: VerifyResultCallback): Promise<VerifySummary> {
    const dir = this.requireOutputDir();
    const targets = this.records.filter((record) => record.status === "completed");
    return this.verifier.verifyParallel(targets, dir, onResult);
  }

  async save(): Promise<void> {
    await this.stateService.save(this.records, this.dir);
  }

  statistics(): FileStatistics {
    return this.stateService.getStatistics(this.records);
  }

  cancel(): void {
    this.downloader.cancel();
    this.verifier.cancel();
  }

  subscribe(listener: ProgressListener): () => void {
    return this.broker.subscribeToEvents(listener);
  }

  close(): void {
    this.broker.disconnect();
  }

  private async checkpoint(batchIndex: number): Promise<void> {
    if (this.checkpointEvery > 0 && (batchIndex + 1) % this.checkpointEvery === 0) {
      await this.save();
      logger.debug(`Checkpointed state after batch ${batchIndex + 1}`);
    }
  }

  private requireOutputDir(): string {
    if (!this.dir) {
      throw new ConfigError("No output directory set; pass OUTPUT_DIR or load a saved state");
    }
    return this.dir;
  }
}
