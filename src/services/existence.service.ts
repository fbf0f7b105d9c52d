import fs from "fs/promises";
import path from "path";
import pLimit from "p-limit";
import logger from "../utils/logger";
import { chunk, yieldToEventLoop } from "../utils/async";
import type { FileBloomFilter } from "../utils/bloomFilter";
import {
  isCacheFresh,
  isCacheValid,
  localName,
  updateDiskMetadata,
} from "../models/file.model";
import type { FileRecord } from "../models/file.model";
import type { DownloadSettings } from "../models/settings.model";
import type { CacheRecommendation, StateService } from "./state.service";
import type { BrokerService } from "./broker.service";

export type ExistenceTier = "bloom" | CacheRecommendation;

export interface ExistenceResult {
  existingFiles: FileRecord[];
  filesToDownload: FileRecord[];
  tier: ExistenceTier;
}

interface DiskEntry {
  size: number;
  mtimeMs: number;
}

const PROGRESS_EVERY = 200;

async function statFile(filePath: string): Promise<DiskEntry | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? { size: stat.size, mtimeMs: stat.mtimeMs } : null;
  } catch {
    return null;
  }
}

function sizeMatches(record: FileRecord, entry: DiskEntry): boolean {
  return record.sizeBytes === undefined || record.sizeBytes === entry.size;
}

/**
 * Splits records into present-on-disk and must-fetch, choosing the cheapest
 * check the cache allows: Bloom prefilter, then a sampled reliability score
 * that picks a cache check, an incremental check or a full directory scan.
 */
export class ExistenceService {
  constructor(
    private readonly settings: DownloadSettings,
    private readonly stateService: StateService,
    private readonly bloomFilter: FileBloomFilter,
    private readonly broker?: BrokerService,
  ) {}

  async checkExisting(
    records: readonly FileRecord[],
    dir: string,
  ): Promise<ExistenceResult> {
    let candidates: readonly FileRecord[] = records;
    const filesToDownload: FileRecord[] = [];

    if (this.bloomFilter.isValid()) {
      const { likelyExisting, definitelyNew } = this.bloomFilter.fastPreFilter(records);
      filesToDownload.push(...definitelyNew);
      candidates = likelyExisting;
      logger.info("Bloom prefilter", {
        likelyExisting: likelyExisting.length,
        definitelyNew: definitelyNew.length,
      });
      if (candidates.length === 0) {
        this.publishProgress(100);
        return { existingFiles: [], filesToDownload, tier: "bloom" };
      }
    }

    const report = await this.stateService.analyzeCacheReliability(candidates, dir, {
      sampleRatio: this.settings.cacheSampleRatio,
      minSample: this.settings.cacheMinSample,
      maxAgeHours: this.settings.cacheMaxAgeHours,
      reliableThreshold: this.settings.reliableThreshold,
      incrementalThreshold: this.settings.incrementalThreshold,
    });

    let partition: { existing: FileRecord[]; missing: FileRecord[] };
    switch (report.recommendation) {
      case "cache_reliable":
        partition = await this.cacheCheck(candidates, dir);
        break;
      case "incremental_check":
        partition = await this.incrementalCheck(candidates, dir);
        break;
      case "full_scan":
        partition = await this.fullScan(candidates, dir);
        break;
    }

    filesToDownload.push(...partition.missing);
    logger.info("Existence check finished", {
      tier: report.recommendation,
      existing: partition.existing.length,
      toDownload: filesToDownload.length,
    });
    return {
      existingFiles: partition.existing,
      filesToDownload,
      tier: report.recommendation,
    };
  }

  /** Trusts fresh, verified records after an existence check; stats the rest. */
  private async cacheCheck(
    records: readonly FileRecord[],
    dir: string,
  ): Promise<{ existing: FileRecord[]; missing: FileRecord[] }> {
    const existing: FileRecord[] = [];
    const missing: FileRecord[] = [];
    const now = Date.now();

    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      const filePath = path.join(dir, localName(record));
      const trusted =
        record.status === "completed" &&
        isCacheFresh(record, this.settings.cacheMaxAgeHours, now);

      if (trusted) {
        if (await exists(filePath)) {
          existing.push(record);
        } else {
          missing.push(record);
        }
      } else {
        const entry = await statFile(filePath);
        if (entry && sizeMatches(record, entry)) {
          updateDiskMetadata(record, entry);
          existing.push(record);
        } else {
          missing.push(record);
        }
      }
      await this.tick(i + 1, records.length);
    }
    this.publishProgress(100);
    return { existing, missing };
  }

  /**
   * Records whose cached mtime and size still match are trusted; the uncertain
   * ones are checked by a bounded worker pool.
   */
  private async incrementalCheck(
    records: readonly FileRecord[],
    dir: string,
  ): Promise<{ existing: FileRecord[]; missing: FileRecord[] }> {
    const existing: FileRecord[] = [];
    const uncertain: FileRecord[] = [];
    const now = Date.now();

    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      const entry = await statFile(path.join(dir, localName(record)));
      if (entry && isCacheValid(record, entry, this.settings.cacheMaxAgeHours, now)) {
        existing.push(record);
      } else {
        uncertain.push(record);
      }
      if ((i + 1) % PROGRESS_EVERY === 0) {
        this.publishProgress(Math.round(((i + 1) / records.length) * 50));
        await yieldToEventLoop();
      }
    }

    const missing: FileRecord[] = [];
    const limit = pLimit(this.settings.existenceWorkers);
    let checked = 0;
    for (const group of chunk(uncertain, this.settings.existenceBatchSize)) {
      const found = await Promise.all(
        group.map((record) =>
          limit(async () => {
            const entry = await statFile(path.join(dir, localName(record)));
            if (entry && sizeMatches(record, entry)) {
              updateDiskMetadata(record, entry);
              return true;
            }
            return false;
          }),
        ),
      );
      group.forEach((record, index) => {
        (found[index] ? existing : missing).push(record);
      });
      checked += group.length;
      this.publishProgress(50 + Math.round((checked / uncertain.length) * 50));
      await yieldToEventLoop();
    }

    logger.debug("Incremental check", {
      trusted: records.length - uncertain.length,
      uncertain: uncertain.length,
    });
    this.publishProgress(100);
    return { existing, missing };
  }

  /** One directory pass, then classification from the in-memory listing. */
  private async fullScan(
    records: readonly FileRecord[],
    dir: string,
  ): Promise<{ existing: FileRecord[]; missing: FileRecord[] }> {
    const listing = await scanDirectory(dir);
    const existing: FileRecord[] = [];
    const missing: FileRecord[] = [];

    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      const entry = listing.get(localName(record));
      if (entry && sizeMatches(record, entry)) {
        updateDiskMetadata(record, entry);
        existing.push(record);
      } else {
        missing.push(record);
      }
      await this.tick(i + 1, records.length);
    }

    this.stateService.markFullScan();
    logger.info("Full directory scan", {
      dir,
      filesOnDisk: listing.size,
      matched: existing.length,
    });
    this.publishProgress(100);
    return { existing, missing };
  }

  private async tick(done: number, total: number): Promise<void> {
    if (done % PROGRESS_EVERY === 0) {
      this.publishProgress(Math.round((done / total) * 100));
      await yieldToEventLoop();
    }
  }

  private publishProgress(percent: number): void {
    this.broker?.publishEvent({ kind: "check_progress", percent });
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function scanDirectory(dir: string): Promise<Map<string, DiskEntry>> {
  const listing = new Map<string, DiskEntry>();
  const handle = await fs.opendir(dir).catch((error: unknown) => {
    logger.warn(`Cannot scan ${dir}, treating it as empty`, {
      error: String(error),
    });
    return null;
  });
  if (!handle) {
    return listing;
  }

  let seen = 0;
  for await (const dirent of handle) {
    if (!dirent.isFile()) {
      continue;
    }
    const entry = await statFile(path.join(dir, dirent.name));
    if (entry) {
      listing.set(dirent.name, entry);
    }
    seen += 1;
    if (seen % PROGRESS_EVERY === 0) {
      await yieldToEventLoop();
    }
  }
  return listing;
}
