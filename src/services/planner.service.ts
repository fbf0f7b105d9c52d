import { fileExtension } from "../models/file.model";
import type { FileRecord } from "../models/file.model";
import type { DownloadSettings } from "../models/settings.model";

export interface FileMix {
  largeRatio: number;
  smallRatio: number;
  jsonRatio: number;
  pngRatio: number;
}

export interface DownloadPlan {
  batchSize: number;
  concurrency: number;
  skipRatio: number;
}

const MiB = 1024 * 1024;

/**
 * Adaptive tuning for a download run: how many files go in a batch, how many
 * requests run at once, and per-file timeout and chunk size.
 */
export class PlannerService {
  constructor(private readonly settings: DownloadSettings) {}

  fileMix(records: readonly FileRecord[]): FileMix {
    if (records.length === 0) {
      return { largeRatio: 0, smallRatio: 0, jsonRatio: 0, pngRatio: 0 };
    }
    let large = 0;
    let small = 0;
    let json = 0;
    let png = 0;
    for (const record of records) {
      const size = record.sizeBytes;
      if (size !== undefined && size > this.settings.largeFileThreshold) {
        large += 1;
      } else if (size !== undefined && size < this.settings.smallFileThreshold) {
        small += 1;
      }
      const ext = fileExtension(record);
      if (ext === ".json") {
        json += 1;
      } else if (ext === ".png") {
        png += 1;
      }
    }
    const n = records.length;
    return {
      largeRatio: large / n,
      smallRatio: small / n,
      jsonRatio: json / n,
      pngRatio: png / n,
    };
  }

  optimalBatchSize(
    totalFiles: number,
    toDownload: readonly FileRecord[],
  ): number {
    const count = toDownload.length;
    if (count === 0) {
      return 1;
    }
    if (count <= 10) {
      return Math.min(5, count);
    }

    let batch = this.settings.batchSize;
    if (count <= 50) {
      batch = Math.min(15, batch);
    } else if (count <= 200) {
      batch = Math.min(30, batch);
    }

    const skipRatio = skipRatioOf(totalFiles, count);
    if (skipRatio > 0.95) {
      batch = Math.max(10, Math.floor(batch / 3));
    } else if (skipRatio > 0.8) {
      batch = Math.max(15, Math.floor(batch / 2));
    } else if (skipRatio > 0.5) {
      batch = Math.max(20, Math.floor((batch * 2) / 3));
    }

    const mix = this.fileMix(toDownload);
    if (mix.largeRatio > 0.3) {
      batch = Math.max(10, Math.floor(batch / 2));
    } else if (mix.smallRatio > 0.8) {
      batch = Math.min(100, batch * 2);
    }

    return Math.max(1, Math.min(batch, count));
  }

  optimalConcurrency(
    totalFiles: number,
    toDownload: readonly FileRecord[],
  ): number {
    const configured = this.settings.concurrentRequests;
    const count = toDownload.length;
    if (count === 0) {
      return 1;
    }
    if (count <= 5) {
      return Math.max(1, Math.min(count, 5, configured));
    }

    const batch = this.optimalBatchSize(totalFiles, toDownload);
    let concurrency: number;
    if (count <= 50) {
      concurrency = batch * 2;
    } else if (count <= 500) {
      concurrency = batch * 3;
    } else {
      concurrency = batch * 4;
    }

    const mix = this.fileMix(toDownload);
    if (mix.largeRatio > 0.5) {
      concurrency = Math.max(20, Math.floor(concurrency / 2));
    } else if (mix.smallRatio > 0.8) {
      concurrency = Math.min(120, Math.floor(concurrency * 1.5));
    }
    if (mix.jsonRatio > 0.7) {
      concurrency = Math.min(100, Math.floor((concurrency * 4) / 3));
    } else if (mix.pngRatio > 0.7) {
      concurrency = Math.max(30, Math.floor((concurrency * 3) / 4));
    }

    return Math.min(configured, Math.max(5, concurrency));
  }

  plan(totalFiles: number, toDownload: readonly FileRecord[]): DownloadPlan {
    return {
      batchSize: this.optimalBatchSize(totalFiles, toDownload),
      concurrency: this.optimalConcurrency(totalFiles, toDownload),
      skipRatio: skipRatioOf(totalFiles, toDownload.length),
    };
  }

  adaptiveTimeout(record: FileRecord): number {
    const { timeoutMs, largeFileThreshold, smallFileThreshold } = this.settings;
    const size = record.sizeBytes;
    if (size === undefined) {
      return timeoutMs;
    }
    if (size > largeFileThreshold) {
      const bySize = Math.max(180_000, (size / MiB) * 10_000);
      return Math.round(Math.min(bySize, timeoutMs * 2));
    }
    if (size < smallFileThreshold) {
      return Math.round(Math.max(60_000, timeoutMs / 2));
    }
    return timeoutMs;
  }

  adaptiveChunkSize(record: FileRecord): number {
    const { chunkSize, largeFileThreshold, smallFileThreshold } = this.settings;
    const size = record.sizeBytes;
    if (size === undefined) {
      return chunkSize;
    }
    if (size > largeFileThreshold) {
      return Math.min(64 * 1024, chunkSize * 2);
    }
    if (size < smallFileThreshold) {
      return Math.max(8 * 1024, Math.floor(chunkSize / 2));
    }
    return chunkSize;
  }
}

export function skipRatioOf(totalFiles: number, toDownload: number): number {
  if (totalFiles <= 0) {
    return 0;
  }
  return Math.max(0, (totalFiles - toDownload) / totalFiles);
}

/** Batch size for marking already-present files completed. */
export function existingMarkBatchSize(count: number): number {
  if (count <= 500) return 100;
  if (count <= 2000) return 500;
  if (count <= 5000) return 1000;
  if (count <= 20000) return 5000;
  return 10000;
}
