import fs from "fs/promises";
import path from "path";
import Joi from "joi";
import logger from "../utils/logger";
import { ParseError, errorMessage } from "../utils/errors";
import { chunk, yieldToEventLoop } from "../utils/async";
import type { FileBloomFilter } from "../utils/bloomFilter";
import {
  CACHE_SCHEMA_VERSION,
  isDownloadStatus,
  isHashVerifyStatus,
  localName,
} from "../models/file.model";
import type { DownloadStatus, FileRecord, HashVerifyStatus } from "../models/file.model";

export const METADATA_VERSION = "2.0";

const SERIALIZE_BATCH_SIZE = 2000;
const COMPACT_THRESHOLD = 1000;

// Status labels written by older releases of the state file.
const LEGACY_STATUS_LABELS: Record<string, DownloadStatus> = {
  待下载: "pending",
  下载中: "downloading",
  已完成: "completed",
  失败: "failed",
  已取消: "cancelled",
  已跳过: "skipped",
  验证失败: "verify_failed",
};

export interface PersistedFileEntry {
  filename: string;
  contentHash: string;
  status: DownloadStatus;
  progress: number;
  sizeBytes: number | null;
  downloadedBytes: number;
  localPath: string | null;
  errorMessage: string | null;
  downloadUrl: string | null;
  mtime: number | null;
  diskVerified: boolean;
  lastCheckedAt: string | null;
  cacheSchemaVersion: string;
  hashVerifyStatus: HashVerifyStatus;
  hashVerifiedAt: string | null;
  calculatedHash: string | null;
}

export interface StateDocument {
  outputDir: string | null;
  metadataVersion: string;
  lastFullScan: string | null;
  totalFiles: number;
  files: PersistedFileEntry[];
}

export interface LoadedState {
  records: FileRecord[];
  outputDir: string | null;
}

export type FileStatistics = Record<DownloadStatus, number> & { total: number };

export type CacheRecommendation =
  | "cache_reliable"
  | "incremental_check"
  | "full_scan";

export interface CacheReliabilityOptions {
  sampleRatio?: number;
  minSample?: number;
  maxAgeHours?: number;
  reliableThreshold?: number;
  incrementalThreshold?: number;
  random?: () => number;
  now?: number;
}

export interface CacheReliabilityReport {
  score: number;
  sampleSize: number;
  validCount: number;
  poolSize: number;
  recommendation: CacheRecommendation;
}

const nullableString = Joi.string().allow(null, "");
const nullableNumber = Joi.number().allow(null);

// Older files carry `md5` / `size` / `downloaded_size`; both spellings load.
const fileEntrySchema = Joi.object({
  filename: Joi.string().required(),
  contentHash: Joi.string(),
  md5: Joi.string(),
  status: Joi.string().default("pending"),
  progress: Joi.number().min(0).max(100).default(0),
  sizeBytes: nullableNumber,
  size: nullableNumber,
  downloadedBytes: Joi.number().min(0),
  downloaded_size: Joi.number().min(0),
  localPath: nullableString,
  local_path: nullableString,
  errorMessage: nullableString,
  error_message: nullableString,
  downloadUrl: nullableString,
  download_url: nullableString,
  mtime: nullableNumber,
  diskVerified: Joi.boolean().default(false),
  lastCheckedAt: nullableString,
  cacheSchemaVersion: Joi.string().default(CACHE_SCHEMA_VERSION),
  hashVerifyStatus: Joi.string().default("not_verified"),
  hashVerifiedAt: nullableString,
  calculatedHash: nullableString,
})
  .or("contentHash", "md5")
  .unknown(true);

const stateDocumentSchema = Joi.object({
  outputDir: nullableString,
  output_dir: nullableString,
  metadataVersion: Joi.string(),
  lastFullScan: nullableString,
  totalFiles: Joi.number().integer().min(0),
  files: Joi.array().items(fileEntrySchema).default([]),
}).unknown(true);

function optional<T>(...values: Array<T | null | undefined | "">): T | undefined {
  for (const value of values) {
    if (value !== null && value !== undefined && value !== "") {
      return value;
    }
  }
  return undefined;
}

function toStatus(raw: unknown): DownloadStatus {
  if (isDownloadStatus(raw)) {
    return raw;
  }
  if (typeof raw === "string" && raw in LEGACY_STATUS_LABELS) {
    return LEGACY_STATUS_LABELS[raw];
  }
  return "pending";
}

interface RawFileEntry {
  filename: string;
  contentHash?: string;
  md5?: string;
  status: string;
  progress: number;
  sizeBytes?: number | null;
  size?: number | null;
  downloadedBytes?: number;
  downloaded_size?: number;
  localPath?: string | null;
  local_path?: string | null;
  errorMessage?: string | null;
  error_message?: string | null;
  downloadUrl?: string | null;
  download_url?: string | null;
  mtime?: number | null;
  diskVerified: boolean;
  lastCheckedAt?: string | null;
  cacheSchemaVersion: string;
  hashVerifyStatus: string;
  hashVerifiedAt?: string | null;
  calculatedHash?: string | null;
}

function fromEntry(entry: RawFileEntry): FileRecord {
  return {
    filename: entry.filename,
    contentHash: optional(entry.contentHash, entry.md5) ?? "",
    status: toStatus(entry.status),
    progress: entry.progress,
    sizeBytes: optional(entry.sizeBytes, entry.size),
    downloadedBytes: optional(entry.downloadedBytes, entry.downloaded_size) ?? 0,
    localPath: optional(entry.localPath, entry.local_path),
    errorMessage: optional(entry.errorMessage, entry.error_message),
    downloadUrl: optional(entry.downloadUrl, entry.download_url),
    mtime: optional(entry.mtime),
    diskVerified: entry.diskVerified,
    lastCheckedAt: optional(entry.lastCheckedAt),
    cacheSchemaVersion: entry.cacheSchemaVersion,
    hashVerifyStatus: isHashVerifyStatus(entry.hashVerifyStatus)
      ? entry.hashVerifyStatus
      : "not_verified",
    hashVerifiedAt: optional(entry.hashVerifiedAt),
    calculatedHash: optional(entry.calculatedHash),
  };
}

export function toEntry(record: FileRecord): PersistedFileEntry {
  return {
    filename: record.filename,
    contentHash: record.contentHash,
    status: record.status,
    progress: record.progress,
    sizeBytes: record.sizeBytes ?? null,
    downloadedBytes: record.downloadedBytes,
    localPath: record.localPath ?? null,
    errorMessage: record.errorMessage ?? null,
    downloadUrl: record.downloadUrl ?? null,
    mtime: record.mtime ?? null,
    diskVerified: record.diskVerified,
    lastCheckedAt: record.lastCheckedAt ?? null,
    cacheSchemaVersion: record.cacheSchemaVersion,
    hashVerifyStatus: record.hashVerifyStatus,
    hashVerifiedAt: record.hashVerifiedAt ?? null,
    calculatedHash: record.calculatedHash ?? null,
  };
}

export class StateService {
  private lastFullScan: string | null = null;

  constructor(
    readonly statePath: string,
    private readonly bloomFilter?: FileBloomFilter,
  ) {}

  get lastFullScanAt(): string | null {
    return this.lastFullScan;
  }

  markFullScan(at: Date = new Date()): void {
    this.lastFullScan = at.toISOString();
  }

  async load(): Promise<LoadedState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.statePath, "utf-8");
    } catch (error: unknown) {
      if (isNotFound(error)) {
        logger.info(`No saved state at ${this.statePath}`);
        return { records: [], outputDir: null };
      }
      logger.error(`Error reading state file ${this.statePath}:`, error);
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ParseError(`Invalid state JSON: ${errorMessage(error)}`, this.statePath);
    }

    const { error, value } = stateDocumentSchema.validate(parsed);
    if (error) {
      throw new ParseError(`Invalid state document: ${error.message}`, this.statePath);
    }

    const entries: RawFileEntry[] = value.files;
    const records: FileRecord[] = [];
    for (const batch of chunk(entries, SERIALIZE_BATCH_SIZE)) {
      for (const entry of batch) {
        records.push(fromEntry(entry));
      }
      await yieldToEventLoop();
    }
    const outputDir: string | null =
      optional<string>(value.outputDir, value.output_dir) ?? null;
    this.lastFullScan = optional<string>(value.lastFullScan) ?? null;

    if (this.bloomFilter) {
      const info = this.bloomFilter.buildFromCompletedFiles(records);
      logger.debug("Rebuilt bloom filter from saved state", info);
    }

    logger.info(`Loaded state with ${records.length} files`, {
      statePath: this.statePath,
      outputDir,
    });
    return { records, outputDir };
  }

  /**
   * Serializes in batches with a yield between them so a 50k-record save does
   * not hold the event loop for the whole encode.
   */
  async save(records: readonly FileRecord[], outputDir: string | null): Promise<void> {
    const compact = records.length > COMPACT_THRESHOLD;
    const header = {
      outputDir,
      metadataVersion: METADATA_VERSION,
      lastFullScan: this.lastFullScan,
      totalFiles: records.length,
    };

    const parts: string[] = [];
    if (compact) {
      parts.push(JSON.stringify(header).slice(0, -1), ',"files":[');
    } else {
      parts.push(JSON.stringify(header, null, 2).slice(0, -2), ',\n  "files": [');
    }

    let first = true;
    for (const batch of chunk(records, SERIALIZE_BATCH_SIZE)) {
      for (const record of batch) {
        const encoded = compact
          ? JSON.stringify(toEntry(record))
          : "\n    " + JSON.stringify(toEntry(record), null, 2).replace(/\n/g, "\n    ");
        parts.push(first ? encoded : "," + encoded);
        first = false;
      }
      await yieldToEventLoop();
    }
    parts.push(compact ? "]}" : records.length > 0 ? "\n  ]\n}\n" : "]\n}\n");

    const tmpPath = `${this.statePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.statePath), { recursive: true });
      await fs.writeFile(tmpPath, parts.join(""), "utf-8");
      await fs.rename(tmpPath, this.statePath);
      logger.debug(`Saved state with ${records.length} files`, {
        statePath: this.statePath,
        compact,
      });
    } catch (error) {
      logger.error(`Error saving state to ${this.statePath}:`, error);
      throw error;
    }
  }

  async clear(): Promise<void> {
    await fs.rm(this.statePath, { force: true });
    this.lastFullScan = null;
  }

  /** One pass. Callers throttle this to once per batch during large runs. */
  getStatistics(records: readonly FileRecord[]): FileStatistics {
    const stats: FileStatistics = {
      total: records.length,
      pending: 0,
      downloading: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      skipped: 0,
      verify_failed: 0,
    };
    for (const record of records) {
      stats[record.status] += 1;
    }
    return stats;
  }

  getTotalSize(records: readonly FileRecord[]): {
    totalBytes: number;
    downloadedBytes: number;
  } {
    let totalBytes = 0;
    let downloadedBytes = 0;
    for (const record of records) {
      totalBytes += record.sizeBytes ?? 0;
      downloadedBytes += record.downloadedBytes;
    }
    return { totalBytes, downloadedBytes };
  }

  filterFiles(
    records: readonly FileRecord[],
    filter: { status?: DownloadStatus; search?: string } = {},
  ): FileRecord[] {
    const search = filter.search?.toLowerCase() ?? "";
    return records.filter(
      (record) =>
        (!filter.status || record.status === filter.status) &&
        (!search ||
          record.filename.toLowerCase().includes(search) ||
          record.contentHash.toLowerCase().includes(search)),
    );
  }

  /**
   * Re-stats a random sample of cache-trusted records. The score decides
   * whether the existence check can trust the cache or has to scan.
   */
  async analyzeCacheReliability(
    records: readonly FileRecord[],
    dir: string,
    options: CacheReliabilityOptions = {},
  ): Promise<CacheReliabilityReport> {
    const {
      sampleRatio = 0.05,
      minSample = 10,
      maxAgeHours = 24,
      reliableThreshold = 0.95,
      incrementalThreshold = 0.8,
      random = Math.random,
      now = Date.now(),
    } = options;

    const pool = records.filter((r) => r.status === "completed" && r.diskVerified);
    if (pool.length === 0) {
      return {
        score: 0,
        sampleSize: 0,
        validCount: 0,
        poolSize: 0,
        recommendation: "full_scan",
      };
    }

    const sampleSize = Math.min(
      pool.length,
      Math.max(minSample, Math.ceil(pool.length * sampleRatio)),
    );
    const sample = sampleWithoutReplacement(pool, sampleSize, random);

    let validCount = 0;
    for (const record of sample) {
      if (await isSampleValid(record, dir, maxAgeHours, now)) {
        validCount += 1;
      }
    }

    const score = validCount / sampleSize;
    const recommendation: CacheRecommendation =
      score >= reliableThreshold
        ? "cache_reliable"
        : score >= incrementalThreshold
          ? "incremental_check"
          : "full_scan";

    logger.info("Cache reliability analysis", {
      score: Math.round(score * 1000) / 1000,
      sampleSize,
      poolSize: pool.length,
      recommendation,
    });
    return { score, sampleSize, validCount, poolSize: pool.length, recommendation };
  }
}

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatSize(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

function sampleWithoutReplacement<T>(
  pool: readonly T[],
  size: number,
  random: () => number,
): T[] {
  const copy = pool.slice();
  // Partial Fisher-Yates: the first `size` slots end up as the sample.
  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (copy.length - i));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy.slice(0, size);
}

async function isSampleValid(
  record: FileRecord,
  dir: string,
  maxAgeHours: number,
  now: number,
): Promise<boolean> {
  if (!record.lastCheckedAt) {
    return false;
  }
  const checkedAt = Date.parse(record.lastCheckedAt);
  if (Number.isNaN(checkedAt) || now - checkedAt > maxAgeHours * 3_600_000) {
    return false;
  }
  try {
    const stat = await fs.stat(path.join(dir, localName(record)));
    return stat.isFile() && stat.size === record.sizeBytes;
  } catch {
    return false;
  }
}
