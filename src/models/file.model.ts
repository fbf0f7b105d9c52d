import path from "path";

export type DownloadStatus =
  | "pending"
  | "downloading"
  | "completed"
  | "failed"
  | "cancelled"
  | "skipped"
  | "verify_failed";

export type HashVerifyStatus =
  | "not_verified"
  | "verifying"
  | "verified_success"
  | "verified_failed";

export const DOWNLOAD_STATUSES: readonly DownloadStatus[] = [
  "pending",
  "downloading",
  "completed",
  "failed",
  "cancelled",
  "skipped",
  "verify_failed",
];

export const HASH_VERIFY_STATUSES: readonly HashVerifyStatus[] = [
  "not_verified",
  "verifying",
  "verified_success",
  "verified_failed",
];

export const CACHE_SCHEMA_VERSION = "1.0";

export interface FileRecord {
  filename: string;
  contentHash: string;
  status: DownloadStatus;
  progress: number;
  sizeBytes?: number;
  downloadedBytes: number;
  localPath?: string;
  errorMessage?: string;
  downloadUrl?: string;

  // Disk cache
  mtime?: number;
  diskVerified: boolean;
  lastCheckedAt?: string;
  cacheSchemaVersion: string;

  // Hash verification
  hashVerifyStatus: HashVerifyStatus;
  hashVerifiedAt?: string;
  calculatedHash?: string;
}

const BINARY_EXTENSIONS = new Set([
  ".png", ".jpg", ".jpeg", ".gif", ".bmp", ".webp", ".ico", ".tiff", ".svg",
  ".mp3", ".wav", ".m4a", ".aac", ".flac", ".ogg", ".wma", ".opus",
  ".mp4", ".avi", ".mov", ".wmv", ".flv", ".webm", ".mkv", ".m4v",
  ".zip", ".rar", ".7z", ".tar", ".gz", ".pdf", ".exe", ".dll",
]);

export function createFileRecord(
  filename: string,
  contentHash: string,
): FileRecord {
  return {
    filename,
    contentHash,
    status: "pending",
    progress: 0,
    downloadedBytes: 0,
    diskVerified: false,
    cacheSchemaVersion: CACHE_SCHEMA_VERSION,
    hashVerifyStatus: "not_verified",
  };
}

export function fileExtension(record: FileRecord): string {
  return path.posix.extname(record.filename.replace(/\\/g, "/")).toLowerCase();
}

export function baseFilename(record: FileRecord): string {
  const normalized = record.filename.replace(/\\/g, "/");
  return path.posix.basename(normalized, path.posix.extname(normalized));
}

/**
 * Local (and remote) name of a record: `<basename>-<hash><ext>`.
 * Embedding the hash keeps a re-download after a content change from
 * colliding with the previous version.
 */
export function localName(record: FileRecord): string {
  return `${baseFilename(record)}-${record.contentHash}${fileExtension(record)}`;
}

export function isBinaryFile(record: FileRecord): boolean {
  return BINARY_EXTENSIONS.has(fileExtension(record));
}

export function markCompleted(
  record: FileRecord,
  localPath: string,
  sizeOnDisk?: number,
): void {
  record.status = "completed";
  record.progress = 100;
  record.localPath = localPath;
  record.errorMessage = undefined;
  if (sizeOnDisk !== undefined) {
    record.sizeBytes = sizeOnDisk;
    record.downloadedBytes = sizeOnDisk;
  }
}

export function markFailed(record: FileRecord, errorMessage: string): void {
  record.status = "failed";
  record.errorMessage = errorMessage;
}

export function markSkipped(record: FileRecord, reason: string): void {
  record.status = "skipped";
  record.errorMessage = reason;
}

export function resetProgress(record: FileRecord): void {
  record.progress = 0;
  record.downloadedBytes = 0;
  record.status = "pending";
  record.errorMessage = undefined;
}

export function resetForRedownload(record: FileRecord): void {
  resetProgress(record);
  record.sizeBytes = undefined;
  record.localPath = undefined;
  record.diskVerified = false;
  record.lastCheckedAt = undefined;
  record.mtime = undefined;
  record.hashVerifyStatus = "not_verified";
  record.hashVerifiedAt = undefined;
  record.calculatedHash = undefined;
}

export function updateDiskMetadata(
  record: FileRecord,
  stat: { size: number; mtimeMs: number },
  now: Date = new Date(),
): void {
  record.mtime = stat.mtimeMs;
  record.sizeBytes = stat.size;
  record.diskVerified = true;
  record.lastCheckedAt = now.toISOString();
  record.cacheSchemaVersion = CACHE_SCHEMA_VERSION;
}

export function isCacheFresh(
  record: FileRecord,
  maxAgeHours: number,
  now: number = Date.now(),
): boolean {
  if (!record.diskVerified || !record.lastCheckedAt) {
    return false;
  }
  const checkedAt = Date.parse(record.lastCheckedAt);
  if (Number.isNaN(checkedAt)) {
    return false;
  }
  return now - checkedAt <= maxAgeHours * 60 * 60 * 1000;
}

/** Fresh cache entry whose recorded mtime and size still match the disk. */
export function isCacheValid(
  record: FileRecord,
  stat: { size: number; mtimeMs: number } | null,
  maxAgeHours: number,
  now: number = Date.now(),
): boolean {
  if (!stat || !isCacheFresh(record, maxAgeHours, now)) {
    return false;
  }
  return record.mtime === stat.mtimeMs && record.sizeBytes === stat.size;
}

const STATUS_LABELS: Record<DownloadStatus, string> = {
  pending: "Pending",
  downloading: "Downloading",
  completed: "Completed",
  failed: "Failed",
  cancelled: "Cancelled",
  skipped: "Skipped",
  verify_failed: "Verify failed",
};

export function statusLabel(status: DownloadStatus): string {
  return STATUS_LABELS[status];
}

export function isDownloadStatus(value: unknown): value is DownloadStatus {
  return DOWNLOAD_STATUSES.some((status) => status === value);
}

export function isHashVerifyStatus(value: unknown): value is HashVerifyStatus {
  return HASH_VERIFY_STATUSES.some((status) => status === value);
}
