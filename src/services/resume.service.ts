import fs from "fs";
import fsp from "fs/promises";
import { Transform } from "stream";
import type { TransformCallback } from "stream";
import { pipeline } from "stream/promises";
import zlib from "zlib";
import logger from "../utils/logger";
import {
  CancelledError,
  IntegrityError,
  classifyError,
  errorMessage,
  statusError,
} from "../utils/errors";
import { detectHashAlgorithm, hashFile, hashesEqual } from "../utils/hash";
import { fileExtension } from "../models/file.model";
import type { FileRecord } from "../models/file.model";
import type { DownloadSettings } from "../models/settings.model";
import { totalFromContentRange } from "./http.service";
import type { HttpService, StreamResponse } from "./http.service";
import type { PlannerService } from "./planner.service";

export interface ResumeDecision {
  resume: boolean;
  reason: string;
  localSize: number;
}

export interface ProbeResult {
  supportsRange: boolean;
  contentLength?: number;
  etag?: string;
  lastModified?: string;
  cached: boolean;
}

export interface TransferOptions {
  signal?: AbortSignal;
  onProgress?: (downloadedBytes: number, totalBytes?: number) => void;
}

interface CachedProbe {
  supportsRange: boolean;
  expiresAt: number;
}

const PROBE_RANGE = "bytes=0-511";
const PART_SUFFIX = ".part";

/** Transfers land here and are renamed to `localPath` once verified. */
export function partPathOf(localPath: string): string {
  return localPath + PART_SUFFIX;
}

function decoderFor(contentEncoding?: string): Transform | null {
  switch (contentEncoding) {
    case "gzip":
    case "x-gzip":
      return zlib.createGunzip();
    case "br":
      return zlib.createBrotliDecompress();
    case "deflate":
      return zlib.createInflate();
    default:
      return null;
  }
}

async function localFileSize(localPath: string): Promise<number | null> {
  try {
    const stat = await fsp.stat(localPath);
    return stat.isFile() ? stat.size : null;
  } catch {
    return null;
  }
}

/**
 * Ranged-GET continuation of partial files, with a full-download fallback
 * and a size-then-hash integrity check on whatever lands on disk.
 */
export class ResumeService {
  private probeCache = new Map<string, CachedProbe>();

  constructor(
    private readonly settings: DownloadSettings,
    private readonly http: HttpService,
    private readonly planner: PlannerService,
  ) {}

  async shouldResume(record: FileRecord, localPath: string): Promise<ResumeDecision> {
    const localSize = await localFileSize(localPath);
    if (localSize === null) {
      return { resume: false, reason: "no partial file", localSize: 0 };
    }
    if (localSize < this.settings.minResumeSizeBytes) {
      return { resume: false, reason: "partial file below resume threshold", localSize };
    }
    if (record.sizeBytes !== undefined && localSize >= record.sizeBytes) {
      return { resume: false, reason: "partial file is not smaller than expected", localSize };
    }
    return { resume: true, reason: "partial file can be resumed", localSize };
  }

  async probeResumeSupport(url: string, signal?: AbortSignal): Promise<ProbeResult> {
    const origin = new URL(url).origin;
    const cached = this.probeCache.get(origin);
    if (cached && cached.expiresAt > Date.now()) {
      return { supportsRange: cached.supportsRange, cached: true };
    }

    let result: ProbeResult = { supportsRange: false, cached: false };
    try {
      const head = await this.http.head(url, {
        signal,
        timeoutMs: this.settings.timeoutMs,
        headers: { "Accept-Encoding": "identity" },
      });
      if (head.status >= 200 && head.status < 300) {
        result = {
          supportsRange: false,
          contentLength: head.headers.contentLength,
          etag: head.headers.etag,
          lastModified: head.headers.lastModified,
          cached: false,
        };
        if (head.headers.acceptRanges === "bytes") {
          const probe = await this.http.getStream(url, {
            signal,
            timeoutMs: this.settings.timeoutMs,
            headers: { Range: PROBE_RANGE, "Accept-Encoding": "identity" },
          });
          this.http.discard(probe);
          result.supportsRange = probe.status === 206;
        }
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      logger.debug(`Range probe failed for ${origin}: ${errorMessage(error)}`);
      return result;
    }

    this.probeCache.set(origin, {
      supportsRange: result.supportsRange,
      expiresAt: Date.now() + this.settings.probeCacheTtlMs,
    });
    logger.debug(`Range support for ${origin}: ${result.supportsRange}`);
    return result;
  }

  /**
   * Requests the bytes after the local file. 416 means the file already holds
   * every byte; 206 appends; any other status leaves the file untouched.
   */
  async resumeDownload(
    record: FileRecord,
    url: string,
    localPath: string,
    options: TransferOptions = {},
  ): Promise<boolean> {
    const localSize = (await localFileSize(localPath)) ?? 0;
    const response = await this.http.getStream(url, {
      signal: options.signal,
      timeoutMs: this.planner.adaptiveTimeout(record),
      headers: { Range: `bytes=${localSize}-`, "Accept-Encoding": "identity" },
    });

    if (response.status === 416) {
      this.http.discard(response);
      record.downloadedBytes = localSize;
      record.sizeBytes ??= localSize;
      logger.debug(`${record.filename} already complete on disk (416)`);
      return true;
    }
    if (response.status !== 206) {
      this.http.discard(response);
      logger.debug(`Resume of ${record.filename} got HTTP ${response.status}`);
      return false;
    }

    const total = totalFromContentRange(response.headers.contentRange);
    if (total !== undefined) {
      record.sizeBytes = total;
    }
    const written = await this.streamToFile(response, record, localPath, "a", localSize, options);
    record.downloadedBytes = localSize + written;
    logger.debug(`Resumed ${record.filename} from byte ${localSize}`, { written });
    return true;
  }

  /**
   * GET of the whole file into the `.part` sibling, renamed to `localPath`
   * only after the integrity check passes.
   */
  async fullDownload(
    record: FileRecord,
    url: string,
    localPath: string,
    options: TransferOptions = {},
  ): Promise<void> {
    const partPath = partPathOf(localPath);
    const compressible = fileExtension(record) === ".json";
    const response = await this.http.getStream(url, {
      signal: options.signal,
      timeoutMs: this.planner.adaptiveTimeout(record),
      headers: {
        "Accept-Encoding": compressible ? "gzip, br, deflate" : "identity",
      },
    });
    if (response.status !== 200) {
      this.http.discard(response);
      throw statusError(response.status);
    }

    // Content-Length of an encoded body is not the size on disk.
    const { contentLength, contentEncoding } = response.headers;
    const decoder = decoderFor(contentEncoding);
    if (contentLength !== undefined && !contentEncoding) {
      record.sizeBytes = contentLength;
    }
    record.downloadedBytes = 0;
    record.downloadedBytes = await this.streamToFile(response, record, partPath, "w", 0, {
      ...options,
      decoder,
    });

    if (!(await this.verifyIntegrity(record, partPath))) {
      await fsp.rm(partPath, { force: true });
      throw new IntegrityError(`Integrity check failed for ${record.filename}`, record.filename);
    }
    record.sizeBytes ??= record.downloadedBytes;
    await fsp.rename(partPath, localPath);
  }

  /**
   * Resumes the `.part` file when allowed and supported, otherwise downloads
   * in full. A resumed file that fails the integrity check is deleted and
   * reported as an `IntegrityError`; the caller decides on a fresh download.
   */
  async smartDownload(
    record: FileRecord,
    url: string,
    localPath: string,
    options: TransferOptions = {},
  ): Promise<void> {
    const partPath = partPathOf(localPath);
    if (this.settings.enableResume) {
      const decision = await this.shouldResume(record, partPath);
      if (decision.resume) {
        const probe = await this.probeResumeSupport(url, options.signal);
        if (probe.supportsRange) {
          if (record.sizeBytes === undefined && probe.contentLength !== undefined) {
            record.sizeBytes = probe.contentLength;
          }
          if (await this.resumeDownload(record, url, partPath, options)) {
            if (await this.verifyIntegrity(record, partPath)) {
              await fsp.rename(partPath, localPath);
              logger.info(`Resumed ${record.filename}`, {
                fromByte: decision.localSize,
              });
              return;
            }
            await fsp.rm(partPath, { force: true });
            throw new IntegrityError(
              `Resumed file failed integrity check for ${record.filename}`,
              record.filename,
            );
          }
          await fsp.rm(partPath, { force: true });
        } else {
          logger.debug(`Server does not support ranges, full download of ${record.filename}`);
        }
      } else {
        logger.debug(`Not resuming ${record.filename}: ${decision.reason}`);
      }
    }
    await this.fullDownload(record, url, localPath, options);
  }

  /** Size first, then the content hash when integrity checks are on. */
  async verifyIntegrity(record: FileRecord, localPath: string): Promise<boolean> {
    const size = await localFileSize(localPath);
    if (size === null) {
      return false;
    }
    if (record.sizeBytes !== undefined && size !== record.sizeBytes) {
      logger.debug(`Size mismatch for ${record.filename}`, {
        expected: record.sizeBytes,
        actual: size,
      });
      return false;
    }
    if (!this.settings.verifyIntegrity) {
      return true;
    }
    const algorithm = detectHashAlgorithm(record.contentHash);
    if (!algorithm) {
      return true;
    }
    const actual = await hashFile(localPath, algorithm);
    return hashesEqual(actual, record.contentHash);
  }

  private async streamToFile(
    response: StreamResponse,
    record: FileRecord,
    filePath: string,
    flags: "a" | "w",
    offset: number,
    options: TransferOptions & { decoder?: Transform | null },
  ): Promise<number> {
    const { signal, onProgress, decoder } = options;
    let written = 0;
    const counter = new Transform({
      transform(piece: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
        if (signal?.aborted) {
          callback(new CancelledError());
          return;
        }
        written += piece.length;
        onProgress?.(offset + written, record.sizeBytes);
        callback(null, piece);
      },
    });
    const sink = fs.createWriteStream(filePath, {
      flags,
      highWaterMark: this.planner.adaptiveChunkSize(record),
    });

    try {
      if (decoder) {
        await pipeline(response.data, decoder, counter, sink);
      } else {
        await pipeline(response.data, counter, sink);
      }
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      throw classifyError(error);
    }
    return written;
  }
}
