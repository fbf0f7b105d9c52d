import fs from "fs/promises";
import os from "os";
import path from "path";
import pLimit from "p-limit";
import logger from "../utils/logger";
import { chunk, yieldToEventLoop } from "../utils/async";
import { errorMessage } from "../utils/errors";
import { detectHashAlgorithm, hashFile, hashesEqual } from "../utils/hash";
import { localName } from "../models/file.model";
import type { FileRecord } from "../models/file.model";
import type { VerifyResult, VerifySummary } from "../models/event.model";
import type { BrokerService } from "./broker.service";

export type VerifyResultCallback = (result: VerifyResult) => void;

export function verifyPoolSize(fileCount: number, cores = os.cpus().length): number {
  const base = Math.min(Math.max(1, cores) * 4, 32);
  if (fileCount < 10) {
    return Math.max(1, Math.min(fileCount, 4));
  }
  if (fileCount < 100) {
    return Math.max(1, Math.min(Math.floor(base / 2), 16));
  }
  return base;
}

export function verifyBatchSize(fileCount: number): number {
  if (fileCount < 20) return Math.max(1, fileCount);
  if (fileCount < 200) return Math.min(50, fileCount);
  if (fileCount < 1000) return 30;
  if (fileCount < 5000) return 20;
  return 15;
}

/**
 * Hashes downloaded files against their expected content hash. Results are
 * handed to the callback as they finish; only counters are kept.
 */
export class VerifierService {
  private cache = new Map<string, string>();
  private cancelled = false;

  constructor(private readonly broker?: BrokerService) {}

  get cacheSize(): number {
    return this.cache.size;
  }

  cancel(): void {
    this.cancelled = true;
  }

  async verifyParallel(
    records: readonly FileRecord[],
    dir: string,
    onResult?: VerifyResultCallback,
  ): Promise<VerifySummary> {
    this.cancelled = false;
    const total = records.length;
    const summary: VerifySummary = {
      total,
      verified: 0,
      mismatched: 0,
      errors: 0,
      cancelled: false,
    };
    const limit = pLimit(verifyPoolSize(total));
    let completed = 0;

    logger.info(`Verifying ${total} files`, { dir });

    for (const batch of chunk(records, verifyBatchSize(total))) {
      await Promise.all(
        batch.map((record) =>
          limit(async () => {
            if (this.cancelled) {
              record.hashVerifyStatus = "not_verified";
              return;
            }
            const result = await this.verifyOne(record, dir);
            completed += 1;
            if (result.success) {
              summary.verified += 1;
            } else if (result.error) {
              summary.errors += 1;
            } else {
              summary.mismatched += 1;
            }
            onResult?.(result);
            this.broker?.publishEvent({ kind: "verify_result", result, completed, total });
          }),
        ),
      );
      if (this.cancelled) {
        summary.cancelled = true;
        break;
      }
      await yieldToEventLoop();
    }

    this.broker?.publishEvent({ kind: "verify_finished", ...summary });
    logger.info("Verification finished", { ...summary });
    return summary;
  }

  async verifyOne(record: FileRecord, dir: string): Promise<VerifyResult> {
    const started = Date.now();
    const filePath = path.join(dir, localName(record));
    const base = { filename: record.filename, expectedHash: record.contentHash };
    record.hashVerifyStatus = "verifying";

    const algorithm = detectHashAlgorithm(record.contentHash);
    if (!algorithm) {
      record.hashVerifyStatus = "not_verified";
      return {
        ...base,
        success: false,
        elapsedMs: Date.now() - started,
        cached: false,
        error: `Unrecognized hash format: ${record.contentHash}`,
      };
    }

    try {
      const stat = await fs.stat(filePath);
      const key = `${filePath}:${stat.size}:${stat.mtimeMs}`;
      let calculated = this.cache.get(key);
      const cached = calculated !== undefined;
      if (calculated === undefined) {
        calculated = await hashFile(filePath, algorithm);
        this.cache.set(key, calculated);
      }

      const success = hashesEqual(calculated, record.contentHash);
      record.calculatedHash = calculated;
      record.hashVerifiedAt = new Date().toISOString();
      if (success) {
        record.hashVerifyStatus = "verified_success";
      } else {
        record.hashVerifyStatus = "verified_failed";
        record.status = "verify_failed";
        record.errorMessage = "Hash mismatch";
        logger.warn(`Hash mismatch for ${record.filename}`, {
          expected: record.contentHash,
          calculated,
        });
      }
      return {
        ...base,
        success,
        calculatedHash: calculated,
        algorithm,
        fileSize: stat.size,
        elapsedMs: Date.now() - started,
        cached,
      };
    } catch (error) {
      const message = errorMessage(error);
      record.hashVerifyStatus = "verified_failed";
      record.status = "verify_failed";
      record.errorMessage = message;
      logger.warn(`Cannot verify ${record.filename}: ${message}`);
      return {
        ...base,
        success: false,
        algorithm,
        elapsedMs: Date.now() - started,
        cached: false,
        error: message,
      };
    }
  }
}
