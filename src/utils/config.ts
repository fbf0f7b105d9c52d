import Joi from "joi";
import { DEFAULT_SETTINGS } from "../models/settings.model";
import type { DownloadSettings } from "../models/settings.model";
import { ConfigError } from "./errors";

export interface AppConfig {
  settings: DownloadSettings;
  manifestPath?: string;
  outputDir?: string;
  stateFile: string;
  verifyAfterDownload: boolean;
}

const d = DEFAULT_SETTINGS;

// Environment variable -> settings key, with the value rules for each.
const envSchema = Joi.object({
  ASSET_BASE_URL: Joi.string()
    .uri({ scheme: ["http", "https"] })
    .default(d.assetBaseUrl),
  MANIFEST_PATH: Joi.string().optional(),
  OUTPUT_DIR: Joi.string().optional(),
  STATE_FILE: Joi.string().default("asset_sync_state.json"),
  VERIFY_AFTER_DOWNLOAD: Joi.boolean().default(false),

  CONCURRENT_REQUESTS: Joi.number().integer().min(1).default(d.concurrentRequests),
  BATCH_SIZE: Joi.number().integer().min(1).default(d.batchSize),
  TIMEOUT_MS: Joi.number().integer().min(1).default(d.timeoutMs),
  RETRY_DELAY_MS: Joi.number().min(0).default(d.retryDelayMs),
  MAX_RETRIES: Joi.number().integer().min(1).default(d.maxRetries),
  CHUNK_SIZE: Joi.number().integer().min(1024).default(d.chunkSize),
  SMALL_FILE_THRESHOLD: Joi.number().integer().min(0).default(d.smallFileThreshold),
  LARGE_FILE_THRESHOLD: Joi.number().integer().min(0).default(d.largeFileThreshold),

  ENABLE_RESUME: Joi.boolean().default(d.enableResume),
  MIN_RESUME_SIZE_BYTES: Joi.number().integer().min(0).default(d.minResumeSizeBytes),
  VERIFY_INTEGRITY: Joi.boolean().default(d.verifyIntegrity),
  PROBE_CACHE_TTL_MS: Joi.number().integer().min(0).default(d.probeCacheTtlMs),

  CACHE_SAMPLE_RATIO: Joi.number().greater(0).max(1).default(d.cacheSampleRatio),
  CACHE_MIN_SAMPLE: Joi.number().integer().min(1).default(d.cacheMinSample),
  CACHE_MAX_AGE_HOURS: Joi.number().greater(0).default(d.cacheMaxAgeHours),
  RELIABLE_THRESHOLD: Joi.number().min(0).max(1).default(d.reliableThreshold),
  INCREMENTAL_THRESHOLD: Joi.number().min(0).max(1).default(d.incrementalThreshold),
  BLOOM_FALSE_POSITIVE_RATE: Joi.number()
    .greater(0)
    .less(1)
    .default(d.bloomFalsePositiveRate),
  EXISTENCE_WORKERS: Joi.number().integer().min(1).max(64).default(d.existenceWorkers),
  EXISTENCE_BATCH_SIZE: Joi.number().integer().min(1).default(d.existenceBatchSize),
})
  .custom((value: Record<string, unknown>, helpers) => {
    if (Number(value.INCREMENTAL_THRESHOLD) > Number(value.RELIABLE_THRESHOLD)) {
      return helpers.message({
        custom: "INCREMENTAL_THRESHOLD must not exceed RELIABLE_THRESHOLD",
      });
    }
    return value;
  })
  .unknown(true);

interface ValidatedEnv {
  ASSET_BASE_URL: string;
  MANIFEST_PATH?: string;
  OUTPUT_DIR?: string;
  STATE_FILE: string;
  VERIFY_AFTER_DOWNLOAD: boolean;
  CONCURRENT_REQUESTS: number;
  BATCH_SIZE: number;
  TIMEOUT_MS: number;
  RETRY_DELAY_MS: number;
  MAX_RETRIES: number;
  CHUNK_SIZE: number;
  SMALL_FILE_THRESHOLD: number;
  LARGE_FILE_THRESHOLD: number;
  ENABLE_RESUME: boolean;
  MIN_RESUME_SIZE_BYTES: number;
  VERIFY_INTEGRITY: boolean;
  PROBE_CACHE_TTL_MS: number;
  CACHE_SAMPLE_RATIO: number;
  CACHE_MIN_SAMPLE: number;
  CACHE_MAX_AGE_HOURS: number;
  RELIABLE_THRESHOLD: number;
  INCREMENTAL_THRESHOLD: number;
  BLOOM_FALSE_POSITIVE_RATE: number;
  EXISTENCE_WORKERS: number;
  EXISTENCE_BATCH_SIZE: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, {
    abortEarly: false,
    convert: true,
  });
  if (error) {
    throw new ConfigError(`Invalid configuration: ${error.message}`);
  }
  const v: ValidatedEnv = value;

  return {
    manifestPath: v.MANIFEST_PATH,
    outputDir: v.OUTPUT_DIR,
    stateFile: v.STATE_FILE,
    verifyAfterDownload: v.VERIFY_AFTER_DOWNLOAD,
    settings: {
      assetBaseUrl: v.ASSET_BASE_URL.replace(/\/+$/, ""),
      concurrentRequests: v.CONCURRENT_REQUESTS,
      batchSize: v.BATCH_SIZE,
      timeoutMs: v.TIMEOUT_MS,
      retryDelayMs: v.RETRY_DELAY_MS,
      maxRetries: v.MAX_RETRIES,
      chunkSize: v.CHUNK_SIZE,
      smallFileThreshold: v.SMALL_FILE_THRESHOLD,
      largeFileThreshold: v.LARGE_FILE_THRESHOLD,
      enableResume: v.ENABLE_RESUME,
      minResumeSizeBytes: v.MIN_RESUME_SIZE_BYTES,
      verifyIntegrity: v.VERIFY_INTEGRITY,
      probeCacheTtlMs: v.PROBE_CACHE_TTL_MS,
      cacheSampleRatio: v.CACHE_SAMPLE_RATIO,
      cacheMinSample: v.CACHE_MIN_SAMPLE,
      cacheMaxAgeHours: v.CACHE_MAX_AGE_HOURS,
      reliableThreshold: v.RELIABLE_THRESHOLD,
      incrementalThreshold: v.INCREMENTAL_THRESHOLD,
      bloomFalsePositiveRate: v.BLOOM_FALSE_POSITIVE_RATE,
      existenceWorkers: v.EXISTENCE_WORKERS,
      existenceBatchSize: v.EXISTENCE_BATCH_SIZE,
    },
  };
}
