export interface DownloadSettings {
  assetBaseUrl: string;
  concurrentRequests: number;
  batchSize: number;
  timeoutMs: number;
  retryDelayMs: number;
  maxRetries: number;
  chunkSize: number;
  smallFileThreshold: number;
  largeFileThreshold: number;

  enableResume: boolean;
  minResumeSizeBytes: number;
  verifyIntegrity: boolean;
  probeCacheTtlMs: number;

  cacheSampleRatio: number;
  cacheMinSample: number;
  cacheMaxAgeHours: number;
  reliableThreshold: number;
  incrementalThreshold: number;
  bloomFalsePositiveRate: number;
  existenceWorkers: number;
  existenceBatchSize: number;
}

export const DEFAULT_SETTINGS: DownloadSettings = {
  assetBaseUrl: "http://localhost:8000/assets",
  concurrentRequests: 80,
  batchSize: 50,
  timeoutMs: 180_000,
  retryDelayMs: 300,
  maxRetries: 5,
  chunkSize: 32_768,
  smallFileThreshold: 100_000,
  largeFileThreshold: 2_000_000,

  enableResume: true,
  minResumeSizeBytes: 2 * 1024 * 1024,
  verifyIntegrity: true,
  probeCacheTtlMs: 60 * 60 * 1000,

  cacheSampleRatio: 0.05,
  cacheMinSample: 10,
  cacheMaxAgeHours: 24,
  reliableThreshold: 0.95,
  incrementalThreshold: 0.8,
  bloomFalsePositiveRate: 0.01,
  existenceWorkers: 8,
  existenceBatchSize: 50,
};

export function resolveSettings(
  overrides: Partial<DownloadSettings> = {},
): DownloadSettings {
  return { ...DEFAULT_SETTINGS, ...overrides };
}
