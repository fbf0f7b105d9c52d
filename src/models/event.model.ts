import type { HashAlgorithm } from "../utils/hash";

interface BaseEvent {
  sessionId: string;
  timestamp: string;
}

export interface DownloadStartedEvent extends BaseEvent {
  kind: "download_started";
  totalFiles: number;
  outputDir: string;
}

export interface CheckProgressEvent extends BaseEvent {
  kind: "check_progress";
  percent: number;
}

export interface FileProgressEvent extends BaseEvent {
  kind: "file_progress";
  filename: string;
  percent: number;
  downloadedBytes: number;
}

export interface FileCompletedEvent extends BaseEvent {
  kind: "file_completed";
  filename: string;
  success: boolean;
  message: string;
}

export interface OverallProgressEvent extends BaseEvent {
  kind: "overall_progress";
  percent: number;
  completed: number;
  total: number;
}

export interface LogEvent extends BaseEvent {
  kind: "log";
  level: "info" | "warn" | "error";
  message: string;
}

export interface DownloadSummary {
  success: number;
  failed: number;
  skipped: number;
}

export interface DownloadFinishedEvent extends BaseEvent, DownloadSummary {
  kind: "download_finished";
}

export interface DownloadCancelledEvent extends BaseEvent, DownloadSummary {
  kind: "download_cancelled";
}

export interface VerifyResult {
  filename: string;
  success: boolean;
  expectedHash: string;
  calculatedHash?: string;
  algorithm?: HashAlgorithm;
  fileSize?: number;
  elapsedMs: number;
  cached: boolean;
  error?: string;
}

export interface VerifyResultEvent extends BaseEvent {
  kind: "verify_result";
  result: VerifyResult;
  completed: number;
  total: number;
}

export interface VerifySummary {
  total: number;
  verified: number;
  mismatched: number;
  errors: number;
  cancelled: boolean;
}

export interface VerifyFinishedEvent extends BaseEvent, VerifySummary {
  kind: "verify_finished";
}

export type ProgressEvent =
  | DownloadStartedEvent
  | CheckProgressEvent
  | FileProgressEvent
  | FileCompletedEvent
  | OverallProgressEvent
  | LogEvent
  | DownloadFinishedEvent
  | DownloadCancelledEvent
  | VerifyResultEvent
  | VerifyFinishedEvent;

export type ProgressEventKind = ProgressEvent["kind"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

export type ProgressEventPayload = DistributiveOmit<
  ProgressEvent,
  "sessionId" | "timestamp"
>;
