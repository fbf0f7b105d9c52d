import axios from "axios";

export class DownloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed manifest or state document. Fatal to the load that hit it. */
export class ParseError extends DownloadError {
  constructor(
    message: string,
    readonly filePath?: string,
  ) {
    super(filePath ? `${message} (${filePath})` : message);
  }
}

/** Timeout, connection reset or 5xx. Retried up to `maxRetries`. */
export class NetworkError extends DownloadError {
  constructor(
    message: string,
    readonly code?: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

/** Unexpected non-5xx status. Not retried. */
export class HttpStatusError extends DownloadError {
  constructor(readonly status: number) {
    super(`HTTP ${status}`);
  }
}

export class IntegrityError extends DownloadError {
  constructor(
    message: string,
    readonly filename: string,
  ) {
    super(message);
  }
}

export class DirectoryError extends DownloadError {
  constructor(
    message: string,
    readonly directory: string,
  ) {
    super(`${message}: ${directory}`);
  }
}

export class ConfigError extends DownloadError {}

/** Cooperative cancellation. Unwinds without marking records failed. */
export class CancelledError extends DownloadError {
  constructor(message = "Download cancelled") {
    super(message);
  }
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ERR_NETWORK",
  "ERR_BAD_RESPONSE",
  "ERR_STREAM_PREMATURE_CLOSE",
]);

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * Maps transport failures to the error taxonomy. Returns the input when it
 * already belongs to it.
 */
export function classifyError(error: unknown): Error {
  if (error instanceof DownloadError) {
    return error;
  }
  if (axios.isCancel(error)) {
    return new CancelledError();
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined && status < 500) {
      return new HttpStatusError(status);
    }
    return new NetworkError(error.message, error.code, status);
  }
  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string" ? error.code : undefined;
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return new NetworkError(error.message, code);
    }
    if (error.name === "AbortError") {
      return new CancelledError();
    }
    return error;
  }
  return new DownloadError(String(error));
}

/** 5xx responses are transient; anything else unexpected is not. */
export function statusError(status: number): NetworkError | HttpStatusError {
  return status >= 500
    ? new NetworkError(`HTTP ${status}`, undefined, status)
    : new HttpStatusError(status);
}

export function isRetryable(error: unknown): boolean {
  return error instanceof NetworkError;
}
