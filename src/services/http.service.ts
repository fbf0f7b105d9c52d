import http from "http";
import https from "https";
import type { Readable } from "stream";
import axios from "axios";
import type { AxiosInstance, AxiosResponseHeaders, RawAxiosResponseHeaders } from "axios";
import logger from "../utils/logger";
import { classifyError } from "../utils/errors";

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface StreamResponse {
  status: number;
  headers: ResponseHeaders;
  data: Readable;
}

export interface ResponseHeaders {
  contentLength?: number;
  acceptRanges?: string;
  etag?: string;
  lastModified?: string;
  contentEncoding?: string;
  contentRange?: string;
}

export interface HeadResponse {
  status: number;
  headers: ResponseHeaders;
}

function headerValue(
  headers: RawAxiosResponseHeaders | AxiosResponseHeaders,
  name: string,
): string | undefined {
  const value = headers[name];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  if (Array.isArray(value) && value.length > 0) {
    return String(value[0]);
  }
  return undefined;
}

export function parseResponseHeaders(
  headers: RawAxiosResponseHeaders | AxiosResponseHeaders,
): ResponseHeaders {
  const lengthRaw = headerValue(headers, "content-length");
  const contentLength = lengthRaw !== undefined ? Number(lengthRaw) : NaN;
  return {
    contentLength: Number.isFinite(contentLength) ? contentLength : undefined,
    acceptRanges: headerValue(headers, "accept-ranges")?.toLowerCase(),
    etag: headerValue(headers, "etag"),
    lastModified: headerValue(headers, "last-modified"),
    contentEncoding: headerValue(headers, "content-encoding")?.toLowerCase(),
    contentRange: headerValue(headers, "content-range"),
  };
}

/** Total size from a `Content-Range: bytes a-b/total` header. */
export function totalFromContentRange(contentRange?: string): number | undefined {
  const match = contentRange?.match(/\/(\d+)\s*$/);
  return match ? Number(match[1]) : undefined;
}

/**
 * Thin axios wrapper. Every status is returned to the caller; only transport
 * failures throw, already classified into the error taxonomy.
 */
export class HttpService {
  private client: AxiosInstance;

  constructor(maxSockets = 150) {
    this.client = axios.create({
      validateStatus: () => true,
      maxRedirects: 5,
      httpAgent: new http.Agent({ keepAlive: true, maxSockets }),
      httpsAgent: new https.Agent({ keepAlive: true, maxSockets }),
      headers: {
        "User-Agent": "asset-sync/1.0",
        Accept: "*/*",
      },
    });
  }

  /** The body arrives as sent; `Content-Encoding` is left for the caller to decode. */
  async getStream(url: string, options: RequestOptions = {}): Promise<StreamResponse> {
    try {
      const response = await this.client.get<Readable>(url, {
        responseType: "stream",
        headers: options.headers,
        timeout: options.timeoutMs,
        signal: options.signal,
        decompress: false,
      });
      return {
        status: response.status,
        headers: parseResponseHeaders(response.headers),
        data: response.data,
      };
    } catch (error) {
      logger.debug(`GET ${url} failed`, { error: String(error) });
      throw classifyError(error);
    }
  }

  async head(url: string, options: RequestOptions = {}): Promise<HeadResponse> {
    try {
      const response = await this.client.head(url, {
        headers: options.headers,
        timeout: options.timeoutMs,
        signal: options.signal,
      });
      return {
        status: response.status,
        headers: parseResponseHeaders(response.headers),
      };
    } catch (error) {
      logger.debug(`HEAD ${url} failed`, { error: String(error) });
      throw classifyError(error);
    }
  }

  /** Drains and discards a response body the caller will not use. */
  discard(response: StreamResponse): void {
    response.data.on("error", () => undefined);
    response.data.destroy();
  }
}
