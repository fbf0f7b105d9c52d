import express from "express";
import type { Server } from "http";
import type { AddressInfo } from "net";
import { gzipSync } from "zlib";

export type RangeMode = "honor" | "advertise-only" | "none";

export interface AssetServerOptions {
  /** Body per remote name (`<basename>-<hash><ext>`). */
  files?: Record<string, Buffer>;
  ranges?: RangeMode;
  /** Number of 500 responses to send for a name before serving it. */
  failures?: Record<string, number>;
  delayMs?: number;
  /** Gzip full responses to clients that accept it. */
  compress?: boolean;
  /** Names sent in 8 KiB pieces this many ms apart, chunked, without Content-Length. */
  trickle?: Record<string, number>;
}

export interface AssetServerStats {
  gets: Record<string, number>;
  heads: Record<string, number>;
  rangeRequests: string[];
  inFlight: number;
  maxInFlight: number;
}

export interface AssetServer {
  baseUrl: string;
  files: Map<string, Buffer>;
  stats: AssetServerStats;
  totalGets(): number;
  close(): Promise<void>;
}

const RANGE_PATTERN = /^bytes=(\d+)-(\d*)$/;
const TRICKLE_PIECE = 8192;

/** Minimal asset host on 127.0.0.1 with an ephemeral port. */
export async function startAssetServer(
  options: AssetServerOptions = {},
): Promise<AssetServer> {
  const files = new Map(Object.entries(options.files ?? {}));
  const failures = new Map(Object.entries(options.failures ?? {}));
  const ranges = options.ranges ?? "honor";
  const stats: AssetServerStats = {
    gets: {},
    heads: {},
    rangeRequests: [],
    inFlight: 0,
    maxInFlight: 0,
  };

  const app = express();

  app.use((_req, res, next) => {
    stats.inFlight += 1;
    stats.maxInFlight = Math.max(stats.maxInFlight, stats.inFlight);
    res.on("close", () => {
      stats.inFlight -= 1;
    });
    if (options.delayMs) {
      setTimeout(next, options.delayMs);
    } else {
      next();
    }
  });

  app.head("/assets/:name", (req, res) => {
    const name = req.params.name;
    stats.heads[name] = (stats.heads[name] ?? 0) + 1;
    const body = files.get(name);
    if (!body) {
      res.status(404).end();
      return;
    }
    res.status(200).set("Content-Length", String(body.length));
    if (ranges !== "none") {
      res.set("Accept-Ranges", "bytes");
    }
    res.end();
  });

  app.get("/assets/:name", (req, res) => {
    const name = req.params.name;
    stats.gets[name] = (stats.gets[name] ?? 0) + 1;

    const remainingFailures = failures.get(name) ?? 0;
    if (remainingFailures > 0) {
      failures.set(name, remainingFailures - 1);
      res.status(500).end();
      return;
    }

    const body = files.get(name);
    if (!body) {
      res.status(404).end();
      return;
    }

    const range = req.headers.range;
    if (range) {
      stats.rangeRequests.push(range);
    }
    const match = range ? RANGE_PATTERN.exec(range) : null;
    if (match && ranges === "honor") {
      const start = Number(match[1]);
      if (start >= body.length) {
        res.status(416).set("Content-Range", `bytes */${body.length}`).end();
        return;
      }
      const end = match[2] ? Math.min(Number(match[2]), body.length - 1) : body.length - 1;
      res.status(206).set({
        "Accept-Ranges": "bytes",
        "Content-Range": `bytes ${start}-${end}/${body.length}`,
        "Content-Length": String(end - start + 1),
      });
      res.end(body.subarray(start, end + 1));
      return;
    }

    if (ranges !== "none") {
      res.set("Accept-Ranges", "bytes");
    }

    if (options.compress && /\bgzip\b/.test(req.headers["accept-encoding"] ?? "")) {
      const packed = gzipSync(body);
      res.status(200).set({ "Content-Encoding": "gzip", "Content-Length": String(packed.length) });
      res.end(packed);
      return;
    }

    const interval = options.trickle?.[name];
    if (interval !== undefined) {
      res.status(200);
      let offset = 0;
      const timer = setInterval(() => {
        if (res.destroyed) {
          clearInterval(timer);
          return;
        }
        const piece = body.subarray(offset, offset + TRICKLE_PIECE);
        offset += piece.length;
        if (offset >= body.length) {
          clearInterval(timer);
          res.end(piece);
        } else {
          res.write(piece);
        }
      }, interval);
      res.on("close", () => clearInterval(timer));
      return;
    }

    res.status(200).set("Content-Length", String(body.length));
    res.end(body);
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const { port } = addressOf(server);

  return {
    baseUrl: `http://127.0.0.1:${port}/assets`,
    files,
    stats,
    totalGets: () => Object.values(stats.gets).reduce((sum, n) => sum + n, 0),
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

function addressOf(server: Server): AddressInfo {
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Asset server is not listening on a TCP port");
  }
  return address;
}
