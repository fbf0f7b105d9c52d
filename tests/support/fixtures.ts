import fs from "fs/promises";
import os from "os";
import path from "path";
import { hashBuffer } from "../../src/utils/hash";
import { createFileRecord, localName } from "../../src/models/file.model";
import type { FileRecord } from "../../src/models/file.model";

export async function makeTempDir(prefix = "asset-sync-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Deterministic bytes; different seeds give different content. */
export function makeContent(size: number, seed = 1): Buffer {
  const data = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    data[i] = (i * 31 + seed * 17) % 256;
  }
  return data;
}

/** Repetitive JSON that compresses well. */
export function makeJsonContent(entries: number): Buffer {
  const items = Array.from({ length: entries }, (_, i) => ({
    id: i,
    name: `entry-${i}`,
    enabled: i % 2 === 0,
  }));
  return Buffer.from(JSON.stringify(items));
}

export function md5(data: Buffer): string {
  return hashBuffer(data, "md5");
}

export interface Asset {
  record: FileRecord;
  name: string;
  body: Buffer;
}

/** A record whose hash matches `body`, plus the name the server serves it under. */
export function makeAsset(filename: string, body: Buffer): Asset {
  const record = createFileRecord(filename, md5(body));
  return { record, name: localName(record), body };
}

export function serverFiles(assets: readonly Asset[]): Record<string, Buffer> {
  return Object.fromEntries(assets.map((asset) => [asset.name, asset.body]));
}
