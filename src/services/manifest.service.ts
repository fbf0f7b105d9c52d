import fs from "fs/promises";
import Joi from "joi";
import logger from "../utils/logger";
import { ParseError, errorMessage } from "../utils/errors";
import { createFileRecord } from "../models/file.model";
import type { FileRecord } from "../models/file.model";

export interface DiffCounts {
  new: number;
  existing: number;
  updated: number;
  removed: number;
}

export interface ManifestDiffResult {
  records: FileRecord[];
  diff: DiffCounts;
}

const manifestSchema = Joi.object()
  .pattern(Joi.string().min(1), Joi.string().hex().min(1).required())
  .required();

/**
 * Repairs the malformed exports seen in the wild: a comma before the closing
 * brace, a dangling trailing comma, or one closing brace too many.
 */
export function cleanupManifestText(raw: string): string {
  let content = raw.replace(/^\uFEFF/, "").trim();
  content = content.replace(/,\s*}\s*$/, "}");
  if (content.endsWith(",")) {
    content = content.slice(0, -1).trimEnd();
  }
  if (/}\s*}$/.test(content)) {
    const opens = (content.match(/{/g) || []).length;
    const closes = (content.match(/}/g) || []).length;
    if (closes > opens) {
      content = content.replace(/}\s*}$/, "}");
      content = content.replace(/,\s*}$/, "}");
    }
  }
  return content;
}

export function parseManifest(
  raw: string,
  filePath?: string,
): Map<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleanupManifestText(raw));
  } catch (error) {
    throw new ParseError(`Invalid manifest JSON: ${errorMessage(error)}`, filePath);
  }

  const { error, value } = manifestSchema.validate(parsed);
  if (error) {
    throw new ParseError(`Invalid manifest: ${error.message}`, filePath);
  }

  const mapping = new Map<string, string>();
  for (const [filename, hash] of Object.entries<string>(value)) {
    mapping.set(filename, hash);
  }
  return mapping;
}

async function readManifest(filePath: string): Promise<Map<string, string>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ParseError(`Cannot read manifest: ${errorMessage(error)}`, filePath);
  }
  return parseManifest(raw, filePath);
}

export class ManifestService {
  async loadMapping(filePath: string): Promise<FileRecord[]> {
    const mapping = await readManifest(filePath);
    const records: FileRecord[] = [];
    for (const [filename, hash] of mapping) {
      records.push(createFileRecord(filename, hash));
    }
    logger.info(`Loaded manifest with ${records.length} entries`, { filePath });
    return records;
  }

  async loadMappingWithDiff(
    filePath: string,
    priorState: readonly FileRecord[],
  ): Promise<ManifestDiffResult> {
    const mapping = await readManifest(filePath);
    const result = diffManifest(mapping, priorState);
    logger.info("Manifest diff against saved state", {
      filePath,
      ...result.diff,
    });
    return result;
  }
}

const keyOf = (filename: string, hash: string) => `${filename}\u0000${hash}`;

/** Keyed by (filename, hash). A renamed hash is always "updated". */
export function diffManifest(
  mapping: ReadonlyMap<string, string>,
  priorState: readonly FileRecord[],
): ManifestDiffResult {
  const priorByKey = new Map<string, FileRecord>();
  const priorFilenames = new Set<string>();
  for (const record of priorState) {
    priorByKey.set(keyOf(record.filename, record.contentHash), record);
    priorFilenames.add(record.filename);
  }

  const records: FileRecord[] = [];
  const diff: DiffCounts = { new: 0, existing: 0, updated: 0, removed: 0 };
  const manifestKeys = new Set<string>();

  for (const [filename, hash] of mapping) {
    const key = keyOf(filename, hash);
    manifestKeys.add(key);
    const prior = priorByKey.get(key);
    if (prior) {
      records.push(prior);
      diff.existing += 1;
    } else if (priorFilenames.has(filename)) {
      records.push(createFileRecord(filename, hash));
      diff.updated += 1;
    } else {
      records.push(createFileRecord(filename, hash));
      diff.new += 1;
    }
  }

  for (const key of priorByKey.keys()) {
    if (!manifestKeys.has(key)) {
      diff.removed += 1;
    }
  }

  return { records, diff };
}

export default new ManifestService();
