import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  VerifierService,
  verifyBatchSize,
  verifyPoolSize,
} from "../../src/services/verifier.service";
import { BrokerService } from "../../src/services/broker.service";
import type { ProgressEvent, VerifyResult } from "../../src/models/event.model";
import { createFileRecord, markCompleted } from "../../src/models/file.model";
import type { FileRecord } from "../../src/models/file.model";
import { makeAsset, makeContent, makeTempDir, removeDir } from "../support/fixtures";

describe("verifyPoolSize", () => {
  it("scales with cores and shrinks for small sets", () => {
    expect(verifyPoolSize(5, 8)).toBe(4);
    expect(verifyPoolSize(3, 8)).toBe(3);
    expect(verifyPoolSize(50, 8)).toBe(16);
    expect(verifyPoolSize(50, 2)).toBe(4);
    expect(verifyPoolSize(500, 2)).toBe(8);
    expect(verifyPoolSize(500, 16)).toBe(32);
  });
});

describe("verifyBatchSize", () => {
  it("gets smaller as the file count grows", () => {
    expect(verifyBatchSize(10)).toBe(10);
    expect(verifyBatchSize(100)).toBe(50);
    expect(verifyBatchSize(500)).toBe(30);
    expect(verifyBatchSize(2000)).toBe(20);
    expect(verifyBatchSize(9000)).toBe(15);
  });
});

describe("VerifierService", () => {
  let dir: string;
  let broker: BrokerService;
  let events: ProgressEvent[];

  async function onDisk(filename: string, body: Buffer, written: Buffer = body): Promise<FileRecord> {
    const asset = makeAsset(filename, body);
    const filePath = path.join(dir, asset.name);
    await fs.writeFile(filePath, written);
    markCompleted(asset.record, filePath, written.length);
    return asset.record;
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    broker = new BrokerService("verifier-test");
    events = [];
    broker.subscribeToEvents((event) => events.push(event));
  });

  afterEach(async () => {
    broker.disconnect();
    await removeDir(dir);
  });

  it("reports matches, mismatches and errors", async () => {
    const good = await onDisk("good.bin", makeContent(500, 1));
    const alsoGood = await onDisk("also-good.json", Buffer.from('{"ok":true}'));
    const tampered = await onDisk("tampered.bin", makeContent(500, 2), makeContent(500, 3));
    const missing = createFileRecord("missing.bin", "0".repeat(32));
    missing.status = "completed";

    const results: VerifyResult[] = [];
    const summary = await new VerifierService(broker).verifyParallel(
      [good, alsoGood, tampered, missing],
      dir,
      (result) => results.push(result),
    );

    expect(summary).toEqual({ total: 4, verified: 2, mismatched: 1, errors: 1, cancelled: false });
    expect(results).toHaveLength(4);
    expect(good).toMatchObject({ hashVerifyStatus: "verified_success", calculatedHash: good.contentHash });
    expect(tampered).toMatchObject({ status: "verify_failed", hashVerifyStatus: "verified_failed" });
    expect(missing).toMatchObject({ status: "verify_failed", hashVerifyStatus: "verified_failed" });
    expect(results.find((r) => r.filename === "tampered.bin")).toMatchObject({
      success: false,
      algorithm: "md5",
      fileSize: 500,
    });

    expect(events.filter((e) => e.kind === "verify_result")).toHaveLength(4);
    expect(events.find((e) => e.kind === "verify_finished")).toMatchObject({ verified: 2 });
  });

  it("keeps the mismatched file on disk", async () => {
    const tampered = await onDisk("kept.bin", makeContent(100, 2), makeContent(100, 4));
    await new VerifierService().verifyParallel([tampered], dir);
    await expect(fs.access(path.join(dir, `kept-${tampered.contentHash}.bin`))).resolves.toBeUndefined();
  });

  it("serves unchanged files from the cache", async () => {
    const record = await onDisk("cached.bin", makeContent(300, 6));
    const verifier = new VerifierService();

    const first = await verifier.verifyOne(record, dir);
    const second = await verifier.verifyOne(record, dir);

    expect(first.cached).toBe(false);
    expect(second.cached).toBe(true);
    expect(second.success).toBe(true);
    expect(verifier.cacheSize).toBe(1);
  });

  it("reports an unrecognised hash format as an error", async () => {
    const record = createFileRecord("odd.bin", "abc");
    const result = await new VerifierService().verifyOne(record, dir);

    expect(result.success).toBe(false);
    expect(result.error).toBe("Unrecognized hash format: abc");
    expect(record.hashVerifyStatus).toBe("not_verified");
  });

  it("stops starting new files once cancelled", async () => {
    const records: FileRecord[] = [];
    for (let i = 0; i < 30; i++) {
      records.push(await onDisk(`bulk-${i}.bin`, makeContent(2000, i)));
    }
    const verifier = new VerifierService();

    const summary = await verifier.verifyParallel(records, dir, () => verifier.cancel());

    expect(summary.cancelled).toBe(true);
    expect(summary.verified).toBeLessThan(30);
    const untouched = records.filter((r) => r.hashVerifyStatus === "not_verified");
    expect(untouched.length).toBe(30 - summary.verified);
  });
});
