import { describe, expect, it } from "vitest";

import { BloomFilter, FileBloomFilter } from "../../src/utils/bloomFilter";
import { createFileRecord } from "../../src/models/file.model";
import type { FileRecord } from "../../src/models/file.model";

function completedRecord(index: number): FileRecord {
  const record = createFileRecord(`sprites/unit-${index}.png`, `aa${index.toString(16)}`);
  record.status = "completed";
  record.diskVerified = true;
  return record;
}

describe("BloomFilter", () => {
  it("sizes the bit array and hash count from capacity and error rate", () => {
    const filter = new BloomFilter(1000, 0.01);
    expect(filter.bitArraySize).toBe(9586);
    expect(filter.hashFunctions).toBe(7);
  });

  it("never reports an added item as absent", () => {
    const filter = new BloomFilter(5000, 0.01);
    const items = Array.from({ length: 5000 }, (_, i) => `asset-${i}.png`);
    filter.addAll(items);

    expect(items.every((item) => filter.has(item))).toBe(true);
    expect(filter.size).toBe(5000);
  });

  it("keeps the measured false-positive rate under twice the target", () => {
    const filter = new BloomFilter(5000, 0.01);
    for (let i = 0; i < 5000; i++) {
      filter.add(`asset-${i}.png`);
    }

    let falsePositives = 0;
    const probes = 20000;
    for (let i = 0; i < probes; i++) {
      if (filter.has(`missing-${i}.bin`)) {
        falsePositives += 1;
      }
    }
    expect(falsePositives / probes).toBeLessThan(0.02);
  });

  it("forgets everything on clear", () => {
    const filter = new BloomFilter(10, 0.01);
    filter.add("a");
    filter.clear();
    expect(filter.has("a")).toBe(false);
    expect(filter.size).toBe(0);
    expect(filter.estimatedFalsePositiveRate()).toBe(0);
  });

  it("rejects error rates outside (0, 1)", () => {
    expect(() => new BloomFilter(10, 0)).toThrow(RangeError);
    expect(() => new BloomFilter(10, 1)).toThrow(RangeError);
  });
});

describe("FileBloomFilter", () => {
  it("is not valid until built from at least one completed file", () => {
    const filter = new FileBloomFilter();
    expect(filter.isValid()).toBe(false);

    filter.buildFromCompletedFiles([createFileRecord("a.json", "ab")]);
    expect(filter.isValid()).toBe(false);
    expect(filter.buildTimestamp).not.toBeNull();
  });

  it("indexes only completed, disk-verified records", () => {
    const done = completedRecord(1);
    const unverified = completedRecord(2);
    unverified.diskVerified = false;
    const pending = createFileRecord("pending.json", "cd");

    const filter = new FileBloomFilter();
    const info = filter.buildFromCompletedFiles([done, unverified, pending]);

    expect(info.completedFiles).toBe(1);
    expect(filter.mightContain(done)).toBe(true);
    expect(filter.isValid()).toBe(true);
  });

  it("splits records into likely existing and definitely new", () => {
    const indexed = Array.from({ length: 20 }, (_, i) => completedRecord(i));
    const filter = new FileBloomFilter();
    filter.buildFromCompletedFiles(indexed);

    const fresh = createFileRecord("brand-new.json", "ef01");
    const { likelyExisting, definitelyNew } = filter.fastPreFilter([...indexed, fresh]);

    expect(likelyExisting).toHaveLength(20);
    expect(definitelyNew).toEqual([fresh]);
  });

  it("grows its capacity when more files complete than expected", () => {
    const filter = new FileBloomFilter(0.01, 10);
    const records = Array.from({ length: 25 }, (_, i) => completedRecord(i));
    filter.buildFromCompletedFiles(records);

    expect(filter.capacity).toBe(25);
    expect(records.every((record) => filter.mightContain(record))).toBe(true);

    filter.buildFromCompletedFiles(records.slice(0, 5));
    expect(filter.capacity).toBe(25);
    expect(filter.size).toBe(5);
  });
});
