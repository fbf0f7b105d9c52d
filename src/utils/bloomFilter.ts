import crypto from "crypto";
import { localName } from "../models/file.model";
import type { FileRecord } from "../models/file.model";

export interface BloomFilterInfo {
  expectedItems: number;
  actualItems: number;
  bitArraySize: number;
  hashFunctions: number;
  memoryKb: number;
  targetFalsePositive: number;
  estimatedFalsePositive: number;
}

/**
 * Probabilistic set membership: `has` never returns false for an added item,
 * and returns true for a non-member with roughly the configured probability.
 */
export class BloomFilter {
  readonly expectedItems: number;
  readonly falsePositiveRate: number;
  readonly bitArraySize: number;
  readonly hashFunctions: number;
  protected bits: Uint8Array;
  protected itemsCount = 0;

  constructor(expectedItems = 50_000, falsePositiveRate = 0.01) {
    if (!(falsePositiveRate > 0 && falsePositiveRate < 1)) {
      throw new RangeError("falsePositiveRate must be between 0 and 1");
    }
    this.expectedItems = Math.max(1, Math.floor(expectedItems));
    this.falsePositiveRate = falsePositiveRate;
    // m = -(n * ln p) / (ln 2)^2, k = m / n * ln 2
    this.bitArraySize = Math.ceil(
      -(this.expectedItems * Math.log(falsePositiveRate)) / Math.LN2 ** 2,
    );
    this.hashFunctions = Math.max(
      1,
      Math.ceil((this.bitArraySize / this.expectedItems) * Math.LN2),
    );
    this.bits = new Uint8Array(Math.ceil(this.bitArraySize / 8));
  }

  get size(): number {
    return this.itemsCount;
  }

  add(item: string): void {
    for (const index of this.indexes(item)) {
      this.bits[index >>> 3] |= 1 << (index & 7);
    }
    this.itemsCount += 1;
  }

  addAll(items: Iterable<string>): void {
    for (const item of items) {
      this.add(item);
    }
  }

  has(item: string): boolean {
    for (const index of this.indexes(item)) {
      if ((this.bits[index >>> 3] & (1 << (index & 7))) === 0) {
        return false;
      }
    }
    return true;
  }

  clear(): void {
    this.bits.fill(0);
    this.itemsCount = 0;
  }

  estimatedFalsePositiveRate(): number {
    if (this.itemsCount === 0) {
      return 0;
    }
    const k = this.hashFunctions;
    return (1 - Math.exp((-k * this.itemsCount) / this.bitArraySize)) ** k;
  }

  info(): BloomFilterInfo {
    return {
      expectedItems: this.expectedItems,
      actualItems: this.itemsCount,
      bitArraySize: this.bitArraySize,
      hashFunctions: this.hashFunctions,
      memoryKb: Math.round((this.bits.length / 1024) * 100) / 100,
      targetFalsePositive: this.falsePositiveRate,
      estimatedFalsePositive:
        Math.round(this.estimatedFalsePositiveRate() * 10_000) / 10_000,
    };
  }

  // Double hashing over one MD5 digest: index_i = h1 + i * h2 (mod m).
  private indexes(item: string): number[] {
    const digest = crypto.createHash("md5").update(item, "utf8").digest();
    const h1 = digest.readUInt32BE(0);
    const h2 = (digest.readUInt32BE(4) | 1) >>> 0;
    const result: number[] = [];
    for (let i = 0; i < this.hashFunctions; i++) {
      result.push((h1 + i * h2) % this.bitArraySize);
    }
    return result;
  }
}

export interface PreFilterResult {
  likelyExisting: FileRecord[];
  definitelyNew: FileRecord[];
}

/**
 * Bloom filter keyed by local file name, built from completed records whose
 * presence on disk was verified. Rebuilt wholesale, never patched while a
 * download batch is running.
 */
export class FileBloomFilter {
  private filter: BloomFilter;
  private builtAt: string | null = null;

  constructor(
    private readonly falsePositiveRate = 0.01,
    expectedFiles = 50_000,
  ) {
    this.filter = new BloomFilter(expectedFiles, falsePositiveRate);
  }

  get capacity(): number {
    return this.filter.expectedItems;
  }

  get size(): number {
    return this.filter.size;
  }

  get buildTimestamp(): string | null {
    return this.builtAt;
  }

  buildFromCompletedFiles(
    records: readonly FileRecord[],
  ): BloomFilterInfo & { completedFiles: number } {
    const names = records
      .filter((r) => r.status === "completed" && r.diskVerified)
      .map(localName);

    // Capacity only grows within a session.
    if (names.length > this.filter.expectedItems) {
      this.filter = new BloomFilter(names.length, this.falsePositiveRate);
    } else {
      this.filter.clear();
    }
    this.filter.addAll(names);
    this.builtAt = new Date().toISOString();

    return { ...this.filter.info(), completedFiles: names.length };
  }

  mightContain(record: FileRecord): boolean {
    return this.filter.has(localName(record));
  }

  fastPreFilter(records: readonly FileRecord[]): PreFilterResult {
    const likelyExisting: FileRecord[] = [];
    const definitelyNew: FileRecord[] = [];
    for (const record of records) {
      if (this.filter.has(localName(record))) {
        likelyExisting.push(record);
      } else {
        definitelyNew.push(record);
      }
    }
    return { likelyExisting, definitelyNew };
  }

  isValid(): boolean {
    return this.builtAt !== null && this.filter.size > 0;
  }

  info(): BloomFilterInfo {
    return this.filter.info();
  }
}
