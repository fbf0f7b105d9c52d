import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  detectHashAlgorithm,
  hashBuffer,
  hashFile,
  hashesEqual,
} from "../../src/utils/hash";
import { makeTempDir, removeDir } from "../support/fixtures";

describe("detectHashAlgorithm", () => {
  it("maps hex length to the algorithm", () => {
    expect(detectHashAlgorithm("a".repeat(32))).toBe("md5");
    expect(detectHashAlgorithm("b".repeat(40))).toBe("sha1");
    expect(detectHashAlgorithm("c".repeat(56))).toBe("sha224");
    expect(detectHashAlgorithm("d".repeat(64))).toBe("sha256");
    expect(detectHashAlgorithm("e".repeat(96))).toBe("sha384");
    expect(detectHashAlgorithm("f".repeat(128))).toBe("sha512");
  });

  it("returns null for unknown lengths and non-hex input", () => {
    expect(detectHashAlgorithm("abc")).toBeNull();
    expect(detectHashAlgorithm("z".repeat(32))).toBeNull();
    expect(detectHashAlgorithm("")).toBeNull();
  });
});

describe("hashesEqual", () => {
  it("ignores case", () => {
    expect(hashesEqual("ABCDEF", "abcdef")).toBe(true);
    expect(hashesEqual("abcdef", "abcde0")).toBe(false);
  });
});

describe("hashFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("streams the file through the digest", async () => {
    const filePath = path.join(dir, "hello.txt");
    await fs.writeFile(filePath, "hello");

    expect(await hashFile(filePath, "md5")).toBe("5d41402abc4b2a76b9719d911017c592");
    expect(await hashFile(filePath, "sha256")).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  it("hashes an empty file", async () => {
    const filePath = path.join(dir, "empty.txt");
    await fs.writeFile(filePath, "");

    expect(await hashFile(filePath, "md5")).toBe("d41d8cd98f00b204e9800998ecf8427e");
    expect(hashBuffer(Buffer.alloc(0), "md5")).toBe("d41d8cd98f00b204e9800998ecf8427e");
  });

  it("rejects for a missing file", async () => {
    await expect(hashFile(path.join(dir, "nope"), "md5")).rejects.toThrow();
  });
});
