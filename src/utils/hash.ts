import crypto from "crypto";
import fs from "fs";

export type HashAlgorithm =
  | "md5"
  | "sha1"
  | "sha224"
  | "sha256"
  | "sha384"
  | "sha512";

const ALGORITHM_BY_HEX_LENGTH: Record<number, HashAlgorithm> = {
  32: "md5",
  40: "sha1",
  56: "sha224",
  64: "sha256",
  96: "sha384",
  128: "sha512",
};

export function detectHashAlgorithm(expectedHash: string): HashAlgorithm | null {
  if (!/^[a-fA-F0-9]+$/.test(expectedHash)) {
    return null;
  }
  return ALGORITHM_BY_HEX_LENGTH[expectedHash.length] ?? null;
}

export function hashesEqual(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function hashBuffer(data: Buffer, algorithm: HashAlgorithm): string {
  return crypto.createHash(algorithm).update(data).digest("hex");
}

/** Streams the file through the digest; memory stays at one read buffer. */
export function hashFile(
  filePath: string,
  algorithm: HashAlgorithm,
  highWaterMark = 64 * 1024,
): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath, { highWaterMark });
    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("error", reject);
    stream.on("end", () => resolve(hash.digest("hex")));
  });
}
