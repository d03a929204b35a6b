import fs from "node:fs";
import crypto from "node:crypto";

export function contentHash(content: string | Buffer): string {
  return `sha256:${crypto.createHash("sha256").update(content).digest("hex")}`;
}

export function fileHash(filePath: string): string {
  const hash = crypto.createHash("sha256");
  const fd = fs.openSync(filePath, "r");
  try {
    const chunk = Buffer.alloc(1024 * 1024);
    let read = fs.readSync(fd, chunk, 0, chunk.length, null);
    while (read > 0) {
      hash.update(chunk.subarray(0, read));
      read = fs.readSync(fd, chunk, 0, chunk.length, null);
    }
  } finally {
    fs.closeSync(fd);
  }
  return `sha256:${hash.digest("hex")}`;
}

/** Accepts both `sha256:<hex>` and bare hex digests. */
export function normalizeChecksum(checksum: string): string {
  const trimmed = checksum.trim().toLowerCase();
  return trimmed.startsWith("sha256:") ? trimmed : `sha256:${trimmed}`;
}

export function checksumsEqual(a: string, b: string): boolean {
  return normalizeChecksum(a) === normalizeChecksum(b);
}
