import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { PathEscapeError } from "./errors.js";

/**
 * Resolves a project-relative target and rejects anything that lands
 * outside the project root (absolute paths, `..` segments).
 */
export function resolveInsideProject(projectRoot: string, relativeTarget: string): string {
  const root = path.resolve(projectRoot);
  const resolved = path.resolve(root, relativeTarget);
  const rel = path.relative(root, resolved);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new PathEscapeError(relativeTarget, root);
  }
  return resolved;
}

export function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

/** Write to a sibling temp file, then rename over the target. */
export function writeFileAtomic(filePath: string, content: string | Buffer, mode?: number): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${crypto.randomBytes(4).toString("hex")}.tmp`,
  );
  try {
    fs.writeFileSync(tempPath, content, mode === undefined ? undefined : { mode });
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    fs.rmSync(tempPath, { force: true });
    throw err;
  }
  if (mode !== undefined) {
    fs.chmodSync(filePath, mode);
  }
}

/** `name.ext` → `name-N.ext` for the smallest unused N ≥ 1. */
export function nextAvailableName(filePath: string): string {
  const dir = path.dirname(filePath);
  const ext = path.extname(filePath);
  const stem = path.basename(filePath, ext);
  let counter = 1;
  let candidate = path.join(dir, `${stem}-${counter}${ext}`);
  while (fs.existsSync(candidate)) {
    counter++;
    candidate = path.join(dir, `${stem}-${counter}${ext}`);
  }
  return candidate;
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** `name.ext` → `name.<timestamp>.ext`, counting up if that is taken too. */
export function timestampedName(filePath: string, date: Date): string {
  const dir = path.dirname(filePath);
  const ext = path.extname(filePath);
  const stem = path.basename(filePath, ext);
  const stamp = formatTimestamp(date);
  let candidate = path.join(dir, `${stem}.${stamp}${ext}`);
  let counter = 1;
  while (fs.existsSync(candidate)) {
    candidate = path.join(dir, `${stem}.${stamp}-${counter}${ext}`);
    counter++;
  }
  return candidate;
}

/**
 * Copies `filePath` into `<backupRoot>/<timestamp>/<relativePath>` and
 * returns the backup location.
 */
export function createBackup(
  filePath: string,
  backupRoot: string,
  relativePath: string,
  date: Date = new Date(),
): string {
  const target = path.join(backupRoot, formatTimestamp(date), relativePath);
  const backupPath = fs.existsSync(target) ? nextAvailableName(target) : target;
  fs.mkdirSync(path.dirname(backupPath), { recursive: true });
  fs.copyFileSync(filePath, backupPath);
  return backupPath;
}

const BINARY_SNIFF_BYTES = 8000;

export function looksBinary(content: string | Buffer): boolean {
  if (typeof content === "string") return content.includes("\u0000");
  const sample = content.subarray(0, BINARY_SNIFF_BYTES);
  return sample.includes(0);
}

export function isBinaryFile(filePath: string): boolean {
  const fd = fs.openSync(filePath, "r");
  try {
    const buf = Buffer.alloc(BINARY_SNIFF_BYTES);
    const read = fs.readSync(fd, buf, 0, buf.length, 0);
    return buf.subarray(0, read).includes(0);
  } finally {
    fs.closeSync(fd);
  }
}

export function removeEmptyDirs(startDir: string, stopAt: string): void {
  let current = path.resolve(startDir);
  const stop = path.resolve(stopAt);
  while (current.startsWith(stop) && current !== stop) {
    if (!fs.existsSync(current) || fs.readdirSync(current).length > 0) return;
    fs.rmdirSync(current);
    current = path.dirname(current);
  }
}
