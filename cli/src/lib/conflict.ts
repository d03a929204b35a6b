import fs from "node:fs";
import path from "node:path";
import type { ConflictStrategy } from "../types/index.js";
import { contentHash, fileHash } from "./checksum.js";
import { backupsDir } from "./config.js";
import {
  createBackup,
  isBinaryFile,
  looksBinary,
  nextAvailableName,
  timestampedName,
  writeFileAtomic,
} from "./files.js";
import { logger } from "./logger.js";

export interface FileSummary {
  sizeBytes: number;
  modifiedAt: Date | null;
  checksum: string;
}

export interface ConflictInfo {
  /** Project-relative path of the file being written. */
  relativePath: string;
  existing: FileSummary;
  incoming: FileSummary;
}

export type TextConflictChoice = "keep" | "overwrite" | "rename";
export type BinaryConflictChoice = "keep" | "accept_new";

/** Interactive side of the Prompt strategy. */
export interface ConflictPrompter {
  chooseText(conflict: ConflictInfo): Promise<TextConflictChoice>;
  chooseBinary(conflict: ConflictInfo): Promise<BinaryConflictChoice>;
}

export type ConflictResolution =
  | { action: "write"; targetPath: string }
  | { action: "skip"; reason: "identical" | "kept" }
  | { action: "overwrite"; targetPath: string; backupPath: string }
  | { action: "rename"; targetPath: string }
  | { action: "keep_both"; targetPath: string };

export interface ConflictResolverOptions {
  projectRoot: string;
  strategy: ConflictStrategy;
  prompter?: ConflictPrompter;
  now?: () => Date;
}

export class ConflictResolver {
  private readonly projectRoot: string;
  private readonly strategy: ConflictStrategy;
  private readonly prompter: ConflictPrompter | undefined;
  private readonly now: () => Date;

  constructor(options: ConflictResolverOptions) {
    this.projectRoot = options.projectRoot;
    this.strategy = options.strategy;
    this.prompter = options.prompter;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Decides how `content` lands at `targetPath`. An overwrite backs up the
   * existing file before returning; nothing else touches the disk.
   * `trustedChecksum` is the checksum this tool last wrote there: a file
   * still matching it has no local edits and is replaced directly.
   */
  async resolve(
    targetPath: string,
    content: string | Buffer,
    trustedChecksum?: string,
  ): Promise<ConflictResolution> {
    if (!fs.existsSync(targetPath)) {
      return { action: "write", targetPath };
    }

    const incomingChecksum = contentHash(content);
    const existingChecksum = fileHash(targetPath);
    if (existingChecksum === incomingChecksum) {
      return { action: "skip", reason: "identical" };
    }
    if (trustedChecksum !== undefined && existingChecksum === trustedChecksum) {
      return { action: "write", targetPath };
    }

    const relativePath = path.relative(this.projectRoot, targetPath).split(path.sep).join("/");
    const binary = looksBinary(content) || isBinaryFile(targetPath);
    logger.debug(`Conflict at ${relativePath} (${binary ? "binary" : "text"}, strategy ${this.strategy})`);

    switch (this.strategy) {
      case "skip":
        return { action: "skip", reason: "kept" };
      case "overwrite":
        return this.overwrite(targetPath, relativePath);
      case "rename":
        return { action: "rename", targetPath: nextAvailableName(targetPath) };
      case "prompt":
        return this.prompt(targetPath, relativePath, content, binary, existingChecksum, incomingChecksum);
    }
  }

  /**
   * Same decision for a keyed entry inside a merged config file. The entry
   * is JSON, so there is no binary path and no backup at this level.
   */
  async resolveEntry(label: string, existing: unknown, incoming: unknown): Promise<TextConflictChoice> {
    logger.debug(`Conflict at ${label} (entry, strategy ${this.strategy})`);
    switch (this.strategy) {
      case "skip":
        return "keep";
      case "overwrite":
        return "overwrite";
      case "rename":
        return "rename";
      case "prompt": {
        if (!this.prompter) {
          logger.warn(`${label} has local changes; keeping it (no prompt available)`);
          return "keep";
        }
        const existingText = JSON.stringify(existing);
        const incomingText = JSON.stringify(incoming);
        return this.prompter.chooseText({
          relativePath: label,
          existing: { sizeBytes: Buffer.byteLength(existingText), modifiedAt: null, checksum: contentHash(existingText) },
          incoming: { sizeBytes: Buffer.byteLength(incomingText), modifiedAt: null, checksum: contentHash(incomingText) },
        });
      }
    }
  }

  private overwrite(targetPath: string, relativePath: string): ConflictResolution {
    const backupPath = createBackup(targetPath, backupsDir(this.projectRoot), relativePath, this.now());
    logger.debug(`Backed up ${relativePath} to ${backupPath}`);
    return { action: "overwrite", targetPath, backupPath };
  }

  private async prompt(
    targetPath: string,
    relativePath: string,
    content: string | Buffer,
    binary: boolean,
    existingChecksum: string,
    incomingChecksum: string,
  ): Promise<ConflictResolution> {
    if (!this.prompter) {
      logger.warn(`${relativePath} has local changes; keeping it (no prompt available)`);
      return { action: "skip", reason: "kept" };
    }

    const stat = fs.statSync(targetPath);
    const conflict: ConflictInfo = {
      relativePath,
      existing: { sizeBytes: stat.size, modifiedAt: stat.mtime, checksum: existingChecksum },
      incoming: {
        sizeBytes: typeof content === "string" ? Buffer.byteLength(content) : content.length,
        modifiedAt: null,
        checksum: incomingChecksum,
      },
    };

    if (binary) {
      const choice = await this.prompter.chooseBinary(conflict);
      if (choice === "keep") return { action: "skip", reason: "kept" };
      return { action: "keep_both", targetPath: timestampedName(targetPath, this.now()) };
    }

    const choice = await this.prompter.chooseText(conflict);
    switch (choice) {
      case "keep":
        return { action: "skip", reason: "kept" };
      case "overwrite":
        return this.overwrite(targetPath, relativePath);
      case "rename":
        return { action: "rename", targetPath: nextAvailableName(targetPath) };
    }
  }
}

/** Carries out a resolution. Returns the path written, or null for a skip. */
export function applyResolution(
  resolution: ConflictResolution,
  content: string | Buffer,
  mode?: number,
): string | null {
  if (resolution.action === "skip") return null;
  writeFileAtomic(resolution.targetPath, content, mode);
  return resolution.targetPath;
}
