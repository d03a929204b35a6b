import fs from "node:fs";
import { z } from "zod/v4";
import type {
  IdeId,
  InstallationStatus,
  InstalledComponent,
  Package,
  PackageInstallationRecord,
} from "../types/index.js";
import { trackerPath } from "./config.js";
import { formatError, isNotFound } from "./errors.js";
import { writeFileAtomic } from "./files.js";
import { logger } from "./logger.js";

export const TRACKER_VERSION = 1;

const componentSchema = z.object({
  type: z.enum(["instruction", "mcp_server", "hook", "command", "resource"]),
  name: z.string().min(1),
  installed_path: z.string(),
  checksum: z.string(),
  status: z.enum(["installed", "failed", "skipped", "pending_credentials"]),
  merge_key: z.string().optional(),
});

const recordSchema = z.object({
  package_name: z.string().min(1),
  namespace: z.string(),
  version: z.string().min(1),
  ide: z.enum(["claude", "cursor", "windsurf", "copilot"]),
  source: z.string().optional(),
  installed_at: z.string(),
  updated_at: z.string(),
  status: z.enum(["installing", "updating", "complete", "partial", "failed"]),
  components: z.array(componentSchema),
});

type StoredRecord = z.infer<typeof recordSchema>;

function fromStored(stored: StoredRecord): PackageInstallationRecord {
  const record: PackageInstallationRecord = {
    packageName: stored.package_name,
    namespace: stored.namespace,
    version: stored.version,
    ide: stored.ide,
    installedAt: stored.installed_at,
    updatedAt: stored.updated_at,
    status: stored.status,
    components: stored.components.map((c) => {
      const component: InstalledComponent = {
        type: c.type,
        name: c.name,
        installedPath: c.installed_path,
        checksum: c.checksum,
        status: c.status,
      };
      if (c.merge_key !== undefined) component.mergeKey = c.merge_key;
      return component;
    }),
  };
  if (stored.source !== undefined) record.source = stored.source;
  return record;
}

function toStored(record: PackageInstallationRecord): StoredRecord {
  return {
    package_name: record.packageName,
    namespace: record.namespace,
    version: record.version,
    ide: record.ide,
    ...(record.source !== undefined ? { source: record.source } : {}),
    installed_at: record.installedAt,
    updated_at: record.updatedAt,
    status: record.status,
    components: record.components.map((c) => ({
      type: c.type,
      name: c.name,
      installed_path: c.installedPath,
      checksum: c.checksum,
      status: c.status,
      ...(c.mergeKey !== undefined ? { merge_key: c.mergeKey } : {}),
    })),
  };
}

/** Accepts the current `{version, packages}` layout and the older bare array. */
export function parseTrackerData(data: unknown, source: string): PackageInstallationRecord[] {
  let entries: unknown[];
  if (Array.isArray(data)) {
    entries = data;
  } else if (typeof data === "object" && data !== null && "packages" in data && Array.isArray(data.packages)) {
    entries = data.packages;
  } else {
    logger.warn(`Ignoring unrecognised tracker file ${source}`);
    return [];
  }

  const records: PackageInstallationRecord[] = [];
  entries.forEach((entry: unknown, index) => {
    const result = recordSchema.safeParse(entry);
    if (result.success) {
      records.push(fromStored(result.data));
    } else {
      logger.warn(`Skipping invalid tracker entry #${index} in ${source}: ${z.prettifyError(result.error)}`);
    }
  });
  return records;
}

/** Reads a project's tracker without constructing a tracker. Used by the registry scan. */
export function readTrackerFile(filePath: string): PackageInstallationRecord[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    logger.warn(`Ignoring unreadable tracker ${filePath}: ${formatError(err)}`);
    return [];
  }
  return parseTrackerData(data, filePath);
}

function matches(record: PackageInstallationRecord, name: string, ide?: IdeId): boolean {
  return record.packageName === name && (ide === undefined || record.ide === ide);
}

/** Project-local ledger at `.instructionkit/packages.json`, one record per (package, IDE). */
export class InstallationTracker {
  readonly projectRoot: string;
  private readonly now: () => Date;

  constructor(projectRoot: string, now: () => Date = () => new Date()) {
    this.projectRoot = projectRoot;
    this.now = now;
  }

  get filePath(): string {
    return trackerPath(this.projectRoot);
  }

  getInstalled(): PackageInstallationRecord[] {
    return readTrackerFile(this.filePath);
  }

  getPackage(name: string, ide?: IdeId): PackageInstallationRecord | undefined {
    return this.getInstalled().find((r) => matches(r, name, ide));
  }

  private write(records: PackageInstallationRecord[]): void {
    const data = { version: TRACKER_VERSION, packages: records.map(toStored) };
    writeFileAtomic(this.filePath, `${JSON.stringify(data, null, 2)}\n`);
  }

  /** Writes `record` over the one with the same package and IDE. */
  save(record: PackageInstallationRecord): PackageInstallationRecord {
    const records = this.getInstalled();
    const index = records.findIndex((r) => matches(r, record.packageName, record.ide));
    if (index === -1) {
      records.push(record);
    } else {
      records[index] = record;
    }
    this.write(records);
    return record;
  }

  /**
   * Opens (or reopens) the record for an install or update. A package that
   * is already tracked keeps its original `installedAt`.
   */
  begin(
    pkg: Package,
    ide: IdeId,
    status: Extract<InstallationStatus, "installing" | "updating">,
    source?: string,
  ): PackageInstallationRecord {
    const timestamp = this.now().toISOString();
    const existing = this.getPackage(pkg.name, ide);
    const resolvedSource = source ?? existing?.source;
    return this.save({
      packageName: pkg.name,
      namespace: pkg.namespace,
      version: existing?.version ?? pkg.version,
      ide,
      ...(resolvedSource !== undefined ? { source: resolvedSource } : {}),
      installedAt: existing?.installedAt ?? timestamp,
      updatedAt: timestamp,
      status,
      components: existing?.components ?? [],
    });
  }

  recordInstallation(
    pkg: Package,
    ide: IdeId,
    components: InstalledComponent[],
    status: InstallationStatus,
    source?: string,
  ): PackageInstallationRecord {
    const timestamp = this.now().toISOString();
    const existing = this.getPackage(pkg.name, ide);
    const resolvedSource = source ?? existing?.source;
    return this.save({
      packageName: pkg.name,
      namespace: pkg.namespace,
      version: pkg.version,
      ide,
      ...(resolvedSource !== undefined ? { source: resolvedSource } : {}),
      installedAt: existing?.installedAt ?? timestamp,
      updatedAt: timestamp,
      status,
      components,
    });
  }

  updateVersion(name: string, newVersion: string, ide?: IdeId): boolean {
    const records = this.getInstalled();
    let changed = false;
    const timestamp = this.now().toISOString();
    for (const record of records) {
      if (!matches(record, name, ide)) continue;
      record.version = newVersion;
      record.updatedAt = timestamp;
      changed = true;
    }
    if (changed) this.write(records);
    return changed;
  }

  remove(name: string, ide?: IdeId): PackageInstallationRecord[] {
    const records = this.getInstalled();
    const removed = records.filter((r) => matches(r, name, ide));
    if (removed.length === 0) return [];
    this.write(records.filter((r) => !matches(r, name, ide)));
    return removed;
  }
}
