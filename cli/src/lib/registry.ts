import fs from "node:fs";
import path from "node:path";
import { z } from "zod/v4";
import type {
  KitConfig,
  PackageInstallationRecord,
  ProjectRegistration,
  RegisteredPackage,
  RegistryFile,
} from "../types/index.js";
import {
  DEFAULT_SCAN_DEPTH,
  getRegistryPath,
  getScanDepth,
  getScanRoots,
  PROJECT_DIR_NAME,
  readConfig,
} from "./config.js";
import { formatError, isNotFound } from "./errors.js";
import { writeFileAtomic } from "./files.js";
import { logger } from "./logger.js";
import { readTrackerFile } from "./tracker.js";

export const REGISTRY_VERSION = 1;

const SKIP_DIRS = new Set(["node_modules", ".git", PROJECT_DIR_NAME]);

const registeredPackageSchema = z.object({
  name: z.string().min(1),
  namespace: z.string(),
  version: z.string().min(1),
  ide: z.enum(["claude", "cursor", "windsurf", "copilot"]),
  installed_at: z.string(),
});

const projectSchema = z.object({
  path: z.string().min(1).refine((p) => path.isAbsolute(p), "path must be absolute"),
  name: z.string(),
  packages: z.array(registeredPackageSchema),
  instructions: z.array(z.string()),
  mcp_servers: z.array(z.string()),
  registered_at: z.string(),
  last_updated: z.string(),
});

const registryShapeSchema = z.object({
  version: z.number().int(),
  last_scan: z.string().nullable().optional(),
  projects: z.array(z.unknown()),
});

type StoredProject = z.infer<typeof projectSchema>;

function fromStored(stored: StoredProject): ProjectRegistration {
  return {
    path: stored.path,
    name: stored.name,
    packages: stored.packages.map((p) => ({
      name: p.name,
      namespace: p.namespace,
      version: p.version,
      ide: p.ide,
      installedAt: p.installed_at,
    })),
    instructions: stored.instructions,
    mcpServers: stored.mcp_servers,
    registeredAt: stored.registered_at,
    lastUpdated: stored.last_updated,
  };
}

function toStored(project: ProjectRegistration): StoredProject {
  return {
    path: project.path,
    name: project.name,
    packages: project.packages.map((p) => ({
      name: p.name,
      namespace: p.namespace,
      version: p.version,
      ide: p.ide,
      installed_at: p.installedAt,
    })),
    instructions: project.instructions,
    mcp_servers: project.mcpServers,
    registered_at: project.registeredAt,
    last_updated: project.lastUpdated,
  };
}

export interface RegistryIssue {
  index: number;
  message: string;
}

type ParsedRegistry =
  | { ok: true; lastScan: string | null; projects: ProjectRegistration[]; issues: RegistryIssue[] }
  | { ok: false; reason: string };

/** Validates the file shape, then each project entry on its own. */
export function parseRegistryText(raw: string): ParsedRegistry {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${formatError(err)}` };
  }
  const shape = registryShapeSchema.safeParse(data);
  if (!shape.success) {
    return { ok: false, reason: z.prettifyError(shape.error) };
  }

  const projects: ProjectRegistration[] = [];
  const issues: RegistryIssue[] = [];
  const seen = new Set<string>();
  shape.data.projects.forEach((entry, index) => {
    const result = projectSchema.safeParse(entry);
    if (!result.success) {
      issues.push({ index, message: z.prettifyError(result.error).replace(/\n/g, " ") });
      return;
    }
    if (seen.has(result.data.path)) {
      issues.push({ index, message: `duplicate project path ${result.data.path}` });
      return;
    }
    seen.add(result.data.path);
    projects.push(fromStored(result.data));
  });
  return { ok: true, lastScan: shape.data.last_scan ?? null, projects, issues };
}

/** Registration built from a project's tracker records. */
export function registrationFromRecords(
  projectPath: string,
  records: PackageInstallationRecord[],
  timestamp: string,
  registeredAt: string = timestamp,
): ProjectRegistration {
  const instructions = new Set<string>();
  const mcpServers = new Set<string>();
  const packages: RegisteredPackage[] = [];

  for (const record of records) {
    packages.push({
      name: record.packageName,
      namespace: record.namespace,
      version: record.version,
      ide: record.ide,
      installedAt: record.installedAt,
    });
    for (const component of record.components) {
      if (component.status !== "installed" && component.status !== "pending_credentials") continue;
      if (component.type === "instruction") instructions.add(component.name);
      if (component.type === "mcp_server") mcpServers.add(component.name);
    }
  }

  return {
    path: projectPath,
    name: path.basename(projectPath),
    packages,
    instructions: [...instructions].sort(),
    mcpServers: [...mcpServers].sort(),
    registeredAt,
    lastUpdated: timestamp,
  };
}

/** Directories under `root` (to `maxDepth` levels) that hold a project tracker. */
export function findTrackedProjects(root: string, maxDepth: number): string[] {
  const found: string[] = [];

  const walk = (dir: string, depth: number): void => {
    if (fs.existsSync(path.join(dir, PROJECT_DIR_NAME, "packages.json"))) {
      found.push(dir);
    }
    if (depth >= maxDepth) return;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      logger.debug(`Skipping ${dir}: ${formatError(err)}`);
      return;
    }
    for (const entry of entries) {
      if (!entry.isDirectory() || SKIP_DIRS.has(entry.name)) continue;
      walk(path.join(dir, entry.name), depth + 1);
    }
  };

  walk(path.resolve(root), 0);
  return found.sort();
}

export interface MainRegistryOptions {
  path: string;
  scanRoots?: string[];
  scanDepth?: number;
  now?: () => Date;
}

export interface RepairResult {
  kept: number;
  dropped: RegistryIssue[];
  rebuilt: boolean;
}

/**
 * Cross-project index at `~/.instructionkit/registry.json`. Project
 * trackers are authoritative; this file is a cache that can always be
 * rebuilt from them.
 */
export class MainRegistry {
  readonly filePath: string;
  private readonly scanRoots: string[];
  private readonly scanDepth: number;
  private readonly now: () => Date;
  private projects = new Map<string, ProjectRegistration>();
  private lastScan: string | null = null;
  private loaded = false;
  private degraded = false;

  constructor(options: MainRegistryOptions) {
    this.filePath = options.path;
    this.scanRoots = options.scanRoots ?? [];
    this.scanDepth = options.scanDepth ?? DEFAULT_SCAN_DEPTH;
    this.now = options.now ?? (() => new Date());
  }

  get isDegraded(): boolean {
    return this.degraded;
  }

  get lastScanAt(): string | null {
    return this.lastScan;
  }

  private readRaw(): string | null {
    try {
      return fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  private ensureLoaded(): void {
    if (!this.loaded) this.load();
  }

  /**
   * parse → validate shape → validate each entry (drop and persist) →
   * rebuild from trackers if unparsable → empty and degraded if that fails.
   */
  load(): void {
    this.loaded = true;
    this.degraded = false;
    this.projects = new Map();
    this.lastScan = null;

    let raw: string | null;
    try {
      raw = this.readRaw();
    } catch (err) {
      logger.warn(`Cannot read registry ${this.filePath}: ${formatError(err)}`);
      this.recoverByRebuild();
      return;
    }
    if (raw === null) return;

    const parsed = parseRegistryText(raw);
    if (!parsed.ok) {
      logger.warn(`Registry ${this.filePath} is corrupt (${parsed.reason}); rebuilding from project trackers`);
      this.recoverByRebuild();
      return;
    }

    this.lastScan = parsed.lastScan;
    for (const project of parsed.projects) this.projects.set(project.path, project);
    if (parsed.issues.length > 0) {
      this.logDropped(parsed.issues);
      this.persist();
    }
  }

  private logDropped(issues: RegistryIssue[]): void {
    for (const issue of issues) {
      logger.warn(`Dropped malformed registry entry #${issue.index}: ${issue.message}`);
    }
  }

  private recoverByRebuild(): void {
    try {
      this.rebuildFromTrackers();
    } catch (err) {
      logger.warn(`Registry rebuild failed (${formatError(err)}); continuing with an empty registry`);
      this.projects = new Map();
      this.degraded = true;
    }
  }

  persist(): void {
    if (this.degraded) {
      logger.debug("Registry is degraded; not writing it");
      return;
    }
    const data = {
      version: REGISTRY_VERSION,
      last_scan: this.lastScan,
      projects: [...this.projects.values()].map(toStored),
    };
    writeFileAtomic(this.filePath, `${JSON.stringify(data, null, 2)}\n`);
  }

  toJSON(): RegistryFile {
    this.ensureLoaded();
    return { version: REGISTRY_VERSION, lastScan: this.lastScan, projects: this.list() };
  }

  list(): ProjectRegistration[] {
    this.ensureLoaded();
    return [...this.projects.values()].sort((a, b) => a.path.localeCompare(b.path));
  }

  get(projectPath: string): ProjectRegistration | undefined {
    this.ensureLoaded();
    return this.projects.get(path.resolve(projectPath));
  }

  /** Replaces the project's entry; a project with no packages is unregistered. */
  registerProject(projectPath: string, records: PackageInstallationRecord[]): ProjectRegistration | null {
    this.ensureLoaded();
    const resolved = path.resolve(projectPath);
    if (records.length === 0) {
      this.unregister(resolved);
      return null;
    }
    const timestamp = this.now().toISOString();
    const existing = this.projects.get(resolved);
    const registration = registrationFromRecords(resolved, records, timestamp, existing?.registeredAt);
    this.projects.set(resolved, registration);
    this.persist();
    return registration;
  }

  unregister(projectPath: string): boolean {
    this.ensureLoaded();
    const removed = this.projects.delete(path.resolve(projectPath));
    if (removed) this.persist();
    return removed;
  }

  projectsUsing(packageName: string): ProjectRegistration[] {
    return this.list().filter((p) => p.packages.some((pkg) => pkg.name === packageName));
  }

  /** Re-reads every tracker under `root` and replaces the entries that live there. */
  scan(root: string, maxDepth: number = this.scanDepth): number {
    this.ensureLoaded();
    const resolvedRoot = path.resolve(root);
    const timestamp = this.now().toISOString();

    for (const projectPath of [...this.projects.keys()]) {
      if (projectPath === resolvedRoot || projectPath.startsWith(resolvedRoot + path.sep)) {
        this.projects.delete(projectPath);
      }
    }

    let count = 0;
    for (const projectPath of findTrackedProjects(resolvedRoot, maxDepth)) {
      const records = readTrackerFile(path.join(projectPath, PROJECT_DIR_NAME, "packages.json"));
      if (records.length === 0) continue;
      this.projects.set(projectPath, registrationFromRecords(projectPath, records, timestamp));
      count++;
    }

    this.lastScan = timestamp;
    this.persist();
    logger.debug(`Scanned ${resolvedRoot} (depth ${maxDepth}): ${count} project(s)`);
    return count;
  }

  /** Checks the file on disk without changing anything. */
  validate(): RegistryIssue[] {
    const raw = this.readRaw();
    if (raw === null) return [];
    const parsed = parseRegistryText(raw);
    if (!parsed.ok) return [{ index: -1, message: parsed.reason }];
    const issues = [...parsed.issues];
    for (const project of parsed.projects) {
      if (!fs.existsSync(path.join(project.path, PROJECT_DIR_NAME, "packages.json"))) {
        issues.push({ index: -1, message: `project ${project.path} has no tracker` });
      }
    }
    return issues;
  }

  /** Drops malformed entries (logging each) and persists; rebuilds when the file cannot be repaired. */
  repair(): RepairResult {
    this.loaded = true;
    this.degraded = false;
    const raw = this.readRaw();
    if (raw === null) {
      return { kept: this.projects.size, dropped: [], rebuilt: false };
    }

    const parsed = parseRegistryText(raw);
    if (!parsed.ok) {
      logger.warn(`Registry ${this.filePath} cannot be repaired (${parsed.reason}); rebuilding from project trackers`);
      this.recoverByRebuild();
      return { kept: this.projects.size, dropped: [], rebuilt: true };
    }

    this.logDropped(parsed.issues);
    this.projects = new Map(parsed.projects.map((p): [string, ProjectRegistration] => [p.path, p]));
    this.lastScan = parsed.lastScan;
    this.persist();
    return { kept: this.projects.size, dropped: parsed.issues, rebuilt: false };
  }

  /** Last-resort recovery: forget the file and scan every configured root. */
  rebuildFromTrackers(): number {
    this.loaded = true;
    this.degraded = false;
    this.projects = new Map();
    let total = 0;
    for (const root of this.scanRoots) {
      total += this.scan(root, this.scanDepth);
    }
    if (this.scanRoots.length === 0) {
      this.lastScan = this.now().toISOString();
      this.persist();
    }
    return total;
  }
}

/** The registry configured in `config.yaml`. */
export function openMainRegistry(config: KitConfig = readConfig()): MainRegistry {
  return new MainRegistry({
    path: getRegistryPath(config),
    scanRoots: getScanRoots(config),
    scanDepth: getScanDepth(config),
  });
}
