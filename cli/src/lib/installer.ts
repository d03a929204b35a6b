import fs from "node:fs";
import path from "node:path";
import type {
  Component,
  ComponentKind,
  ComponentStatus,
  ConflictStrategy,
  IdeId,
  InstallationStatus,
  InstalledComponent,
  McpServerComponent,
  Package,
  PackageInstallationRecord,
  Policy,
  TranslatedComponent,
} from "../types/index.js";
import { contentHash, fileHash } from "./checksum.js";
import { backupsDir, DEFAULT_POLICY } from "./config.js";
import { applyResolution, ConflictResolver } from "./conflict.js";
import type { ConflictPrompter } from "./conflict.js";
import { CredentialStore, resolveCredentials } from "./credentials.js";
import type { CredentialPrompter } from "./credentials.js";
import { EXIT_CODES, NotFoundError, PathEscapeError, formatError, isNotFound } from "./errors.js";
import type { ExitCode } from "./errors.js";
import { createBackup, removeEmptyDirs, resolveInsideProject, toPosix, writeFileAtomic } from "./files.js";
import { logger } from "./logger.js";
import { loadPackage } from "./manifest.js";
import type { LoadedPackage } from "./manifest.js";
import { getServer, mergeServer, removeServer, sameJson, substitutePlaceholders } from "./mcp-config.js";
import type { MainRegistry } from "./registry.js";
import { InstallationTracker } from "./tracker.js";
import { checkSupport, translateComponent } from "./translator.js";

// ── Types ──

export interface InstallOptions {
  projectRoot: string;
  ide: IdeId;
  conflictStrategy?: ConflictStrategy;
  conflictPrompter?: ConflictPrompter;
  credentialPrompter?: CredentialPrompter;
  registry?: MainRegistry;
  policy?: Policy;
  /** Recorded in the tracker so `update` can find the package again. */
  source?: string;
  now?: () => Date;
}

export interface ComponentOutcome {
  kind: ComponentKind;
  name: string;
  status: ComponentStatus;
  /** Human-readable result, e.g. "skipped: identical". */
  detail: string;
  /** Project-relative path, when the component has one. */
  targetPath?: string;
  written: boolean;
  /** Installed or skipped because it was already identical. */
  ok: boolean;
}

export interface InstallSummary {
  packageName: string;
  namespace: string;
  version: string;
  ide: IdeId;
  status: Extract<InstallationStatus, "complete" | "partial" | "failed">;
  outcomes: ComponentOutcome[];
  installed: number;
  skipped: number;
  failed: number;
  pending: number;
  /** Files (or config entries) actually written. */
  written: number;
  warnings: string[];
}

interface ComponentResult {
  outcome: ComponentOutcome;
  record: InstalledComponent;
}

interface PipelineContext {
  pkg: Package;
  packageRoot: string;
  projectRoot: string;
  ide: IdeId;
  resolver: ConflictResolver;
  credentials: CredentialStore;
  credentialPrompter: CredentialPrompter | undefined;
  previous: PackageInstallationRecord | undefined;
  now: () => Date;
}

// ── Helpers ──

export function orderedComponents(pkg: Package): Component[] {
  const { instructions, mcpServers, hooks, commands, resources } = pkg.components;
  return [...instructions, ...mcpServers, ...hooks, ...commands, ...resources];
}

function result(
  component: Component,
  status: ComponentStatus,
  detail: string,
  extra: { targetPath?: string; checksum?: string; written?: boolean; ok?: boolean; mergeKey?: string } = {},
): ComponentResult {
  const outcome: ComponentOutcome = {
    kind: component.kind,
    name: component.name,
    status,
    detail,
    written: extra.written ?? false,
    ok: extra.ok ?? status === "installed",
  };
  if (extra.targetPath !== undefined) outcome.targetPath = extra.targetPath;

  const record: InstalledComponent = {
    type: component.kind,
    name: component.name,
    installedPath: extra.targetPath ?? "",
    checksum: extra.checksum ?? "",
    status,
  };
  if (extra.mergeKey !== undefined) record.mergeKey = extra.mergeKey;
  return { outcome, record };
}

function previousComponent(ctx: PipelineContext, component: Component): InstalledComponent | undefined {
  return ctx.previous?.components.find((c) => c.type === component.kind && c.name === component.name);
}

function relative(projectRoot: string, absolutePath: string): string {
  return toPosix(path.relative(projectRoot, absolutePath));
}

function readPackageFile(packageRoot: string) {
  return (file: string): Buffer => {
    const resolved = path.resolve(packageRoot, file);
    const rel = path.relative(packageRoot, resolved);
    if (rel.startsWith("..") || path.isAbsolute(rel)) {
      throw new PathEscapeError(file, packageRoot);
    }
    return fs.readFileSync(resolved);
  };
}

function serverChecksum(server: unknown): string {
  return contentHash(JSON.stringify(server));
}

// ── File components ──

async function installFileComponent(
  ctx: PipelineContext,
  translated: TranslatedComponent,
): Promise<ComponentResult> {
  const component = translated.source;
  const target = resolveInsideProject(ctx.projectRoot, translated.targetPath);
  const checksum = contentHash(translated.content);
  const previous = previousComponent(ctx, component);

  // An earlier install may have landed elsewhere (renamed or timestamped copy).
  if (previous?.installedPath && previous.installedPath !== translated.targetPath) {
    const earlier = resolveInsideProject(ctx.projectRoot, previous.installedPath);
    if (fs.existsSync(earlier) && fileHash(earlier) === checksum) {
      return result(component, "installed", "skipped: identical", {
        targetPath: previous.installedPath,
        checksum,
        ok: true,
      });
    }
  }

  const trusted = previous?.installedPath === translated.targetPath ? previous.checksum : undefined;
  const resolution = await ctx.resolver.resolve(target, translated.content, trusted);

  if (resolution.action === "skip") {
    if (resolution.reason === "identical") {
      return result(component, "installed", "skipped: identical", {
        targetPath: translated.targetPath,
        checksum,
        ok: true,
      });
    }
    return result(component, "skipped", "skipped: kept local changes", {
      targetPath: translated.targetPath,
      checksum: fileHash(target),
    });
  }

  const written = applyResolution(resolution, translated.content, translated.mode);
  const writtenPath = written === null ? translated.targetPath : relative(ctx.projectRoot, written);
  const detail =
    resolution.action === "overwrite"
      ? `installed → ${writtenPath} (backup ${relative(ctx.projectRoot, resolution.backupPath)})`
      : `installed → ${writtenPath}`;
  return result(component, "installed", detail, { targetPath: writtenPath, checksum, written: true });
}

// ── MCP servers ──

function nextServerKey(servers: string | null, key: string): string {
  let counter = 1;
  while (getServer(servers, `${key}-${counter}`) !== undefined) counter++;
  return `${key}-${counter}`;
}

async function installMcpServer(
  ctx: PipelineContext,
  component: McpServerComponent,
  translated: TranslatedComponent,
): Promise<ComponentResult> {
  const target = resolveInsideProject(ctx.projectRoot, translated.targetPath);
  const key = translated.mergeKey ?? component.name;
  const template: unknown = JSON.parse(translated.content.toString());

  const credentials = await resolveCredentials(
    component.credentials,
    component.name,
    ctx.credentials,
    ctx.credentialPrompter,
  );
  const server = substitutePlaceholders(template, credentials.values);
  const checksum = serverChecksum(server);

  let existing: string | null = null;
  try {
    existing = fs.readFileSync(target, "utf-8");
  } catch (err) {
    if (!isNotFound(err)) throw err;
  }

  const previousEntry = getServer(existing, key);
  const pendingStatus: ComponentStatus = credentials.status === "pending" ? "pending_credentials" : "installed";
  const pendingDetail =
    credentials.status === "pending" ? ` (pending credentials: ${credentials.missing.join(", ")})` : "";

  if (previousEntry !== undefined && sameJson(previousEntry, server)) {
    return result(component, pendingStatus, `skipped: identical${pendingDetail}`, {
      targetPath: translated.targetPath,
      checksum,
      mergeKey: key,
      ok: credentials.status === "resolved",
    });
  }

  let writeKey = key;
  const previous = previousComponent(ctx, component);
  const ours = previousEntry !== undefined && previous?.checksum === serverChecksum(previousEntry);
  if (previousEntry !== undefined && !ours) {
    const relativePath = `${translated.targetPath}#mcpServers.${key}`;
    const choice = await ctx.resolver.resolveEntry(relativePath, previousEntry, server);
    if (choice === "keep") {
      return result(component, "skipped", "skipped: kept local changes", {
        targetPath: translated.targetPath,
        checksum: serverChecksum(previousEntry),
        mergeKey: key,
      });
    }
    if (choice === "overwrite" && existing !== null) {
      createBackup(target, backupsDir(ctx.projectRoot), translated.targetPath, ctx.now());
    }
    if (choice === "rename") {
      writeKey = nextServerKey(existing, key);
    }
  }

  const merged = mergeServer(existing, writeKey, server);
  writeFileAtomic(target, merged.content);
  return result(component, pendingStatus, `installed → ${translated.targetPath} [${writeKey}]${pendingDetail}`, {
    targetPath: translated.targetPath,
    checksum,
    mergeKey: writeKey,
    written: true,
    ok: credentials.status === "resolved",
  });
}

// ── Pipeline ──

async function installComponent(ctx: PipelineContext, component: Component): Promise<ComponentResult> {
  const unsupported = checkSupport(component, ctx.ide);
  if (unsupported && !unsupported.supported) {
    return result(component, "skipped", `skipped: ${unsupported.reason}`);
  }

  try {
    const translation = translateComponent(component, ctx.ide, {
      packageName: ctx.pkg.name,
      readFile: readPackageFile(ctx.packageRoot),
      projectRoot: ctx.projectRoot,
    });
    if (!translation.supported) {
      return result(component, "skipped", `skipped: ${translation.reason}`);
    }
    if (component.kind === "mcp_server") {
      return await installMcpServer(ctx, component, translation.translated);
    }
    return await installFileComponent(ctx, translation.translated);
  } catch (err) {
    if (err instanceof PathEscapeError) {
      logger.error(`${component.kind} ${component.name}: ${err.message}`);
    } else {
      logger.debug(`${component.kind} ${component.name} failed: ${formatError(err)}`);
    }
    return result(component, "failed", `failed: ${formatError(err)}`);
  }
}

export function overallStatus(outcomes: ComponentOutcome[]): InstallSummary["status"] {
  if (outcomes.every((o) => o.ok)) return "complete";
  if (outcomes.some((o) => o.ok)) return "partial";
  return "failed";
}

function summarize(
  pkg: Package,
  ide: IdeId,
  outcomes: ComponentOutcome[],
  warnings: string[],
): InstallSummary {
  return {
    packageName: pkg.name,
    namespace: pkg.namespace,
    version: pkg.version,
    ide,
    status: overallStatus(outcomes),
    outcomes,
    installed: outcomes.filter((o) => o.status === "installed" && o.written).length,
    skipped: outcomes.filter((o) => o.status === "skipped" || (o.ok && !o.written)).length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    pending: outcomes.filter((o) => o.status === "pending_credentials").length,
    written: outcomes.filter((o) => o.written).length,
    warnings,
  };
}

async function runPipeline(
  loaded: LoadedPackage,
  options: InstallOptions,
  mode: "installing" | "updating",
): Promise<InstallSummary> {
  const { package: pkg, root: packageRoot } = loaded;
  const projectRoot = path.resolve(options.projectRoot);
  const now = options.now ?? (() => new Date());
  const tracker = new InstallationTracker(projectRoot, now);
  const previous = tracker.getPackage(pkg.name, options.ide);

  tracker.begin(pkg, options.ide, mode, options.source);

  const ctx: PipelineContext = {
    pkg,
    packageRoot,
    projectRoot,
    ide: options.ide,
    resolver: new ConflictResolver({
      projectRoot,
      strategy: options.conflictStrategy ?? "prompt",
      ...(options.conflictPrompter ? { prompter: options.conflictPrompter } : {}),
      now,
    }),
    credentials: new CredentialStore(projectRoot),
    credentialPrompter: options.credentialPrompter,
    previous,
    now,
  };

  const results: ComponentResult[] = [];
  for (const component of orderedComponents(pkg)) {
    const componentResult = await installComponent(ctx, component);
    logger.debug(`${component.kind} ${component.name}: ${componentResult.outcome.detail}`);
    results.push(componentResult);
  }
  ctx.credentials.save();

  const summary = summarize(pkg, options.ide, results.map((r) => r.outcome), loaded.warnings);
  tracker.recordInstallation(pkg, options.ide, results.map((r) => r.record), summary.status, options.source);
  if (mode === "updating") {
    tracker.updateVersion(pkg.name, pkg.version, options.ide);
  }

  if (options.registry) {
    try {
      options.registry.registerProject(projectRoot, tracker.getInstalled());
    } catch (err) {
      logger.warn(`Could not update the project registry: ${formatError(err)}`);
    }
  }

  return summary;
}

// ── Public operations ──

/** Validates the package (throwing before any write) and installs it best-effort. */
export async function installPackage(packageRoot: string, options: InstallOptions): Promise<InstallSummary> {
  const loaded = loadPackage(packageRoot, options.policy ?? DEFAULT_POLICY);
  return runPipeline(loaded, options, "installing");
}

export interface UpdateResult extends InstallSummary {
  previousVersion: string;
  /** Files of components the new version no longer ships. */
  removed: string[];
}

/**
 * Reinstalls a tracked package from a newer checkout. Files this tool wrote
 * and nobody edited since are replaced without asking.
 */
export async function updatePackage(packageRoot: string, options: InstallOptions): Promise<UpdateResult> {
  const loaded = loadPackage(packageRoot, options.policy ?? DEFAULT_POLICY);
  const projectRoot = path.resolve(options.projectRoot);
  const tracker = new InstallationTracker(projectRoot, options.now);
  const before = tracker.getPackage(loaded.package.name, options.ide);
  if (!before) {
    throw new NotFoundError(`${loaded.package.name} is not installed for ${options.ide}`);
  }

  const summary = await runPipeline(loaded, options, "updating");

  const shipped = new Set(orderedComponents(loaded.package).map((c) => `${c.kind}:${c.name}`));
  const dropped = before.components.filter((c) => !shipped.has(`${c.type}:${c.name}`));
  const removed = removeComponents(projectRoot, dropped, false, claimedPaths(tracker.getInstalled())).removed;

  return { ...summary, previousVersion: before.version, removed };
}

export interface UninstallOptions {
  projectRoot: string;
  ide?: IdeId;
  /** Remove files even when they were edited after install. */
  force?: boolean;
  registry?: MainRegistry;
}

export interface UninstallSummary {
  packageName: string;
  removed: string[];
  kept: string[];
  records: number;
}

function ownedPath(component: InstalledComponent): string {
  return component.type === "mcp_server"
    ? `${component.installedPath}#${component.mergeKey ?? component.name}`
    : component.installedPath;
}

/** Paths (and MCP entries) still claimed by `records`. */
function claimedPaths(records: PackageInstallationRecord[]): Set<string> {
  return new Set(
    records.flatMap((r) =>
      r.components
        .filter((c) => c.installedPath && (c.status === "installed" || c.status === "pending_credentials"))
        .map(ownedPath),
    ),
  );
}

/** Removes what `components` wrote, except files another record still claims. */
function removeComponents(
  projectRoot: string,
  components: InstalledComponent[],
  force: boolean,
  claimed: Set<string>,
): { removed: string[]; kept: string[] } {
  const removed: string[] = [];
  const kept: string[] = [];

  for (const component of components) {
    if (component.status !== "installed" && component.status !== "pending_credentials") continue;
    if (!component.installedPath) continue;
    if (claimed.has(ownedPath(component))) {
      logger.debug(`${ownedPath(component)} is still used by another installation; left in place`);
      continue;
    }

    let target: string;
    try {
      target = resolveInsideProject(projectRoot, component.installedPath);
    } catch (err) {
      logger.warn(formatError(err));
      continue;
    }
    if (!fs.existsSync(target)) continue;

    if (component.type === "mcp_server") {
      const key = component.mergeKey ?? component.name;
      const text = fs.readFileSync(target, "utf-8");
      const entry = getServer(text, key);
      if (entry === undefined) continue;
      if (!force && component.checksum && serverChecksum(entry) !== component.checksum) {
        kept.push(`${component.installedPath}#${key}`);
        continue;
      }
      writeFileAtomic(target, removeServer(text, key).content);
      removed.push(`${component.installedPath}#${key}`);
      continue;
    }

    if (!force && component.checksum && fileHash(target) !== component.checksum) {
      kept.push(component.installedPath);
      continue;
    }
    fs.rmSync(target, { force: true });
    removeEmptyDirs(path.dirname(target), projectRoot);
    removed.push(component.installedPath);
  }

  return { removed, kept };
}

export function uninstallPackage(packageName: string, options: UninstallOptions): UninstallSummary {
  const projectRoot = path.resolve(options.projectRoot);
  const tracker = new InstallationTracker(projectRoot);
  const selected = (r: PackageInstallationRecord) =>
    r.packageName === packageName && (options.ide === undefined || r.ide === options.ide);
  const installed = tracker.getInstalled();
  const records = installed.filter(selected);
  if (records.length === 0) {
    throw new NotFoundError(`${packageName} is not installed in ${projectRoot}`);
  }

  const claimed = claimedPaths(installed.filter((r) => !selected(r)));
  const removed: string[] = [];
  const kept: string[] = [];
  for (const record of records) {
    const outcome = removeComponents(projectRoot, record.components, options.force ?? false, claimed);
    removed.push(...outcome.removed);
    kept.push(...outcome.kept);
  }
  for (const file of kept) {
    logger.warn(`${file} was modified after install; left in place`);
  }

  tracker.remove(packageName, options.ide);
  if (options.registry) {
    try {
      options.registry.registerProject(projectRoot, tracker.getInstalled());
    } catch (err) {
      logger.warn(`Could not update the project registry: ${formatError(err)}`);
    }
  }

  return { packageName, removed, kept, records: records.length };
}

export function exitCodeForSummary(summary: Pick<InstallSummary, "status">): ExitCode {
  switch (summary.status) {
    case "complete":
      return EXIT_CODES.success;
    case "partial":
      return EXIT_CODES.partial;
    case "failed":
      return EXIT_CODES.failure;
  }
}
