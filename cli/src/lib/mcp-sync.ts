import fs from "node:fs";
import path from "node:path";
import type { CredentialDescriptor, IdeId, InstalledComponent } from "../types/index.js";
import { contentHash } from "./checksum.js";
import { CredentialStore, resolveCredentials } from "./credentials.js";
import type { CredentialPrompter } from "./credentials.js";
import { formatError } from "./errors.js";
import { resolveInsideProject, writeFileAtomic } from "./files.js";
import { logger } from "./logger.js";
import { findPlaceholders, getServer, mergeServer, substitutePlaceholders } from "./mcp-config.js";
import { InstallationTracker } from "./tracker.js";

export interface SyncOptions {
  projectRoot: string;
  ide?: IdeId;
  prompter?: CredentialPrompter;
  now?: () => Date;
}

export interface SyncedServer {
  packageName: string;
  ide: IdeId;
  server: string;
  configPath: string;
  status: "resolved" | "pending" | "missing";
  /** Credentials still unresolved. */
  missing: string[];
}

export interface SyncResult {
  servers: SyncedServer[];
  resolved: number;
  pending: number;
}

function descriptorFor(name: string, server: string): CredentialDescriptor {
  return { name, description: `${name} for ${server}`, required: true };
}

function readConfigFile(projectRoot: string, relativePath: string): { target: string; text: string } | null {
  try {
    const target = resolveInsideProject(projectRoot, relativePath);
    return { target, text: fs.readFileSync(target, "utf-8") };
  } catch (err) {
    logger.warn(`Cannot read ${relativePath}: ${formatError(err)}`);
    return null;
  }
}

/**
 * Finishes MCP servers left waiting for credentials: fills their
 * placeholders from the credential store (prompting for anything absent),
 * rewrites the config entry and marks the component installed.
 */
export async function syncMcpCredentials(options: SyncOptions): Promise<SyncResult> {
  const projectRoot = path.resolve(options.projectRoot);
  const tracker = new InstallationTracker(projectRoot, options.now);
  const store = new CredentialStore(projectRoot);
  const servers: SyncedServer[] = [];

  for (const record of tracker.getInstalled()) {
    if (options.ide !== undefined && record.ide !== options.ide) continue;
    const pending = record.components.filter(
      (c) => c.type === "mcp_server" && c.status === "pending_credentials",
    );
    if (pending.length === 0) continue;

    const components: InstalledComponent[] = record.components.map((c) => ({ ...c }));
    for (const component of components) {
      if (component.type !== "mcp_server" || component.status !== "pending_credentials") continue;
      const key = component.mergeKey ?? component.name;
      const synced: SyncedServer = {
        packageName: record.packageName,
        ide: record.ide,
        server: key,
        configPath: component.installedPath,
        status: "pending",
        missing: [],
      };
      servers.push(synced);

      const config = readConfigFile(projectRoot, component.installedPath);
      if (!config) {
        synced.status = "missing";
        continue;
      }
      const { target, text } = config;
      const entry = getServer(text, key);
      if (entry === undefined) {
        logger.warn(`MCP server "${key}" is no longer in ${component.installedPath}`);
        synced.status = "missing";
        continue;
      }

      const descriptors = findPlaceholders(entry).map((name) => descriptorFor(name, key));
      const credentials = await resolveCredentials(descriptors, key, store, options.prompter);
      const server = substitutePlaceholders(entry, credentials.values);
      writeFileAtomic(target, mergeServer(text, key, server).content);
      component.checksum = contentHash(JSON.stringify(server));

      if (credentials.status === "resolved") {
        component.status = "installed";
        synced.status = "resolved";
      } else {
        synced.missing = credentials.missing;
      }
    }

    const stillPending = components.some((c) => c.status === "pending_credentials");
    const status =
      record.status === "partial" && !stillPending && components.every((c) => c.status === "installed")
        ? "complete"
        : record.status;
    tracker.save({
      ...record,
      updatedAt: (options.now ?? (() => new Date()))().toISOString(),
      status,
      components,
    });
  }

  store.save();
  return {
    servers,
    resolved: servers.filter((s) => s.status === "resolved").length,
    pending: servers.filter((s) => s.status !== "resolved").length,
  };
}
