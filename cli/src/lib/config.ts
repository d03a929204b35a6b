import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { parse, stringify } from "yaml";
import { z } from "zod/v4";
import type { ConflictStrategy, KitConfig, Policy } from "../types/index.js";
import { formatError, InvalidInputError } from "./errors.js";
import { logger } from "./logger.js";

const MIB = 1024 * 1024;

export const DEFAULT_POLICY: Policy = {
  resourceWarnBytes: 50 * MIB,
  resourceMaxBytes: 200 * MIB,
  entropyThreshold: 4.5,
};

export const DEFAULT_SCAN_DEPTH = 3;

export const CONFLICT_STRATEGIES = ["prompt", "skip", "overwrite", "rename"] as const;

/** Directory inside each project that holds the tracker, resources and backups. */
export const PROJECT_DIR_NAME = ".instructionkit";

const configSchema = z.object({
  conflict_strategy: z.enum(CONFLICT_STRATEGIES).optional(),
  policy: z
    .object({
      resource_warn_bytes: z.number().int().positive().optional(),
      resource_max_bytes: z.number().int().positive().optional(),
      entropy_threshold: z.number().positive().optional(),
    })
    .optional(),
  registry: z
    .object({
      path: z.string().min(1).optional(),
      scan_depth: z.number().int().min(0).optional(),
      scan_roots: z.array(z.string().min(1)).optional(),
    })
    .optional(),
  auth: z.object({ github_token: z.string().optional() }).optional(),
  cache: z.object({ dir: z.string().min(1).optional() }).optional(),
});

export function getConfigDir(): string {
  return process.env["INSTRUCTIONKIT_HOME"] ?? path.join(os.homedir(), PROJECT_DIR_NAME);
}

function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

export function readConfig(): KitConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(getConfigPath(), "utf-8");
  } catch {
    return {};
  }

  let data: unknown;
  try {
    data = parse(raw);
  } catch (err) {
    logger.warn(`Ignoring unreadable config ${getConfigPath()}: ${formatError(err)}`);
    return {};
  }
  if (data === null || data === undefined) return {};

  const result = configSchema.safeParse(data);
  if (!result.success) {
    logger.warn(`Ignoring invalid config ${getConfigPath()}: ${z.prettifyError(result.error)}`);
    return {};
  }
  return result.data;
}

export function writeConfig(config: KitConfig): void {
  fs.mkdirSync(getConfigDir(), { recursive: true });
  fs.writeFileSync(getConfigPath(), stringify(config), "utf-8");
}

export function getPolicy(config: KitConfig = readConfig()): Policy {
  return {
    resourceWarnBytes: config.policy?.resource_warn_bytes ?? DEFAULT_POLICY.resourceWarnBytes,
    resourceMaxBytes: config.policy?.resource_max_bytes ?? DEFAULT_POLICY.resourceMaxBytes,
    entropyThreshold: config.policy?.entropy_threshold ?? DEFAULT_POLICY.entropyThreshold,
  };
}

export function getConflictStrategy(config: KitConfig = readConfig()): ConflictStrategy {
  return config.conflict_strategy ?? "prompt";
}

export function getRegistryPath(config: KitConfig = readConfig()): string {
  return config.registry?.path ?? path.join(getConfigDir(), "registry.json");
}

export function getScanDepth(config: KitConfig = readConfig()): number {
  return config.registry?.scan_depth ?? DEFAULT_SCAN_DEPTH;
}

export function getScanRoots(config: KitConfig = readConfig()): string[] {
  return config.registry?.scan_roots ?? [os.homedir()];
}

export function getCacheDir(config: KitConfig = readConfig()): string {
  return config.cache?.dir ?? path.join(getConfigDir(), "packages");
}

export function getGitHubToken(): string | undefined {
  const envToken = process.env["INSTRUCTIONKIT_GITHUB_TOKEN"];
  if (envToken) return envToken;
  return readConfig().auth?.github_token;
}

export function setConfigValue(key: string, value: string): KitConfig {
  const config = readConfig();
  switch (key) {
    case "conflict_strategy": {
      const strategy = CONFLICT_STRATEGIES.find((s) => s === value);
      if (!strategy) {
        throw new InvalidInputError(`Invalid value for ${key}: use one of ${CONFLICT_STRATEGIES.join(", ")}`);
      }
      config.conflict_strategy = strategy;
      break;
    }
    case "policy.resource_warn_bytes":
      config.policy = { ...config.policy, resource_warn_bytes: Number(value) };
      break;
    case "policy.resource_max_bytes":
      config.policy = { ...config.policy, resource_max_bytes: Number(value) };
      break;
    case "policy.entropy_threshold":
      config.policy = { ...config.policy, entropy_threshold: Number(value) };
      break;
    case "registry.path":
      config.registry = { ...config.registry, path: value };
      break;
    case "registry.scan_depth":
      config.registry = { ...config.registry, scan_depth: Number(value) };
      break;
    case "auth.github_token":
      config.auth = { ...config.auth, github_token: value };
      break;
    case "cache.dir":
      config.cache = { ...config.cache, dir: value };
      break;
    default:
      throw new InvalidInputError(`Unknown config key: ${key}`);
  }

  const checked = configSchema.safeParse(config);
  if (!checked.success) {
    throw new InvalidInputError(`Invalid value for ${key}: ${z.prettifyError(checked.error)}`);
  }
  writeConfig(checked.data);
  return checked.data;
}

// ── Project paths ──

export function projectDataDir(projectRoot: string): string {
  return path.join(projectRoot, PROJECT_DIR_NAME);
}

export function trackerPath(projectRoot: string): string {
  return path.join(projectDataDir(projectRoot), "packages.json");
}

export function credentialsPath(projectRoot: string): string {
  return path.join(projectDataDir(projectRoot), ".env");
}

export function backupsDir(projectRoot: string): string {
  return path.join(projectDataDir(projectRoot), "backups");
}
