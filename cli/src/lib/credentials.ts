import fs from "node:fs";
import path from "node:path";
import type { CredentialDescriptor } from "../types/index.js";
import { credentialsPath, PROJECT_DIR_NAME } from "./config.js";
import { isNotFound } from "./errors.js";
import { writeFileAtomic } from "./files.js";
import { logger } from "./logger.js";

export interface EnvEntry {
  key: string;
  value: string;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(["\\n])/g, (_m, ch: string) => (ch === "n" ? "\n" : ch));
  }
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  return value;
}

function quote(value: string): string {
  if (/^[A-Za-z0-9_./:@+-]*$/.test(value)) return value;
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")}"`;
}

export function parseEnvFile(content: string): EnvEntry[] {
  const entries: EnvEntry[] = [];
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;
    entries.push({
      key: trimmed.slice(0, eqIndex).trim(),
      value: unquote(trimmed.slice(eqIndex + 1).trim()),
    });
  }
  return entries;
}

export function formatEnvFile(values: Map<string, string>): string {
  const lines = ["# Credentials for installed MCP servers. Do not commit."];
  for (const [key, value] of values) {
    lines.push(`${key}=${quote(value)}`);
  }
  return `${lines.join("\n")}\n`;
}

/** Adds `entry` to the project's .gitignore unless a line already matches it. */
export function ensureGitignored(projectRoot: string, entry: string): boolean {
  const gitignorePath = path.join(projectRoot, ".gitignore");
  let existing = "";
  try {
    existing = fs.readFileSync(gitignorePath, "utf-8");
  } catch (err) {
    if (!isNotFound(err)) throw err;
  }
  const lines = existing.split("\n").map((l) => l.trim());
  if (lines.includes(entry) || lines.includes(`/${entry}`)) return false;

  const prefix = existing === "" || existing.endsWith("\n") ? existing : `${existing}\n`;
  fs.writeFileSync(gitignorePath, `${prefix}${entry}\n`, "utf-8");
  return true;
}

/** Project-local `.instructionkit/.env` holding resolved credential values. */
export class CredentialStore {
  private readonly projectRoot: string;
  private values: Map<string, string> | null = null;
  private dirty = false;

  constructor(projectRoot: string) {
    this.projectRoot = projectRoot;
  }

  get filePath(): string {
    return credentialsPath(this.projectRoot);
  }

  private load(): Map<string, string> {
    if (this.values) return this.values;
    const values = new Map<string, string>();
    try {
      for (const { key, value } of parseEnvFile(fs.readFileSync(this.filePath, "utf-8"))) {
        values.set(key, value);
      }
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
    this.values = values;
    return values;
  }

  get(name: string): string | undefined {
    return this.load().get(name);
  }

  set(name: string, value: string): void {
    this.load().set(name, value);
    this.dirty = true;
  }

  entries(): EnvEntry[] {
    return [...this.load()].map(([key, value]) => ({ key, value }));
  }

  save(): void {
    if (!this.dirty) return;
    writeFileAtomic(this.filePath, formatEnvFile(this.load()), 0o600);
    if (ensureGitignored(this.projectRoot, `${PROJECT_DIR_NAME}/.env`)) {
      logger.debug(`Added ${PROJECT_DIR_NAME}/.env to .gitignore`);
    }
    this.dirty = false;
  }
}

// ── Resolution ──

export type CredentialPromptResult =
  | { ok: true; value: string }
  | { ok: false; reason: "cancelled" };

export interface CredentialPrompter {
  promptFor(descriptor: CredentialDescriptor, serverName: string): Promise<CredentialPromptResult>;
}

export type CredentialResolution =
  | { status: "resolved"; values: Record<string, string> }
  | { status: "pending"; values: Record<string, string>; missing: string[] };

/**
 * Resolves each descriptor from the store, then its default, then the
 * prompter. After a cancelled prompt the remaining credentials are not asked for.
 */
export async function resolveCredentials(
  descriptors: CredentialDescriptor[],
  serverName: string,
  store: CredentialStore,
  prompter?: CredentialPrompter,
): Promise<CredentialResolution> {
  const values: Record<string, string> = {};
  const missing: string[] = [];
  let cancelled = false;

  for (const descriptor of descriptors) {
    const stored = store.get(descriptor.name);
    if (stored !== undefined) {
      values[descriptor.name] = stored;
      continue;
    }
    if (descriptor.default !== undefined) {
      values[descriptor.name] = descriptor.default;
      continue;
    }

    if (prompter && !cancelled) {
      const result = await prompter.promptFor(descriptor, serverName);
      if (result.ok) {
        values[descriptor.name] = result.value;
        store.set(descriptor.name, result.value);
        continue;
      }
      cancelled = true;
    }

    if (descriptor.required) {
      missing.push(descriptor.name);
    } else {
      values[descriptor.name] = "";
    }
  }

  store.save();
  if (missing.length > 0) return { status: "pending", values, missing };
  return { status: "resolved", values };
}
