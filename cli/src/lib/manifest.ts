import fs from "node:fs";
import path from "node:path";
import { parse, stringify } from "yaml";
import type {
  CommandComponent,
  CredentialDescriptor,
  HookComponent,
  IdeId,
  InstructionComponent,
  McpServerComponent,
  Package,
  PackageComponents,
  Policy,
  ResourceComponent,
} from "../types/index.js";
import { isIdeId } from "./capabilities.js";
import { checksumsEqual, fileHash } from "./checksum.js";
import { DEFAULT_POLICY } from "./config.js";
import { ManifestInvalidError, NotFoundError, ResourceTooLargeError, formatError } from "./errors.js";
import type { ManifestIssue } from "./errors.js";
import { findPlaceholders } from "./mcp-config.js";
import { formatVersion, parseVersion } from "./version.js";

export const MANIFEST_FILE = "instructionkit-package.yaml";

const NAME_REGEX = /^[a-z0-9-]+$/;
const COMPONENT_NAME_REGEX = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const CREDENTIAL_NAME_REGEX = /^[A-Z][A-Z0-9_]*$/;
const REQUIRED_FIELDS = ["name", "version", "description", "author", "namespace"] as const;

const INSTRUCTION_EXTENSIONS = [".md", ".mdc", ".markdown"];
const SCRIPT_EXTENSIONS = [".sh", ".bash", ".zsh", ".py", ".js", ".mjs", ".ts", ".rb", ".ps1"];

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

interface SectionDef {
  key: keyof ManifestSections;
  required: string[];
}

interface ManifestSections {
  instructions: unknown;
  mcp_servers: unknown;
  hooks: unknown;
  commands: unknown;
  resources: unknown;
}

const SECTIONS: SectionDef[] = [
  { key: "instructions", required: ["name", "description", "file"] },
  { key: "mcp_servers", required: ["name", "description", "file"] },
  { key: "hooks", required: ["name", "description", "file", "hook_type"] },
  { key: "commands", required: ["name", "description", "file", "command_type"] },
  { key: "resources", required: ["name", "description", "file"] },
];

// ── Parsing ──

/** Parses manifest YAML into a plain object. Throws on anything that is not a mapping. */
export function readManifestData(raw: string): Raw {
  let data: unknown;
  try {
    data = parse(raw);
  } catch (err) {
    throw new ManifestInvalidError([{ code: "invalid_field", message: `Invalid YAML: ${formatError(err)}` }]);
  }
  if (!isRecord(data)) {
    throw new ManifestInvalidError([
      { code: "invalid_field", message: "Invalid YAML: manifest must be an object" },
    ]);
  }
  return data;
}

// ── Phase 1: required fields ──

function sectionEntries(components: Raw, def: SectionDef): unknown[] {
  const value = components[def.key];
  return Array.isArray(value) ? value : [];
}

export function checkRequiredFields(data: Raw): ManifestIssue[] {
  const issues: ManifestIssue[] = [];

  for (const field of REQUIRED_FIELDS) {
    const value = data[field];
    if (isBlank(value)) {
      issues.push({ code: "missing_field", field, message: `Missing required field: ${field}` });
    } else if (typeof value !== "string") {
      issues.push({ code: "invalid_field", field, message: `Field ${field} must be a string` });
    }
  }

  const components = data["components"];
  if (components === undefined || components === null) return issues;
  if (!isRecord(components)) {
    issues.push({ code: "invalid_field", field: "components", message: "Field components must be a mapping" });
    return issues;
  }

  for (const def of SECTIONS) {
    const section = components[def.key];
    if (section === undefined || section === null) continue;
    if (!Array.isArray(section)) {
      issues.push({
        code: "invalid_field",
        field: `components.${def.key}`,
        message: `Field components.${def.key} must be a list`,
      });
      continue;
    }

    sectionEntries(components, def).forEach((entry, index) => {
      const prefix = `components.${def.key}[${index}]`;
      if (!isRecord(entry)) {
        issues.push({ code: "invalid_field", field: prefix, message: `${prefix} must be a mapping` });
        return;
      }
      for (const field of def.required) {
        if (isBlank(entry[field])) {
          issues.push({
            code: "missing_field",
            field: `${prefix}.${field}`,
            message: `Missing required field: ${prefix}.${field}`,
          });
        }
      }

      if (def.key !== "mcp_servers") return;
      const credentials = entry["credentials"];
      if (credentials === undefined || credentials === null) return;
      if (!Array.isArray(credentials)) {
        issues.push({
          code: "invalid_field",
          field: `${prefix}.credentials`,
          message: `Field ${prefix}.credentials must be a list`,
        });
        return;
      }
      credentials.forEach((cred: unknown, credIndex) => {
        const credPrefix = `${prefix}.credentials[${credIndex}]`;
        if (!isRecord(cred)) {
          issues.push({ code: "invalid_field", field: credPrefix, message: `${credPrefix} must be a mapping` });
          return;
        }
        for (const field of ["name", "description"]) {
          if (isBlank(cred[field])) {
            issues.push({
              code: "missing_field",
              field: `${credPrefix}.${field}`,
              message: `Missing required field: ${credPrefix}.${field}`,
            });
          }
        }
      });
    });
  }

  return issues;
}

// ── Phase 2: field constraints, building the typed package ──

class FieldReader {
  readonly issues: ManifestIssue[] = [];

  string(record: Raw, key: string, field: string): string {
    const value = record[key];
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    this.issues.push({ code: "invalid_field", field, message: `Field ${field} must be a string` });
    return "";
  }

  optionalString(record: Raw, key: string, field: string): string | undefined {
    if (isBlank(record[key])) return undefined;
    return this.string(record, key, field);
  }

  stringList(record: Raw, key: string, field: string): string[] {
    const value = record[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
      this.issues.push({ code: "invalid_field", field, message: `Field ${field} must be a list of strings` });
      return [];
    }
    return value;
  }

  ideSupport(record: Raw, field: string): IdeId[] | undefined {
    const value = record["ide_support"];
    if (value === undefined || value === null) return undefined;
    const list = this.stringList(record, "ide_support", field);
    const ides: IdeId[] = [];
    for (const entry of list) {
      if (isIdeId(entry)) {
        ides.push(entry);
      } else {
        this.issues.push({ code: "invalid_field", field, message: `Unknown IDE "${entry}" in ${field}` });
      }
    }
    return ides;
  }

  /** Component names end up in target file names, so no path separators. */
  componentName(record: Raw, field: string): string {
    const name = this.string(record, "name", field);
    if (name !== "" && !COMPONENT_NAME_REGEX.test(name)) {
      this.issues.push({
        code: "invalid_field",
        field,
        message: `Invalid component name "${name}": must match ${COMPONENT_NAME_REGEX}`,
      });
    }
    return name;
  }

  /** A relative path that stays inside the package's resource directory. */
  installPath(record: Raw, field: string): string | undefined {
    const value = this.optionalString(record, "install_path", field);
    if (value === undefined) return undefined;
    const normalized = path.posix.normalize(value.replace(/\\/g, "/"));
    if (path.posix.isAbsolute(normalized) || normalized === "." || normalized === ".." || normalized.startsWith("../")) {
      this.issues.push({
        code: "invalid_field",
        field,
        message: `Invalid ${field} "${value}": must be a relative path inside the resource directory`,
      });
    }
    return value;
  }

  boolean(record: Raw, key: string, field: string, fallback: boolean): boolean {
    const value = record[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value === "boolean") return value;
    this.issues.push({ code: "invalid_field", field, message: `Field ${field} must be true or false` });
    return fallback;
  }

  size(record: Raw, field: string): number {
    const value = record["size"];
    if (value === undefined || value === null) return 0;
    if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
    this.issues.push({ code: "invalid_field", field, message: `Field ${field} must be a non-negative integer` });
    return 0;
  }
}

function isStrictVersion(version: string): boolean {
  const parsed = parseVersion(version);
  return parsed !== null && formatVersion(parsed) === version;
}

function checkDuplicates(
  names: string[],
  label: string,
  key: string,
  issues: ManifestIssue[],
): void {
  const seen = new Set<string>();
  const reported = new Set<string>();
  for (const name of names) {
    if (seen.has(name) && !reported.has(name)) {
      issues.push({
        code: "duplicate_name",
        field: `components.${key}`,
        message: `Duplicate ${label} name: ${name}`,
      });
      reported.add(name);
    }
    seen.add(name);
  }
}

function readCredentials(reader: FieldReader, entry: Raw, prefix: string): CredentialDescriptor[] {
  const raw = entry["credentials"];
  if (!Array.isArray(raw)) return [];

  const credentials: CredentialDescriptor[] = [];
  raw.forEach((item: unknown, index) => {
    if (!isRecord(item)) return;
    const field = `${prefix}.credentials[${index}]`;
    const name = reader.string(item, "name", `${field}.name`);
    if (!CREDENTIAL_NAME_REGEX.test(name)) {
      reader.issues.push({
        code: "invalid_field",
        field: `${field}.name`,
        message: `Invalid credential name "${name}": must match ${CREDENTIAL_NAME_REGEX}`,
      });
    }
    const required = reader.boolean(item, "required", `${field}.required`, true);
    const defaultValue = reader.optionalString(item, "default", `${field}.default`);
    if (required && defaultValue !== undefined) {
      reader.issues.push({
        code: "invalid_field",
        field: `${field}.default`,
        message: `Credential ${name} is required and cannot have a default`,
      });
    }

    const credential: CredentialDescriptor = {
      name,
      description: reader.string(item, "description", `${field}.description`),
      required,
    };
    if (defaultValue !== undefined) credential.default = defaultValue;
    const example = reader.optionalString(item, "example", `${field}.example`);
    if (example !== undefined) credential.example = example;
    credentials.push(credential);
  });
  return credentials;
}

function withIdeSupport<T extends { ideSupport?: IdeId[] }>(component: T, ideSupport: IdeId[] | undefined): T {
  if (ideSupport !== undefined) component.ideSupport = ideSupport;
  return component;
}

function readComponents(reader: FieldReader, data: Raw): PackageComponents {
  const components: PackageComponents = {
    instructions: [],
    mcpServers: [],
    hooks: [],
    commands: [],
    resources: [],
  };
  const section = data["components"];
  if (!isRecord(section)) return components;

  const entries = (key: keyof ManifestSections): Array<{ entry: Raw; prefix: string }> => {
    const list = section[key];
    if (!Array.isArray(list)) return [];
    return list.flatMap((entry: unknown, index) =>
      isRecord(entry) ? [{ entry, prefix: `components.${key}[${index}]` }] : [],
    );
  };

  const base = (entry: Raw, prefix: string) => ({
    name: reader.componentName(entry, `${prefix}.name`),
    description: reader.string(entry, "description", `${prefix}.description`),
    file: reader.string(entry, "file", `${prefix}.file`),
  });

  for (const { entry, prefix } of entries("instructions")) {
    const component: InstructionComponent = {
      kind: "instruction",
      ...base(entry, prefix),
      tags: reader.stringList(entry, "tags", `${prefix}.tags`),
    };
    components.instructions.push(withIdeSupport(component, reader.ideSupport(entry, `${prefix}.ide_support`)));
  }

  for (const { entry, prefix } of entries("mcp_servers")) {
    const component: McpServerComponent = {
      kind: "mcp_server",
      ...base(entry, prefix),
      credentials: readCredentials(reader, entry, prefix),
    };
    components.mcpServers.push(withIdeSupport(component, reader.ideSupport(entry, `${prefix}.ide_support`)));
  }

  for (const { entry, prefix } of entries("hooks")) {
    const component: HookComponent = {
      kind: "hook",
      ...base(entry, prefix),
      hookType: reader.string(entry, "hook_type", `${prefix}.hook_type`),
    };
    components.hooks.push(withIdeSupport(component, reader.ideSupport(entry, `${prefix}.ide_support`)));
  }

  for (const { entry, prefix } of entries("commands")) {
    const component: CommandComponent = {
      kind: "command",
      ...base(entry, prefix),
      commandType: reader.string(entry, "command_type", `${prefix}.command_type`),
    };
    components.commands.push(withIdeSupport(component, reader.ideSupport(entry, `${prefix}.ide_support`)));
  }

  for (const { entry, prefix } of entries("resources")) {
    const fields = base(entry, prefix);
    const component: ResourceComponent = {
      kind: "resource",
      ...fields,
      installPath: reader.installPath(entry, `${prefix}.install_path`) ?? fields.file,
      sizeBytes: reader.size(entry, `${prefix}.size`),
    };
    const checksum = reader.optionalString(entry, "checksum", `${prefix}.checksum`);
    if (checksum !== undefined) component.checksum = checksum;
    components.resources.push(withIdeSupport(component, reader.ideSupport(entry, `${prefix}.ide_support`)));
  }

  checkDuplicates(components.instructions.map((c) => c.name), "instruction", "instructions", reader.issues);
  checkDuplicates(components.mcpServers.map((c) => c.name), "MCP server", "mcp_servers", reader.issues);
  checkDuplicates(components.hooks.map((c) => c.name), "hook", "hooks", reader.issues);
  checkDuplicates(components.commands.map((c) => c.name), "command", "commands", reader.issues);
  checkDuplicates(components.resources.map((c) => c.name), "resource", "resources", reader.issues);

  return components;
}

export type ManifestCheck =
  | { ok: true; package: Package }
  | { ok: false; issues: ManifestIssue[] };

/**
 * Structural validation. Missing fields are reported on their own;
 * field constraints are only checked once every required field is present.
 */
export function validateManifest(data: Raw): ManifestCheck {
  const missing = checkRequiredFields(data);
  if (missing.length > 0) return { ok: false, issues: missing };

  const reader = new FieldReader();
  const name = reader.string(data, "name", "name");
  const version = reader.string(data, "version", "version");
  const namespace = reader.string(data, "namespace", "namespace");

  if (!NAME_REGEX.test(name)) {
    reader.issues.push({
      code: "invalid_field",
      field: "name",
      message: `Invalid name "${name}": must match ${NAME_REGEX}`,
    });
  }
  if (!isStrictVersion(version)) {
    reader.issues.push({
      code: "invalid_field",
      field: "version",
      message: `Invalid version "${version}": must be valid semver (X.Y.Z)`,
    });
  }
  const segments = namespace.split("/");
  if (segments.length < 2 || segments.some((s) => s.trim() === "")) {
    reader.issues.push({
      code: "invalid_field",
      field: "namespace",
      message: `Invalid namespace "${namespace}": must have at least two slash-separated segments`,
    });
  }

  const pkg: Package = {
    name,
    namespace,
    version,
    description: reader.string(data, "description", "description"),
    author: reader.string(data, "author", "author"),
    keywords: reader.stringList(data, "keywords", "keywords"),
    components: readComponents(reader, data),
  };
  const license = reader.optionalString(data, "license", "license");
  if (license !== undefined) pkg.license = license;
  const homepage = reader.optionalString(data, "homepage", "homepage");
  if (homepage !== undefined) pkg.homepage = homepage;
  const repository = reader.optionalString(data, "repository", "repository");
  if (repository !== undefined) pkg.repository = repository;

  if (reader.issues.length > 0) return { ok: false, issues: reader.issues };
  return { ok: true, package: pkg };
}

/** Parses and structurally validates manifest text. Throws ManifestInvalidError. */
export function parseManifest(raw: string): Package {
  const result = validateManifest(readManifestData(raw));
  if (!result.ok) throw new ManifestInvalidError(result.issues);
  return result.package;
}

// ── Phase 3: referenced files ──

export interface FileCheckResult {
  issues: ManifestIssue[];
  warnings: string[];
  /** The package with resource sizes taken from disk. */
  package: Package;
}

function resolveInPackage(baseDir: string, file: string): string | null {
  const root = path.resolve(baseDir);
  const resolved = path.resolve(root, file);
  const rel = path.relative(root, resolved);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) return null;
  return resolved;
}

function hasExtension(file: string, extensions: string[]): boolean {
  return extensions.includes(path.extname(file).toLowerCase());
}

export function checkPackageFiles(
  pkg: Package,
  baseDir: string,
  policy: Policy = DEFAULT_POLICY,
): FileCheckResult {
  const issues: ManifestIssue[] = [];
  const warnings: string[] = [];

  const locate = (file: string, label: string): string | null => {
    const resolved = resolveInPackage(baseDir, file);
    if (resolved === null) {
      issues.push({ code: "invalid_file", field: file, message: `${label} file ${file} is outside the package` });
      return null;
    }
    if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
      issues.push({ code: "file_not_found", field: file, message: `${label} file not found: ${file}` });
      return null;
    }
    return resolved;
  };

  for (const instruction of pkg.components.instructions) {
    if (locate(instruction.file, "Instruction") === null) continue;
    if (!hasExtension(instruction.file, INSTRUCTION_EXTENSIONS)) {
      issues.push({
        code: "invalid_file",
        field: instruction.file,
        message: `Instruction file ${instruction.file} must be markdown (${INSTRUCTION_EXTENSIONS.join(", ")})`,
      });
    }
  }

  for (const server of pkg.components.mcpServers) {
    const resolved = locate(server.file, "MCP config");
    if (resolved === null) continue;
    let config: unknown;
    try {
      config = JSON.parse(fs.readFileSync(resolved, "utf-8"));
    } catch (err) {
      issues.push({
        code: "invalid_file",
        field: server.file,
        message: `MCP config file ${server.file} is not valid JSON: ${formatError(err)}`,
      });
      continue;
    }
    if (!isRecord(config)) {
      issues.push({
        code: "invalid_file",
        field: server.file,
        message: `MCP config file ${server.file} must contain a JSON object`,
      });
      continue;
    }
    const declared = new Set(server.credentials.map((c) => c.name));
    for (const placeholder of findPlaceholders(config)) {
      if (!declared.has(placeholder)) {
        issues.push({
          code: "invalid_file",
          field: server.file,
          message: `MCP server ${server.name} uses \${${placeholder}} but declares no such credential`,
        });
      }
    }
  }

  for (const hook of pkg.components.hooks) {
    if (locate(hook.file, "Hook") === null) continue;
    if (!hasExtension(hook.file, SCRIPT_EXTENSIONS)) {
      issues.push({
        code: "invalid_file",
        field: hook.file,
        message: `Hook file ${hook.file} must be a script (${SCRIPT_EXTENSIONS.join(", ")})`,
      });
    }
  }

  for (const command of pkg.components.commands) {
    if (locate(command.file, "Command") === null) continue;
    if (!hasExtension(command.file, [...SCRIPT_EXTENSIONS, ".md"])) {
      issues.push({
        code: "invalid_file",
        field: command.file,
        message: `Command file ${command.file} must be a script or markdown`,
      });
    }
  }

  const resources: ResourceComponent[] = [];
  for (const resource of pkg.components.resources) {
    const resolved = locate(resource.file, "Resource");
    if (resolved === null) {
      resources.push(resource);
      continue;
    }
    const sizeBytes = fs.statSync(resolved).size;
    resources.push({ ...resource, sizeBytes });

    if (sizeBytes > policy.resourceMaxBytes) {
      issues.push({
        code: "resource_too_large",
        field: resource.file,
        message: `Resource ${resource.file} is ${sizeBytes} bytes (limit ${policy.resourceMaxBytes})`,
      });
      continue;
    }
    if (sizeBytes > policy.resourceWarnBytes) {
      warnings.push(`Resource ${resource.file} is large (${sizeBytes} bytes)`);
    }
    if (resource.checksum !== undefined) {
      const actual = fileHash(resolved);
      if (!checksumsEqual(actual, resource.checksum)) {
        issues.push({
          code: "checksum_mismatch",
          field: resource.file,
          message: `Resource ${resource.file} checksum mismatch: expected ${resource.checksum}, got ${actual}`,
        });
      }
    }
  }

  return {
    issues,
    warnings,
    package: { ...pkg, components: { ...pkg.components, resources } },
  };
}

// ── Loading ──

export interface LoadedPackage {
  package: Package;
  root: string;
  warnings: string[];
}

/**
 * Reads, validates and file-checks the manifest in `dir`.
 * All-or-nothing: any issue throws ManifestInvalidError.
 */
export function loadPackage(dir: string, policy: Policy = DEFAULT_POLICY): LoadedPackage {
  const manifestPath = path.join(dir, MANIFEST_FILE);
  if (!fs.existsSync(manifestPath)) {
    throw new NotFoundError(`No ${MANIFEST_FILE} found in ${dir}`);
  }
  const pkg = parseManifest(fs.readFileSync(manifestPath, "utf-8"));
  const checked = checkPackageFiles(pkg, dir, policy);
  if (checked.issues.length > 0) {
    const oversized = checked.package.components.resources.find((r) => r.sizeBytes > policy.resourceMaxBytes);
    if (oversized) {
      throw new ResourceTooLargeError(checked.issues, oversized.file, oversized.sizeBytes, policy.resourceMaxBytes);
    }
    throw new ManifestInvalidError(checked.issues);
  }
  return { package: checked.package, root: path.resolve(dir), warnings: checked.warnings };
}

// ── Serialization ──

function ideSupportField(ideSupport: IdeId[] | undefined): { ide_support?: IdeId[] } {
  return ideSupport === undefined ? {} : { ide_support: ideSupport };
}

export function toManifestData(pkg: Package): Raw {
  const data: Raw = {
    name: pkg.name,
    version: pkg.version,
    description: pkg.description,
    author: pkg.author,
    namespace: pkg.namespace,
  };
  if (pkg.license !== undefined) data["license"] = pkg.license;
  if (pkg.homepage !== undefined) data["homepage"] = pkg.homepage;
  if (pkg.repository !== undefined) data["repository"] = pkg.repository;
  if (pkg.keywords.length > 0) data["keywords"] = pkg.keywords;

  const { instructions, mcpServers, hooks, commands, resources } = pkg.components;
  data["components"] = {
    instructions: instructions.map((c) => ({
      name: c.name,
      description: c.description,
      file: c.file,
      tags: c.tags,
      ...ideSupportField(c.ideSupport),
    })),
    mcp_servers: mcpServers.map((c) => ({
      name: c.name,
      description: c.description,
      file: c.file,
      credentials: c.credentials.map((cred) => ({
        name: cred.name,
        description: cred.description,
        required: cred.required,
        ...(cred.default !== undefined ? { default: cred.default } : {}),
        ...(cred.example !== undefined ? { example: cred.example } : {}),
      })),
      ...ideSupportField(c.ideSupport),
    })),
    hooks: hooks.map((c) => ({
      name: c.name,
      description: c.description,
      file: c.file,
      hook_type: c.hookType,
      ...ideSupportField(c.ideSupport),
    })),
    commands: commands.map((c) => ({
      name: c.name,
      description: c.description,
      file: c.file,
      command_type: c.commandType,
      ...ideSupportField(c.ideSupport),
    })),
    resources: resources.map((c) => ({
      name: c.name,
      description: c.description,
      file: c.file,
      install_path: c.installPath,
      ...(c.checksum !== undefined ? { checksum: c.checksum } : {}),
      size: c.sizeBytes,
      ...ideSupportField(c.ideSupport),
    })),
  };
  return data;
}

export function serializeManifest(pkg: Package): string {
  return stringify(toManifestData(pkg));
}
