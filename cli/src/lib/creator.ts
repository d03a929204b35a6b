import fs from "node:fs";
import path from "node:path";
import type {
  CredentialDescriptor,
  InstructionComponent,
  McpServerComponent,
  Package,
} from "../types/index.js";
import { DEFAULT_POLICY } from "./config.js";
import { InvalidInputError, NotFoundError } from "./errors.js";
import { writeFileAtomic } from "./files.js";
import { logger } from "./logger.js";
import { loadPackage, MANIFEST_FILE, serializeManifest } from "./manifest.js";
import { findPlaceholders, parseMcpConfig } from "./mcp-config.js";
import { templateEnv } from "./secrets.js";

export interface CreatePackageOptions {
  projectRoot: string;
  outputDir: string;
  name: string;
  namespace: string;
  version?: string;
  description: string;
  author: string;
  license?: string;
  /** Project-relative instruction files to bundle. */
  instructions: string[];
  /** Project-relative MCP config to take servers from. */
  mcpConfig?: string;
  /** Server names to include; all servers when omitted. */
  mcpServers?: string[];
  /** Decides medium-confidence values; true replaces the value with a placeholder. */
  confirmMedium: (name: string, value: string) => Promise<boolean>;
  entropyThreshold?: number;
}

export interface CreatedPackage {
  package: Package;
  manifestPath: string;
  /** Per server, the env names that were replaced with placeholders. */
  templated: Record<string, string[]>;
}

export function toComponentName(file: string): string {
  return path
    .basename(file, path.extname(file))
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringEnv(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {};
  const env: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === "string") env[key] = item;
  }
  return env;
}

/**
 * Builds a package directory from files already in a project. MCP `env`
 * values are classified: high-confidence secrets become `${NAME}`
 * placeholders with a required credential, medium ones go through
 * `confirmMedium`, safe ones stay as they are.
 */
export async function createPackage(options: CreatePackageOptions): Promise<CreatedPackage> {
  const projectRoot = path.resolve(options.projectRoot);
  const outputDir = path.resolve(options.outputDir);
  const threshold = options.entropyThreshold ?? DEFAULT_POLICY.entropyThreshold;

  if (fs.existsSync(path.join(outputDir, MANIFEST_FILE))) {
    throw new InvalidInputError(`${MANIFEST_FILE} already exists in ${outputDir}`);
  }

  const instructions: InstructionComponent[] = [];
  for (const file of options.instructions) {
    const source = path.resolve(projectRoot, file);
    if (!fs.existsSync(source)) throw new NotFoundError(`Instruction file not found: ${file}`);
    const name = toComponentName(file);
    const ext = path.extname(file) || ".md";
    const relative = `instructions/${name}${ext}`;
    fs.mkdirSync(path.join(outputDir, "instructions"), { recursive: true });
    fs.copyFileSync(source, path.join(outputDir, relative));
    instructions.push({ kind: "instruction", name, description: `${name} instructions`, file: relative, tags: [] });
  }

  const mcpServers: McpServerComponent[] = [];
  const templated: Record<string, string[]> = {};
  if (options.mcpConfig) {
    const configPath = path.resolve(projectRoot, options.mcpConfig);
    if (!fs.existsSync(configPath)) throw new NotFoundError(`MCP config not found: ${options.mcpConfig}`);
    const servers = parseMcpConfig(fs.readFileSync(configPath, "utf-8")).mcpServers;
    const wanted = options.mcpServers ?? Object.keys(servers);

    for (const serverName of wanted) {
      const server = servers[serverName];
      if (!isRecord(server)) {
        throw new NotFoundError(`MCP server ${serverName} not found in ${options.mcpConfig}`);
      }
      const name = toComponentName(serverName);
      const env = stringEnv(server["env"]);
      const result = await templateEnv(env, options.confirmMedium, threshold);
      const output: Record<string, unknown> = { ...server };
      if (Object.keys(env).length > 0) output["env"] = result.env;

      const credentials: CredentialDescriptor[] = findPlaceholders(output).map((variable) => ({
        name: variable,
        description: `${variable} for ${serverName}`,
        required: true,
      }));
      const relative = `mcp/${name}.json`;
      writeFileAtomic(path.join(outputDir, relative), `${JSON.stringify(output, null, 2)}\n`);
      mcpServers.push({ kind: "mcp_server", name, description: `${serverName} MCP server`, file: relative, credentials });
      templated[name] = result.templated;
      if (result.templated.length > 0) {
        logger.debug(`${serverName}: templated ${result.templated.join(", ")}`);
      }
    }
  }

  const pkg: Package = {
    name: options.name,
    namespace: options.namespace,
    version: options.version ?? "0.1.0",
    description: options.description,
    author: options.author,
    keywords: [],
    components: { instructions, mcpServers, hooks: [], commands: [], resources: [] },
  };
  if (options.license !== undefined) pkg.license = options.license;

  const manifestPath = path.join(outputDir, MANIFEST_FILE);
  writeFileAtomic(manifestPath, serializeManifest(pkg));

  // The written package has to load like any other.
  const loaded = loadPackage(outputDir);
  return { package: loaded.package, manifestPath, templated };
}
