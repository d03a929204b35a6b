import path from "node:path";
import type {
  Component,
  IdeCapability,
  IdeId,
  McpServerComponent,
  TranslatedComponent,
  TranslationResult,
} from "../types/index.js";
import { getCapability, supportsKind } from "./capabilities.js";
import { PROJECT_DIR_NAME } from "./config.js";
import { PathEscapeError } from "./errors.js";
import { resolveInsideProject, toPosix } from "./files.js";
import { parseMcpConfig } from "./mcp-config.js";

const EXECUTABLE_MODE = 0o755;

export interface TranslationContext {
  packageName: string;
  /** Reads a file from the package by its manifest-relative path. */
  readFile: (file: string) => Buffer;
  /** When set, target paths are checked against this root. */
  projectRoot?: string;
}

export interface ComponentTranslator {
  readonly capability: IdeCapability;
  supports(component: Component): TranslationResult | null;
  translate(component: Component, context: TranslationContext): TranslationResult;
}

const KIND_LABELS: Record<Component["kind"], string> = {
  instruction: "instructions",
  mcp_server: "MCP servers",
  hook: "hooks",
  command: "commands",
  resource: "resources",
};

export function resourceRoot(packageName: string): string {
  return path.posix.join(PROJECT_DIR_NAME, "resources", packageName);
}

/** Throws PathEscapeError when `installPath` leaves the package's resource directory. */
export function resourceTargetPath(packageName: string, installPath: string): string {
  const root = resourceRoot(packageName);
  const target = path.posix.join(root, toPosix(installPath));
  if (path.posix.isAbsolute(toPosix(installPath)) || !target.startsWith(`${root}/`)) {
    throw new PathEscapeError(installPath, root, "the package resource directory");
  }
  return target;
}

/**
 * Reads the MCP server definition out of a component file. Accepts either
 * the bare server object or a document wrapping it under `mcpServers`.
 */
export function readServerDefinition(component: McpServerComponent, raw: string): unknown {
  const data: unknown = JSON.parse(raw);
  if (typeof data === "object" && data !== null && !Array.isArray(data) && "mcpServers" in data) {
    const servers = parseMcpConfig(raw).mcpServers;
    return servers[component.name] ?? Object.values(servers)[0] ?? {};
  }
  return data;
}

class IdeTranslator implements ComponentTranslator {
  constructor(readonly capability: IdeCapability) {}

  supports(component: Component): TranslationResult | null {
    const { id, displayName } = this.capability;
    if (component.ideSupport !== undefined && !component.ideSupport.includes(id)) {
      return { supported: false, reason: `${component.name} does not list ${id} in ide_support` };
    }
    if (!supportsKind(this.capability, component.kind)) {
      return { supported: false, reason: `${displayName} does not support ${KIND_LABELS[component.kind]}` };
    }
    return null;
  }

  translate(component: Component, context: TranslationContext): TranslationResult {
    const unsupported = this.supports(component);
    if (unsupported) return unsupported;

    const translated = this.render(component, context);
    if (translated === null) {
      return {
        supported: false,
        reason: `${this.capability.displayName} does not support ${KIND_LABELS[component.kind]}`,
      };
    }
    if (context.projectRoot !== undefined) {
      resolveInsideProject(context.projectRoot, translated.targetPath);
    }
    return { supported: true, translated };
  }

  private render(component: Component, context: TranslationContext): TranslatedComponent | null {
    const cap = this.capability;
    switch (component.kind) {
      case "instruction": {
        if (!cap.instructions) return null;
        return {
          source: component,
          targetPath: `${cap.instructions.path}${component.name}${cap.instructions.extension}`,
          content: context.readFile(component.file).toString("utf-8"),
          mergeStrategy: "replace",
        };
      }

      case "mcp_server": {
        if (!cap.mcp) return null;
        const raw = context.readFile(component.file).toString("utf-8");
        const server = readServerDefinition(component, raw);
        return {
          source: component,
          targetPath: cap.mcp.configPath,
          content: JSON.stringify(server, null, 2),
          mergeStrategy: "merge_json",
          mergeKey: component.name,
        };
      }

      case "hook": {
        if (!cap.hooks) return null;
        return {
          source: component,
          targetPath: `${cap.hooks.path}${component.name}${path.extname(component.file)}`,
          content: context.readFile(component.file).toString("utf-8"),
          mergeStrategy: "replace",
          mode: EXECUTABLE_MODE,
        };
      }

      case "command": {
        if (!cap.commands) return null;
        return {
          source: component,
          targetPath: `${cap.commands.path}${component.name}${path.extname(component.file)}`,
          content: context.readFile(component.file).toString("utf-8"),
          mergeStrategy: "replace",
          mode: EXECUTABLE_MODE,
        };
      }

      case "resource": {
        if (!cap.resources) return null;
        return {
          source: component,
          targetPath: resourceTargetPath(context.packageName, component.installPath),
          content: context.readFile(component.file),
          mergeStrategy: "replace",
        };
      }
    }
  }
}

const TRANSLATORS: Readonly<Record<IdeId, ComponentTranslator>> = {
  claude: new IdeTranslator(getCapability("claude")),
  cursor: new IdeTranslator(getCapability("cursor")),
  windsurf: new IdeTranslator(getCapability("windsurf")),
  copilot: new IdeTranslator(getCapability("copilot")),
};

/** Renders one component for one IDE. Unsupported combinations are a value, not an error. */
export function translateComponent(
  component: Component,
  ide: IdeId,
  context: TranslationContext,
): TranslationResult {
  return TRANSLATORS[ide].translate(component, context);
}

/** Support check without reading the component's file. */
export function checkSupport(component: Component, ide: IdeId): TranslationResult | null {
  return TRANSLATORS[ide].supports(component);
}
