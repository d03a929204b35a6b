import type { ComponentKind, IdeCapability, IdeId } from "../types/index.js";

export const IDE_IDS: readonly IdeId[] = ["claude", "cursor", "windsurf", "copilot"];

const CAPABILITIES: Readonly<Record<IdeId, IdeCapability>> = {
  claude: {
    id: "claude",
    displayName: "Claude Code",
    instructions: { path: ".claude/rules/", extension: ".md" },
    mcp: { configPath: ".mcp.json", format: "json" },
    hooks: { path: ".claude/hooks/" },
    commands: { path: ".claude/commands/" },
    resources: true,
    detectMarkers: [".claude"],
  },
  cursor: {
    id: "cursor",
    displayName: "Cursor",
    instructions: { path: ".cursor/rules/", extension: ".mdc" },
    resources: true,
    detectMarkers: [".cursor"],
  },
  windsurf: {
    id: "windsurf",
    displayName: "Windsurf",
    instructions: { path: ".windsurf/rules/", extension: ".md" },
    mcp: { configPath: ".windsurf/mcp.json", format: "json" },
    resources: true,
    detectMarkers: [".windsurf"],
  },
  copilot: {
    id: "copilot",
    displayName: "GitHub Copilot",
    instructions: { path: ".github/instructions/", extension: ".instructions.md" },
    resources: false,
    detectMarkers: [".github/copilot-instructions.md", ".github/instructions"],
  },
};

export function isIdeId(value: string): value is IdeId {
  return IDE_IDS.some((id) => id === value);
}

export function getCapability(ide: IdeId): IdeCapability {
  return CAPABILITIES[ide];
}

export function listCapabilities(): IdeCapability[] {
  return IDE_IDS.map((id) => CAPABILITIES[id]);
}

export function supportsKind(capability: IdeCapability, kind: ComponentKind): boolean {
  switch (kind) {
    case "instruction":
      return capability.instructions !== undefined;
    case "mcp_server":
      return capability.mcp !== undefined;
    case "hook":
      return capability.hooks !== undefined;
    case "command":
      return capability.commands !== undefined;
    case "resource":
      return capability.resources;
  }
}

/** Every declared capability must carry a non-empty path/format. Returns the problems found. */
export function validateCapability(capability: IdeCapability): string[] {
  const problems: string[] = [];
  const { id } = capability;
  if (capability.instructions) {
    if (!capability.instructions.path) problems.push(`${id}: instructions path is empty`);
    if (!capability.instructions.extension) problems.push(`${id}: instructions extension is empty`);
  }
  if (capability.mcp) {
    if (!capability.mcp.configPath) problems.push(`${id}: MCP config path is empty`);
    if (!capability.mcp.format) problems.push(`${id}: MCP config format is empty`);
  }
  if (capability.hooks && !capability.hooks.path) problems.push(`${id}: hooks path is empty`);
  if (capability.commands && !capability.commands.path) problems.push(`${id}: commands path is empty`);
  return problems;
}
