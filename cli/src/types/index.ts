// ── IDEs ──

export type IdeId = "claude" | "cursor" | "windsurf" | "copilot";

export type ComponentKind = "instruction" | "mcp_server" | "hook" | "command" | "resource";

export type McpConfigFormat = "json";

export interface IdeCapability {
  id: IdeId;
  displayName: string;
  instructions?: { path: string; extension: string };
  mcp?: { configPath: string; format: McpConfigFormat };
  hooks?: { path: string };
  commands?: { path: string };
  resources: boolean;
  detectMarkers: string[];
}

// ── Package manifest ──

export interface CredentialDescriptor {
  name: string;
  description: string;
  required: boolean;
  default?: string;
  example?: string;
}

interface ComponentBase {
  name: string;
  description: string;
  file: string;
  ideSupport?: IdeId[];
}

export interface InstructionComponent extends ComponentBase {
  kind: "instruction";
  tags: string[];
}

export interface McpServerComponent extends ComponentBase {
  kind: "mcp_server";
  credentials: CredentialDescriptor[];
}

export interface HookComponent extends ComponentBase {
  kind: "hook";
  hookType: string;
}

export interface CommandComponent extends ComponentBase {
  kind: "command";
  commandType: string;
}

export interface ResourceComponent extends ComponentBase {
  kind: "resource";
  installPath: string;
  checksum?: string;
  sizeBytes: number;
}

export type Component =
  | InstructionComponent
  | McpServerComponent
  | HookComponent
  | CommandComponent
  | ResourceComponent;

export interface PackageComponents {
  instructions: InstructionComponent[];
  mcpServers: McpServerComponent[];
  hooks: HookComponent[];
  commands: CommandComponent[];
  resources: ResourceComponent[];
}

export interface Package {
  name: string;
  namespace: string;
  version: string;
  description: string;
  author: string;
  license?: string;
  homepage?: string;
  repository?: string;
  keywords: string[];
  components: PackageComponents;
}

// ── Translation ──

export type MergeStrategy = "replace" | "merge_json" | "merge_yaml" | "append";

export interface TranslatedComponent {
  source: Component;
  /** Relative to the project root, always forward slashes. */
  targetPath: string;
  content: string | Buffer;
  mergeStrategy: MergeStrategy;
  /** Key under `mcpServers` for merge_json targets. */
  mergeKey?: string;
  mode?: number;
}

export type TranslationResult =
  | { supported: true; translated: TranslatedComponent }
  | { supported: false; reason: string };

// ── Secrets ──

export type SecretConfidence = "high" | "medium" | "safe";

// ── Conflicts ──

export type ConflictStrategy = "prompt" | "skip" | "overwrite" | "rename";

// ── Installation tracking ──

export type ComponentStatus = "installed" | "failed" | "skipped" | "pending_credentials";

export type InstallationStatus = "installing" | "updating" | "complete" | "partial" | "failed";

export interface InstalledComponent {
  type: ComponentKind;
  name: string;
  installedPath: string;
  checksum: string;
  status: ComponentStatus;
  mergeKey?: string;
}

export interface PackageInstallationRecord {
  packageName: string;
  namespace: string;
  version: string;
  ide: IdeId;
  /** Local directory or git URL the package was installed from. */
  source?: string;
  installedAt: string;
  updatedAt: string;
  status: InstallationStatus;
  components: InstalledComponent[];
}

// ── Main registry ──

export interface RegisteredPackage {
  name: string;
  namespace: string;
  version: string;
  ide: IdeId;
  installedAt: string;
}

export interface ProjectRegistration {
  path: string;
  name: string;
  packages: RegisteredPackage[];
  instructions: string[];
  mcpServers: string[];
  registeredAt: string;
  lastUpdated: string;
}

export interface RegistryFile {
  version: number;
  lastScan: string | null;
  projects: ProjectRegistration[];
}

// ── Config ──

export interface KitConfig {
  conflict_strategy?: ConflictStrategy;
  policy?: {
    resource_warn_bytes?: number;
    resource_max_bytes?: number;
    entropy_threshold?: number;
  };
  registry?: {
    path?: string;
    scan_depth?: number;
    scan_roots?: string[];
  };
  auth?: {
    github_token?: string;
  };
  cache?: {
    dir?: string;
  };
}

export interface Policy {
  resourceWarnBytes: number;
  resourceMaxBytes: number;
  entropyThreshold: number;
}
