const PLACEHOLDER_REGEX = /\$\{([A-Z][A-Z0-9_]*)\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function collectPlaceholders(value: unknown, into: Set<string>): void {
  if (typeof value === "string") {
    for (const match of value.matchAll(PLACEHOLDER_REGEX)) {
      if (match[1] !== undefined) into.add(match[1]);
    }
  } else if (Array.isArray(value)) {
    for (const item of value) collectPlaceholders(item, into);
  } else if (isPlainObject(value)) {
    for (const item of Object.values(value)) collectPlaceholders(item, into);
  }
}

/** Every `${VAR}` name referenced anywhere in a parsed JSON value, in first-seen order. */
export function findPlaceholders(value: unknown): string[] {
  const names = new Set<string>();
  collectPlaceholders(value, names);
  return [...names];
}

/** Replaces `${VAR}` in every string. Unknown names are left in place. */
export function substitutePlaceholders(value: unknown, values: Record<string, string>): unknown {
  if (typeof value === "string") {
    return value.replace(PLACEHOLDER_REGEX, (whole, name: string) => values[name] ?? whole);
  }
  if (Array.isArray(value)) {
    return value.map((item) => substitutePlaceholders(item, values));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = substitutePlaceholders(item, values);
    }
    return out;
  }
  return value;
}

export interface McpConfigDocument {
  mcpServers: Record<string, unknown>;
  [key: string]: unknown;
}

/** Parses an IDE MCP config; an absent or empty file is an empty document. */
export function parseMcpConfig(text: string | null): McpConfigDocument {
  if (text === null || text.trim() === "") return { mcpServers: {} };
  const data: unknown = JSON.parse(text);
  if (!isPlainObject(data)) {
    throw new Error("MCP config must be a JSON object");
  }
  const servers = data["mcpServers"];
  if (servers === undefined) return { ...data, mcpServers: {} };
  if (!isPlainObject(servers)) {
    throw new Error("MCP config field mcpServers must be an object");
  }
  return { ...data, mcpServers: servers };
}

export function formatMcpConfig(doc: McpConfigDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (isPlainObject(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${stableStringify(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function sameJson(a: unknown, b: unknown): boolean {
  return stableStringify(a) === stableStringify(b);
}

export interface MergeResult {
  content: string;
  /** The server entry that was there before, if any. */
  previous: unknown;
  changed: boolean;
}

/**
 * Sets `mcpServers[key]` in an existing config text, leaving every other
 * key in the file untouched.
 */
export function mergeServer(existing: string | null, key: string, server: unknown): MergeResult {
  const doc = parseMcpConfig(existing);
  const previous = doc.mcpServers[key];
  const changed = previous === undefined || !sameJson(previous, server);
  const merged: McpConfigDocument = { ...doc, mcpServers: { ...doc.mcpServers, [key]: server } };
  return { content: formatMcpConfig(merged), previous, changed };
}

export function removeServer(existing: string | null, key: string): { content: string; removed: boolean } {
  const doc = parseMcpConfig(existing);
  if (!(key in doc.mcpServers)) {
    return { content: formatMcpConfig(doc), removed: false };
  }
  const servers = { ...doc.mcpServers };
  delete servers[key];
  return { content: formatMcpConfig({ ...doc, mcpServers: servers }), removed: true };
}

export function getServer(existing: string | null, key: string): unknown {
  return parseMcpConfig(existing).mcpServers[key];
}
