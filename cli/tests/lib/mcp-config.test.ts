import { describe, it, expect } from "vitest";
import {
  findPlaceholders,
  getServer,
  mergeServer,
  parseMcpConfig,
  removeServer,
  sameJson,
  substitutePlaceholders,
} from "../../src/lib/mcp-config.js";

describe("placeholders", () => {
  const server = {
    command: "npx",
    args: ["--token", "${API_TOKEN}"],
    env: { API_TOKEN: "${API_TOKEN}", REGION: "${REGION}", HOME: "$HOME" },
  };

  it("finds every ${NAME} in first-seen order", () => {
    expect(findPlaceholders(server)).toEqual(["API_TOKEN", "REGION"]);
  });

  it("substitutes known names and leaves the rest", () => {
    expect(substitutePlaceholders(server, { API_TOKEN: "test-secret" })).toEqual({
      command: "npx",
      args: ["--token", "test-secret"],
      env: { API_TOKEN: "test-secret", REGION: "${REGION}", HOME: "$HOME" },
    });
  });
});

describe("parseMcpConfig", () => {
  it("treats a missing or empty file as an empty document", () => {
    expect(parseMcpConfig(null)).toEqual({ mcpServers: {} });
    expect(parseMcpConfig("  \n")).toEqual({ mcpServers: {} });
  });

  it("rejects documents that are not objects", () => {
    expect(() => parseMcpConfig("[]")).toThrow("MCP config must be a JSON object");
    expect(() => parseMcpConfig('{"mcpServers": 3}')).toThrow("MCP config field mcpServers must be an object");
  });
});

describe("mergeServer / removeServer", () => {
  const existing = JSON.stringify({ theme: "dark", mcpServers: { local: { command: "local-mcp" } } });

  it("adds the entry and keeps unrelated keys", () => {
    const result = mergeServer(existing, "github", { command: "gh" });
    expect(result.changed).toBe(true);
    expect(result.previous).toBeUndefined();
    expect(JSON.parse(result.content)).toEqual({
      theme: "dark",
      mcpServers: { local: { command: "local-mcp" }, github: { command: "gh" } },
    });
    expect(result.content.endsWith("}\n")).toBe(true);
  });

  it("reports an unchanged entry", () => {
    const result = mergeServer(existing, "local", { command: "local-mcp" });
    expect(result.changed).toBe(false);
    expect(result.previous).toEqual({ command: "local-mcp" });
  });

  it("removes only the named entry", () => {
    const result = removeServer(existing, "local");
    expect(result.removed).toBe(true);
    expect(JSON.parse(result.content)).toEqual({ theme: "dark", mcpServers: {} });
    expect(removeServer(existing, "missing").removed).toBe(false);
  });

  it("reads a single entry", () => {
    expect(getServer(existing, "local")).toEqual({ command: "local-mcp" });
    expect(getServer(null, "local")).toBeUndefined();
  });
});

describe("sameJson", () => {
  it("ignores key order", () => {
    expect(sameJson({ a: 1, b: [1, { c: 2, d: 3 }] }, { b: [1, { d: 3, c: 2 }], a: 1 })).toBe(true);
    expect(sameJson({ a: [1, 2] }, { a: [2, 1] })).toBe(false);
  });
});
