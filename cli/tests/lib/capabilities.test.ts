import { describe, it, expect } from "vitest";
import {
  getCapability,
  IDE_IDS,
  isIdeId,
  listCapabilities,
  supportsKind,
  validateCapability,
} from "../../src/lib/capabilities.js";
import { detectIdes } from "../../src/lib/detector.js";
import { tmpDirs, writeFile } from "../helpers.js";

const useTmpDir = tmpDirs();

describe("capability table", () => {
  it("has a valid entry for every IDE", () => {
    expect(listCapabilities().map((c) => c.id)).toEqual([...IDE_IDS]);
    for (const capability of listCapabilities()) {
      expect(validateCapability(capability)).toEqual([]);
    }
  });

  it("reports empty paths", () => {
    const broken = { ...getCapability("claude"), hooks: { path: "" } };
    expect(validateCapability(broken)).toEqual(["claude: hooks path is empty"]);
  });

  it("describes what each IDE supports", () => {
    expect(getCapability("cursor").instructions).toEqual({ path: ".cursor/rules/", extension: ".mdc" });
    expect(supportsKind(getCapability("claude"), "hook")).toBe(true);
    expect(supportsKind(getCapability("windsurf"), "hook")).toBe(false);
    expect(supportsKind(getCapability("copilot"), "mcp_server")).toBe(false);
    expect(supportsKind(getCapability("copilot"), "resource")).toBe(false);
  });

  it("recognises IDE ids", () => {
    expect(isIdeId("windsurf")).toBe(true);
    expect(isIdeId("vim")).toBe(false);
  });
});

describe("detectIdes", () => {
  it("finds IDEs by their marker files", () => {
    const dir = useTmpDir();
    writeFile(dir, ".cursor/rules/existing.mdc", "rule");
    writeFile(dir, ".github/copilot-instructions.md", "# Copilot");
    expect(detectIdes(dir)).toEqual(["cursor", "copilot"]);
  });

  it("returns nothing for a bare directory", () => {
    expect(detectIdes(useTmpDir())).toEqual([]);
  });
});
