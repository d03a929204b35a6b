import { describe, it, expect, beforeEach, afterEach } from "vitest";
import os from "node:os";
import path from "node:path";
import {
  DEFAULT_POLICY,
  getCacheDir,
  getConflictStrategy,
  getPolicy,
  getRegistryPath,
  getScanDepth,
  getScanRoots,
  readConfig,
  setConfigValue,
} from "../../src/lib/config.js";
import { InvalidInputError } from "../../src/lib/errors.js";
import { logger } from "../../src/lib/logger.js";
import { readFile, tmpDirs, writeFile } from "../helpers.js";

const useTmpDir = tmpDirs();
let home = "";
const originalHome = process.env["INSTRUCTIONKIT_HOME"];

beforeEach(() => {
  home = useTmpDir();
  process.env["INSTRUCTIONKIT_HOME"] = home;
});

afterEach(() => {
  if (originalHome === undefined) {
    delete process.env["INSTRUCTIONKIT_HOME"];
  } else {
    process.env["INSTRUCTIONKIT_HOME"] = originalHome;
  }
  if (logger.isCapturing()) logger.flush();
});

describe("readConfig", () => {
  it("falls back to defaults without a config file", () => {
    expect(readConfig()).toEqual({});
    expect(getPolicy()).toEqual(DEFAULT_POLICY);
    expect(getConflictStrategy()).toBe("prompt");
    expect(getRegistryPath()).toBe(path.join(home, "registry.json"));
    expect(getCacheDir()).toBe(path.join(home, "packages"));
    expect(getScanDepth()).toBe(3);
    expect(getScanRoots()).toEqual([os.homedir()]);
  });

  it("reads overrides from config.yaml", () => {
    writeFile(
      home,
      "config.yaml",
      "conflict_strategy: skip\npolicy:\n  entropy_threshold: 3.5\nregistry:\n  scan_depth: 1\n  scan_roots: [/work]\n",
    );
    expect(getConflictStrategy()).toBe("skip");
    expect(getPolicy()).toEqual({ ...DEFAULT_POLICY, entropyThreshold: 3.5 });
    expect(getScanDepth()).toBe(1);
    expect(getScanRoots()).toEqual(["/work"]);
  });

  it("ignores an invalid config with a warning", () => {
    writeFile(home, "config.yaml", "conflict_strategy: merge\n");
    logger.capture();
    expect(readConfig()).toEqual({});
    const lines = logger.flush();
    expect(lines).toHaveLength(1);
    expect(lines[0]?.startsWith(`warn Ignoring invalid config ${path.join(home, "config.yaml")}: `)).toBe(true);
  });
});

describe("setConfigValue", () => {
  it("writes a value and keeps the rest of the file", () => {
    setConfigValue("conflict_strategy", "overwrite");
    setConfigValue("registry.scan_depth", "5");
    expect(readConfig()).toEqual({ conflict_strategy: "overwrite", registry: { scan_depth: 5 } });
    expect(readFile(home, "config.yaml")).toBe("conflict_strategy: overwrite\nregistry:\n  scan_depth: 5\n");
  });

  it("rejects unknown keys and invalid values", () => {
    expect(() => setConfigValue("colour", "blue")).toThrow("Unknown config key: colour");
    expect(() => setConfigValue("conflict_strategy", "merge")).toThrow(InvalidInputError);
    expect(() => setConfigValue("registry.scan_depth", "deep")).toThrow(InvalidInputError);
  });
});
