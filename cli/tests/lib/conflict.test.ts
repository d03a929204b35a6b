import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { applyResolution, ConflictResolver } from "../../src/lib/conflict.js";
import type {
  BinaryConflictChoice,
  ConflictInfo,
  ConflictPrompter,
  TextConflictChoice,
} from "../../src/lib/conflict.js";
import { logger } from "../../src/lib/logger.js";
import type { ConflictStrategy } from "../../src/types/index.js";
import { computeHash, readFile, tmpDirs, writeFile } from "../helpers.js";

const useTmpDir = tmpDirs();
const NOW = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));
const TARGET = ".claude/rules/style.md";

afterEach(() => {
  if (logger.isCapturing()) logger.flush();
});

class FakePrompter implements ConflictPrompter {
  readonly seen: ConflictInfo[] = [];

  constructor(
    private readonly text: TextConflictChoice,
    private readonly binary: BinaryConflictChoice = "keep",
  ) {}

  async chooseText(conflict: ConflictInfo): Promise<TextConflictChoice> {
    this.seen.push(conflict);
    return this.text;
  }

  async chooseBinary(conflict: ConflictInfo): Promise<BinaryConflictChoice> {
    this.seen.push(conflict);
    return this.binary;
  }
}

function setup(strategy: ConflictStrategy, prompter?: ConflictPrompter) {
  const root = useTmpDir();
  const target = writeFile(root, TARGET, "local edits\n");
  const resolver = new ConflictResolver({
    projectRoot: root,
    strategy,
    ...(prompter ? { prompter } : {}),
    now: () => NOW,
  });
  return { root, target, resolver };
}

describe("ConflictResolver.resolve", () => {
  it("writes when nothing is there", async () => {
    const root = useTmpDir();
    const resolver = new ConflictResolver({ projectRoot: root, strategy: "prompt" });
    const target = path.join(root, TARGET);
    expect(await resolver.resolve(target, "new")).toEqual({ action: "write", targetPath: target });
  });

  it("skips identical content", async () => {
    const { target, resolver } = setup("overwrite");
    expect(await resolver.resolve(target, "local edits\n")).toEqual({ action: "skip", reason: "identical" });
  });

  it("replaces a file that still matches what was last installed", async () => {
    const { target, resolver } = setup("skip");
    const result = await resolver.resolve(target, "new version\n", computeHash("local edits\n"));
    expect(result).toEqual({ action: "write", targetPath: target });
  });

  it("keeps local changes under the skip strategy", async () => {
    const { target, resolver } = setup("skip");
    expect(await resolver.resolve(target, "new version\n")).toEqual({ action: "skip", reason: "kept" });
  });

  it("leaves the same final state when skip is resolved twice", async () => {
    const { root, target, resolver } = setup("skip");
    const listing = () => fs.readdirSync(path.dirname(target)).sort();

    const first = await resolver.resolve(target, "new version\n");
    expect(applyResolution(first, "new version\n")).toBeNull();
    const afterFirst = { content: readFile(root, TARGET), files: listing() };

    const second = await resolver.resolve(target, "new version\n");
    expect(applyResolution(second, "new version\n")).toBeNull();

    expect(second).toEqual(first);
    expect({ content: readFile(root, TARGET), files: listing() }).toEqual(afterFirst);
    expect(afterFirst).toEqual({ content: "local edits\n", files: ["style.md"] });
    expect(fs.existsSync(path.join(root, ".instructionkit"))).toBe(false);
  });

  it("backs up before an overwrite", async () => {
    const { root, target, resolver } = setup("overwrite");
    const result = await resolver.resolve(target, "new version\n");
    const backupPath = path.join(root, ".instructionkit/backups/20260102-030405", TARGET);
    expect(result).toEqual({ action: "overwrite", targetPath: target, backupPath });
    expect(fs.readFileSync(backupPath, "utf-8")).toBe("local edits\n");
  });

  it("renames to the first free -N name", async () => {
    const { root, target, resolver } = setup("rename");
    writeFile(root, ".claude/rules/style-1.md", "taken");
    expect(await resolver.resolve(target, "new version\n")).toEqual({
      action: "rename",
      targetPath: path.join(root, ".claude/rules/style-2.md"),
    });
  });

  it("keeps the file when prompting is impossible", async () => {
    const { target, resolver } = setup("prompt");
    logger.capture();
    expect(await resolver.resolve(target, "new version\n")).toEqual({ action: "skip", reason: "kept" });
    expect(logger.flush()).toEqual([`warn ${TARGET} has local changes; keeping it (no prompt available)`]);
  });

  it("asks the prompter for text conflicts", async () => {
    const prompter = new FakePrompter("overwrite");
    const { root, target, resolver } = setup("prompt", prompter);
    const result = await resolver.resolve(target, "new version\n");
    expect(result.action).toBe("overwrite");
    expect(prompter.seen).toHaveLength(1);
    const conflict = prompter.seen[0];
    expect(conflict?.relativePath).toBe(TARGET);
    expect(conflict?.existing.sizeBytes).toBe(12);
    expect(conflict?.existing.checksum).toBe(computeHash("local edits\n"));
    expect(conflict?.incoming).toEqual({
      sizeBytes: 12,
      modifiedAt: null,
      checksum: computeHash("new version\n"),
    });
    expect(fs.existsSync(path.join(root, ".instructionkit/backups"))).toBe(true);
  });

  it("offers keep or accept-new for binary files", async () => {
    const prompter = new FakePrompter("keep", "accept_new");
    const root = useTmpDir();
    const target = writeFile(root, "assets/logo.png", Buffer.from([0x89, 0x50, 0x00, 0x01]));
    const resolver = new ConflictResolver({ projectRoot: root, strategy: "prompt", prompter, now: () => NOW });
    const result = await resolver.resolve(target, Buffer.from([0x89, 0x50, 0x00, 0x02]));
    expect(result).toEqual({
      action: "keep_both",
      targetPath: path.join(root, "assets/logo.20260102-030405.png"),
    });
  });
});

describe("ConflictResolver.resolveEntry", () => {
  it("maps strategies to entry choices", async () => {
    const root = useTmpDir();
    const overwrite = new ConflictResolver({ projectRoot: root, strategy: "overwrite" });
    const skip = new ConflictResolver({ projectRoot: root, strategy: "skip" });
    const prompt = new ConflictResolver({ projectRoot: root, strategy: "prompt", prompter: new FakePrompter("rename") });
    expect(await overwrite.resolveEntry(".mcp.json#mcpServers.github", { a: 1 }, { a: 2 })).toBe("overwrite");
    expect(await skip.resolveEntry(".mcp.json#mcpServers.github", { a: 1 }, { a: 2 })).toBe("keep");
    expect(await prompt.resolveEntry(".mcp.json#mcpServers.github", { a: 1 }, { a: 2 })).toBe("rename");
  });
});

describe("applyResolution", () => {
  it("writes the content with the requested mode", () => {
    const root = useTmpDir();
    const target = path.join(root, ".claude/hooks/lint.sh");
    expect(applyResolution({ action: "write", targetPath: target }, "#!/bin/sh\n", 0o755)).toBe(target);
    expect(readFile(root, ".claude/hooks/lint.sh")).toBe("#!/bin/sh\n");
    expect(fs.statSync(target).mode & 0o777).toBe(0o755);
  });

  it("writes nothing for a skip", () => {
    expect(applyResolution({ action: "skip", reason: "kept" }, "ignored")).toBeNull();
  });
});
