import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import { logger } from "../../src/lib/logger.js";
import { InstallationTracker, parseTrackerData, readTrackerFile } from "../../src/lib/tracker.js";
import type { InstalledComponent, Package } from "../../src/types/index.js";
import { readFile, tmpDirs, writeFile } from "../helpers.js";

const useTmpDir = tmpDirs();

afterEach(() => {
  if (logger.isCapturing()) logger.flush();
});

function pkg(version: string): Package {
  return {
    name: "demo-kit",
    namespace: "acme/tools",
    version,
    description: "Demo",
    author: "tester",
    keywords: [],
    components: { instructions: [], mcpServers: [], hooks: [], commands: [], resources: [] },
  };
}

const component: InstalledComponent = {
  type: "instruction",
  name: "style",
  installedPath: ".claude/rules/style.md",
  checksum: "sha256:abc",
  status: "installed",
};

function clock(...isoTimes: string[]): () => Date {
  let index = 0;
  return () => new Date(isoTimes[Math.min(index++, isoTimes.length - 1)] ?? "2026-01-01T00:00:00.000Z");
}

describe("InstallationTracker", () => {
  it("records an installation in snake_case on disk", () => {
    const dir = useTmpDir();
    const tracker = new InstallationTracker(dir, clock("2026-01-01T00:00:00.000Z"));
    tracker.recordInstallation(pkg("1.0.0"), "claude", [{ ...component, mergeKey: "style" }], "complete", "/src/kit");

    const data: unknown = JSON.parse(readFile(dir, ".instructionkit/packages.json"));
    expect(data).toEqual({
      version: 1,
      packages: [
        {
          package_name: "demo-kit",
          namespace: "acme/tools",
          version: "1.0.0",
          ide: "claude",
          source: "/src/kit",
          installed_at: "2026-01-01T00:00:00.000Z",
          updated_at: "2026-01-01T00:00:00.000Z",
          status: "complete",
          components: [
            {
              type: "instruction",
              name: "style",
              installed_path: ".claude/rules/style.md",
              checksum: "sha256:abc",
              status: "installed",
              merge_key: "style",
            },
          ],
        },
      ],
    });
  });

  it("keeps installedAt and the old version while an update runs", () => {
    const dir = useTmpDir();
    const tracker = new InstallationTracker(
      dir,
      clock("2026-01-01T00:00:00.000Z", "2026-02-01T00:00:00.000Z", "2026-02-01T00:00:05.000Z"),
    );
    tracker.recordInstallation(pkg("1.0.0"), "claude", [component], "complete");

    const open = tracker.begin(pkg("1.1.0"), "claude", "updating");
    expect(open.status).toBe("updating");
    expect(open.version).toBe("1.0.0");
    expect(open.installedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(open.components).toEqual([component]);

    tracker.recordInstallation(pkg("1.1.0"), "claude", [component], "partial");
    const record = tracker.getPackage("demo-kit", "claude");
    expect(record?.version).toBe("1.1.0");
    expect(record?.status).toBe("partial");
    expect(record?.installedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(record?.updatedAt).toBe("2026-02-01T00:00:05.000Z");
  });

  it("tracks each IDE separately", () => {
    const dir = useTmpDir();
    const tracker = new InstallationTracker(dir);
    tracker.recordInstallation(pkg("1.0.0"), "claude", [component], "complete");
    tracker.recordInstallation(pkg("1.0.0"), "cursor", [], "complete");
    expect(tracker.getInstalled().map((r) => r.ide)).toEqual(["claude", "cursor"]);

    expect(tracker.updateVersion("demo-kit", "1.0.1", "cursor")).toBe(true);
    expect(tracker.getPackage("demo-kit", "claude")?.version).toBe("1.0.0");
    expect(tracker.getPackage("demo-kit", "cursor")?.version).toBe("1.0.1");
    expect(tracker.updateVersion("other", "2.0.0")).toBe(false);

    expect(tracker.remove("demo-kit", "claude").map((r) => r.ide)).toEqual(["claude"]);
    expect(tracker.getInstalled().map((r) => r.ide)).toEqual(["cursor"]);
  });

  it("returns nothing for a project without a tracker", () => {
    expect(new InstallationTracker(useTmpDir()).getInstalled()).toEqual([]);
  });
});

describe("parseTrackerData", () => {
  const good = {
    package_name: "demo-kit",
    namespace: "acme/tools",
    version: "1.0.0",
    ide: "cursor",
    installed_at: "2026-01-01T00:00:00.000Z",
    updated_at: "2026-01-01T00:00:00.000Z",
    status: "complete",
    components: [],
  };

  it("reads the legacy bare array layout", () => {
    expect(parseTrackerData([good], "legacy.json").map((r) => r.packageName)).toEqual(["demo-kit"]);
  });

  it("skips invalid entries with a warning", () => {
    logger.capture();
    const records = parseTrackerData({ version: 1, packages: [good, { package_name: "broken" }] }, "t.json");
    const lines = logger.flush();
    expect(records).toHaveLength(1);
    expect(lines).toHaveLength(1);
    expect(lines[0]?.startsWith("warn Skipping invalid tracker entry #1 in t.json:")).toBe(true);
  });

  it("ignores unreadable JSON", () => {
    const dir = useTmpDir();
    const file = writeFile(dir, "packages.json", "{not json");
    logger.capture();
    expect(readTrackerFile(file)).toEqual([]);
    expect(logger.flush()[0]?.startsWith(`warn Ignoring unreadable tracker ${file}:`)).toBe(true);
    expect(fs.existsSync(file)).toBe(true);
  });
});
