import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import crypto from "node:crypto";
import { afterEach } from "vitest";
import { stringify } from "yaml";
import { MANIFEST_FILE } from "../src/lib/manifest.js";

export function createTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "instructionkit-test-"));
}

/** Temp dirs created through the returned function are removed after each test. */
export function tmpDirs(): () => string {
  let dirs: string[] = [];
  afterEach(() => {
    for (const dir of dirs) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
    dirs = [];
  });
  return () => {
    const dir = createTmpDir();
    dirs.push(dir);
    return dir;
  };
}

export function writeFile(dir: string, relativePath: string, content: string | Buffer): string {
  const fullPath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content);
  return fullPath;
}

export function readFile(dir: string, relativePath: string): string {
  return fs.readFileSync(path.join(dir, relativePath), "utf-8");
}

export function computeHash(content: string | Buffer): string {
  return `sha256:${crypto.createHash("sha256").update(content).digest("hex")}`;
}

export function manifestData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: "demo-kit",
    version: "1.0.0",
    description: "Demo package",
    author: "tester",
    namespace: "acme/tools",
    ...overrides,
  };
}

export function writeManifest(dir: string, data: Record<string, unknown>): void {
  writeFile(dir, MANIFEST_FILE, stringify(data));
}

export interface PackageFixture {
  data: Record<string, unknown>;
  files: Record<string, string | Buffer>;
}

export function writePackage(dir: string, fixture: PackageFixture): string {
  writeManifest(dir, fixture.data);
  for (const [file, content] of Object.entries(fixture.files)) {
    writeFile(dir, file, content);
  }
  return dir;
}

/** One instruction and one MCP server needing GITHUB_TOKEN. */
export function standardPackage(overrides: Record<string, unknown> = {}): PackageFixture {
  return {
    data: manifestData({
      components: {
        instructions: [{ name: "style", description: "Style guide", file: "instructions/style.md" }],
        mcp_servers: [
          {
            name: "github",
            description: "GitHub server",
            file: "mcp/github.json",
            credentials: [{ name: "GITHUB_TOKEN", description: "Personal access token" }],
          },
        ],
      },
      ...overrides,
    }),
    files: {
      "instructions/style.md": "# Style\n\nUse tabs.\n",
      "mcp/github.json": JSON.stringify({
        command: "npx",
        args: ["-y", "github-mcp"],
        env: { GITHUB_TOKEN: "${GITHUB_TOKEN}" },
      }),
    },
  };
}
