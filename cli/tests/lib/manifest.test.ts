import { describe, it, expect } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  checkRequiredFields,
  loadPackage,
  parseManifest,
  readManifestData,
  serializeManifest,
  validateManifest,
} from "../../src/lib/manifest.js";
import {
  EXIT_CODES,
  ManifestInvalidError,
  NotFoundError,
  ResourceTooLargeError,
  exitCodeForError,
} from "../../src/lib/errors.js";
import type { Policy } from "../../src/types/index.js";
import { computeHash, manifestData, standardPackage, tmpDirs, writeFile, writePackage } from "../helpers.js";

const useTmpDir = tmpDirs();

const SMALL_POLICY: Policy = { resourceWarnBytes: 10, resourceMaxBytes: 20, entropyThreshold: 4.5 };

function resourcePackage(extra: Record<string, unknown> = {}) {
  return manifestData({
    components: {
      resources: [{ name: "data", description: "Sample data", file: "assets/data.bin", ...extra }],
    },
  });
}

// ── parsing ──

describe("parseManifest", () => {
  it("parses a valid manifest into a package", () => {
    const pkg = parseManifest(`
name: demo-kit
version: 1.2.0
description: Demo package
author: tester
namespace: acme/tools
keywords: [style]
components:
  instructions:
    - name: style
      description: Style guide
      file: instructions/style.md
      ide_support: [claude, cursor]
  hooks:
    - name: lint
      description: Lint before commit
      file: hooks/lint.sh
      hook_type: pre-commit
`);
    expect(pkg.name).toBe("demo-kit");
    expect(pkg.version).toBe("1.2.0");
    expect(pkg.keywords).toEqual(["style"]);
    expect(pkg.components.instructions).toEqual([
      {
        kind: "instruction",
        name: "style",
        description: "Style guide",
        file: "instructions/style.md",
        tags: [],
        ideSupport: ["claude", "cursor"],
      },
    ]);
    expect(pkg.components.hooks[0]?.hookType).toBe("pre-commit");
    expect(pkg.components.mcpServers).toEqual([]);
  });

  it("defaults credentials to required and resources to their file path", () => {
    const pkg = parseManifest(`
name: demo-kit
version: 1.0.0
description: Demo package
author: tester
namespace: acme/tools
components:
  mcp_servers:
    - name: db
      description: Database
      file: mcp/db.json
      credentials:
        - name: DB_URL
          description: Connection string
        - name: DB_SCHEMA
          description: Schema
          required: false
          default: public
  resources:
    - name: logo
      description: Logo
      file: assets/logo.png
`);
    expect(pkg.components.mcpServers[0]?.credentials).toEqual([
      { name: "DB_URL", description: "Connection string", required: true },
      { name: "DB_SCHEMA", description: "Schema", required: false, default: "public" },
    ]);
    expect(pkg.components.resources[0]?.installPath).toBe("assets/logo.png");
    expect(pkg.components.resources[0]?.sizeBytes).toBe(0);
  });

  it("rejects YAML that is not a mapping", () => {
    expect(() => readManifestData("- a\n- b\n")).toThrow(ManifestInvalidError);
    expect(() => parseManifest("just a string")).toThrow("Invalid YAML: manifest must be an object");
  });

  it("reports YAML syntax errors as an invalid manifest", () => {
    const dir = useTmpDir();
    writeFile(dir, "instructionkit-package.yaml", "name: [unclosed\n");
    try {
      loadPackage(dir);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ManifestInvalidError);
      expect(exitCodeForError(err)).toBe(EXIT_CODES.invalidInput);
      if (!(err instanceof ManifestInvalidError)) return;
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0]?.code).toBe("invalid_field");
      expect(err.issues[0]?.message.startsWith("Invalid YAML: ")).toBe(true);
    }
  });
});

// ── validation ──

describe("validateManifest", () => {
  it("lists every missing top-level field", () => {
    const result = validateManifest({ name: "demo-kit" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues.map((i) => i.message)).toEqual([
      "Missing required field: version",
      "Missing required field: description",
      "Missing required field: author",
      "Missing required field: namespace",
    ]);
  });

  it("reports missing component fields before checking field values", () => {
    const data = manifestData({
      name: "Bad Name",
      components: { hooks: [{ name: "lint", description: "Lint", file: "hooks/lint.sh" }] },
    });
    expect(checkRequiredFields(data)).toEqual([
      {
        code: "missing_field",
        field: "components.hooks[0].hook_type",
        message: "Missing required field: components.hooks[0].hook_type",
      },
    ]);
    const result = validateManifest(data);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toHaveLength(1);
  });

  it("checks name, version and namespace formats", () => {
    const result = validateManifest(manifestData({ name: "Demo_Kit", version: "v1.0.0", namespace: "acme" }));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues.map((i) => i.field)).toEqual(["name", "version", "namespace"]);
    expect(result.issues.every((i) => i.code === "invalid_field")).toBe(true);
  });

  it("accepts prerelease versions and deep namespaces", () => {
    const result = validateManifest(manifestData({ version: "2.0.0-rc.1", namespace: "acme/tools/ai" }));
    expect(result.ok).toBe(true);
  });

  it("rejects duplicate component names within a kind", () => {
    const result = validateManifest(
      manifestData({
        components: {
          instructions: [
            { name: "style", description: "One", file: "a.md" },
            { name: "style", description: "Two", file: "b.md" },
          ],
          commands: [{ name: "style", description: "Other kind", file: "c.md", command_type: "slash" }],
        },
      }),
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toEqual([
      { code: "duplicate_name", field: "components.instructions", message: "Duplicate instruction name: style" },
    ]);
  });

  it("validates credential names and required defaults", () => {
    const result = validateManifest(
      manifestData({
        components: {
          mcp_servers: [
            {
              name: "api",
              description: "API",
              file: "mcp/api.json",
              credentials: [
                { name: "api_token", description: "lowercase", required: false },
                { name: "API_TOKEN", description: "Token", default: "test-secret" },
              ],
            },
          ],
        },
      }),
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues.map((i) => i.message)).toEqual([
      'Invalid credential name "api_token": must match /^[A-Z][A-Z0-9_]*$/',
      "Credential API_TOKEN is required and cannot have a default",
    ]);
  });

  it("rejects component names that are not plain file names", () => {
    const result = validateManifest(
      manifestData({
        components: {
          instructions: [{ name: "../../AGENTS", description: "Escape", file: "a.md" }],
          hooks: [{ name: "sub/lint", description: "Lint", file: "lint.sh", hook_type: "pre-commit" }],
          commands: [{ name: "Review_v2.1", description: "Review", file: "review.md", command_type: "slash" }],
        },
      }),
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toEqual([
      {
        code: "invalid_field",
        field: "components.instructions[0].name",
        message: 'Invalid component name "../../AGENTS": must match /^[A-Za-z0-9][A-Za-z0-9._-]*$/',
      },
      {
        code: "invalid_field",
        field: "components.hooks[0].name",
        message: 'Invalid component name "sub/lint": must match /^[A-Za-z0-9][A-Za-z0-9._-]*$/',
      },
    ]);
  });

  it("keeps resource install paths inside the resource directory", () => {
    const resource = (installPath: string) => ({
      name: "data",
      description: "Data",
      file: "assets/data.bin",
      install_path: installPath,
    });
    const result = validateManifest(
      manifestData({
        components: {
          resources: [
            resource("../../../.git/config"),
            { ...resource("/etc/passwd"), name: "abs" },
            { ...resource("nested/../../up.bin"), name: "up" },
            { ...resource("nested/../data.bin"), name: "fine" },
          ],
        },
      }),
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues.map((i) => i.message)).toEqual([
      'Invalid components.resources[0].install_path "../../../.git/config": must be a relative path inside the resource directory',
      'Invalid components.resources[1].install_path "/etc/passwd": must be a relative path inside the resource directory',
      'Invalid components.resources[2].install_path "nested/../../up.bin": must be a relative path inside the resource directory',
    ]);
  });

  it("rejects unknown IDEs in ide_support", () => {
    const result = validateManifest(
      manifestData({
        components: {
          instructions: [{ name: "style", description: "Style", file: "style.md", ide_support: ["claude", "vim"] }],
        },
      }),
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues.map((i) => i.message)).toEqual([
      'Unknown IDE "vim" in components.instructions[0].ide_support',
    ]);
  });
});

// ── loading with files ──

describe("loadPackage", () => {
  it("loads a package whose files exist", () => {
    const dir = writePackage(useTmpDir(), standardPackage());
    const loaded = loadPackage(dir);
    expect(loaded.root).toBe(path.resolve(dir));
    expect(loaded.warnings).toEqual([]);
    expect(loaded.package.components.mcpServers[0]?.name).toBe("github");
  });

  it("throws NotFoundError without a manifest", () => {
    const dir = useTmpDir();
    expect(() => loadPackage(dir)).toThrow(NotFoundError);
  });

  it("reports referenced files that do not exist", () => {
    const fixture = standardPackage();
    delete fixture.files["instructions/style.md"];
    const dir = writePackage(useTmpDir(), fixture);
    try {
      loadPackage(dir);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ManifestInvalidError);
      if (!(err instanceof ManifestInvalidError)) return;
      expect(err.issues).toEqual([
        {
          code: "file_not_found",
          field: "instructions/style.md",
          message: "Instruction file not found: instructions/style.md",
        },
      ]);
    }
  });

  it("rejects files outside the package", () => {
    const dir = useTmpDir();
    writePackage(
      dir,
      {
        data: manifestData({
          components: { instructions: [{ name: "escape", description: "Escape", file: "../outside.md" }] },
        }),
        files: {},
      },
    );
    expect(() => loadPackage(dir)).toThrow("Instruction file ../outside.md is outside the package");
  });

  it("rejects MCP placeholders without a declared credential", () => {
    const fixture = standardPackage();
    fixture.files["mcp/github.json"] = JSON.stringify({ command: "gh", env: { TOKEN: "${OTHER_TOKEN}" } });
    const dir = writePackage(useTmpDir(), fixture);
    expect(() => loadPackage(dir)).toThrow("MCP server github uses ${OTHER_TOKEN} but declares no such credential");
  });

  it("accepts a resource at the size limit with a warning", () => {
    const dir = useTmpDir();
    writePackage(dir, { data: resourcePackage(), files: { "assets/data.bin": Buffer.alloc(20, 1) } });
    const loaded = loadPackage(dir, SMALL_POLICY);
    expect(loaded.warnings).toEqual(["Resource assets/data.bin is large (20 bytes)"]);
    expect(loaded.package.components.resources[0]?.sizeBytes).toBe(20);
  });

  it("rejects a resource one byte over the limit", () => {
    const dir = useTmpDir();
    writePackage(dir, { data: resourcePackage(), files: { "assets/data.bin": Buffer.alloc(21, 1) } });
    try {
      loadPackage(dir, SMALL_POLICY);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ResourceTooLargeError);
      expect(err).toBeInstanceOf(ManifestInvalidError);
      if (!(err instanceof ResourceTooLargeError)) return;
      expect(err.code).toBe("resource_too_large");
      expect(err.sizeBytes).toBe(21);
      expect(err.limitBytes).toBe(20);
      expect(err.issues.map((i) => i.message)).toEqual(["Resource assets/data.bin is 21 bytes (limit 20)"]);
    }
  });

  it("applies the default 200 MiB limit", () => {
    const limit = 200 * 1024 * 1024;
    const dir = useTmpDir();
    writePackage(dir, { data: resourcePackage(), files: { "assets/data.bin": "" } });
    const file = path.join(dir, "assets/data.bin");

    fs.truncateSync(file, limit);
    expect(loadPackage(dir).warnings).toEqual([`Resource assets/data.bin is large (${limit} bytes)`]);

    fs.truncateSync(file, limit + 1);
    expect(() => loadPackage(dir)).toThrow(ResourceTooLargeError);
  });

  it("verifies declared resource checksums", () => {
    const content = "resource body";
    const dir = useTmpDir();
    writePackage(dir, {
      data: resourcePackage({ checksum: computeHash(content).slice("sha256:".length) }),
      files: { "assets/data.bin": content },
    });
    expect(loadPackage(dir).package.components.resources[0]?.checksum).toBe(
      computeHash(content).slice("sha256:".length),
    );

    writeFile(dir, "assets/data.bin", "tampered");
    expect(() => loadPackage(dir)).toThrow("checksum mismatch");
  });
});

describe("serializeManifest", () => {
  it("writes a manifest that parses back to the same package", () => {
    const pkg = parseManifest(serializeManifest(parseManifest(`
name: demo-kit
version: 1.0.0
description: Demo package
author: tester
namespace: acme/tools
license: MIT
components:
  mcp_servers:
    - name: db
      description: Database
      file: mcp/db.json
      credentials:
        - name: DB_URL
          description: Connection string
          example: postgres://localhost/app
  resources:
    - name: logo
      description: Logo
      file: assets/logo.png
      install_path: images/logo.png
      ide_support: [claude]
`)));
    expect(pkg.license).toBe("MIT");
    expect(pkg.components.mcpServers[0]?.credentials[0]?.example).toBe("postgres://localhost/app");
    expect(pkg.components.resources[0]).toEqual({
      kind: "resource",
      name: "logo",
      description: "Logo",
      file: "assets/logo.png",
      installPath: "images/logo.png",
      sizeBytes: 0,
      ideSupport: ["claude"],
    });
  });
});
