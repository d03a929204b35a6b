import fs from "node:fs";
import path from "node:path";
import { listCapabilities, validateCapability } from "./capabilities.js";
import { contentHash, fileHash } from "./checksum.js";
import { credentialsPath, PROJECT_DIR_NAME } from "./config.js";
import { formatError } from "./errors.js";
import { getServer } from "./mcp-config.js";
import { InstallationTracker } from "./tracker.js";

export interface DiagnosticIssue {
  severity: "error" | "warning";
  message: string;
  fix?: string;
}

export interface DoctorResult {
  issues: DiagnosticIssue[];
  packagesChecked: number;
  healthy: boolean;
}

export function runDoctor(projectDir: string = process.cwd()): DoctorResult {
  const issues: DiagnosticIssue[] = [];
  const records = new InstallationTracker(projectDir).getInstalled();

  for (const capability of listCapabilities()) {
    for (const problem of validateCapability(capability)) {
      issues.push({ severity: "error", message: `IDE table: ${problem}` });
    }
  }

  for (const record of records) {
    const label = `${record.packageName}@${record.version} (${record.ide})`;

    if (record.status === "installing" || record.status === "updating") {
      issues.push({
        severity: "error",
        message: `${label} was interrupted while ${record.status}`,
        fix: `Run \`instructionkit install ${record.source ?? record.packageName} --ide ${record.ide}\` again`,
      });
    }

    for (const component of record.components) {
      if (component.status === "pending_credentials") {
        issues.push({
          severity: "warning",
          message: `MCP server "${component.name}" from ${label} is waiting for credentials`,
          fix: "Run `instructionkit mcp sync` to provide them",
        });
      }
      if (component.status !== "installed" && component.status !== "pending_credentials") continue;
      if (!component.installedPath) continue;

      const fullPath = path.join(projectDir, component.installedPath);
      if (!fs.existsSync(fullPath)) {
        issues.push({
          severity: "error",
          message: `Missing file for ${component.type} "${component.name}" from ${label}: ${component.installedPath}`,
          fix: `Run \`instructionkit install\` for ${record.packageName} again to restore it`,
        });
        continue;
      }

      if (component.type === "mcp_server") {
        const key = component.mergeKey ?? component.name;
        let entry: unknown;
        try {
          entry = getServer(fs.readFileSync(fullPath, "utf-8"), key);
        } catch (err) {
          issues.push({
            severity: "error",
            message: `Cannot read ${component.installedPath}: ${formatError(err)}`,
          });
          continue;
        }
        if (entry === undefined) {
          issues.push({
            severity: "error",
            message: `MCP server "${key}" from ${label} is missing from ${component.installedPath}`,
            fix: `Run \`instructionkit install\` for ${record.packageName} again to restore it`,
          });
        } else if (component.checksum && contentHash(JSON.stringify(entry)) !== component.checksum) {
          issues.push({
            severity: "warning",
            message: `MCP server "${key}" in ${component.installedPath} was changed after install`,
            fix: "Ignore if intentional",
          });
        }
        continue;
      }

      if (component.checksum && fileHash(fullPath) !== component.checksum) {
        issues.push({
          severity: "warning",
          message: `Checksum mismatch for ${component.type} "${component.name}" at ${component.installedPath}`,
          fix: "File was modified locally. Reinstall to restore it, or ignore if intentional",
        });
      }
    }
  }

  if (fs.existsSync(credentialsPath(projectDir))) {
    const gitignore = path.join(projectDir, ".gitignore");
    const entry = `${PROJECT_DIR_NAME}/.env`;
    const ignored =
      fs.existsSync(gitignore) &&
      fs
        .readFileSync(gitignore, "utf-8")
        .split("\n")
        .some((line) => line.trim() === entry || line.trim() === `/${entry}`);
    if (!ignored) {
      issues.push({
        severity: "error",
        message: `${entry} holds credentials but is not in .gitignore`,
        fix: `Add \`${entry}\` to .gitignore`,
      });
    }
  }

  return {
    issues,
    packagesChecked: records.length,
    healthy: issues.filter((i) => i.severity === "error").length === 0,
  };
}
