import fs from "node:fs";
import type { PackageInstallationRecord } from "../types/index.js";
import { isGitUrl } from "./git.js";
import type { GitTransport } from "./git.js";
import { loadPackage } from "./manifest.js";
import { availableVersions, compareVersions, formatVersion, hasUpdate, isValidVersion, parseVersion } from "./version.js";

export type UpdateCheck =
  | { packageName: string; installed: string; status: "available"; latest: string; ref?: string }
  | { packageName: string; installed: string; status: "current" }
  | { packageName: string; installed: string; status: "unknown"; reason: string };

/** Compares a tracked package with its source: repository tags for git, the manifest for a directory. */
export async function checkForUpdate(
  record: PackageInstallationRecord,
  transport: GitTransport,
): Promise<UpdateCheck> {
  const base = { packageName: record.packageName, installed: record.version };
  const source = record.source;
  if (!source) {
    return { ...base, status: "unknown", reason: "no recorded source" };
  }
  if (!isValidVersion(record.version)) {
    return { ...base, status: "unknown", reason: `installed version ${record.version} is not semver` };
  }

  if (fs.existsSync(source) && fs.statSync(source).isDirectory()) {
    const version = loadPackage(source).package.version;
    return compareVersions(version, record.version) > 0
      ? { ...base, status: "available", latest: version }
      : { ...base, status: "current" };
  }

  if (isGitUrl(source)) {
    const tags = await transport.listTags(source);
    const latest = hasUpdate(record.version, availableVersions(tags));
    if (!latest) return { ...base, status: "current" };
    const ref = tags.find((tag) => {
      const parsed = parseVersion(tag);
      return parsed !== null && formatVersion(parsed) === latest;
    });
    return { ...base, status: "available", latest, ...(ref !== undefined ? { ref } : {}) };
  }

  return { ...base, status: "unknown", reason: `source ${source} is not available` };
}
