export interface SemVer {
  major: number;
  minor: number;
  patch: number;
  prerelease: string[];
  build: string[];
}

const SEMVER_REGEX =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/;

/** Parses `1.2.3`, `v1.2.3`, `1.2.3-rc.1+build.5`; returns null when invalid. */
export function parseVersion(version: string): SemVer | null {
  const trimmed = version.trim();
  const raw = trimmed.startsWith("v") ? trimmed.slice(1) : trimmed;
  const match = SEMVER_REGEX.exec(raw);
  if (!match) return null;
  const [major, minor, patch] = [match[1], match[2], match[3]].map(Number);
  if (
    major === undefined ||
    minor === undefined ||
    patch === undefined ||
    ![major, minor, patch].every(Number.isSafeInteger)
  ) {
    return null;
  }
  return {
    major,
    minor,
    patch,
    prerelease: match[4] ? match[4].split(".") : [],
    build: match[5] ? match[5].split(".") : [],
  };
}

export function isValidVersion(version: string): boolean {
  return parseVersion(version) !== null;
}

function requireVersion(version: string): SemVer {
  const parsed = parseVersion(version);
  if (!parsed) {
    throw new Error(`Invalid version "${version}": must be valid semver (X.Y.Z)`);
  }
  return parsed;
}

export function formatVersion(v: SemVer): string {
  let out = `${v.major}.${v.minor}.${v.patch}`;
  if (v.prerelease.length > 0) out += `-${v.prerelease.join(".")}`;
  if (v.build.length > 0) out += `+${v.build.join(".")}`;
  return out;
}

function sign(n: number): -1 | 0 | 1 {
  if (n < 0) return -1;
  if (n > 0) return 1;
  return 0;
}

function compareIdentifiers(a: string, b: string): -1 | 0 | 1 {
  const aNum = /^\d+$/.test(a);
  const bNum = /^\d+$/.test(b);
  // no leading zeros, so the longer number is the larger one
  if (aNum && bNum && a.length !== b.length) return sign(a.length - b.length);
  // Numeric identifiers always have lower precedence than alphanumeric ones.
  if (aNum && !bNum) return -1;
  if (bNum && !aNum) return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function comparePrerelease(a: string[], b: string[]): -1 | 0 | 1 {
  if (a.length === 0 && b.length === 0) return 0;
  if (a.length === 0) return 1;
  if (b.length === 0) return -1;

  const len = Math.max(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined) return -1;
    if (right === undefined) return 1;
    const cmp = compareIdentifiers(left, right);
    if (cmp !== 0) return cmp;
  }
  return 0;
}

/**
 * Standard semver precedence. Build metadata is ignored, a prerelease sorts
 * before the release of the same numeric triple.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const va = requireVersion(a);
  const vb = requireVersion(b);
  if (va.major !== vb.major) return sign(va.major - vb.major);
  if (va.minor !== vb.minor) return sign(va.minor - vb.minor);
  if (va.patch !== vb.patch) return sign(va.patch - vb.patch);
  return comparePrerelease(va.prerelease, vb.prerelease);
}

/** Filters tags down to valid semver (leading `v` stripped), newest first, deduplicated. */
export function availableVersions(tags: string[]): string[] {
  const seen = new Set<string>();
  const versions: string[] = [];
  for (const tag of tags) {
    const parsed = parseVersion(tag);
    if (!parsed) continue;
    const normalized = formatVersion(parsed);
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    versions.push(normalized);
  }
  return versions.sort((a, b) => compareVersions(b, a));
}

/** Highest available version strictly greater than `installed`, or null. */
export function hasUpdate(installed: string, available: string[]): string | null {
  let best: string | null = null;
  for (const candidate of available) {
    if (!isValidVersion(candidate)) continue;
    if (compareVersions(candidate, installed) <= 0) continue;
    if (best === null || compareVersions(candidate, best) > 0) {
      best = candidate;
    }
  }
  return best === null ? null : formatVersion(requireVersion(best));
}
