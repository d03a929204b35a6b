import type { SecretConfidence } from "../types/index.js";
import { DEFAULT_POLICY } from "./config.js";

const SECRET_NAME_KEYWORDS = ["token", "key", "secret", "password", "auth", "credential"];

const UUID_PATTERN = /[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}/;
const BASE64_RUN_PATTERN = /[A-Za-z0-9+/]{20,}={0,2}/;
const HEX_RUN_PATTERN = /[0-9a-fA-F]{32,}/;

const BOOLEAN_PATTERN = /^(true|false|yes|no|on|off)$/i;
const NUMERIC_PATTERN = /^-?\d+(\.\d+)?$/;
const SIMPLE_URL_PATTERN = /^https?:\/\/[^\s?#@]+$/;

/** Shannon entropy in bits per character. */
export function shannonEntropy(value: string): number {
  if (value.length === 0) return 0;
  const counts = new Map<string, number>();
  for (const ch of value) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }
  const length = [...value].length;
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

/**
 * Classifies an environment variable for package creation.
 * Rules apply in order and the first match wins.
 */
export function classifySecret(
  name: string,
  value: string,
  entropyThreshold: number = DEFAULT_POLICY.entropyThreshold,
): SecretConfidence {
  const lowerName = name.toLowerCase();
  if (SECRET_NAME_KEYWORDS.some((keyword) => lowerName.includes(keyword))) {
    return "high";
  }

  if (UUID_PATTERN.test(value) || BASE64_RUN_PATTERN.test(value) || HEX_RUN_PATTERN.test(value)) {
    return "high";
  }

  if (shannonEntropy(value) > entropyThreshold) {
    return "medium";
  }

  const trimmed = value.trim();
  if (
    trimmed === "" ||
    BOOLEAN_PATTERN.test(trimmed) ||
    NUMERIC_PATTERN.test(trimmed) ||
    SIMPLE_URL_PATTERN.test(trimmed)
  ) {
    return "safe";
  }

  return "medium";
}

export function placeholderFor(name: string): string {
  return `\${${name}}`;
}

/** `api-token` → `API_TOKEN`. Names that do not start with a letter get an `ENV_` prefix. */
export function credentialNameFor(key: string): string {
  const name = key.toUpperCase().replace(/[^A-Z0-9_]/g, "_");
  return /^[A-Z]/.test(name) ? name : `ENV_${name}`;
}

export interface TemplatedEnv {
  env: Record<string, string>;
  /** Credential names of the `${NAME}` placeholders written. */
  templated: string[];
}

/**
 * Runs every entry through the classifier. High is always templated,
 * medium only when `confirmMedium` says so, safe stays literal.
 */
export async function templateEnv(
  env: Record<string, string>,
  confirmMedium: (name: string, value: string) => Promise<boolean>,
  entropyThreshold: number = DEFAULT_POLICY.entropyThreshold,
): Promise<TemplatedEnv> {
  const result: Record<string, string> = {};
  const templated: string[] = [];

  for (const [name, value] of Object.entries(env)) {
    const confidence = classifySecret(name, value, entropyThreshold);
    let replace = confidence === "high";
    if (confidence === "medium") {
      replace = await confirmMedium(name, value);
    }
    if (replace) {
      const credential = credentialNameFor(name);
      result[name] = placeholderFor(credential);
      if (!templated.includes(credential)) templated.push(credential);
    } else {
      result[name] = value;
    }
  }

  return { env: result, templated };
}
