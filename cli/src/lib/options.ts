import path from "node:path";
import type { ConflictStrategy, IdeId } from "../types/index.js";
import { IDE_IDS, isIdeId } from "./capabilities.js";
import { CONFLICT_STRATEGIES, getConflictStrategy } from "./config.js";
import { detectIdes } from "./detector.js";
import { InvalidInputError } from "./errors.js";

export function parseIde(value: string): IdeId {
  if (!isIdeId(value)) {
    throw new InvalidInputError(`Unknown IDE "${value}". Use one of: ${IDE_IDS.join(", ")}`);
  }
  return value;
}

export function parseConflictStrategy(value: string | undefined): ConflictStrategy {
  if (value === undefined) return getConflictStrategy();
  const strategy = CONFLICT_STRATEGIES.find((s) => s === value);
  if (!strategy) {
    throw new InvalidInputError(
      `Unknown conflict strategy "${value}". Use one of: ${CONFLICT_STRATEGIES.join(", ")}`,
    );
  }
  return strategy;
}

/** `--ide` when given, otherwise every IDE detected in the project. */
export function targetIdes(projectRoot: string, ide: string | undefined): IdeId[] {
  if (ide !== undefined) return [parseIde(ide)];
  const detected = detectIdes(projectRoot);
  if (detected.length === 0) {
    throw new InvalidInputError(
      `No IDE detected in ${projectRoot}. Pass --ide (${IDE_IDS.join(", ")})`,
    );
  }
  return detected;
}

export function projectRootFrom(project: string | undefined): string {
  return path.resolve(project ?? process.cwd());
}
