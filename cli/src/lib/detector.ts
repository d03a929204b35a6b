import fs from "node:fs";
import path from "node:path";
import type { IdeId } from "../types/index.js";
import { listCapabilities } from "./capabilities.js";

/** IDEs whose marker file or directory exists in the project, in table order. */
export function detectIdes(projectPath: string): IdeId[] {
  return listCapabilities()
    .filter((cap) => cap.detectMarkers.some((marker) => fs.existsSync(path.join(projectPath, marker))))
    .map((cap) => cap.id);
}
