import { Command } from "commander";
import { listCapabilities } from "../lib/capabilities.js";
import { detectIdes } from "../lib/detector.js";
import { logger } from "../lib/logger.js";
import { projectRootFrom } from "../lib/options.js";

function yesNo(value: boolean): string {
  return value ? "yes" : "-";
}

export const idesCommand = new Command("ides")
  .description("Show supported IDEs and which ones this project uses")
  .option("--project <dir>", "Project directory (defaults to the current directory)")
  .action((options: { project?: string }) => {
    const detected = new Set(detectIdes(projectRootFrom(options.project)));
    logger.blank();
    logger.table(
      ["ide", "detected", "instructions", "mcp", "hooks", "commands", "resources"],
      listCapabilities().map((cap) => [
        cap.id,
        yesNo(detected.has(cap.id)),
        cap.instructions ? `${cap.instructions.path}*${cap.instructions.extension}` : "-",
        cap.mcp ? cap.mcp.configPath : "-",
        yesNo(cap.hooks !== undefined),
        yesNo(cap.commands !== undefined),
        yesNo(cap.resources),
      ]),
    );
    logger.blank();
  });
