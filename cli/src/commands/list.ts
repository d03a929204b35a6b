import { Command } from "commander";
import { exitCodeForError, formatError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { projectRootFrom } from "../lib/options.js";
import { InstallationTracker } from "../lib/tracker.js";

export const listCommand = new Command("list")
  .description("List packages installed in the project")
  .option("--project <dir>", "Project directory (defaults to the current directory)")
  .option("--json", "Print the tracker records as JSON")
  .action((options: { project?: string; json?: boolean }) => {
    try {
      const records = new InstallationTracker(projectRootFrom(options.project)).getInstalled();

      if (options.json) {
        console.log(JSON.stringify(records, null, 2));
        return;
      }
      if (records.length === 0) {
        logger.info("No packages installed. Run `instructionkit install <source>` to get started.");
        return;
      }

      logger.blank();
      logger.table(
        ["name", "version", "ide", "status", "components"],
        records.map((r) => [
          `${r.namespace}/${r.packageName}`,
          r.version,
          r.ide,
          r.status,
          String(r.components.filter((c) => c.status === "installed").length),
        ]),
      );
      logger.blank();
    } catch (err) {
      logger.error(formatError(err));
      process.exit(exitCodeForError(err));
    }
  });
