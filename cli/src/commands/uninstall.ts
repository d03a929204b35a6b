import { Command } from "commander";
import { exitCodeForError, formatError } from "../lib/errors.js";
import { uninstallPackage } from "../lib/installer.js";
import { logger } from "../lib/logger.js";
import { parseIde, projectRootFrom } from "../lib/options.js";
import { openMainRegistry } from "../lib/registry.js";

export const uninstallCommand = new Command("uninstall")
  .description("Remove an installed package and the files it wrote")
  .argument("<package>", "Package name")
  .option("--ide <ide>", "Only remove the install for this IDE")
  .option("--project <dir>", "Project directory (defaults to the current directory)")
  .option("--force", "Also remove files that were edited after install")
  .action((packageName: string, options: { ide?: string; project?: string; force?: boolean }) => {
    try {
      logger.blank();
      const summary = uninstallPackage(packageName, {
        projectRoot: projectRootFrom(options.project),
        ...(options.ide !== undefined ? { ide: parseIde(options.ide) } : {}),
        force: options.force ?? false,
        registry: openMainRegistry(),
      });
      for (const file of summary.removed) logger.dim(`  removed ${file}`);
      logger.success(`Uninstalled ${packageName} (${summary.removed.length} removed, ${summary.kept.length} kept)`);
      if (summary.kept.length > 0) {
        logger.dim("  Pass --force to remove modified files too.");
      }
      logger.blank();
    } catch (err) {
      logger.error(formatError(err));
      process.exit(exitCodeForError(err));
    }
  });
