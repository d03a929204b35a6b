import { Command } from "commander";
import { getPolicy } from "../lib/config.js";
import { exitCodeForError, formatError, ManifestInvalidError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { loadPackage } from "../lib/manifest.js";
import { orderedComponents } from "../lib/installer.js";

export const validateCommand = new Command("validate")
  .description("Validate a package directory without installing it")
  .argument("[dir]", "Package directory", ".")
  .action((dir: string) => {
    try {
      const loaded = loadPackage(dir, getPolicy());
      const pkg = loaded.package;
      logger.blank();
      logger.success(`${pkg.namespace}/${pkg.name}@${pkg.version} is valid`);
      for (const warning of loaded.warnings) logger.warn(warning);
      logger.table(
        ["kind", "name", "file"],
        orderedComponents(pkg).map((c) => [c.kind, c.name, c.file]),
      );
      logger.blank();
    } catch (err) {
      if (err instanceof ManifestInvalidError) {
        logger.error(`${dir}: ${err.issues.length} manifest problem(s)`);
        for (const issue of err.issues) logger.dim(`  ${issue.code}: ${issue.message}`);
      } else {
        logger.error(formatError(err));
      }
      process.exit(exitCodeForError(err));
    }
  });
