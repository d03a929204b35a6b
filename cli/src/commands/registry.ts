import { Command } from "commander";
import os from "node:os";
import { getScanDepth } from "../lib/config.js";
import { exitCodeForError, EXIT_CODES, formatError, InvalidInputError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { openMainRegistry } from "../lib/registry.js";

function fail(err: unknown): never {
  logger.error(formatError(err));
  process.exit(exitCodeForError(err));
}

function parseDepth(value: string | undefined): number {
  if (value === undefined) return getScanDepth();
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidInputError(`--depth must be a non-negative integer, got "${value}"`);
  }
  return depth;
}

export const registryCommand = new Command("registry").description(
  "Inspect and maintain the cross-project registry",
);

registryCommand
  .command("list")
  .description("List registered projects")
  .option("--json", "Print the registry as JSON")
  .action((options: { json?: boolean }) => {
    try {
      const registry = openMainRegistry();
      if (options.json) {
        console.log(JSON.stringify(registry.toJSON(), null, 2));
        return;
      }
      const projects = registry.list();
      if (projects.length === 0) {
        logger.info("No projects registered. Run `instructionkit registry scan` to find them.");
        return;
      }
      logger.blank();
      logger.table(
        ["project", "packages", "mcp servers", "updated"],
        projects.map((project) => [
          project.path,
          project.packages.map((pkg) => `${pkg.name}@${pkg.version} (${pkg.ide})`).join(", "),
          project.mcpServers.join(", "),
          project.lastUpdated,
        ]),
      );
      logger.blank();
    } catch (err) {
      fail(err);
    }
  });

registryCommand
  .command("scan")
  .description("Find projects with installed packages and register them")
  .argument("[root]", "Directory to scan (defaults to the home directory)")
  .option("--depth <n>", "Directory depth to descend")
  .action((root: string | undefined, options: { depth?: string }) => {
    try {
      const target = root ?? os.homedir();
      const count = openMainRegistry().scan(target, parseDepth(options.depth));
      logger.success(`Registered ${count} project(s) under ${target}`);
    } catch (err) {
      fail(err);
    }
  });

registryCommand
  .command("validate")
  .description("Report problems in the registry file without changing it")
  .action(() => {
    try {
      const issues = openMainRegistry().validate();
      if (issues.length === 0) {
        logger.success("Registry is valid.");
        return;
      }
      for (const issue of issues) {
        logger.warn(issue.index >= 0 ? `Entry #${issue.index}: ${issue.message}` : issue.message);
      }
      process.exit(EXIT_CODES.partial);
    } catch (err) {
      fail(err);
    }
  });

registryCommand
  .command("repair")
  .description("Drop malformed entries, or rebuild the registry when it cannot be read")
  .action(() => {
    try {
      const result = openMainRegistry().repair();
      if (result.rebuilt) {
        logger.success(`Rebuilt the registry from project trackers (${result.kept} project(s))`);
      } else {
        logger.success(`Kept ${result.kept} project(s), dropped ${result.dropped.length}`);
      }
    } catch (err) {
      fail(err);
    }
  });

registryCommand
  .command("rebuild")
  .description("Recreate the registry by scanning the configured roots")
  .action(() => {
    try {
      const count = openMainRegistry().rebuildFromTrackers();
      logger.success(`Registered ${count} project(s)`);
    } catch (err) {
      fail(err);
    }
  });

registryCommand
  .command("using")
  .description("List projects that have a package installed")
  .argument("<package>", "Package name")
  .action((packageName: string) => {
    try {
      const projects = openMainRegistry().projectsUsing(packageName);
      if (projects.length === 0) {
        logger.info(`No registered project uses ${packageName}.`);
        return;
      }
      for (const project of projects) {
        const versions = project.packages
          .filter((pkg) => pkg.name === packageName)
          .map((pkg) => `${pkg.version} (${pkg.ide})`)
          .join(", ");
        logger.info(`${project.path}  ${versions}`);
      }
    } catch (err) {
      fail(err);
    }
  });
