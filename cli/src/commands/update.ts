import { Command } from "commander";
import * as p from "@clack/prompts";
import type { PackageInstallationRecord } from "../types/index.js";
import { getPolicy } from "../lib/config.js";
import { exitCodeForError, formatError, NotFoundError } from "../lib/errors.js";
import type { ExitCode } from "../lib/errors.js";
import { resolvePackageSource, SimpleGitTransport } from "../lib/git.js";
import { exitCodeForSummary, updatePackage } from "../lib/installer.js";
import type { UpdateResult } from "../lib/installer.js";
import { logger } from "../lib/logger.js";
import { parseConflictStrategy, parseIde, projectRootFrom } from "../lib/options.js";
import { ClackPrompter, isInteractive, withSpinner } from "../lib/prompts.js";
import { openMainRegistry } from "../lib/registry.js";
import { InstallationTracker } from "../lib/tracker.js";
import { checkForUpdate } from "../lib/update-check.js";
import type { UpdateCheck } from "../lib/update-check.js";
import { printSummary, worstExitCode } from "./install.js";

function describeCheck(check: UpdateCheck): string {
  switch (check.status) {
    case "available":
      return `${check.installed} → ${check.latest}`;
    case "current":
      return "up to date";
    case "unknown":
      return `unknown (${check.reason})`;
  }
}

export const updateCommand = new Command("update")
  .description("Update installed packages from their recorded source")
  .argument("[package]", "Package name (omit to update all)")
  .option("--check", "Only report which packages have updates")
  .option("--ide <ide>", "Only packages installed for this IDE")
  .option("--conflict <strategy>", "prompt, skip, overwrite or rename")
  .option("--project <dir>", "Project directory (defaults to the current directory)")
  .option("--no-input", "Never prompt; conflicts keep the existing file")
  .option("--json", "Print results as JSON")
  .action(
    async (
      packageName: string | undefined,
      options: { check?: boolean; ide?: string; conflict?: string; project?: string; input?: boolean; json?: boolean },
    ) => {
      try {
        const interactive = isInteractive() && options.input !== false && !options.json;
        const projectRoot = projectRootFrom(options.project);
        const ide = options.ide !== undefined ? parseIde(options.ide) : undefined;
        const tracker = new InstallationTracker(projectRoot);
        const records = tracker
          .getInstalled()
          .filter(
            (r) =>
              (packageName === undefined || r.packageName === packageName) && (ide === undefined || r.ide === ide),
          );

        if (packageName !== undefined && records.length === 0) {
          throw new NotFoundError(`${packageName} is not installed in ${projectRoot}`);
        }
        if (records.length === 0) {
          logger.info("No packages installed.");
          return;
        }

        if (interactive) {
          p.intro(options.check ? "Checking for updates" : "Updating packages");
        } else if (!options.json) {
          logger.blank();
        }

        const transport = new SimpleGitTransport();
        const checks: { record: PackageInstallationRecord; check: UpdateCheck }[] = [];
        for (const record of records) {
          const check = await withSpinner(`Checking ${record.packageName} (${record.ide})`, () =>
            checkForUpdate(record, transport),
          );
          checks.push({ record, check });
        }

        if (options.check) {
          if (options.json) {
            console.log(JSON.stringify(checks.map((c) => ({ ide: c.record.ide, ...c.check })), null, 2));
          } else {
            logger.table(
              ["package", "ide", "installed", "update"],
              checks.map(({ record, check }) => [record.packageName, record.ide, record.version, describeCheck(check)]),
            );
            if (interactive) p.outro("Done!");
            else logger.blank();
          }
          return;
        }

        const strategy = parseConflictStrategy(options.conflict);
        const prompter = interactive ? new ClackPrompter() : undefined;
        const registry = openMainRegistry();
        const codes: ExitCode[] = [];
        const results: UpdateResult[] = [];

        for (const { record, check } of checks) {
          if (check.status !== "available" || !record.source) {
            if (!options.json) logger.info(`${record.packageName} (${record.ide}): ${describeCheck(check)}`);
            continue;
          }
          const resolved = await resolvePackageSource(record.source, transport, check.ref);
          const result = await updatePackage(resolved.root, {
            projectRoot,
            ide: record.ide,
            conflictStrategy: strategy,
            ...(prompter ? { conflictPrompter: prompter, credentialPrompter: prompter } : {}),
            registry,
            policy: getPolicy(),
            source: record.source,
          });
          results.push(result);
          codes.push(exitCodeForSummary(result));
          if (!options.json) {
            printSummary(result, interactive);
            for (const file of result.removed) logger.dim(`  removed ${file}`);
          }
        }

        if (options.json) {
          console.log(JSON.stringify(results, null, 2));
        } else if (results.length === 0) {
          logger.info("All packages are up to date.");
        }
        if (interactive) p.outro("Done!");
        process.exit(worstExitCode(codes));
      } catch (err) {
        logger.error(formatError(err));
        process.exit(exitCodeForError(err));
      }
    },
  );
