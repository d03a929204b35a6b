import { Command } from "commander";
import * as p from "@clack/prompts";
import { getPolicy } from "../lib/config.js";
import { exitCodeForError, formatError } from "../lib/errors.js";
import type { ExitCode } from "../lib/errors.js";
import { resolvePackageSource, SimpleGitTransport } from "../lib/git.js";
import { exitCodeForSummary, installPackage } from "../lib/installer.js";
import type { InstallSummary } from "../lib/installer.js";
import { logger } from "../lib/logger.js";
import { parseConflictStrategy, projectRootFrom, targetIdes } from "../lib/options.js";
import { ClackPrompter, isInteractive, withSpinner } from "../lib/prompts.js";
import { openMainRegistry } from "../lib/registry.js";

export function printSummary(summary: InstallSummary, interactive: boolean): void {
  const title = `${summary.namespace}/${summary.packageName}@${summary.version} → ${summary.ide}`;
  const counts = `${summary.installed} installed, ${summary.skipped} skipped, ${summary.failed} failed, ${summary.pending} pending credentials`;

  if (interactive) {
    for (const warning of summary.warnings) p.log.warn(warning);
    for (const outcome of summary.outcomes) {
      const line = `${outcome.kind} ${outcome.name}: ${outcome.detail}`;
      if (outcome.status === "failed") p.log.error(line);
      else if (outcome.ok) p.log.success(line);
      else p.log.warn(line);
    }
    p.log.info(`${title}: ${counts}`);
    return;
  }

  for (const warning of summary.warnings) logger.warn(warning);
  logger.bold(title);
  logger.table(
    ["kind", "name", "status", "detail"],
    summary.outcomes.map((o) => [o.kind, o.name, o.status, o.detail]),
  );
  logger.blank();
  if (summary.status === "complete") logger.success(counts);
  else if (summary.status === "partial") logger.warn(counts);
  else logger.error(counts);
}

/** Worst of several exit codes; failure beats partial beats success. */
export function worstExitCode(codes: ExitCode[]): ExitCode {
  return codes.reduce<ExitCode>((worst, code) => (code > worst ? code : worst), 0);
}

export const installCommand = new Command("install")
  .description("Install a package into the current project")
  .argument("<source>", "Package directory or git URL")
  .option("--ide <ide>", "Target IDE (defaults to every IDE detected in the project)")
  .option("--conflict <strategy>", "prompt, skip, overwrite or rename")
  .option("--ref <ref>", "Git tag, branch or commit to install")
  .option("--project <dir>", "Project directory (defaults to the current directory)")
  .option("--no-input", "Never prompt; conflicts keep the existing file")
  .option("--json", "Print the install summaries as JSON")
  .action(
    async (
      source: string,
      options: { ide?: string; conflict?: string; ref?: string; project?: string; input?: boolean; json?: boolean },
    ) => {
      try {
        const interactive = isInteractive() && options.input !== false && !options.json;
        const projectRoot = projectRootFrom(options.project);
        const ides = targetIdes(projectRoot, options.ide);
        const strategy = parseConflictStrategy(options.conflict);
        const prompter = interactive ? new ClackPrompter() : undefined;

        if (interactive) {
          p.intro(`Installing ${source}`);
        } else if (!options.json) {
          logger.blank();
        }

        const transport = new SimpleGitTransport();
        const resolved = await withSpinner(`Fetching ${source}`, () =>
          resolvePackageSource(source, transport, options.ref),
        );
        const registry = openMainRegistry();

        const summaries: InstallSummary[] = [];
        for (const ide of ides) {
          const summary = await installPackage(resolved.root, {
            projectRoot,
            ide,
            conflictStrategy: strategy,
            ...(prompter ? { conflictPrompter: prompter, credentialPrompter: prompter } : {}),
            registry,
            policy: getPolicy(),
            source: resolved.repository ?? resolved.root,
          });
          summaries.push(summary);
          if (!options.json) printSummary(summary, interactive);
        }

        if (options.json) {
          console.log(JSON.stringify(summaries, null, 2));
        } else if (interactive) {
          p.outro("Done!");
        } else {
          logger.blank();
        }
        process.exit(worstExitCode(summaries.map(exitCodeForSummary)));
      } catch (err) {
        logger.error(formatError(err));
        process.exit(exitCodeForError(err));
      }
    },
  );
