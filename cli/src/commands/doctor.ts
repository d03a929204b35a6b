import { Command } from "commander";
import { runDoctor, type DiagnosticIssue } from "../lib/doctor.js";
import { EXIT_CODES, exitCodeForError, formatError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { projectRootFrom } from "../lib/options.js";

function countLabel(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function printIssues(issues: DiagnosticIssue[]): void {
  // errors first, original order within a severity
  const ordered = [...issues].sort((a, b) => Number(a.severity === "warning") - Number(b.severity === "warning"));
  logger.table(
    ["severity", "problem", "fix"],
    ordered.map((issue) => [issue.severity, issue.message, issue.fix ?? "-"]),
  );
}

export const doctorCommand = new Command("doctor")
  .description("Check installed packages: files present, checksums, MCP entries and credentials")
  .option("--project <dir>", "Project directory (defaults to the current directory)")
  .option("--json", "Print the diagnostics as JSON")
  .action((options: { project?: string; json?: boolean }) => {
    try {
      const result = runDoctor(projectRootFrom(options.project));
      const errorCount = result.issues.filter((i) => i.severity === "error").length;
      const warningCount = result.issues.length - errorCount;

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else if (result.issues.length === 0) {
        logger.success(`${countLabel(result.packagesChecked, "package")} checked, no issues found`);
      } else {
        logger.blank();
        printIssues(result.issues);
        logger.blank();
        const summary = `${countLabel(result.packagesChecked, "package")} checked: ${countLabel(errorCount, "error")}, ${countLabel(warningCount, "warning")}`;
        if (errorCount > 0) {
          logger.error(summary);
        } else {
          logger.warn(summary);
        }
      }

      if (errorCount > 0) {
        process.exit(EXIT_CODES.failure);
      } else if (warningCount > 0) {
        process.exit(EXIT_CODES.partial);
      }
    } catch (err) {
      logger.error(formatError(err));
      process.exit(exitCodeForError(err));
    }
  });
