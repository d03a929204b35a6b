import { Command } from "commander";
import * as p from "@clack/prompts";
import { exitCodeForError, EXIT_CODES, formatError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { syncMcpCredentials } from "../lib/mcp-sync.js";
import { parseIde, projectRootFrom } from "../lib/options.js";
import { ClackPrompter, isInteractive } from "../lib/prompts.js";

export const mcpCommand = new Command("mcp").description("Manage MCP servers installed by packages");

mcpCommand
  .command("sync")
  .description("Fill in credentials for MCP servers that are still waiting for them")
  .option("--ide <ide>", "Only servers installed for this IDE")
  .option("--project <dir>", "Project directory (defaults to the current directory)")
  .option("--no-input", "Use stored credentials only")
  .action(async (options: { ide?: string; project?: string; input?: boolean }) => {
    try {
      const interactive = isInteractive() && options.input !== false;
      if (interactive) p.intro("Syncing MCP credentials");

      const result = await syncMcpCredentials({
        projectRoot: projectRootFrom(options.project),
        ...(options.ide !== undefined ? { ide: parseIde(options.ide) } : {}),
        ...(interactive ? { prompter: new ClackPrompter() } : {}),
      });

      if (result.servers.length === 0) {
        logger.info("No MCP servers are waiting for credentials.");
        return;
      }
      for (const server of result.servers) {
        const label = `${server.server} (${server.packageName}, ${server.ide})`;
        if (server.status === "resolved") logger.success(`${label} configured in ${server.configPath}`);
        else if (server.status === "missing") logger.error(`${label} is missing from ${server.configPath}`);
        else logger.warn(`${label} still needs ${server.missing.join(", ")}`);
      }

      if (interactive) p.outro(`${result.resolved} resolved, ${result.pending} pending`);
      process.exit(result.pending > 0 ? EXIT_CODES.partial : EXIT_CODES.success);
    } catch (err) {
      logger.error(formatError(err));
      process.exit(exitCodeForError(err));
    }
  });
