import { Command } from "commander";
import * as p from "@clack/prompts";
import path from "node:path";
import { getPolicy } from "../lib/config.js";
import { createPackage } from "../lib/creator.js";
import { exitCodeForError, formatError, InvalidInputError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { projectRootFrom } from "../lib/options.js";
import { ClackPrompter, handleCancel, isInteractive } from "../lib/prompts.js";

interface CreateOptions {
  name?: string;
  namespace?: string;
  packageVersion?: string;
  description?: string;
  author?: string;
  license?: string;
  instruction?: string[];
  mcpConfig?: string;
  server?: string[];
  out?: string;
  project?: string;
  input?: boolean;
}

async function required(value: string | undefined, flag: string, message: string, interactive: boolean): Promise<string> {
  if (value) return value;
  if (!interactive) throw new InvalidInputError(`Missing ${flag}`);
  const answer = await p.text({
    message,
    validate(input) {
      if (!input.trim()) return `${message} is required`;
    },
  });
  return handleCancel(answer).trim();
}

export const createCommand = new Command("create")
  .description("Build a package from instruction files and MCP servers in this project")
  .option("--name <name>", "Package name (lowercase, digits and dashes)")
  .option("--namespace <namespace>", "Namespace, e.g. acme/tools")
  .option("--package-version <version>", "Initial package version", "0.1.0")
  .option("--description <text>", "Package description")
  .option("--author <author>", "Package author")
  .option("--license <license>", "License identifier")
  .option("--instruction <files...>", "Instruction files to include")
  .option("--mcp-config <file>", "MCP config to take servers from, e.g. .mcp.json")
  .option("--server <names...>", "Only these servers from the MCP config")
  .option("--out <dir>", "Output directory (defaults to ./<name>)")
  .option("--project <dir>", "Project directory (defaults to the current directory)")
  .option("--no-input", "Never prompt; medium-confidence values are templated")
  .action(async (options: CreateOptions) => {
    try {
      const interactive = isInteractive() && options.input !== false;
      const projectRoot = projectRootFrom(options.project);
      const prompter = new ClackPrompter();

      if (interactive) {
        p.intro("Create a package");
      } else {
        logger.blank();
      }

      const name = await required(options.name, "--name", "Package name", interactive);
      const namespace = await required(options.namespace, "--namespace", "Namespace", interactive);
      const description = await required(options.description, "--description", "Description", interactive);
      const author = await required(options.author, "--author", "Author", interactive);
      const instructions = options.instruction ?? [];
      if (instructions.length === 0 && !options.mcpConfig) {
        throw new InvalidInputError("Nothing to package: pass --instruction and/or --mcp-config");
      }

      const created = await createPackage({
        projectRoot,
        outputDir: path.resolve(projectRoot, options.out ?? name),
        name,
        namespace,
        ...(options.packageVersion !== undefined ? { version: options.packageVersion } : {}),
        description,
        author,
        ...(options.license !== undefined ? { license: options.license } : {}),
        instructions,
        ...(options.mcpConfig !== undefined ? { mcpConfig: options.mcpConfig } : {}),
        ...(options.server !== undefined ? { mcpServers: options.server } : {}),
        confirmMedium: interactive
          ? (key, value) => prompter.confirmSecret(key, value)
          : () => Promise.resolve(true),
        entropyThreshold: getPolicy().entropyThreshold,
      });

      for (const [server, names] of Object.entries(created.templated)) {
        if (names.length === 0) continue;
        const line = `${server}: ${names.join(", ")} replaced with placeholders`;
        if (interactive) p.log.info(line);
        else logger.info(line);
      }

      if (interactive) {
        p.outro(`Created ${path.relative(projectRoot, created.manifestPath)}`);
      } else {
        logger.success(`Created ${created.manifestPath}`);
        logger.blank();
      }
    } catch (err) {
      logger.error(formatError(err));
      process.exit(exitCodeForError(err));
    }
  });
