#!/usr/bin/env node
import { Command } from "commander";
import { configCommand } from "./commands/config.js";
import { createCommand } from "./commands/create.js";
import { doctorCommand } from "./commands/doctor.js";
import { idesCommand } from "./commands/ides.js";
import { installCommand } from "./commands/install.js";
import { listCommand } from "./commands/list.js";
import { mcpCommand } from "./commands/mcp.js";
import { registryCommand } from "./commands/registry.js";
import { uninstallCommand } from "./commands/uninstall.js";
import { updateCommand } from "./commands/update.js";
import { validateCommand } from "./commands/validate.js";
import { logger } from "./lib/logger.js";

const program = new Command();

program
  .name("instructionkit")
  .description("Install instructions, MCP servers, hooks and commands into AI coding tools.")
  .version("0.1.0")
  .option("--verbose", "Print debug output")
  .hook("preAction", (command) => {
    if (command.opts<{ verbose?: boolean }>().verbose) logger.setVerbose(true);
  });

program.addCommand(installCommand);
program.addCommand(updateCommand);
program.addCommand(uninstallCommand);
program.addCommand(listCommand);
program.addCommand(createCommand);
program.addCommand(validateCommand);
program.addCommand(mcpCommand);
program.addCommand(registryCommand);
program.addCommand(doctorCommand);
program.addCommand(idesCommand);
program.addCommand(configCommand);

await program.parseAsync();
