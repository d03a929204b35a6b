import { Command } from "commander";
import { stringify } from "yaml";
import { getConfigDir, readConfig, setConfigValue } from "../lib/config.js";
import { exitCodeForError, formatError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

export const configCommand = new Command("config").description("Read and change ~/.instructionkit/config.yaml");

configCommand
  .command("get")
  .description("Print the current configuration")
  .action(() => {
    const config = readConfig();
    if (Object.keys(config).length === 0) {
      logger.info(`No configuration in ${getConfigDir()}; defaults apply.`);
      return;
    }
    process.stdout.write(stringify(config));
  });

configCommand
  .command("set")
  .description("Set a configuration value, e.g. conflict_strategy skip")
  .argument("<key>", "Dotted key such as policy.resource_max_bytes")
  .argument("<value>", "New value")
  .action((key: string, value: string) => {
    try {
      setConfigValue(key, value);
      logger.success(`Set ${key}`);
    } catch (err) {
      logger.error(formatError(err));
      process.exit(exitCodeForError(err));
    }
  });
