/**
 * brief-agent config command - View and initialize configuration
 */

import { Command } from "commander";
import YAML from "yaml";
import { getConfigPath, initConfig, loadConfig } from "../../config/loader.js";
import { errorMessage } from "../../errors.js";

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command("config").description("View and initialize configuration");

  configCmd
    .command("path")
    .description("Show config file path")
    .action(() => {
      console.log(getConfigPath());
    });

  configCmd
    .command("show")
    .description("Show current configuration")
    .option("--json", "Output as JSON instead of YAML")
    .action(async (opts: { json?: boolean }) => {
      try {
        const config = await loadConfig();
        console.log(opts.json ? JSON.stringify(config, null, 2) : YAML.stringify(config));
      } catch (error) {
        console.error(`Failed to load config: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  configCmd
    .command("init")
    .description("Write the default configuration")
    .option("--force", "Overwrite an existing config file")
    .action(async (opts: { force?: boolean }) => {
      try {
        const { configPath } = await initConfig({ force: opts.force });
        console.log(`✓ Wrote default config to ${configPath}`);
      } catch (error) {
        console.error(`Failed to initialize config: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
