/**
 * Main CLI entry point for brief-agent
 */

import { Command } from "commander";
import { registerBriefsCommand } from "./commands/briefs.js";
import { registerCacheCommand } from "./commands/cache.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerRunCommand } from "./commands/run.js";
import { registerServeCommand } from "./commands/serve.js";
import { registerTickersCommand } from "./commands/tickers.js";

/**
 * Build the brief-agent CLI program
 */
export function buildProgram(): Command {
  const program = new Command();

  program
    .name("brief-agent")
    .description("IR & News Brief Agent - Company briefs from investor relations releases and news")
    .version("0.1.0");

  registerRunCommand(program);
  registerServeCommand(program);
  registerTickersCommand(program);
  registerBriefsCommand(program);
  registerConfigCommand(program);
  registerCacheCommand(program);

  return program;
}

/**
 * Run the CLI
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = buildProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
