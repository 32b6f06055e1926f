/**
 * brief-agent run command - Generate a brief for one ticker
 */

import { Command } from "commander";
import { BriefDateSchema, TickerSchema } from "../../brief/schema.js";
import { loadConfig } from "../../config/loader.js";
import { GenerationModeSchema } from "../../config/types.js";
import { errorMessage } from "../../errors.js";
import { createBriefAgent } from "../../orchestrator/agent.js";
import { formatRunLog, generateRunId } from "../../orchestrator/core.js";
import { createLogger } from "../../runtime/logger.js";

export interface RunOptions {
  ticker: string;
  date?: string;
  mode?: string;
  output?: string;
  json?: boolean;
  trace?: boolean;
}

/**
 * Today's date as YYYY-MM-DD (UTC)
 */
export function today(): string {
  return new Date().toISOString().slice(0, 10);
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Generate a brief for a ticker")
    .requiredOption("-t, --ticker <ticker>", "Stock ticker, e.g. NOKIA.HE")
    .option("-d, --date <date>", "Brief date (YYYY-MM-DD, default: today)")
    .option("-m, --mode <mode>", "Generation mode: demo, openai, anthropic or gemini")
    .option("-o, --output <dir>", "Output directory")
    .option("--json", "Output the result as JSON")
    .option("--trace", "Print the run trace and enable debug logging")
    .action(async (opts: RunOptions) => {
      try {
        const config = await loadConfig();

        const ticker = TickerSchema.safeParse(opts.ticker);
        if (!ticker.success) {
          console.error(`Invalid ticker: ${opts.ticker}`);
          process.exit(1);
        }
        const date = BriefDateSchema.safeParse(opts.date ?? today());
        if (!date.success) {
          console.error(`Invalid date: ${opts.date ?? ""} (expected YYYY-MM-DD)`);
          process.exit(1);
        }
        const mode = GenerationModeSchema.safeParse(opts.mode ?? config.generation.defaultMode);
        if (!mode.success) {
          console.error(`Unknown mode: ${opts.mode ?? ""}`);
          process.exit(1);
        }

        const logger = createLogger(generateRunId(), config.logging, {
          verbose: opts.trace,
          quiet: opts.json,
        });

        const agent = createBriefAgent(mode.data, config, logger, { outputDir: opts.output });
        const result = await agent.run(ticker.data, date.data);

        if (opts.trace && !opts.json) {
          const ctx = agent.getContext();
          if (ctx) {
            console.log("");
            console.log(formatRunLog(ctx));
          }
        }

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else if (result.status === "success") {
          console.log("");
          console.log("┌─ Brief Generated");
          console.log(`│ Run ID:    ${result.runId}`);
          console.log(`│ Report:    ${result.outputPaths.reportPath}`);
          console.log(`│ JSON:      ${result.outputPaths.jsonPath}`);
          console.log(`│ Steps:     ${result.stats.steps} (${result.stats.retries} retries)`);
          console.log(`│ Duration:  ${result.stats.durationMs}ms`);
          for (const issue of result.issues) {
            console.log(`│ Issue:     ${issue}`);
          }
          console.log("└─");
        } else {
          console.error("");
          console.error(`Brief generation failed: ${result.error}`);
          if (result.failedStep) {
            console.error(`Failed step: ${result.failedStep}`);
          }
        }

        await logger.flush();

        if (result.status !== "success") {
          process.exit(1);
        }
      } catch (error) {
        console.error(`Run failed: ${errorMessage(error)}`);
        if (process.env.DEBUG) {
          console.error(error);
        }
        process.exit(1);
      }
    });
}
