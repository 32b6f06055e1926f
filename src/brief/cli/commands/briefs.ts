/**
 * brief-agent briefs command - Inspect generated briefs
 */

import { Command } from "commander";
import { loadConfig } from "../../config/loader.js";
import { errorMessage } from "../../errors.js";
import { listBriefs, readBriefFile } from "../../storage/brief-store.js";

export function registerBriefsCommand(program: Command): void {
  const briefsCmd = program.command("briefs").description("Inspect generated briefs");

  briefsCmd
    .command("list")
    .description("List generated briefs, newest first")
    .option("-o, --output <dir>", "Output directory")
    .option("--json", "Output as JSON")
    .action(async (opts: { output?: string; json?: boolean }) => {
      try {
        const config = await loadConfig();
        const briefs = await listBriefs(opts.output ?? config.paths.outputDir);

        if (opts.json) {
          console.log(JSON.stringify(briefs, null, 2));
          return;
        }

        if (briefs.length === 0) {
          console.log("No briefs found.");
          return;
        }

        for (const brief of briefs) {
          console.log(`${brief.date}  ${brief.ticker.padEnd(14)} ${brief.filename}`);
        }
      } catch (error) {
        console.error(`Failed to list briefs: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  briefsCmd
    .command("show")
    .description("Print a brief (markdown report or JSON artifact)")
    .argument("<filename>", "Artifact file name, e.g. brief_NOKIA.HE_2026-01-18.md")
    .option("-o, --output <dir>", "Output directory")
    .action(async (filename: string, opts: { output?: string }) => {
      try {
        const config = await loadConfig();
        const stored = await readBriefFile(opts.output ?? config.paths.outputDir, filename);
        console.log(stored.kind === "json" ? JSON.stringify(stored.brief, null, 2) : stored.content);
      } catch (error) {
        console.error(`Failed to show brief: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
