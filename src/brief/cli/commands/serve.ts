/**
 * brief-agent serve command - Start the API server
 */

import { Command } from "commander";
import { loadConfig } from "../../config/loader.js";
import { errorMessage } from "../../errors.js";
import { generateRunId } from "../../orchestrator/core.js";
import { createLogger } from "../../runtime/logger.js";
import { BriefApiServer, EVENTS_PATH } from "../../server/api-server.js";

export interface ServeOptions {
  host?: string;
  port?: number;
  verbose?: boolean;
}

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Start the API server")
    .option("--host <host>", "Host to bind to (default: 127.0.0.1)")
    .option("-p, --port <port>", "Port to listen on (default: 8000)", (value) => parseInt(value, 10))
    .option("-v, --verbose", "Enable verbose logging")
    .action(async (opts: ServeOptions) => {
      try {
        const loaded = await loadConfig();
        const config = {
          ...loaded,
          server: {
            ...loaded.server,
            ...(opts.host ? { host: opts.host } : {}),
            ...(opts.port !== undefined && !Number.isNaN(opts.port) && { port: opts.port }),
          },
        };

        const logger = createLogger(generateRunId(), config.logging, {
          verbose: opts.verbose,
        });

        const server = new BriefApiServer({ config, logger });

        const shutdown = async (): Promise<void> => {
          console.log("\nShutting down...");
          await server.stop();
          await logger.flush();
          process.exit(0);
        };

        const onSignal = (): void => {
          shutdown().catch((error: unknown) => {
            console.error(`Shutdown failed: ${errorMessage(error)}`);
            process.exit(1);
          });
        };
        process.on("SIGINT", onSignal);
        process.on("SIGTERM", onSignal);

        const { host, port } = await server.start();

        console.log("");
        console.log("Brief API Server");
        console.log("================");
        console.log(`Output dir:  ${config.paths.outputDir}`);
        console.log(`Mode:        ${config.generation.defaultMode}`);
        console.log(`API:         http://${host}:${port}/api`);
        console.log(`Events:      ws://${host}:${port}${EVENTS_PATH}`);
        console.log("");
        console.log("Server running. Press Ctrl+C to stop.");
      } catch (error) {
        console.error(`Failed to start server: ${errorMessage(error)}`);
        if (process.env.DEBUG) {
          console.error(error);
        }
        process.exit(1);
      }
    });
}
