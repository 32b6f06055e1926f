#!/usr/bin/env node
/**
 * brief-agent CLI entry point
 */

import { runCli } from "./cli/main.js";

runCli().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
