/**
 * Tests for the brief-agent CLI
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CONFIG_PATH_ENV } from "../config/loader.js";
import { buildProgram } from "./main.js";

describe("buildProgram", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "brief-cli-"));
    vi.stubEnv(CONFIG_PATH_ENV, path.join(tmpDir, "config.yaml"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function captureStdout(): () => unknown {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    return () => {
      const output: unknown = JSON.parse(logSpy.mock.calls.map((call) => String(call[0])).join("\n"));
      return output;
    };
  }

  it("registers every command", () => {
    const names = buildProgram().commands.map((command) => command.name());

    expect(names).toEqual(["run", "serve", "tickers", "briefs", "config", "cache"]);
  });

  it("searches tickers as JSON", async () => {
    const read = captureStdout();

    await buildProgram().parseAsync(["node", "brief-agent", "tickers", "nokia", "--json"]);

    expect(read()).toEqual([{ ticker: "NOKIA.HE", name: "Nokia Oyj", market: "Helsinki" }]);
  });

  it("generates a demo brief", async () => {
    const read = captureStdout();
    const outputDir = path.join(tmpDir, "output");

    await buildProgram().parseAsync([
      "node",
      "brief-agent",
      "run",
      "-t",
      "ACME",
      "-d",
      "2026-01-18",
      "-m",
      "demo",
      "-o",
      outputDir,
      "--json",
    ]);

    expect(read()).toMatchObject({
      status: "success",
      outputPaths: {
        reportPath: path.join(outputDir, "brief_ACME_2026-01-18.md"),
        jsonPath: path.join(outputDir, "brief_ACME_2026-01-18.json"),
      },
      brief: { ticker: "ACME", date: "2026-01-18" },
      issues: [],
      stats: { steps: 8, retries: 0 },
    });
    await expect(fs.access(path.join(outputDir, "brief_ACME_2026-01-18.md"))).resolves.toBeUndefined();
  });
});
