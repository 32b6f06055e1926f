/**
 * Tests for orchestrator core functions
 */

import { describe, it, expect } from "vitest";
import { BriefErrorCode, isBriefError } from "../errors.js";
import {
  buildFailure,
  buildSuccess,
  createExecutionContext,
  formatRunLog,
  generateRunId,
  isRunSuccess,
  recordTrace,
  requireOutput,
  setOnce,
} from "./core.js";

const goal = { ticker: "NOKIA.HE", date: "2026-01-18", mode: "demo" } as const;

describe("orchestrator core", () => {
  describe("generateRunId", () => {
    it("embeds the timestamp and a random suffix", () => {
      const id = generateRunId(new Date("2026-01-18T09:30:15.123Z"));
      expect(id).toMatch(/^run_20260118T093015_[0-9a-f]{6}$/);
    });

    it("differs between calls", () => {
      const now = new Date();
      expect(generateRunId(now)).not.toBe(generateRunId(now));
    });
  });

  describe("createExecutionContext", () => {
    it("seeds the context from the goal", () => {
      const ctx = createExecutionContext(goal);

      expect(ctx.ticker).toBe("NOKIA.HE");
      expect(ctx.date).toBe("2026-01-18");
      expect(ctx.mode).toBe("demo");
      expect(ctx.stats.stepCount).toBe(0);
      expect(ctx.stats.retries).toBe(0);
      expect(ctx.trace).toEqual([]);
      expect(ctx.data).toEqual({});
    });
  });

  describe("setOnce", () => {
    it("writes a value", () => {
      const ctx = createExecutionContext(goal);
      setOnce(ctx, "newsRaw", [{ title: "a" }]);
      expect(ctx.data.newsRaw).toEqual([{ title: "a" }]);
    });

    it("rejects a second write", () => {
      const ctx = createExecutionContext(goal);
      setOnce(ctx, "irReleasesRaw", []);

      let caught: unknown;
      try {
        setOnce(ctx, "irReleasesRaw", [{ title: "late" }]);
      } catch (error) {
        caught = error;
      }

      expect(isBriefError(caught, BriefErrorCode.CONTEXT_ALREADY_SET)).toBe(true);
      expect(ctx.data.irReleasesRaw).toEqual([]);
    });
  });

  describe("requireOutput", () => {
    it("returns a written value", () => {
      const ctx = createExecutionContext(goal);
      setOnce(ctx, "news", [{ title: "a" }]);
      expect(requireOutput(ctx, "news")).toEqual([{ title: "a" }]);
    });

    it("throws for a missing value", () => {
      const ctx = createExecutionContext(goal);
      expect(() => requireOutput(ctx, "generatedSections")).toThrow(
        "Context key not set: generatedSections",
      );
    });
  });

  describe("run results", () => {
    const sampleBrief = {
      date: "2026-01-18",
      ticker: "NOKIA.HE",
      summary_bullets: ["a", "b", "c"],
      ir_releases: [],
      news: [],
      drivers: ["d"],
      risks: ["r"],
      limitations: [],
    };

    it("builds a success result", () => {
      const ctx = createExecutionContext(goal);
      ctx.stats.stepCount = 8;
      const outputPaths = { reportPath: "out/b.md", jsonPath: "out/b.json" };

      const result = buildSuccess(ctx, { brief: sampleBrief, outputPaths, issues: ["news required"] });

      expect(isRunSuccess(result)).toBe(true);
      expect(result.runId).toBe(ctx.runId);
      expect(result.outputPaths).toEqual(outputPaths);
      expect(result.issues).toEqual(["news required"]);
      expect(result.stats.steps).toBe(8);
      expect(result.stats.durationMs).toBeGreaterThanOrEqual(0);
    });

    it("builds a failure result with the failed step", () => {
      const ctx = createExecutionContext(goal);
      ctx.stats.retries = 1;

      const result = buildFailure(ctx, "backend down", "generate_sections");

      expect(isRunSuccess(result)).toBe(false);
      expect(result.failedStep).toBe("generate_sections");
      expect(result.error).toBe("backend down");
      expect(result.stats.retries).toBe(1);
    });

    it("omits the failed step when none is known", () => {
      const result = buildFailure(createExecutionContext(goal), "No brief was produced");
      expect("failedStep" in result).toBe(false);
    });
  });

  describe("formatRunLog", () => {
    it("renders the header and trace entries", () => {
      const ctx = createExecutionContext(goal);
      recordTrace(ctx, "step", "load_ir");
      recordTrace(ctx, "retry", "Retrying generate_sections", { error: "timeout" });

      const log = formatRunLog(ctx);

      expect(log).toContain(`# Run Log: ${ctx.runId}`);
      expect(log).toContain("**Ticker:** NOKIA.HE");
      expect(log).toContain("**Mode:** demo");
      expect(log).toMatch(/- `[\d:.]+Z` \[step\] load_ir/);
      expect(log).toContain('[retry] Retrying generate_sections {"error":"timeout"}');
    });
  });
});
