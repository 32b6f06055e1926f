/**
 * Orchestrator core - Run context, trace log and run results
 */

import crypto from "node:crypto";
import type { Brief } from "../brief/schema.js";
import type { GenerationMode } from "../config/types.js";
import { BriefError, BriefErrorCode } from "../errors.js";
import type { GeneratedSections } from "../generation/types.js";
import type { RawItem, StockInfo } from "../sources/types.js";
import type { BriefFiles } from "../storage/brief-store.js";
import type { StepType } from "./planner.js";

/**
 * Values produced by the steps of a run. Each is written once, by one step
 * type, and read only by later steps.
 */
export interface StepOutputs {
  stockInfo?: StockInfo;
  irReleasesRaw?: RawItem[];
  newsRaw?: RawItem[];
  irReleases?: RawItem[];
  news?: RawItem[];
  generatedSections?: GeneratedSections;
  brief?: Brief;
  outputPaths?: BriefFiles;
}

/**
 * Run statistics
 */
export interface RunStats {
  stepCount: number;
  retries: number;
  startTime: number;
}

/**
 * Trace entry
 */
export interface TraceEntry {
  timestamp: number;
  type: "plan" | "step" | "retry" | "warning" | "error";
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Per-run state owned by the agent
 */
export interface ExecutionContext {
  readonly runId: string;
  readonly ticker: string;
  readonly date: string;
  readonly mode: GenerationMode;
  stats: RunStats;
  trace: TraceEntry[];
  data: StepOutputs;
}

export interface RunStatsSummary {
  steps: number;
  retries: number;
  durationMs: number;
}

export interface RunSuccess {
  status: "success";
  runId: string;
  outputPaths: BriefFiles;
  brief: Brief;
  issues: string[];
  stats: RunStatsSummary;
}

export interface RunFailure {
  status: "failure";
  runId: string;
  failedStep?: StepType;
  error: string;
  stats: RunStatsSummary;
}

export type RunResult = RunSuccess | RunFailure;

export function isRunSuccess(result: RunResult): result is RunSuccess {
  return result.status === "success";
}

/**
 * Short id used for run logs and log file names
 */
export function generateRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\..+$/, "");
  return `run_${stamp}_${crypto.randomBytes(3).toString("hex")}`;
}

export function createExecutionContext(goal: {
  ticker: string;
  date: string;
  mode: GenerationMode;
}): ExecutionContext {
  return {
    runId: generateRunId(),
    ticker: goal.ticker,
    date: goal.date,
    mode: goal.mode,
    stats: {
      stepCount: 0,
      retries: 0,
      startTime: Date.now(),
    },
    trace: [],
    data: {},
  };
}

/**
 * Append an entry to the run trace
 */
export function recordTrace(
  ctx: ExecutionContext,
  type: TraceEntry["type"],
  message: string,
  data?: Record<string, unknown>,
): void {
  ctx.trace.push({ timestamp: Date.now(), type, message, data });
}

/**
 * Write a step output. A second write to the same key is a programming error.
 */
export function setOnce<K extends keyof StepOutputs>(
  ctx: ExecutionContext,
  key: K,
  value: NonNullable<StepOutputs[K]>,
): void {
  if (ctx.data[key] !== undefined) {
    throw new BriefError(BriefErrorCode.CONTEXT_ALREADY_SET, `Context key already set: ${key}`, {
      details: { key },
    });
  }
  ctx.data[key] = value;
}

/**
 * Read a step output a later step depends on
 */
export function requireOutput<K extends keyof StepOutputs>(
  ctx: ExecutionContext,
  key: K,
): NonNullable<StepOutputs[K]> {
  const value = ctx.data[key];
  if (value === undefined || value === null) {
    throw new BriefError(BriefErrorCode.CONTEXT_NOT_READY, `Context key not set: ${key}`, {
      details: { key },
    });
  }
  return value;
}

function summarizeStats(ctx: ExecutionContext): RunStatsSummary {
  return {
    steps: ctx.stats.stepCount,
    retries: ctx.stats.retries,
    durationMs: Date.now() - ctx.stats.startTime,
  };
}

export function buildSuccess(
  ctx: ExecutionContext,
  result: { brief: Brief; outputPaths: BriefFiles; issues: string[] },
): RunSuccess {
  return {
    status: "success",
    runId: ctx.runId,
    outputPaths: result.outputPaths,
    brief: result.brief,
    issues: result.issues,
    stats: summarizeStats(ctx),
  };
}

export function buildFailure(
  ctx: ExecutionContext,
  error: string,
  failedStep?: StepType,
): RunFailure {
  return {
    status: "failure",
    runId: ctx.runId,
    ...(failedStep ? { failedStep } : {}),
    error,
    stats: summarizeStats(ctx),
  };
}

/**
 * Format the run trace as markdown
 */
export function formatRunLog(ctx: ExecutionContext): string {
  const lines: string[] = [
    `# Run Log: ${ctx.runId}`,
    "",
    `**Ticker:** ${ctx.ticker}`,
    `**Date:** ${ctx.date}`,
    `**Mode:** ${ctx.mode}`,
    `**Started:** ${new Date(ctx.stats.startTime).toISOString()}`,
    `**Duration:** ${Date.now() - ctx.stats.startTime}ms`,
    `**Steps:** ${ctx.stats.stepCount}`,
    `**Retries:** ${ctx.stats.retries}`,
    "",
    "## Trace",
    "",
  ];

  for (const entry of ctx.trace) {
    const time = new Date(entry.timestamp).toISOString().split("T")[1];
    const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
    lines.push(`- \`${time}\` [${entry.type}] ${entry.message}${dataStr}`);
  }

  return lines.join("\n");
}
