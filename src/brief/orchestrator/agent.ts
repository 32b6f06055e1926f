/**
 * Brief agent - Executes the plan against a per-run context
 */

import type { Brief, IRRelease, NewsItem } from "../brief/schema.js";
import { validateBrief } from "../brief/validate.js";
import type { BriefConfig, GenerationMode } from "../config/types.js";
import { BriefError, BriefErrorCode, errorMessage } from "../errors.js";
import { createBackend } from "../generation/factory.js";
import type { GenerationBackend } from "../generation/types.js";
import type { BriefLogger } from "../runtime/logger.js";
import { FixtureReader } from "../sources/fixtures.js";
import { LiveFetchers } from "../sources/live.js";
import { type FixtureSource, type LiveSource, type RawItem, readText } from "../sources/types.js";
import { writeBriefFiles } from "../storage/brief-store.js";
import { FileCache } from "../storage/file-cache.js";
import {
  type ExecutionContext,
  type RunResult,
  buildFailure,
  buildSuccess,
  createExecutionContext,
  recordTrace,
  requireOutput,
  setOnce,
} from "./core.js";
import { type PlanStep, Planner, describeStep } from "./planner.js";
import { selectTop } from "./selector.js";

export interface BriefAgentDeps {
  logger: BriefLogger;
  backend: GenerationBackend;
  planner: Planner;
  fixtures: FixtureSource;
  live: LiveSource;
}

/**
 * A plan step that ended the run
 */
export class StepError extends BriefError {
  constructor(
    readonly step: PlanStep,
    readonly reason: unknown,
  ) {
    super(BriefErrorCode.STEP_FAILED, `Step ${step.type} failed: ${errorMessage(reason)}`, {
      cause: reason,
      details: { step: step.type },
    });
    this.name = "StepError";
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled step: ${JSON.stringify(value)}`);
}

function toIRRelease(item: RawItem): IRRelease {
  const summary = readText(item, "summary");
  return {
    title: readText(item, "title") ?? "",
    date: readText(item, "date") ?? "",
    source: readText(item, "source") ?? "",
    url: readText(item, "url") ?? "",
    ...(summary !== undefined && { summary }),
  };
}

function toNewsItem(item: RawItem): NewsItem {
  const date = readText(item, "date");
  const summary = readText(item, "summary");
  return {
    title: readText(item, "title") ?? "",
    source: readText(item, "source") ?? "",
    url: readText(item, "url") ?? "",
    ...(date !== undefined && { date }),
    ...(summary !== undefined && { summary }),
  };
}

export class BriefAgent {
  private readonly logger: BriefLogger;
  private readonly backend: GenerationBackend;
  private readonly planner: Planner;
  private readonly fixtures: FixtureSource;
  private readonly live: LiveSource;
  private ctx: ExecutionContext | null = null;

  constructor(
    readonly mode: GenerationMode,
    deps: BriefAgentDeps,
  ) {
    this.logger = deps.logger;
    this.backend = deps.backend;
    this.planner = deps.planner;
    this.fixtures = deps.fixtures;
    this.live = deps.live;
  }

  /**
   * Context of the current or most recent run
   */
  getContext(): ExecutionContext | null {
    return this.ctx;
  }

  /**
   * Produce and persist the brief for a ticker and date
   */
  async run(ticker: string, date: string): Promise<RunResult> {
    this.ctx = createExecutionContext({ ticker, date, mode: this.mode });
    const ctx = this.ctx;

    this.logger.info(`Starting brief generation for ${ticker} on ${date}`, {
      runId: ctx.runId,
      mode: this.mode,
      backend: this.backend.mode,
    });

    const steps = this.planner.plan({ ticker, date, mode: this.mode });
    recordTrace(ctx, "plan", `Plan: ${steps.length} steps`, {
      steps: steps.map(describeStep),
    });

    try {
      for (const [index, step] of steps.entries()) {
        this.logger.step(index + 1, steps.length, step.description);
        await this.executeWithPolicy(ctx, step);
      }
    } catch (error) {
      const failedStep = error instanceof StepError ? error.step.type : undefined;
      const message = error instanceof StepError ? errorMessage(error.reason) : errorMessage(error);
      this.logger.error(`Brief generation failed: ${message}`, { failedStep });
      recordTrace(ctx, "error", `Run failed: ${message}`, {
        failedStep,
        ...(error instanceof BriefError && { code: error.code }),
      });
      return buildFailure(ctx, message, failedStep);
    }

    const { brief, outputPaths } = ctx.data;
    if (!brief) {
      recordTrace(ctx, "error", "No brief was produced");
      return buildFailure(ctx, "No brief was produced");
    }

    const issues = validateBrief(brief);
    for (const issue of issues) {
      this.logger.warn(`Validation issue: ${issue}`);
      recordTrace(ctx, "warning", `Validation issue: ${issue}`);
    }

    if (!outputPaths) {
      recordTrace(ctx, "error", "Brief was not saved");
      return buildFailure(ctx, "Brief was not saved");
    }

    this.logger.info("Brief generation complete", {
      report: outputPaths.reportPath,
      json: outputPaths.jsonPath,
    });
    return buildSuccess(ctx, { brief, outputPaths, issues });
  }

  /**
   * Run a step. Section generation gets one immediate retry; any other
   * failure ends the run.
   */
  private async executeWithPolicy(ctx: ExecutionContext, step: PlanStep): Promise<void> {
    try {
      await this.executeStep(ctx, step);
      return;
    } catch (error) {
      if (step.type !== "generate_sections") {
        throw new StepError(step, error);
      }
      this.logger.warn(`Step ${step.type} failed, retrying once: ${errorMessage(error)}`);
      recordTrace(ctx, "retry", `Retrying ${step.type}`, { error: errorMessage(error) });
      ctx.stats.retries++;
    }

    try {
      await this.executeStep(ctx, step);
    } catch (error) {
      throw new StepError(step, error);
    }
  }

  private async executeStep(ctx: ExecutionContext, step: PlanStep): Promise<void> {
    ctx.stats.stepCount++;
    recordTrace(ctx, "step", describeStep(step));

    switch (step.type) {
      case "load_ir":
        return this.loadIr(ctx);
      case "load_news":
        return this.loadNews(ctx);
      case "select_items":
        return this.selectItems(ctx, step.params.source, step.params.n);
      case "generate_sections":
        return this.generateSections(ctx);
      case "render_output":
        return this.renderOutput(ctx);
      case "validate":
        // Validation runs once the plan has finished
        return;
      case "save":
        return this.save(ctx, step.params.outputDir);
      default:
        return assertNever(step);
    }
  }

  private async loadIr(ctx: ExecutionContext): Promise<void> {
    const items =
      this.mode === "demo"
        ? await this.fixtures.read("ir", ctx.ticker, ctx.date)
        : await this.live.fetchIr(ctx.ticker, ctx.data.stockInfo?.name ?? "");
    setOnce(ctx, "irReleasesRaw", items);
  }

  private async loadNews(ctx: ExecutionContext): Promise<void> {
    if (this.mode === "demo") {
      setOnce(ctx, "newsRaw", await this.fixtures.read("news", ctx.ticker, ctx.date));
      return;
    }

    if (!ctx.data.stockInfo) {
      setOnce(ctx, "stockInfo", await this.live.fetchStockInfo(ctx.ticker));
    }
    const companyName = ctx.data.stockInfo?.name ?? "";
    setOnce(ctx, "newsRaw", await this.live.fetchNews(ctx.ticker, companyName));
  }

  private selectItems(ctx: ExecutionContext, source: "ir" | "news", n: number): void {
    if (source === "ir") {
      setOnce(ctx, "irReleases", selectTop(requireOutput(ctx, "irReleasesRaw"), n));
    } else {
      setOnce(ctx, "news", selectTop(requireOutput(ctx, "newsRaw"), n));
    }
  }

  private async generateSections(ctx: ExecutionContext): Promise<void> {
    const sections = await this.backend.generateSections({
      ticker: ctx.ticker,
      date: ctx.date,
      irReleases: requireOutput(ctx, "irReleases"),
      news: requireOutput(ctx, "news"),
    });
    setOnce(ctx, "generatedSections", sections);
  }

  private renderOutput(ctx: ExecutionContext): void {
    const sections = requireOutput(ctx, "generatedSections");
    const brief: Brief = {
      date: ctx.date,
      ticker: ctx.ticker,
      summary_bullets: sections.summary_bullets,
      ir_releases: requireOutput(ctx, "irReleases").map(toIRRelease),
      news: requireOutput(ctx, "news").map(toNewsItem),
      drivers: sections.drivers,
      risks: sections.risks,
      limitations: sections.limitations,
    };
    setOnce(ctx, "brief", brief);
  }

  private async save(ctx: ExecutionContext, outputDir: string): Promise<void> {
    const brief = ctx.data.brief;
    if (!brief) {
      this.logger.warn("No brief to save");
      recordTrace(ctx, "warning", "No brief to save");
      return;
    }
    const paths = await writeBriefFiles(brief, outputDir);
    this.logger.info(`Wrote brief to ${paths.reportPath} and ${paths.jsonPath}`);
    setOnce(ctx, "outputPaths", paths);
  }
}

export interface CreateBriefAgentOptions {
  outputDir?: string;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
}

/**
 * Wire an agent from configuration
 */
export function createBriefAgent(
  mode: GenerationMode,
  config: BriefConfig,
  logger: BriefLogger,
  options: CreateBriefAgentOptions = {},
): BriefAgent {
  const cache = config.cache.enabled
    ? new FileCache(config.cache.dir, config.cache.ttlHours, logger)
    : undefined;

  return new BriefAgent(mode, {
    logger,
    backend: createBackend(mode, logger, { generation: config.generation, env: options.env }),
    planner: new Planner(logger, { outputDir: options.outputDir ?? config.paths.outputDir }),
    fixtures: new FixtureReader(config.paths.dataDir, logger),
    live: new LiveFetchers({ logger, cache, fetchImpl: options.fetchImpl }),
  });
}
