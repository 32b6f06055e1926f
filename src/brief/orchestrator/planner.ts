/**
 * Planner - Turns a brief goal into the fixed step sequence
 */

import type { GenerationMode } from "../config/types.js";
import type { BriefLogger } from "../runtime/logger.js";
import type { FixtureKind } from "../sources/types.js";

/**
 * What a run should produce
 */
export interface Goal {
  readonly ticker: string;
  readonly date: string;
  readonly mode: GenerationMode;
}

interface StepBase {
  readonly description: string;
}

export type PlanStep =
  | (StepBase & { readonly type: "load_ir"; readonly params: Record<string, never> })
  | (StepBase & { readonly type: "load_news"; readonly params: Record<string, never> })
  | (StepBase & {
      readonly type: "select_items";
      readonly params: { readonly source: FixtureKind; readonly n: number };
    })
  | (StepBase & { readonly type: "generate_sections"; readonly params: Record<string, never> })
  | (StepBase & { readonly type: "render_output"; readonly params: Record<string, never> })
  | (StepBase & { readonly type: "validate"; readonly params: Record<string, never> })
  | (StepBase & { readonly type: "save"; readonly params: { readonly outputDir: string } });

export type StepType = PlanStep["type"];

/** IR releases kept after selection */
export const IR_SELECT_COUNT = 3;

/** News items kept after selection */
export const NEWS_SELECT_COUNT = 5;

export const DEFAULT_OUTPUT_DIR = "output";

export interface PlannerOptions {
  outputDir?: string;
}

/**
 * One-line rendering of a step for logs and traces
 */
export function describeStep(step: PlanStep): string {
  switch (step.type) {
    case "select_items":
      return `${step.type}(source=${step.params.source}, n=${step.params.n})`;
    case "save":
      return `${step.type}(outputDir=${step.params.outputDir})`;
    default:
      return step.type;
  }
}

export class Planner {
  private readonly outputDir: string;

  constructor(
    private readonly logger: BriefLogger,
    options: PlannerOptions = {},
  ) {
    this.outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;
  }

  /**
   * Plan a run. Every goal gets the same eight steps.
   */
  plan(goal: Goal): PlanStep[] {
    const steps: PlanStep[] = [
      { type: "load_ir", description: `Load IR releases for ${goal.ticker}`, params: {} },
      { type: "load_news", description: `Load news for ${goal.ticker}`, params: {} },
      {
        type: "select_items",
        description: "Select top IR releases",
        params: { source: "ir", n: IR_SELECT_COUNT },
      },
      {
        type: "select_items",
        description: "Select top news items",
        params: { source: "news", n: NEWS_SELECT_COUNT },
      },
      { type: "generate_sections", description: "Generate brief sections", params: {} },
      { type: "render_output", description: "Assemble the brief", params: {} },
      { type: "validate", description: "Validate the brief", params: {} },
      {
        type: "save",
        description: "Save brief artifacts",
        params: { outputDir: this.outputDir },
      },
    ];

    this.logger.info(`Created plan with ${steps.length} steps`, {
      ticker: goal.ticker,
      date: goal.date,
      mode: goal.mode,
    });
    steps.forEach((step, index) => {
      this.logger.debug(`  ${index + 1}. ${describeStep(step)}`);
    });

    return steps;
  }
}
