/**
 * Orchestrator exports
 */

export * from "./core.js";
export * from "./planner.js";
export * from "./selector.js";
export * from "./agent.js";
