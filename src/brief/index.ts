/**
 * IR & News Brief Agent library entry point
 */

export * from "./errors.js";
export * from "./config/types.js";
export * from "./config/loader.js";
export * from "./runtime/logger.js";
export * from "./brief/schema.js";
export * from "./brief/validate.js";
export * from "./brief/render.js";
export * from "./generation/types.js";
export * from "./generation/deterministic.js";
export * from "./generation/remote.js";
export * from "./generation/openai.js";
export * from "./generation/anthropic.js";
export * from "./generation/gemini.js";
export * from "./generation/factory.js";
export * from "./sources/types.js";
export * from "./sources/fixtures.js";
export * from "./sources/live.js";
export * from "./sources/tickers.js";
export * from "./storage/file-cache.js";
export * from "./storage/brief-store.js";
export * from "./orchestrator/index.js";
export { BriefApiServer, GenerateRequestSchema, EVENTS_PATH } from "./server/api-server.js";
export type { BriefRunner, EventFrame, GenerationEvent, GenerateRequest } from "./server/api-server.js";
export { buildProgram, runCli } from "./cli/main.js";
