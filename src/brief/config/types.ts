/**
 * Configuration types for the brief agent
 */

import { z } from "zod";

/**
 * Generation modes: the deterministic template plus one per remote provider
 */
export const GENERATION_MODES = ["demo", "openai", "anthropic", "gemini"] as const;

export const GenerationModeSchema = z.enum(GENERATION_MODES);

export type GenerationMode = z.infer<typeof GenerationModeSchema>;

/**
 * Filesystem locations
 */
export const PathsConfigSchema = z.object({
  /** Directory receiving brief_<TICKER>_<DATE>.md/.json */
  outputDir: z.string().default("output"),
  /** Directory holding sample_ir.json and sample_news.json for demo mode */
  dataDir: z.string().default("data"),
});

export type PathsConfig = z.infer<typeof PathsConfigSchema>;

/**
 * Server configuration
 */
export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().default("127.0.0.1"),
  /** Port to listen on */
  port: z.number().int().min(0).max(65535).default(8000),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Text generation configuration
 */
export const GenerationConfigSchema = z.object({
  /** Mode used when a request does not name one */
  defaultMode: GenerationModeSchema.default("demo"),
  /** Model name per remote provider */
  models: z
    .object({
      openai: z.string().default("gpt-4o-mini"),
      anthropic: z.string().default("claude-3-5-haiku-latest"),
      gemini: z.string().default("gemini-2.0-flash"),
    })
    .default({}),
  /** Upper bound on generated tokens per request */
  maxTokens: z.number().int().positive().default(1000),
});

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;

/**
 * Cache for live fetches
 */
export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  dir: z.string().default(".cache"),
  ttlHours: z.number().positive().default(24),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  /** Directory for log files */
  logDir: z.string().optional(),
  /** Enable structured JSON logging */
  jsonLogs: z.boolean().default(false),
  /** Include timestamps */
  timestamps: z.boolean().default(true),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Main configuration
 */
export const BriefConfigSchema = z.object({
  /** Config version */
  version: z.literal(1).default(1),
  paths: PathsConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  generation: GenerationConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type BriefConfig = z.infer<typeof BriefConfigSchema>;

/**
 * Default configuration
 */
export function getDefaultConfig(): BriefConfig {
  return BriefConfigSchema.parse({});
}
