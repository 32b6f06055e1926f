/**
 * Configuration loading and validation
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import YAML from "yaml";
import { BriefError, BriefErrorCode, errorMessage, isNotFoundError } from "../errors.js";
import {
  type BriefConfig,
  BriefConfigSchema,
  LoggingConfigSchema,
  getDefaultConfig,
} from "./types.js";

/** Default config directory */
export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".brief-agent");

/** Default config file name */
export const CONFIG_FILE_NAME = "config.yaml";

/** Environment variable for config path override */
export const CONFIG_PATH_ENV = "BRIEF_AGENT_CONFIG_PATH";

/** Environment variable for config directory override */
export const CONFIG_DIR_ENV = "BRIEF_AGENT_CONFIG_DIR";

/** Environment variable overriding the configured log level */
export const LOG_LEVEL_ENV = "LOG_LEVEL";

/**
 * Get the configuration directory path
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_DIR_ENV] || DEFAULT_CONFIG_DIR;
}

/**
 * Get the configuration file path
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_PATH_ENV] || path.join(getConfigDir(env), CONFIG_FILE_NAME);
}

/**
 * Check if config file exists
 */
export async function configExists(env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
  try {
    await fs.access(getConfigPath(env));
    return true;
  } catch {
    return false;
  }
}

/**
 * Apply environment overrides on top of a loaded config
 */
export function applyEnvOverrides(
  config: BriefConfig,
  env: NodeJS.ProcessEnv = process.env,
): BriefConfig {
  const level = env[LOG_LEVEL_ENV]?.toLowerCase();
  if (!level) return config;

  const parsed = LoggingConfigSchema.shape.level.safeParse(level);
  if (!parsed.success) return config;

  return { ...config, logging: { ...config.logging, level: parsed.data } };
}

/**
 * Load configuration from file
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<BriefConfig> {
  const configPath = getConfigPath(env);

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) {
      // Return default config if file doesn't exist
      return applyEnvOverrides(getDefaultConfig(), env);
    }
    throw new BriefError(
      BriefErrorCode.CONFIG_INVALID,
      `Failed to read config from ${configPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  try {
    const parsed: unknown = YAML.parse(content) ?? {};
    return applyEnvOverrides(BriefConfigSchema.parse(parsed), env);
  } catch (error) {
    throw new BriefError(
      BriefErrorCode.CONFIG_INVALID,
      `Failed to load config from ${configPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * Save configuration to file
 */
export async function saveConfig(
  config: BriefConfig,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const configPath = getConfigPath(env);

  await fs.mkdir(path.dirname(configPath), { recursive: true });

  // Validate before saving
  const validated = BriefConfigSchema.parse(config);

  await fs.writeFile(configPath, YAML.stringify(validated, { indent: 2 }), "utf-8");
  return configPath;
}

/**
 * Write the default configuration, refusing to overwrite unless forced
 */
export async function initConfig(
  options: { force?: boolean; env?: NodeJS.ProcessEnv } = {},
): Promise<{ configPath: string; config: BriefConfig }> {
  const env = options.env ?? process.env;
  const configPath = getConfigPath(env);

  if (!options.force && (await configExists(env))) {
    throw new BriefError(BriefErrorCode.CONFIG_INVALID, `Config already exists at ${configPath}`);
  }

  const config = getDefaultConfig();
  await saveConfig(config, env);

  return { configPath, config };
}
