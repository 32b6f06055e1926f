/**
 * Backend selection by generation mode
 */

import type { GenerationConfig, GenerationMode } from "../config/types.js";
import { MissingCredentialError } from "../errors.js";
import type { BriefLogger } from "../runtime/logger.js";
import { AnthropicBackend } from "./anthropic.js";
import { DeterministicBackend } from "./deterministic.js";
import { GeminiBackend } from "./gemini.js";
import { OpenAIBackend } from "./openai.js";
import type { RemoteBackendOptions } from "./remote.js";
import type { GenerationBackend } from "./types.js";

export interface BackendFactoryOptions {
  generation: GenerationConfig;
  env?: NodeJS.ProcessEnv;
}

function assertNever(value: never): never {
  throw new Error(`Unknown generation mode: ${String(value)}`);
}

function instantiate(
  mode: GenerationMode,
  logger: BriefLogger,
  options: BackendFactoryOptions,
): GenerationBackend {
  const { generation, env } = options;
  const remote = (model: string): RemoteBackendOptions => ({
    model,
    maxTokens: generation.maxTokens,
    env,
  });

  switch (mode) {
    case "demo":
      return new DeterministicBackend();
    case "openai":
      return new OpenAIBackend(logger, remote(generation.models.openai));
    case "anthropic":
      return new AnthropicBackend(logger, remote(generation.models.anthropic));
    case "gemini":
      return new GeminiBackend(logger, remote(generation.models.gemini));
    default:
      return assertNever(mode);
  }
}

/**
 * Create the backend for a mode. A remote mode without its API key falls
 * back to the deterministic backend.
 */
export function createBackend(
  mode: GenerationMode,
  logger: BriefLogger,
  options: BackendFactoryOptions,
): GenerationBackend {
  try {
    return instantiate(mode, logger, options);
  } catch (error) {
    if (error instanceof MissingCredentialError) {
      logger.warn(`${error.envVar} not found, falling back to demo mode`);
      return new DeterministicBackend();
    }
    throw error;
  }
}
