/**
 * Anthropic messages backend
 */

import Anthropic from "@anthropic-ai/sdk";
import type { BriefLogger } from "../runtime/logger.js";
import { RemoteBackend, type RemoteBackendOptions } from "./remote.js";

export const ANTHROPIC_API_KEY_ENV = "ANTHROPIC_API_KEY";

export class AnthropicBackend extends RemoteBackend {
  readonly mode = "anthropic" as const;

  private readonly client: Anthropic;

  constructor(logger: BriefLogger, options: RemoteBackendOptions) {
    super(logger, ANTHROPIC_API_KEY_ENV, options);
    this.client = new Anthropic({ apiKey: this.apiKey });
    logger.info("Initialized Anthropic backend", { model: this.model });
  }

  protected async complete(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [{ role: "user", content: prompt }],
    });
    const block = response.content[0];
    return block && block.type === "text" ? block.text : "";
  }
}
