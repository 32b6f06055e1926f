/**
 * OpenAI chat completions backend
 */

import OpenAI from "openai";
import type { BriefLogger } from "../runtime/logger.js";
import { RemoteBackend, type RemoteBackendOptions } from "./remote.js";

export const OPENAI_API_KEY_ENV = "OPENAI_API_KEY";

export class OpenAIBackend extends RemoteBackend {
  readonly mode = "openai" as const;

  private readonly client: OpenAI;

  constructor(logger: BriefLogger, options: RemoteBackendOptions) {
    super(logger, OPENAI_API_KEY_ENV, options);
    this.client = new OpenAI({ apiKey: this.apiKey });
    logger.info("Initialized OpenAI backend", { model: this.model });
  }

  protected async complete(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: this.maxTokens,
    });
    return response.choices[0]?.message.content ?? "";
  }
}
