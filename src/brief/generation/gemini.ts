/**
 * Google Gemini backend. The only backend that asks the model for the
 * structured sections.
 */

import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import type { BriefLogger } from "../runtime/logger.js";
import { StructuredRemoteBackend, type RemoteBackendOptions } from "./remote.js";

export const GEMINI_API_KEY_ENV = "GEMINI_API_KEY";

export class GeminiBackend extends StructuredRemoteBackend {
  readonly mode = "gemini" as const;

  private readonly client: GenerativeModel;

  constructor(logger: BriefLogger, options: RemoteBackendOptions) {
    super(logger, GEMINI_API_KEY_ENV, options);
    this.client = new GoogleGenerativeAI(this.apiKey).getGenerativeModel({
      model: this.model,
      generationConfig: { maxOutputTokens: this.maxTokens },
    });
    logger.info("Initialized Gemini backend", { model: this.model });
  }

  protected async complete(prompt: string): Promise<string> {
    const result = await this.client.generateContent(prompt);
    return result.response.text();
  }
}
