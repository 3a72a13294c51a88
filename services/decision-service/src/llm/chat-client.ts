import OpenAI from "openai";
import type { LlmConfig } from "../config";
import { LlmConfigurationError } from "../errors";
import { logger } from "../logger";
import { withRetry } from "./retry";
import type { RetryOptions } from "./retry";

export type ChatRequest = {
  system: string;
  user: string;
  json?: boolean;
  maxTokens?: number;
};

export interface ChatClient {
  readonly model: string;
  complete(request: ChatRequest): Promise<string>;
}

export class OpenAiChatClient implements ChatClient {
  readonly model: string;
  private readonly openai: OpenAI;

  constructor(
    private readonly settings: LlmConfig,
    private readonly sleep?: RetryOptions["sleep"]
  ) {
    if (!settings.apiKey) {
      throw new LlmConfigurationError("OPENAI_API_KEY is required to build the chat client");
    }
    if (!settings.model.trim()) {
      throw new LlmConfigurationError("OPENAI_MODEL must name a chat model");
    }
    this.model = settings.model;
    this.openai = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      // retries are handled by withRetry so that only rate limits and timeouts repeat
      maxRetries: 0
    });
  }

  async complete(request: ChatRequest): Promise<string> {
    const started = Date.now();
    const response = await withRetry(
      () =>
        this.openai.chat.completions.create({
          model: this.model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.user }
          ],
          response_format: request.json ? { type: "json_object" } : undefined,
          max_tokens: request.maxTokens ?? this.settings.maxTokens
        }),
      { ...this.settings.retry, operation: "chat.completions", sleep: this.sleep }
    );
    const content = response.choices[0]?.message.content ?? "";
    logger.debug({ model: this.model, chars: content.length, elapsedMs: Date.now() - started }, "Chat completion received");
    return content;
  }
}
