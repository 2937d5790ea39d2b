/**
 * Anthropic SDK wrapper used for planning, synthesis and direct answers.
 */

import Anthropic from "@anthropic-ai/sdk";
import { log } from "../util/logger";

export const DEFAULT_MODEL = "claude-sonnet-4-5";

/** One-shot text completion. The only LLM surface the router needs. */
export interface LanguageModel {
  complete(prompt: string, options?: { signal?: AbortSignal; }): Promise<string>;
}

export interface ChatClientOptions {
  apiKey?: string;
  authToken?: string;
  model?: string;
  systemPrompt?: string;
  maxTokens?: number;
}

export class ChatClient implements LanguageModel {
  private client: Anthropic;
  readonly model: string;
  readonly systemPrompt?: string;
  private maxTokens: number;

  constructor(options: ChatClientOptions) {
    if (!options.apiKey && !options.authToken) {
      throw new Error("ChatClient requires either apiKey or authToken");
    }

    this.client = new Anthropic({
      apiKey: options.apiKey,
      authToken: options.authToken,
    });
    this.model = options.model ?? DEFAULT_MODEL;
    this.systemPrompt = options.systemPrompt;
    this.maxTokens = options.maxTokens ?? 4096;
  }

  async complete(
    prompt: string,
    options: { signal?: AbortSignal; } = {},
  ): Promise<string> {
    log(`Sending ${prompt.length}-char prompt to ${this.model}`);

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [{ role: "user", content: prompt }],
    };

    if (this.systemPrompt) {
      params.system = this.systemPrompt;
    }

    const message = await this.client.messages.create(params, {
      signal: options.signal,
    });

    return message.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map(block => block.text)
      .join("")
      .trim();
  }
}
