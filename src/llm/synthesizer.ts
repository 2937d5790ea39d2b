/**
 * Turns tool results into the final answer.
 */

import type { LanguageModel } from "./client";
import { errorMessage, SynthesisError } from "../router/errors";
import type { ToolExecutionResult } from "../router/types";
import { createLogger } from "../util/logger";

const logger = createLogger("synthesizer");

export interface Synthesizer {
  /** Never rejects; failures come back as explanatory text. */
  synthesize(
    query: string,
    results: readonly ToolExecutionResult[],
    options?: { signal?: AbortSignal; },
  ): Promise<string>;
}

export function buildSynthesisPrompt(
  query: string,
  results: readonly ToolExecutionResult[],
): string {
  const resultsText = results
    .map(r => `Tool: ${r.toolName}\nSuccess: ${r.success}\nResult: ${r.resultText}`)
    .join("\n\n");

  return [
    "Using the tool execution results below, answer the user's query.",
    "Failed tools are listed with Success: false; mention what could not be",
    "retrieved instead of guessing.",
    "",
    `USER QUERY: ${query}`,
    "",
    "TOOL RESULTS:",
    resultsText,
    "",
    "Give a clear, well-structured answer. Be concise but complete.",
  ].join("\n");
}

export class LlmSynthesizer implements Synthesizer {
  private model: LanguageModel;

  constructor(model: LanguageModel) {
    this.model = model;
  }

  async synthesize(
    query: string,
    results: readonly ToolExecutionResult[],
    options: { signal?: AbortSignal; } = {},
  ): Promise<string> {
    try {
      const text = await this.model.complete(buildSynthesisPrompt(query, results), options);
      return text || "Unable to synthesize response.";
    } catch (err) {
      const failure = new SynthesisError(errorMessage(err), err);
      logger.error(`Synthesis failed: ${failure.message}`);
      return `Error synthesizing response: ${failure.message}`;
    }
  }
}
