/**
 * The `process_query` operation: plan → execute → synthesize, with
 * coarse overall progress at fixed checkpoints and composed progress in
 * between.
 */

import type { ExecutionMode } from "../config/types";
import type { LanguageModel } from "../llm/client";
import type { Planner } from "../llm/planner";
import type { Synthesizer } from "../llm/synthesizer";
import { errorMessage } from "../router/errors";
import { MonotonicProgress, ProgressScaler } from "../router/progress";
import type { Router } from "../router/router";
import type {
  PlannedCall,
  ProgressReporter,
  ToolExecutionResult,
} from "../router/types";
import { createLogger } from "../util/logger";

const logger = createLogger("orchestrator");

export type OrchestrationPhase = "planning" | "executing" | "synthesizing" | "done";

export const NO_TOOLS_MESSAGE =
  "No downstream tools available. Please check server connections.";
export const CANCELLED_MESSAGE = "Query cancelled before completion.";

export interface OrchestratorDeps {
  router: Router;
  planner: Planner;
  synthesizer: Synthesizer;
  /** Answers directly when the planner finds no useful tool. */
  model: LanguageModel;
  executionMode?: ExecutionMode;
}

export interface ProcessQueryOptions {
  onProgress?: ProgressReporter;
  /** Observes phase transitions; used for diagnostics and tests. */
  onPhase?: (phase: OrchestrationPhase) => void;
  signal?: AbortSignal;
}

export class Orchestrator {
  private deps: OrchestratorDeps;
  private executionMode: ExecutionMode;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.executionMode = deps.executionMode ?? "sequential";
  }

  /**
   * Never rejects: every failure below this boundary is turned into a
   * partial result or a plain-text explanation.
   */
  async processQuery(
    query: string,
    options: ProcessQueryOptions = {},
  ): Promise<string> {
    try {
      return await this.run(query, options);
    } catch (err) {
      logger.error(`Query failed: ${errorMessage(err)}`);
      return `Error processing query: ${errorMessage(err)}`;
    }
  }

  private async run(query: string, options: ProcessQueryOptions): Promise<string> {
    const { router, planner, synthesizer } = this.deps;
    const { signal } = options;
    const progress = new MonotonicProgress(options.onProgress);
    let phase: OrchestrationPhase = "planning";
    const enter = (next: OrchestrationPhase): void => {
      logger.log(`${phase} → ${next}`);
      phase = next;
      options.onPhase?.(next);
    };
    options.onPhase?.(phase);

    progress.report(0.1, "Analyzing query and planning tool calls...");
    const catalog = router.snapshotCatalog();
    if (catalog.length === 0) {
      enter("done");
      return NO_TOOLS_MESSAGE;
    }

    progress.report(0.2, "Planning which tools to use...");
    const calls = await planner.plan(query, catalog, { signal });
    if (signal?.aborted) {
      enter("done");
      return CANCELLED_MESSAGE;
    }

    if (calls.length === 0) {
      progress.report(0.9, "Generating direct response...");
      const answer = await this.answerDirectly(query, signal);
      progress.report(1.0, "Complete!");
      enter("done");
      return answer;
    }

    enter("executing");
    progress.report(0.3, `Executing ${calls.length} tool(s)...`);
    const results = await this.executeAll(calls, progress, signal);

    if (signal?.aborted) {
      enter("done");
      return CANCELLED_MESSAGE;
    }

    enter("synthesizing");
    progress.report(0.9, "Synthesizing final response...");
    const answer = await synthesizer.synthesize(query, results, { signal });

    progress.report(1.0, "Complete!");
    enter("done");
    return answer;
  }

  private async executeAll(
    calls: readonly PlannedCall[],
    progress: MonotonicProgress,
    signal: AbortSignal | undefined,
  ): Promise<ToolExecutionResult[]> {
    const { dispatcher } = this.deps.router;
    const count = calls.length;

    const runOne = (call: PlannedCall, index: number): Promise<ToolExecutionResult> => {
      const scaler = ProgressScaler.forCall(index, count);
      progress.report(
        scaler.lo,
        `Executing tool ${index + 1}/${count}: ${call.toolName}`,
      );
      return dispatcher.execute(call, scaler, {
        onProgress: update => progress.report(update.fraction, update.message),
        signal,
      });
    };

    if (this.executionMode === "concurrent") {
      return Promise.all(calls.map(runOne));
    }

    const results: ToolExecutionResult[] = [];
    for (const [index, call] of calls.entries()) {
      results.push(await runOne(call, index));
    }
    return results;
  }

  private async answerDirectly(
    query: string,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    try {
      const text = await this.deps.model.complete(query, { signal });
      return text || "Unable to generate response.";
    } catch (err) {
      logger.error(`Direct answer failed: ${errorMessage(err)}`);
      return `Unable to generate a response: ${errorMessage(err)}`;
    }
  }
}
