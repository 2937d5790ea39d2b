/**
 * `toolrelay query` command: runs one plan → execute → synthesize cycle
 * locally. Progress is drawn on stderr; the answer goes to stdout.
 */

import type { Command } from "commander";
import { errorMessage } from "../router/errors";
import type { ProgressUpdate } from "../router/types";
import { error as logError } from "../util/logger";
import {
  addConnectOptions,
  type ConnectOptions,
  createOrchestrator,
  type LlmOptions,
  startRouter,
} from "./common";
import { formatProgressBar } from "./format";

interface QueryOptions extends ConnectOptions, LlmOptions {
  progress: boolean;
}

function drawProgress(update: ProgressUpdate): void {
  const line = formatProgressBar(update.fraction, update.message);
  if (process.stderr.isTTY) {
    process.stderr.write(`\r\x1b[2K${line}`);
  } else {
    process.stderr.write(`${line}\n`);
  }
}

export function registerQueryCommand(program: Command): void {
  addConnectOptions(
    program
      .command("query")
      .description("Answer one query using the downstream tools")
      .argument("<text>", "Natural-language query"),
  )
    .option("--model <model>", "LLM used for planning and synthesis")
    .option("--concurrent", "Run planned tool calls concurrently")
    .option("--no-progress", "Don't draw progress on stderr")
    .action(async (text: string, options: QueryOptions) => {
      const controller = new AbortController();
      process.once("SIGINT", () => controller.abort());

      try {
        const started = await startRouter(options);
        const orchestrator = createOrchestrator(started, options);

        const answer = await orchestrator.processQuery(text, {
          onProgress: options.progress ? drawProgress : undefined,
          signal: controller.signal,
        });
        if (options.progress && process.stderr.isTTY) process.stderr.write("\n");

        console.log(answer);
        await started.router.close();
        process.exit(0);
      } catch (err) {
        logError(`query failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
