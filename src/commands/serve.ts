/**
 * `toolrelay serve` command: connects downstream servers and starts the
 * router's MCP server on stdio (default) or Streamable HTTP.
 */

import type { Command } from "commander";
import { RouterServer } from "../server/router-server";
import { error as logError, log } from "../util/logger";
import { errorMessage } from "../router/errors";
import {
  addConnectOptions,
  type ConnectOptions,
  createOrchestrator,
  type LlmOptions,
  parsePositiveInt,
  startRouter,
} from "./common";

interface ServeOptions extends ConnectOptions, LlmOptions {
  transport: string;
  port: number;
  host?: string;
  apiKey?: string;
  exposeTools?: boolean;
}

export function registerServeCommand(program: Command): void {
  addConnectOptions(
    program
      .command("serve")
      .description("Start the router MCP server"),
  )
    .option("--transport <type>", "Transport: stdio | http", "stdio")
    .option("--port <port>", "Port for HTTP transport", parsePositiveInt, 8002)
    .option("--host <host>", "Interface for HTTP transport")
    .option("--api-key <key>", "Require this x-api-key on HTTP requests")
    .option("--model <model>", "LLM used for planning and synthesis")
    .option("--concurrent", "Run planned tool calls concurrently")
    .option("--expose-tools", "Also expose downstream tools directly")
    .action(async (options: ServeOptions) => {
      try {
        if (options.transport !== "stdio" && options.transport !== "http") {
          throw new Error(`Unknown transport "${options.transport}". Use stdio or http`);
        }

        const started = await startRouter(options);
        const orchestrator = createOrchestrator(started, options);
        const ctx = { router: started.router, orchestrator };
        const serverOptions = { exposeDownstreamTools: options.exposeTools ?? false };

        let closeServer: () => Promise<void>;
        if (options.transport === "http") {
          const { startHttpServer } = await import("../transport/http-server.js");
          const server = await startHttpServer(ctx, {
            ...serverOptions,
            port: options.port,
            host: options.host,
            apiKey: options.apiKey,
          });
          closeServer = server.close;
        } else {
          const server = new RouterServer(ctx, serverOptions);
          await server.serve();
          closeServer = () => server.close();
        }

        const shutdown = async (): Promise<void> => {
          log("Shutting down...");
          try {
            await closeServer();
            await started.router.close();
          } catch (err) {
            logError(`shutdown failed: ${errorMessage(err)}`);
          } finally {
            process.exit(0);
          }
        };

        process.on("SIGINT", () => void shutdown());
        process.on("SIGTERM", () => void shutdown());
      } catch (err) {
        logError(`serve failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
