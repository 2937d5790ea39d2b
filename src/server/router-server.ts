/**
 * MCP server exposed to the planning client.
 * Uses the low-level Server API so handlers can stream progress.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  type CallToolResult,
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type ProgressToken,
  type ServerNotification,
  type Tool,
  ToolSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { Orchestrator } from "../orchestrator/orchestrator";
import { errorMessage } from "../router/errors";
import { MonotonicProgress, ProgressScaler } from "../router/progress";
import type { Router } from "../router/router";
import type { JsonObject, ProgressReporter } from "../router/types";
import { jsonObjectSchema } from "../router/json";
import { createLogger } from "../util/logger";
import { VERSION } from "../version";

const logger = createLogger("server");

export const PROCESS_QUERY = "process_query";
export const LIST_AVAILABLE_TOOLS = "list_available_tools";
export const HEALTH_CHECK = "health_check";

export const ROUTER_TOOLS: Tool[] = [
  {
    name: PROCESS_QUERY,
    description: "Answer a natural-language query using the downstream tools. "
      + "Plans which tools to call, runs them, and synthesizes a response. "
      + "Reports progress while it works.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Natural-language query or request" },
      },
      required: ["query"],
    },
  },
  {
    name: LIST_AVAILABLE_TOOLS,
    description: "List every downstream tool reachable through this router.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: HEALTH_CHECK,
    description: "Report the connection state of every downstream server.",
    inputSchema: { type: "object", properties: {} },
  },
];

const processQueryArgs = z.object({ query: z.string().min(1) });

export interface RouterServerOptions {
  /** Also list downstream tools and route direct calls to them. */
  exposeDownstreamTools?: boolean;
}

export interface RouterServerContext {
  router: Router;
  orchestrator: Orchestrator;
}

function textResult(text: string, isError = false): CallToolResult {
  return { content: [{ type: "text", text }], isError };
}

function progressForwarder(
  token: ProgressToken | undefined,
  send: (notification: ServerNotification) => Promise<void>,
): ProgressReporter | undefined {
  if (token === undefined) return undefined;
  return update => {
    send({
      method: "notifications/progress",
      params: {
        progressToken: token,
        progress: update.fraction,
        total: update.total,
        message: update.message,
      },
    }).catch((err: unknown) => {
      logger.warn(`Failed to send progress: ${errorMessage(err)}`);
    });
  };
}

export function registerRouterHandlers(
  server: Server,
  ctx: RouterServerContext,
  options: RouterServerOptions = {},
): void {
  const { router, orchestrator } = ctx;
  const routerToolNames = new Set(ROUTER_TOOLS.map(t => t.name));

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools: Tool[] = [...ROUTER_TOOLS];
    if (options.exposeDownstreamTools) {
      for (const route of router.connections.routes()) {
        if (routerToolNames.has(route.toolName)) continue;
        const inputSchema = ToolSchema.shape.inputSchema.safeParse(route.schema.inputSchema);
        if (!inputSchema.success) {
          logger.warn(`Not exposing ${route.toolName}: input schema is not an object schema`);
          continue;
        }
        tools.push({
          name: route.toolName,
          description: route.schema.description
            ? `[${route.serverName}] ${route.schema.description}`
            : `[${route.serverName}] ${route.toolName}`,
          inputSchema: inputSchema.data,
        });
      }
    }
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const onProgress = progressForwarder(
      request.params._meta?.progressToken,
      extra.sendNotification,
    );
    logger.log(`Tool call: ${name}`);

    switch (name) {
      case PROCESS_QUERY: {
        const parsed = processQueryArgs.safeParse(args ?? {});
        if (!parsed.success) {
          return textResult("Error: process_query requires a non-empty 'query' string", true);
        }
        const answer = await orchestrator.processQuery(parsed.data.query, {
          onProgress,
          signal: extra.signal,
        });
        return textResult(answer);
      }
      case LIST_AVAILABLE_TOOLS:
        return textResult(JSON.stringify(router.listAvailableTools(), null, 2));
      case HEALTH_CHECK:
        return textResult(JSON.stringify(router.healthCheck(), null, 2));
    }

    if (options.exposeDownstreamTools && router.resolve(name)) {
      const parsedArgs = jsonObjectSchema.safeParse(args ?? {});
      if (!parsedArgs.success) {
        return textResult(`Error: invalid arguments for ${name}: ${parsedArgs.error.message}`, true);
      }
      const callArgs: JsonObject = parsedArgs.data;
      const progress = new MonotonicProgress(onProgress);
      const result = await router.dispatcher.execute(
        { toolName: name, arguments: callArgs },
        new ProgressScaler(0, 1),
        {
          onProgress: update => progress.report(update.fraction, update.message),
          signal: extra.signal,
        },
      );
      return textResult(result.resultText, !result.success);
    }

    logger.warn(`Unknown tool requested: ${name}`);
    return textResult(`Error: Unknown tool: ${name}`, true);
  });
}

export function createRouterServer(
  ctx: RouterServerContext,
  options: RouterServerOptions = {},
): Server {
  const server = new Server(
    { name: "toolrelay", version: VERSION },
    { capabilities: { tools: {} } },
  );
  registerRouterHandlers(server, ctx, options);
  return server;
}

/** Serves the router over stdio. */
export class RouterServer {
  private server: Server;

  constructor(ctx: RouterServerContext, options: RouterServerOptions = {}) {
    this.server = createRouterServer(ctx, options);
  }

  async serve(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.log("Router listening on stdio");
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}
