/**
 * In-process downstream MCP server for tests, connected over the SDK's
 * linked in-memory transport pair.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import {
  type CallToolResult,
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

export const DOWNSTREAM_TOOLS: Tool[] = [
  {
    name: "echo",
    description: "Echo the text back",
    inputSchema: {
      type: "object",
      properties: { text: { type: "string" } },
      required: ["text"],
    },
  },
  {
    name: "fail",
    description: "Always reports a tool error",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "image",
    description: "Returns non-text content",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "slowtool",
    description: "Waits until cancelled",
    inputSchema: { type: "object", properties: {} },
  },
];

function text(value: string, isError = false): CallToolResult {
  return { content: [{ type: "text", text: value }], isError };
}

/** Starts the server and returns the client end of the pair. */
export async function startDownstream(tools: Tool[] = DOWNSTREAM_TOOLS): Promise<Transport> {
  const server = new Server(
    { name: "test-downstream", version: "0.0.0" },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const token = request.params._meta?.progressToken;

    switch (name) {
      case "echo": {
        if (token !== undefined) {
          for (let step = 1; step <= 3; step++) {
            await extra.sendNotification({
              method: "notifications/progress",
              params: { progressToken: token, progress: step, total: 3, message: `step ${step}` },
            });
          }
        }
        const value = args?.text;
        return text(typeof value === "string" ? value : "");
      }
      case "fail":
        return text("disk full", true);
      case "image":
        return { content: [{ type: "image", data: "AAAA", mimeType: "image/png" }] };
      case "slowtool":
        await new Promise<void>(resolve => {
          extra.signal.addEventListener("abort", () => resolve(), { once: true });
        });
        return text("too late");
      default:
        return text(`unknown ${name}`, true);
    }
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  return clientTransport;
}
