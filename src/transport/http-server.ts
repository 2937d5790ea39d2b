/**
 * Streamable HTTP transport for the router's MCP server.
 * One SDK transport (and server instance) per MCP session.
 */

import { randomUUID, timingSafeEqual } from "node:crypto";
import {
  createServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  createRouterServer,
  type RouterServerContext,
  type RouterServerOptions,
} from "../server/router-server";
import { errorMessage } from "../router/errors";
import { createLogger } from "../util/logger";

const logger = createLogger("http");

export interface HttpServerOptions extends RouterServerOptions {
  port: number;
  host?: string;
  /** When set, /mcp requests must carry a matching x-api-key header. */
  apiKey?: string;
}

export interface RunningHttpServer {
  port: number;
  close: () => Promise<void>;
}

function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === "string" ? value : undefined;
}

export async function startHttpServer(
  ctx: RouterServerContext,
  options: HttpServerOptions,
): Promise<RunningHttpServer> {
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        transports.set(sessionId, transport);
        logger.log(`MCP session opened: ${sessionId}`);
      },
    });
    transport.onclose = () => {
      const { sessionId } = transport;
      if (sessionId) {
        transports.delete(sessionId);
        logger.log(`MCP session closed: ${sessionId}`);
      }
    };
    await createRouterServer(ctx, options).connect(transport);
    return transport;
  };

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/health" && req.method === "GET") {
      sendJson(res, 200, ctx.router.healthCheck());
      return;
    }

    if (url.pathname !== "/mcp") {
      sendJson(res, 404, { error: "Not found" });
      return;
    }

    if (options.apiKey) {
      const provided = headerValue(req, "x-api-key");
      if (provided === undefined || !safeCompare(provided, options.apiKey)) {
        sendJson(res, 401, { error: "Unauthorized" });
        return;
      }
    }

    const sessionId = headerValue(req, "mcp-session-id");
    const existing = sessionId ? transports.get(sessionId) : undefined;

    switch (req.method) {
      case "POST": {
        const transport = existing ?? await openSession();
        await transport.handleRequest(req, res);
        return;
      }
      case "GET": {
        if (!existing) {
          sendJson(res, 400, { error: "No session. Send POST /mcp first." });
          return;
        }
        await existing.handleRequest(req, res);
        return;
      }
      case "DELETE": {
        if (existing) {
          await existing.close();
        }
        res.writeHead(200);
        res.end();
        return;
      }
      default:
        sendJson(res, 405, { error: "Method not allowed" });
    }
  };

  const httpServer = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      logger.error(`Request failed: ${errorMessage(err)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal server error" });
      } else {
        res.end();
      }
    });
  });

  return new Promise((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      const address = httpServer.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port;
      logger.warn(`Router listening on http://${options.host ?? "localhost"}:${port}/mcp`);
      resolve({
        port,
        close: async () => {
          for (const transport of [...transports.values()]) {
            await transport.close();
          }
          transports.clear();
          await new Promise<void>(done => httpServer.close(() => done()));
        },
      });
    });
  });
}
