/**
 * Wraps the MCP SDK Client for a single downstream server.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import {
  getDefaultEnvironment,
  StdioClientTransport,
} from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolResultSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { isHttpConfig } from "../config/types";
import {
  ConnectionError,
  errorMessage,
  ProtocolError,
  RemoteError,
  TimeoutError,
} from "./errors";
import {
  callToolResultSchema,
  extractResultText,
  toolDescriptorSchema,
} from "./json";
import type {
  DownstreamEndpoint,
  InvokeOptions,
  JsonObject,
  ProgressSink,
  SessionState,
  ToolDescriptor,
  ToolExecutionResult,
  TransportSession,
} from "./types";
import { createLogger } from "../util/logger";
import { VERSION } from "../version";

const logger = createLogger("session");

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export type TransportFactory = (endpoint: DownstreamEndpoint) => Transport;

export interface UpstreamSessionOptions {
  /** Overrides transport creation from the endpoint config. */
  createTransport?: TransportFactory;
  requestTimeoutMs?: number;
}

export function createTransportFor(endpoint: DownstreamEndpoint): Transport {
  const { config } = endpoint;

  if (isHttpConfig(config)) {
    const url = new URL(config.url);
    if (config.type === "sse") {
      return new SSEClientTransport(url);
    }
    // Default to StreamableHTTP for "url" type
    return new StreamableHTTPClientTransport(url);
  }

  return new StdioClientTransport({
    command: config.command,
    args: config.args,
    env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
  });
}

export class UpstreamSession implements TransportSession {
  readonly endpoint: DownstreamEndpoint;
  private client: Client;
  private createTransport: TransportFactory;
  private requestTimeoutMs: number;
  private _state: SessionState = "disconnected";
  private _tools: ToolDescriptor[] = [];
  private _failure?: string;

  constructor(endpoint: DownstreamEndpoint, options: UpstreamSessionOptions = {}) {
    this.endpoint = endpoint;
    this.createTransport = options.createTransport ?? createTransportFor;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.client = new Client(
      { name: `toolrelay-${endpoint.name}`, version: VERSION },
      { capabilities: {} },
    );
  }

  get name(): string {
    return this.endpoint.name;
  }

  get state(): SessionState {
    return this._state;
  }

  get declaredTools(): readonly ToolDescriptor[] {
    return this._tools;
  }

  get failure(): string | undefined {
    return this._failure;
  }

  async connect(): Promise<void> {
    logger.log(`Connecting to downstream: ${this.name} (${this.endpoint.address})`);
    const previous = this._state;
    this._state = "connecting";

    try {
      await this.client.connect(this.createTransport(this.endpoint));
    } catch (err) {
      this._state = previous;
      throw new ConnectionError(
        this.name,
        `Failed to connect to ${this.name}: ${errorMessage(err)}`,
        err,
      );
    }
  }

  async listCapabilities(): Promise<ToolDescriptor[]> {
    let raw: unknown[];
    try {
      const result = await this.client.listTools();
      raw = result.tools;
    } catch (err) {
      throw new ProtocolError(
        this.name,
        `Tool discovery failed on ${this.name}: ${errorMessage(err)}`,
        err,
      );
    }

    const tools: ToolDescriptor[] = [];
    for (const entry of raw) {
      const parsed = toolDescriptorSchema.safeParse(entry);
      if (!parsed.success) {
        throw new ProtocolError(
          this.name,
          `Malformed tool descriptor from ${this.name}: ${parsed.error.message}`,
        );
      }
      tools.push({
        name: parsed.data.name,
        description: parsed.data.description ?? "",
        inputSchema: parsed.data.inputSchema,
      });
    }

    if (tools.length === 0) {
      logger.warn(`${this.name}: connected but discovered 0 tools`);
    }

    this._tools = tools;
    this._state = "ready";
    this._failure = undefined;
    logger.log(`Connected to ${this.name}: ${tools.length} tools`);
    return tools;
  }

  markFailed(reason: string): void {
    this._state = "failed";
    this._failure = reason;
    this._tools = [];
  }

  async invoke(
    toolName: string,
    args: JsonObject,
    sink: ProgressSink,
    options: InvokeOptions = {},
  ): Promise<ToolExecutionResult> {
    if (this._state !== "ready") {
      throw new RemoteError(toolName, `Downstream ${this.name} is not connected`);
    }

    logger.log(`Calling ${this.name}/${toolName}`);
    let raw: unknown;
    try {
      raw = await this.client.callTool(
        { name: toolName, arguments: args },
        CallToolResultSchema,
        {
          // The SDK allocates a fresh progressToken per request.
          onprogress: progress => {
            sink({
              progress: progress.progress,
              total: progress.total,
              message: progress.message,
            });
          },
          signal: options.signal,
          timeout: options.timeoutMs ?? this.requestTimeoutMs,
          resetTimeoutOnProgress: true,
        },
      );
    } catch (err) {
      // The SDK rejects a caller abort with a RequestTimeout code too.
      if (options.signal?.aborted) {
        throw new RemoteError(toolName, `Call cancelled: ${errorMessage(err)}`, err);
      }
      if (err instanceof McpError && err.code === ErrorCode.RequestTimeout) {
        throw new TimeoutError(toolName, err.message, err);
      }
      throw new RemoteError(toolName, errorMessage(err), err);
    }

    const parsed = callToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RemoteError(
        toolName,
        `Malformed result from ${this.name}/${toolName}: ${parsed.error.message}`,
      );
    }

    logger.log(`Completed ${this.name}/${toolName}`);
    return {
      toolName,
      resultText: extractResultText(parsed.data),
      success: parsed.data.isError !== true,
    };
  }

  async close(): Promise<void> {
    try {
      await this.client.close();
      logger.log(`Closed downstream: ${this.name}`);
    } catch (err) {
      logger.warn(`Error closing ${this.name}: ${errorMessage(err)}`);
    }
    if (this._state !== "failed") this._state = "disconnected";
  }
}
