/**
 * Shared types for the routing layer.
 */

import type { ServerConfig } from "../config/types";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** A configured downstream server. Immutable for the process lifetime. */
export interface DownstreamEndpoint {
  name: string;
  /** Display form of the connection target (URL or command line). */
  address: string;
  config: ServerConfig;
}

export type SessionState = "disconnected" | "connecting" | "ready" | "failed";

export interface ToolDescriptor {
  name: string;
  description: string;
  /** Forwarded verbatim to the planner and to downstream calls. */
  inputSchema: JsonObject;
}

export interface ToolRoute {
  toolName: string;
  serverName: string;
  schema: ToolDescriptor;
}

export interface PlannedCall {
  toolName: string;
  arguments: JsonObject;
}

export interface ToolExecutionResult {
  toolName: string;
  resultText: string;
  success: boolean;
}

/** Raw progress notification as sent by a downstream server. */
export interface ProgressEvent {
  progress: number;
  total?: number;
  message?: string;
}

/** Progress normalized to a fraction of the caller's whole operation. */
export interface ProgressUpdate {
  fraction: number;
  total: 1;
  message?: string;
}

export type ProgressSink = (event: ProgressEvent) => void;
export type ProgressReporter = (update: ProgressUpdate) => void;

export interface InvokeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * A live connection to one downstream server.
 */
export interface TransportSession {
  readonly endpoint: DownstreamEndpoint;
  readonly state: SessionState;
  readonly declaredTools: readonly ToolDescriptor[];
  /** Reason recorded by the last `markFailed` call. */
  readonly failure?: string;
  connect(): Promise<void>;
  listCapabilities(): Promise<ToolDescriptor[]>;
  /** Called by the owner when a handshake or discovery step fails. */
  markFailed(reason: string): void;
  /**
   * Progress events reach `sink` in the order the server sent them and
   * strictly before the returned promise settles.
   */
  invoke(
    toolName: string,
    args: JsonObject,
    sink: ProgressSink,
    options?: InvokeOptions,
  ): Promise<ToolExecutionResult>;
  close(): Promise<void>;
}
