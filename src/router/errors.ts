/**
 * Error taxonomy for the router.
 *
 * Every class here is recoverable below the orchestration boundary:
 * connection and protocol errors mark one session failed, the rest turn a
 * single planned call (or the planning / synthesis step) into text.
 */

export type RouterErrorCode =
  | "connection"
  | "protocol"
  | "unknown_tool"
  | "remote"
  | "timeout"
  | "planner"
  | "synthesis";

export class RouterError extends Error {
  readonly code: RouterErrorCode;
  readonly metadata?: Record<string, unknown>;

  constructor(
    code: RouterErrorCode,
    message: string,
    options: { cause?: unknown; metadata?: Record<string, unknown>; } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.metadata = options.metadata;
  }
}

/** A downstream endpoint could not be reached or refused the handshake. */
export class ConnectionError extends RouterError {
  constructor(serverName: string, message: string, cause?: unknown) {
    super("connection", message, { cause, metadata: { serverName } });
  }
}

/** A downstream server answered with something that is not valid MCP. */
export class ProtocolError extends RouterError {
  constructor(serverName: string, message: string, cause?: unknown) {
    super("protocol", message, { cause, metadata: { serverName } });
  }
}

export class UnknownToolError extends RouterError {
  constructor(toolName: string) {
    super("unknown_tool", `Unknown tool: ${toolName}`, {
      metadata: { toolName },
    });
  }
}

/** The downstream call itself failed. */
export class RemoteError extends RouterError {
  constructor(toolName: string, message: string, cause?: unknown) {
    super("remote", message, { cause, metadata: { toolName } });
  }
}

export class TimeoutError extends RouterError {
  constructor(toolName: string, message: string, cause?: unknown) {
    super("timeout", message, { cause, metadata: { toolName } });
  }
}

export class PlannerError extends RouterError {
  constructor(message: string, cause?: unknown) {
    super("planner", message, { cause });
  }
}

export class SynthesisError extends RouterError {
  constructor(message: string, cause?: unknown) {
    super("synthesis", message, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
