/**
 * Forwards one planned call to the session that owns the tool and relays
 * its progress into the caller's slice of overall progress.
 */

import type { ConnectionManager } from "./connection-manager";
import {
  errorMessage,
  RemoteError,
  RouterError,
  UnknownToolError,
} from "./errors";
import { normalizeProgress, type ProgressScaler } from "./progress";
import type {
  PlannedCall,
  ProgressEvent,
  ProgressReporter,
  ToolExecutionResult,
} from "./types";
import { createLogger } from "../util/logger";

const logger = createLogger("dispatch");

export type DispatchOutcome =
  | { ok: true; result: ToolExecutionResult; }
  | { ok: false; error: RouterError; };

export interface ExecuteOptions {
  onProgress?: ProgressReporter;
  signal?: AbortSignal;
}

export class Dispatcher {
  private connections: ConnectionManager;

  constructor(connections: ConnectionManager) {
    this.connections = connections;
  }

  /**
   * Run one call. Never rejects: any failure comes back as a result with
   * `success: false` and the error message as its text.
   */
  async execute(
    call: PlannedCall,
    scaler: ProgressScaler,
    options: ExecuteOptions = {},
  ): Promise<ToolExecutionResult> {
    const outcome = await this.attempt(call, scaler, options);
    if (outcome.ok) return outcome.result;

    logger.warn(`Tool ${call.toolName} failed (${outcome.error.code}): ${outcome.error.message}`);
    return {
      toolName: call.toolName,
      resultText: `Error: ${outcome.error.message}`,
      success: false,
    };
  }

  private async attempt(
    call: PlannedCall,
    scaler: ProgressScaler,
    options: ExecuteOptions,
  ): Promise<DispatchOutcome> {
    const route = this.connections.resolve(call.toolName);
    if (!route) {
      return { ok: false, error: new UnknownToolError(call.toolName) };
    }

    const session = this.connections.getSession(route.serverName);
    if (!session) {
      return {
        ok: false,
        error: new RemoteError(call.toolName, `No connection to server: ${route.serverName}`),
      };
    }

    const sink = (event: ProgressEvent): void => {
      logger.log(
        `[${call.toolName}] ${event.progress}/${event.total ?? "?"} ${event.message ?? ""}`,
      );
      options.onProgress?.({
        fraction: scaler.scale(normalizeProgress(event)),
        total: 1,
        message: `[${call.toolName}] ${event.message ?? "Working..."}`,
      });
    };

    logger.log(`Calling ${call.toolName} on ${route.serverName}`);
    try {
      const result = await session.invoke(call.toolName, call.arguments, sink, {
        signal: options.signal,
      });
      return { ok: true, result };
    } catch (err) {
      return {
        ok: false,
        error: err instanceof RouterError
          ? err
          : new RemoteError(call.toolName, errorMessage(err), err),
      };
    }
  }
}
