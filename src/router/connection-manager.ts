/**
 * Owns one session per configured downstream server.
 * Error isolation: one server failing to start doesn't affect the others.
 */

import { ToolRegistry } from "./registry";
import { errorMessage } from "./errors";
import type {
  DownstreamEndpoint,
  ToolDescriptor,
  ToolRoute,
  TransportSession,
} from "./types";
import { UpstreamSession } from "./upstream-session";
import { createLogger } from "../util/logger";

const logger = createLogger("connections");

export type SessionFactory = (endpoint: DownstreamEndpoint) => TransportSession;

export interface ConnectionManagerOptions {
  createSession?: SessionFactory;
  /** Passed to the default session factory. */
  requestTimeoutMs?: number;
}

export class ConnectionManager {
  private _sessions = new Map<string, TransportSession>();
  private registry = new ToolRegistry();
  private createSession: SessionFactory;

  constructor(options: ConnectionManagerOptions = {}) {
    this.createSession = options.createSession
      ?? (endpoint => new UpstreamSession(endpoint, { requestTimeoutMs: options.requestTimeoutMs }));
  }

  /**
   * Connect and discover every endpoint, then build the registry.
   * Never rejects: a failing endpoint is recorded as a failed session.
   * Sessions from an earlier call are closed and replaced.
   */
  async connectAll(endpoints: readonly DownstreamEndpoint[]): Promise<void> {
    logger.log(`Connecting to ${endpoints.length} downstream servers...`);

    if (this._sessions.size > 0) {
      await this.closeAll();
      this._sessions.clear();
    }

    const sessions = endpoints.map(endpoint => {
      const session = this.createSession(endpoint);
      this._sessions.set(endpoint.name, session);
      return session;
    });

    await Promise.allSettled(sessions.map(session => this.startSession(session)));

    // Merge in configuration order so the last configured server wins a
    // name collision regardless of which handshake finished first.
    this.registry.clear();
    for (const session of sessions) {
      if (session.state !== "ready") continue;
      const collisions = this.registry.register(
        session.endpoint.name,
        session.declaredTools,
      );
      for (const c of collisions) {
        logger.warn(
          `Tool "${c.toolName}" from ${c.previousServer} is shadowed by ${c.winningServer}`,
        );
      }
    }

    const ready = sessions.filter(s => s.state === "ready").map(s => s.endpoint.name);
    logger.log(
      `Connected to ${ready.length}/${endpoints.length} servers: ${ready.join(", ")}`,
    );
    logger.log(`Total tools available: ${this.registry.size}`);
  }

  private async startSession(session: TransportSession): Promise<void> {
    const { name } = session.endpoint;
    try {
      await session.connect();
      await session.listCapabilities();
    } catch (err) {
      const reason = errorMessage(err);
      logger.error(`Downstream ${name} unavailable: ${reason}`);
      // Release whatever half-open transport the failed attempt left behind.
      await session.close().catch((closeErr: unknown) => {
        logger.warn(`Error closing ${name}: ${errorMessage(closeErr)}`);
      });
      session.markFailed(reason);
    }
  }

  resolve(toolName: string): ToolRoute | undefined {
    return this.registry.resolve(toolName);
  }

  /** Stable, ordered copy of the merged catalog. */
  snapshotCatalog(): ToolDescriptor[] {
    return this.registry.catalog();
  }

  routes(): ToolRoute[] {
    return this.registry.routesInOrder();
  }

  getSession(serverName: string): TransportSession | undefined {
    return this._sessions.get(serverName);
  }

  /** All sessions, in configuration order. */
  sessions(): TransportSession[] {
    return [...this._sessions.values()];
  }

  async closeAll(): Promise<void> {
    logger.log("Shutting down all downstream connections...");
    await Promise.allSettled(this.sessions().map(session => session.close()));
  }
}
