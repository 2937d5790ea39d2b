/**
 * The router aggregate: built once at startup and handed to every request
 * path. Holds the sessions, the registry and the dispatcher.
 */

import {
  ConnectionManager,
  type ConnectionManagerOptions,
} from "./connection-manager";
import { Dispatcher } from "./dispatcher";
import type { DownstreamEndpoint, ToolDescriptor, ToolRoute } from "./types";

export interface ToolListing {
  totalTools: number;
  tools: Array<{ name: string; server: string; description: string; }>;
}

export interface HealthReport {
  routerStatus: string;
  downstreamServers: Array<{
    server: string;
    address: string;
    connected: boolean;
    toolsCount: number;
  }>;
}

export class Router {
  readonly connections: ConnectionManager;
  readonly dispatcher: Dispatcher;

  constructor(options: ConnectionManagerOptions = {}) {
    this.connections = new ConnectionManager(options);
    this.dispatcher = new Dispatcher(this.connections);
  }

  /** Connect every endpoint and build the registry. Call before serving. */
  async start(endpoints: readonly DownstreamEndpoint[]): Promise<void> {
    await this.connections.connectAll(endpoints);
  }

  resolve(toolName: string): ToolRoute | undefined {
    return this.connections.resolve(toolName);
  }

  snapshotCatalog(): ToolDescriptor[] {
    return this.connections.snapshotCatalog();
  }

  listAvailableTools(): ToolListing {
    const tools = this.connections.routes().map(route => ({
      name: route.toolName,
      server: route.serverName,
      description: route.schema.description || "No description",
    }));
    return { totalTools: tools.length, tools };
  }

  healthCheck(): HealthReport {
    return {
      routerStatus: "healthy",
      downstreamServers: this.connections.sessions().map(session => {
        const connected = session.state === "ready";
        return {
          server: session.endpoint.name,
          address: session.endpoint.address,
          connected,
          toolsCount: connected ? session.declaredTools.length : 0,
        };
      }),
    };
  }

  async close(): Promise<void> {
    await this.connections.closeAll();
  }
}
