/**
 * Flat tool-name → route table merged from every ready session.
 *
 * Written only while the router starts, before any request traffic, and
 * read concurrently afterwards. Routes are not pruned when a session
 * closes.
 */

import type { ToolDescriptor, ToolRoute } from "./types";

export interface Collision {
  toolName: string;
  previousServer: string;
  winningServer: string;
}

export class ToolRegistry {
  private routes = new Map<string, ToolRoute>();

  /**
   * Register every tool of one server. A name already owned by another
   * server is taken over (last writer wins) and reported as a collision.
   */
  register(serverName: string, tools: readonly ToolDescriptor[]): Collision[] {
    const collisions: Collision[] = [];
    for (const tool of tools) {
      const existing = this.routes.get(tool.name);
      if (existing && existing.serverName !== serverName) {
        collisions.push({
          toolName: tool.name,
          previousServer: existing.serverName,
          winningServer: serverName,
        });
      }
      this.routes.set(tool.name, {
        toolName: tool.name,
        serverName,
        schema: tool,
      });
    }
    return collisions;
  }

  resolve(toolName: string): ToolRoute | undefined {
    return this.routes.get(toolName);
  }

  routesInOrder(): ToolRoute[] {
    return [...this.routes.values()];
  }

  catalog(): ToolDescriptor[] {
    return this.routesInOrder().map(route => route.schema);
  }

  get size(): number {
    return this.routes.size;
  }

  clear(): void {
    this.routes.clear();
  }
}
