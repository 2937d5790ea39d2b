/**
 * Configuration types for downstream server definitions.
 * Server entries follow the common `.mcp.json` format.
 */

export interface StdioServerConfig {
  type?: "stdio";
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

export interface HttpServerConfig {
  type: "sse" | "url";
  url: string;
}

export type ServerConfig = StdioServerConfig | HttpServerConfig;

export type ExecutionMode = "sequential" | "concurrent";

export interface RouterSettings {
  /** LLM used for planning, synthesis and direct answers. */
  model?: string;
  executionMode?: ExecutionMode;
  /** Per-call downstream timeout; reset whenever the call reports progress. */
  requestTimeoutMs?: number;
}

export interface McpConfigFile {
  mcpServers: Record<string, ServerConfig>;
  router?: RouterSettings;
}

export interface ResolvedConfig {
  /** Insertion order is configuration order and decides tool-name collisions. */
  servers: Record<string, ServerConfig>;
  router: RouterSettings;
  /** Config file paths that were successfully loaded (for diagnostics). */
  configSources?: string[];
}

export function isHttpConfig(config: ServerConfig): config is HttpServerConfig {
  return config.type === "sse" || config.type === "url";
}

/** Display form of a server's connection target. */
export function describeAddress(config: ServerConfig): string {
  if (isHttpConfig(config)) return config.url;
  return [config.command, ...(config.args ?? [])].join(" ");
}
