/**
 * Discover and merge .mcp.json config files.
 *
 * Precedence (later wins on conflict):
 * 1. $HOME/.mcp.json (global)
 * 2. .mcp.json in CWD (project-level)
 * 3. --config <path> (explicit, replaces CWD)
 * 4. --server / --server-url flags (additive)
 *
 * Server order in the result is the order servers were first declared;
 * the router relies on it to break tool-name collisions.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { validateConfig } from "./schema";
import type { ResolvedConfig, RouterSettings, ServerConfig } from "./types";
import { describeAddress, isHttpConfig } from "./types";
import type { DownstreamEndpoint } from "../router/types";
import { errorMessage } from "../router/errors";
import { log, warn } from "../util/logger";

const ENV_VAR_RE = /\$\{([^}]+)\}/g;

export function expandEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return value.replace(ENV_VAR_RE, (_, varName: string) => {
    if (!(varName in env)) {
      warn(`Environment variable '${varName}' is not set; substituting an empty string`);
    }
    return env[varName] ?? "";
  });
}

/** Returns a copy of `config` with ${VAR} references resolved in URLs and env values. */
export function expandServerConfig(
  config: ServerConfig,
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  if (isHttpConfig(config)) {
    return { ...config, url: expandEnvVars(config.url, env) };
  }
  if (!config.env) return { ...config };

  const expanded: Record<string, string> = {};
  for (const [key, value] of Object.entries(config.env)) {
    expanded[key] = expandEnvVars(value, env);
  }
  return { ...config, env: expanded };
}

interface LoadedConfig {
  servers: Record<string, ServerConfig>;
  router?: RouterSettings;
}

async function loadConfigFile(path: string): Promise<LoadedConfig> {
  try {
    const content = await readFile(path, "utf-8");
    const validated = validateConfig(JSON.parse(content));
    log(
      `Loaded config from ${path} (${Object.keys(validated.mcpServers).length} servers)`,
    );
    return { servers: validated.mcpServers, router: validated.router };
  } catch (err) {
    warn(`Skipping config ${path}: ${errorMessage(err)}`);
    return { servers: {} };
  }
}

export interface DiscoveryOptions {
  configPath?: string;
  /** Defaults to the user's home directory. */
  homeDir?: string;
  /** Defaults to `process.cwd()`. */
  cwd?: string;
  inlineServers?: Array<{ name: string; command: string; }>;
  inlineUrls?: Array<{ name: string; url: string; }>;
  /** Source for ${VAR} expansion. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

export async function discoverConfig(
  options: DiscoveryOptions = {},
): Promise<ResolvedConfig> {
  const servers: Record<string, ServerConfig> = {};
  const configSources: string[] = [];
  let router: RouterSettings = {};
  const cwd = options.cwd ?? process.cwd();

  const merge = async (path: string): Promise<void> => {
    if (!existsSync(path)) return;
    const loaded = await loadConfigFile(path);
    if (Object.keys(loaded.servers).length > 0) configSources.push(path);
    Object.assign(servers, loaded.servers);
    if (loaded.router) router = { ...router, ...loaded.router };
  };

  // 1. Global config
  await merge(join(options.homeDir ?? homedir(), ".mcp.json"));

  // 2. Project-level or explicit config (resolve relative paths from CWD)
  await merge(
    options.configPath
      ? resolve(cwd, options.configPath)
      : join(cwd, ".mcp.json"),
  );

  // 3. Inline --server flags
  for (const { name, command } of options.inlineServers ?? []) {
    const parts = command.split(/\s+/);
    servers[name] = {
      type: "stdio",
      command: parts[0] ?? "",
      args: parts.slice(1),
    };
  }

  // 4. Inline --server-url flags
  for (const { name, url } of options.inlineUrls ?? []) {
    servers[name] = { type: "url", url };
  }

  for (const [name, config] of Object.entries(servers)) {
    servers[name] = expandServerConfig(config, options.env ?? process.env);
  }

  log(`Resolved ${Object.keys(servers).length} total servers`);
  return { servers, router, configSources };
}

/** Endpoints in configuration order. */
export function toEndpoints(config: ResolvedConfig): DownstreamEndpoint[] {
  return Object.entries(config.servers).map(([name, serverConfig]) => ({
    name,
    address: describeAddress(serverConfig),
    config: serverConfig,
  }));
}
