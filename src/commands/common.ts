/**
 * Shared utilities for toolrelay commands: argument parsing and the
 * start-up sequence that builds the router.
 */

import type { Command } from "commander";
import { discoverConfig, toEndpoints } from "../config/discovery";
import type { ExecutionMode, ResolvedConfig } from "../config/types";
import { ChatClient, DEFAULT_MODEL } from "../llm/client";
import { LlmPlanner } from "../llm/planner";
import { LlmSynthesizer } from "../llm/synthesizer";
import { Orchestrator } from "../orchestrator/orchestrator";
import { Router } from "../router/router";

/**
 * Commander collect helper: appends each flag value into an array.
 * Pass as the third argument to `.option()` with `[]` as the default.
 */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

function splitPair(item: string, flag: string, valueLabel: string): { name: string; value: string; } {
  const eq = item.indexOf("=");
  if (eq === -1) {
    throw new Error(`Invalid ${flag} format: "${item}". Use name=${valueLabel}`);
  }
  const name = item.slice(0, eq).trim();
  const value = item.slice(eq + 1).trim();
  if (!name) {
    throw new Error(`Invalid ${flag} format: "${item}". Server name must not be empty`);
  }
  if (!value) {
    throw new Error(`Invalid ${flag} format: "${item}". Server ${valueLabel} must not be empty`);
  }
  return { name, value };
}

/** Parse `--server name=command` inline server definitions. */
export function parseInlineServers(
  items: string[],
): Array<{ name: string; command: string; }> {
  return items.map(item => {
    const { name, value } = splitPair(item, "--server", "command");
    return { name, command: value };
  });
}

/**
 * Parse `--server-url name=url` inline URL definitions. The URL must parse
 * and use http(s).
 */
export function parseInlineUrls(
  items: string[],
): Array<{ name: string; url: string; }> {
  return items.map(item => {
    const { name, value } = splitPair(item, "--server-url", "url");
    let parsed: URL;
    try {
      parsed = new URL(value);
    } catch {
      throw new Error(`Invalid --server-url "${item}": not a valid URL`);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new Error(`Invalid --server-url "${item}": only http and https are supported`);
    }
    return { name, url: value };
  });
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/** Options shared by every command that connects to downstream servers. */
export interface ConnectOptions {
  config?: string;
  server: string[];
  serverUrl: string[];
  timeout?: number;
}

export function addConnectOptions(command: Command): Command {
  return command
    .option("--config <path>", "Path to .mcp.json config file")
    .option(
      "--server <name=command>",
      "Add stdio server inline (repeatable)",
      collect,
      [],
    )
    .option(
      "--server-url <name=url>",
      "Add HTTP server inline (repeatable)",
      collect,
      [],
    )
    .option(
      "--timeout <ms>",
      "Per-call downstream timeout in ms",
      parsePositiveInt,
    );
}

export interface StartedRouter {
  config: ResolvedConfig;
  router: Router;
}

/**
 * Resolve config and connect every downstream server.
 * Rejects only when no server is configured at all.
 */
export async function startRouter(options: ConnectOptions): Promise<StartedRouter> {
  const config = await discoverConfig({
    configPath: options.config,
    inlineServers: parseInlineServers(options.server),
    inlineUrls: parseInlineUrls(options.serverUrl),
  });

  if (Object.keys(config.servers).length === 0) {
    throw new Error(
      "No MCP servers configured. Use --config, --server, or create .mcp.json",
    );
  }

  const router = new Router({
    requestTimeoutMs: options.timeout ?? config.router.requestTimeoutMs,
  });
  await router.start(toEndpoints(config));
  return { config, router };
}

export interface LlmOptions {
  model?: string;
  concurrent?: boolean;
}

export function createOrchestrator(
  { config, router }: StartedRouter,
  options: LlmOptions,
  env: Record<string, string | undefined> = process.env,
): Orchestrator {
  const apiKey = env.ANTHROPIC_API_KEY;
  const authToken = env.ANTHROPIC_AUTH_TOKEN;
  if (!apiKey && !authToken) {
    throw new Error(
      "ANTHROPIC_API_KEY not set. Export it (or ANTHROPIC_AUTH_TOKEN) to plan and answer queries.",
    );
  }

  const model = new ChatClient({
    apiKey,
    authToken,
    model: options.model ?? env.TOOLRELAY_MODEL ?? config.router.model ?? DEFAULT_MODEL,
  });

  const executionMode: ExecutionMode = options.concurrent
    ? "concurrent"
    : config.router.executionMode ?? "sequential";

  return new Orchestrator({
    router,
    planner: new LlmPlanner(model),
    synthesizer: new LlmSynthesizer(model),
    model,
    executionMode,
  });
}
