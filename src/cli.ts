#!/usr/bin/env node
/**
 * toolrelay: MCP router CLI
 *
 * Usage:
 *   toolrelay serve [options]     Start the router MCP server (stdio or http)
 *   toolrelay query <text>        Answer one query from the terminal
 *   toolrelay tools [--json]      List the merged downstream tool catalog
 *   toolrelay status [--json]     Health check for downstream servers
 */

import { config } from "dotenv";
import { program } from "commander";
import { registerServeCommand } from "./commands/serve";
import { registerQueryCommand } from "./commands/query";
import { registerToolsCommand } from "./commands/tools";
import { registerStatusCommand } from "./commands/status";
import { errorMessage } from "./router/errors";
import { setVerbose } from "./util/logger";
import { VERSION } from "./version";

// Load environment variables from .env.local and .env
config({ path: ".env.local", quiet: true });
config({ path: ".env", quiet: true });

async function main(): Promise<void> {
  program
    .name("toolrelay")
    .description("MCP router: plan, dispatch and synthesize across downstream tool servers")
    .version(VERSION)
    .option("--verbose", "Verbose logging to stderr")
    .hook("preAction", thisCommand => {
      if (thisCommand.opts().verbose) {
        setVerbose(true);
      }
    });

  registerServeCommand(program);
  registerQueryCommand(program);
  registerToolsCommand(program);
  registerStatusCommand(program);

  await program.parseAsync();
}

main().catch(err => {
  console.error(`toolrelay: ${errorMessage(err)}`);
  process.exit(1);
});
