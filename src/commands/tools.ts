/**
 * `toolrelay tools` command: lists the merged downstream tool catalog.
 */

import type { Command } from "commander";
import { errorMessage } from "../router/errors";
import { error as logError } from "../util/logger";
import { addConnectOptions, type ConnectOptions, startRouter } from "./common";
import { formatToolListing } from "./format";

interface ToolsOptions extends ConnectOptions {
  json?: boolean;
}

export function registerToolsCommand(program: Command): void {
  addConnectOptions(
    program
      .command("tools")
      .description("List every tool reachable through the router"),
  )
    .option("--json", "Output as JSON")
    .action(async (options: ToolsOptions) => {
      try {
        const { router } = await startRouter(options);
        const listing = router.listAvailableTools();
        await router.close();

        console.log(
          options.json ? JSON.stringify(listing, null, 2) : formatToolListing(listing),
        );
        process.exit(0);
      } catch (err) {
        logError(`tools failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
