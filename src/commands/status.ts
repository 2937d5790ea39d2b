/**
 * `toolrelay status` command: connects every configured downstream
 * server once and reports the router's health check.
 */

import type { Command } from "commander";
import { errorMessage } from "../router/errors";
import type { HealthReport } from "../router/router";
import { error as logError, log } from "../util/logger";
import { addConnectOptions, type ConnectOptions, startRouter } from "./common";
import { formatHealth } from "./format";

interface StatusOptions extends ConnectOptions {
  json?: boolean;
}

/** Exit code for a health report: 0 only when every server is connected. */
export function statusExitCode(report: HealthReport): number {
  const servers = report.downstreamServers;
  return servers.length > 0 && servers.every(s => s.connected) ? 0 : 1;
}

export function registerStatusCommand(program: Command): void {
  addConnectOptions(
    program
      .command("status")
      .description("Health check for all configured downstream servers"),
  )
    .option("--json", "Output as JSON")
    .action(async (options: StatusOptions) => {
      log("Running health check...");
      try {
        const { router } = await startRouter(options);
        const report = router.healthCheck();
        await router.close();

        console.log(options.json ? JSON.stringify(report, null, 2) : formatHealth(report));
        process.exit(statusExitCode(report));
      } catch (err) {
        logError(`status failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
