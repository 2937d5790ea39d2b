/**
 * ANSI pretty-printing for command output.
 */

import type { HealthReport, ToolListing } from "../router/router";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";
const GREEN = "\x1b[32m";
const CYAN = "\x1b[36m";
const RED = "\x1b[31m";

export function bold(text: string): string {
  return `${BOLD}${text}${RESET}`;
}

export function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

export function green(text: string): string {
  return `${GREEN}${text}${RESET}`;
}

export function cyan(text: string): string {
  return `${CYAN}${text}${RESET}`;
}

export function red(text: string): string {
  return `${RED}${text}${RESET}`;
}

export function formatToolListing(listing: ToolListing): string {
  if (listing.tools.length === 0) return dim("  (no tools)");

  const maxNameLen = Math.max(...listing.tools.map(t => t.name.length));
  const lines = listing.tools.map(t => {
    const padded = t.name.padEnd(maxNameLen + 2);
    return `  ${cyan(padded)}${dim(`[${t.server}]`)} ${t.description}`;
  });
  lines.push("", `  ${bold(String(listing.totalTools))} tools`);
  return lines.join("\n");
}

export function formatHealth(report: HealthReport): string {
  const lines: string[] = [`Router: ${report.routerStatus}`, "", "Servers:"];
  if (report.downstreamServers.length === 0) {
    lines.push(dim("  (none configured)"));
  }
  for (const s of report.downstreamServers) {
    const icon = s.connected ? green("✓") : red("✗");
    const tools = s.connected ? `${s.toolsCount} tools` : "unreachable";
    lines.push(`  ${icon} ${s.server.padEnd(20)} ${tools.padEnd(14)} ${dim(s.address)}`);
  }

  const connected = report.downstreamServers.filter(s => s.connected).length;
  const totalTools = report.downstreamServers.reduce((sum, s) => sum + s.toolsCount, 0);
  lines.push(
    "",
    `Summary: ${connected}/${report.downstreamServers.length} servers, ${totalTools} tools`,
  );
  return lines.join("\n");
}

/** Single-line progress bar, e.g. `[██████░░░░] 60% Planning...`. */
export function formatProgressBar(fraction: number, message?: string, width = 30): string {
  const clamped = Math.min(1, Math.max(0, fraction));
  const filled = Math.round(width * clamped);
  const bar = "█".repeat(filled) + "░".repeat(width - filled);
  const percent = `${Math.round(clamped * 100)}%`;
  return message ? `[${bar}] ${percent} ${message}` : `[${bar}] ${percent}`;
}
