import { describe, expect, it } from "vitest";
import {
  bold,
  cyan,
  dim,
  formatHealth,
  formatProgressBar,
  formatToolListing,
  green,
  red,
} from "../../src/commands/format.js";

const stripAnsi = (s: string): string => s.replace(/\x1b\[[0-9;]*m/g, "");

describe("formatProgressBar", () => {
  it("renders an empty bar", () => {
    expect(formatProgressBar(0, undefined, 10)).toBe("[░░░░░░░░░░] 0%");
  });

  it("renders a partial bar with a message", () => {
    expect(formatProgressBar(0.3, "Executing tool 1/2: echo", 10)).toBe(
      "[███░░░░░░░] 30% Executing tool 1/2: echo",
    );
  });

  it("clamps fractions outside [0,1]", () => {
    expect(formatProgressBar(1.7, undefined, 4)).toBe("[████] 100%");
    expect(formatProgressBar(-1, undefined, 4)).toBe("[░░░░] 0%");
  });

  it("defaults to 30 cells", () => {
    expect(formatProgressBar(0.5)).toBe(`[${"█".repeat(15)}${"░".repeat(15)}] 50%`);
  });
});

describe("formatToolListing", () => {
  it("aligns tool names and shows the total", () => {
    const text = stripAnsi(formatToolListing({
      totalTools: 2,
      tools: [
        { name: "get_forecast", server: "weather", description: "Forecast for a city" },
        { name: "search", server: "web", description: "No description" },
      ],
    }));

    expect(text.split("\n")).toEqual([
      "  get_forecast  [weather] Forecast for a city",
      "  search        [web] No description",
      "",
      "  2 tools",
    ]);
  });

  it("notes an empty listing", () => {
    expect(stripAnsi(formatToolListing({ totalTools: 0, tools: [] }))).toBe("  (no tools)");
  });
});

describe("formatHealth", () => {
  it("lists each server and a summary", () => {
    const text = stripAnsi(formatHealth({
      routerStatus: "healthy",
      downstreamServers: [
        { server: "weather", address: "http://localhost:8001/mcp", connected: true, toolsCount: 3 },
        { server: "offline", address: "npx offline-mcp", connected: false, toolsCount: 0 },
      ],
    }));
    const lines = text.split("\n");

    expect(lines[0]).toBe("Router: healthy");
    expect(lines[3]).toBe(
      `  ✓ ${"weather".padEnd(20)} ${"3 tools".padEnd(14)} http://localhost:8001/mcp`,
    );
    expect(lines[4]).toBe(
      `  ✗ ${"offline".padEnd(20)} ${"unreachable".padEnd(14)} npx offline-mcp`,
    );
    expect(lines.at(-1)).toBe("Summary: 1/2 servers, 3 tools");
  });

  it("notes when no server is configured", () => {
    const text = stripAnsi(formatHealth({ routerStatus: "healthy", downstreamServers: [] }));
    expect(text).toContain("  (none configured)");
    expect(text.split("\n").at(-1)).toBe("Summary: 0/0 servers, 0 tools");
  });
});

describe("ANSI helpers", () => {
  it("wrap text in escape codes", () => {
    expect(bold("x")).toBe("\x1b[1mx\x1b[0m");
    expect(dim("x")).toBe("\x1b[2mx\x1b[0m");
    expect(green("x")).toBe("\x1b[32mx\x1b[0m");
    expect(cyan("x")).toBe("\x1b[36mx\x1b[0m");
    expect(red("x")).toBe("\x1b[31mx\x1b[0m");
  });
});
