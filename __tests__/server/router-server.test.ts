import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, type Progress } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Planner } from "../../src/llm/planner.js";
import { Orchestrator } from "../../src/orchestrator/orchestrator.js";
import { Router } from "../../src/router/router.js";
import type { PlannedCall } from "../../src/router/types.js";
import {
  createRouterServer,
  HEALTH_CHECK,
  LIST_AVAILABLE_TOOLS,
  PROCESS_QUERY,
  type RouterServerOptions,
} from "../../src/server/router-server.js";
import { endpoint, fakeFactory, tool } from "../helpers/fake-session.js";

interface Harness {
  client: Client;
  router: Router;
  close(): Promise<void>;
}

async function connectHarness(
  plan: PlannedCall[],
  options: RouterServerOptions = {},
): Promise<Harness> {
  const router = new Router({
    createSession: fakeFactory({
      weather: {
        tools: [tool("get_forecast", "Forecast for a city")],
        progress: [{ progress: 1, total: 2, message: "fetching" }],
        results: { get_forecast: "Sunny, 21C" },
      },
      misc: { tools: [tool(HEALTH_CHECK, "shadowed by the router")] },
    }),
  });
  await router.start([endpoint("weather"), endpoint("misc")]);

  const planner: Planner = { plan: async () => plan };
  const orchestrator = new Orchestrator({
    router,
    planner,
    synthesizer: {
      synthesize: async (_query, results) =>
        results.map(r => `${r.toolName}=${r.resultText}`).join("; "),
    },
    model: { complete: async () => "direct" },
  });

  const server = createRouterServer({ router, orchestrator }, options);
  const client = new Client({ name: "test-client", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);

  return {
    client,
    router,
    async close() {
      await client.close();
      await server.close();
      await router.close();
    },
  };
}

function firstText(result: { content: Array<{ type: string; text?: unknown; }>; }): string {
  const first = result.content[0];
  return typeof first?.text === "string" ? first.text : "";
}

describe("router MCP server", () => {
  let harness: Harness | undefined;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await harness?.close();
    harness = undefined;
    vi.restoreAllMocks();
  });

  it("lists the three router tools", async () => {
    harness = await connectHarness([]);
    const { tools } = await harness.client.listTools();
    expect(tools.map(t => t.name)).toEqual([PROCESS_QUERY, LIST_AVAILABLE_TOOLS, HEALTH_CHECK]);
    expect(tools[0]?.inputSchema.required).toEqual(["query"]);
  });

  it("answers process_query and streams progress to the caller", async () => {
    harness = await connectHarness([{ toolName: "get_forecast", arguments: { city: "Oslo" } }]);
    const progress: Progress[] = [];

    const result = await harness.client.callTool(
      { name: PROCESS_QUERY, arguments: { query: "weather in Oslo?" } },
      CallToolResultSchema,
      { onprogress: p => progress.push(p) },
    );

    expect(result.isError).toBe(false);
    expect(firstText(result)).toBe("get_forecast=Sunny, 21C");
    expect(progress.map(p => p.message)).toEqual([
      "Analyzing query and planning tool calls...",
      "Planning which tools to use...",
      "Executing 1 tool(s)...",
      "Executing tool 1/1: get_forecast",
      "[get_forecast] fetching",
      "Synthesizing final response...",
      "Complete!",
    ]);
    expect(progress.every(p => p.total === 1)).toBe(true);
    expect(progress[4]?.progress).toBeCloseTo(0.55);
    expect(progress.at(-1)?.progress).toBe(1);
  });

  it("rejects process_query without a query", async () => {
    harness = await connectHarness([]);
    const result = await harness.client.callTool(
      { name: PROCESS_QUERY, arguments: {} },
      CallToolResultSchema,
    );
    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      { type: "text", text: "Error: process_query requires a non-empty 'query' string" },
    ]);
  });

  it("returns the tool listing as JSON", async () => {
    harness = await connectHarness([]);
    const result = await harness.client.callTool(
      { name: LIST_AVAILABLE_TOOLS, arguments: {} },
      CallToolResultSchema,
    );
    expect(JSON.parse(firstText(result))).toEqual(harness.router.listAvailableTools());
    expect(JSON.parse(firstText(result))).toMatchObject({ totalTools: 2 });
  });

  it("returns the health report as JSON", async () => {
    harness = await connectHarness([]);
    const result = await harness.client.callTool(
      { name: HEALTH_CHECK, arguments: {} },
      CallToolResultSchema,
    );
    expect(JSON.parse(firstText(result))).toEqual({
      routerStatus: "healthy",
      downstreamServers: [
        { server: "weather", address: "http://localhost/weather", connected: true, toolsCount: 1 },
        { server: "misc", address: "http://localhost/misc", connected: true, toolsCount: 1 },
      ],
    });
  });

  it("reports unknown tools as errors", async () => {
    harness = await connectHarness([]);
    const result = await harness.client.callTool(
      { name: "get_forecast", arguments: {} },
      CallToolResultSchema,
    );
    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe("Error: Unknown tool: get_forecast");
  });

  describe("with downstream tools exposed", () => {
    it("lists downstream tools after the router tools, skipping shadowed names", async () => {
      harness = await connectHarness([], { exposeDownstreamTools: true });
      const { tools } = await harness.client.listTools();

      expect(tools.map(t => t.name)).toEqual([
        PROCESS_QUERY,
        LIST_AVAILABLE_TOOLS,
        HEALTH_CHECK,
        "get_forecast",
      ]);
      expect(tools[3]?.description).toBe("[weather] Forecast for a city");
    });

    it("routes a direct call to the owning server", async () => {
      harness = await connectHarness([], { exposeDownstreamTools: true });
      const progress: Progress[] = [];

      const result = await harness.client.callTool(
        { name: "get_forecast", arguments: { city: "Oslo" } },
        CallToolResultSchema,
        { onprogress: p => progress.push(p) },
      );

      expect(result.isError).toBe(false);
      expect(firstText(result)).toBe("Sunny, 21C");
      expect(progress).toEqual([{ progress: 0.5, total: 1, message: "[get_forecast] fetching" }]);
    });

    it("rejects arguments that are not JSON values instead of dropping them", async () => {
      harness = await connectHarness([], { exposeDownstreamTools: true });

      const result = await harness.client.callTool(
        { name: "get_forecast", arguments: { when: new Date(0) } },
        CallToolResultSchema,
      );

      expect(result.isError).toBe(true);
      expect(firstText(result)).toMatch(/^Error: invalid arguments for get_forecast: /);
    });

    it("still answers health_check itself when a downstream tool shares the name", async () => {
      harness = await connectHarness([], { exposeDownstreamTools: true });
      const result = await harness.client.callTool(
        { name: HEALTH_CHECK, arguments: {} },
        CallToolResultSchema,
      );
      expect(JSON.parse(firstText(result))).toMatchObject({ routerStatus: "healthy" });
    });
  });
});
