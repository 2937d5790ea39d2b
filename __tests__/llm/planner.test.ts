import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { LanguageModel } from "../../src/llm/client.js";
import { buildPlanningPrompt, LlmPlanner, parsePlan } from "../../src/llm/planner.js";
import { PlannerError } from "../../src/router/errors.js";
import { tool } from "../helpers/fake-session.js";

function modelReturning(reply: string | Error) {
  const complete = vi.fn(async (_prompt: string, _options?: { signal?: AbortSignal; }) => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  return { complete } satisfies LanguageModel;
}

describe("parsePlan", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses a bare JSON array", () => {
    expect(parsePlan('[{"tool": "get_forecast", "arguments": {"city": "Oslo"}}]')).toEqual([
      { toolName: "get_forecast", arguments: { city: "Oslo" } },
    ]);
  });

  it("parses an array inside a json code fence", () => {
    const text = '```json\n[{"tool": "web_search", "arguments": {"query": "mcp"}}]\n```';
    expect(parsePlan(text)).toEqual([
      { toolName: "web_search", arguments: { query: "mcp" } },
    ]);
  });

  it("parses an unlabeled code fence", () => {
    expect(parsePlan('```\n[{"tool": "a"}]\n```')).toEqual([{ toolName: "a", arguments: {} }]);
  });

  it("accepts an object with a tools array", () => {
    expect(parsePlan('{"tools": [{"tool": "a", "arguments": {}}, {"tool": "b"}]}')).toEqual([
      { toolName: "a", arguments: {} },
      { toolName: "b", arguments: {} },
    ]);
  });

  it("returns no calls for an empty array", () => {
    expect(parsePlan("[]")).toEqual([]);
  });

  it("drops malformed entries and keeps the rest", () => {
    const calls = parsePlan('[{"tool": "a"}, {"name": "b"}, "c", {"tool": "d", "arguments": [1]}]');
    expect(calls).toEqual([{ toolName: "a", arguments: {} }]);
    expect(console.error).toHaveBeenCalledTimes(3);
  });

  it("keeps duplicate calls in order", () => {
    const calls = parsePlan('[{"tool": "a", "arguments": {"n": 1}}, {"tool": "a", "arguments": {"n": 2}}]');
    expect(calls.map(c => c.arguments)).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it("throws PlannerError on empty output", () => {
    expect(() => parsePlan("  ")).toThrow(PlannerError);
  });

  it("throws PlannerError on prose", () => {
    expect(() => parsePlan("I would call the weather tool.")).toThrow(
      /^Planner output is not JSON: /,
    );
  });

  it("throws PlannerError on an unexpected JSON shape", () => {
    expect(() => parsePlan('{"calls": []}')).toThrow(
      "Planner output is neither an array nor { tools: [...] }",
    );
  });
});

describe("buildPlanningPrompt", () => {
  it("lists every tool with its schema and the query", () => {
    const prompt = buildPlanningPrompt("weather in Oslo?", [
      tool("get_forecast", "Forecast for a city"),
      tool("ping", ""),
    ]);

    expect(prompt).toContain(
      '- get_forecast: Forecast for a city\n  Schema: {"type":"object","properties":{}}',
    );
    expect(prompt).toContain("- ping: No description\n");
    expect(prompt).toContain("USER QUERY: weather in Oslo?");
  });
});

describe("LlmPlanner", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("plans from the model's reply", async () => {
    const model = modelReturning('[{"tool": "get_forecast", "arguments": {"city": "Oslo"}}]');
    const planner = new LlmPlanner(model);

    const calls = await planner.plan("weather in Oslo?", [tool("get_forecast")]);

    expect(calls).toEqual([{ toolName: "get_forecast", arguments: { city: "Oslo" } }]);
    expect(model.complete).toHaveBeenCalledWith(
      buildPlanningPrompt("weather in Oslo?", [tool("get_forecast")]),
      {},
    );
  });

  it("returns no calls when the reply is not a plan", async () => {
    const planner = new LlmPlanner(modelReturning("Sure! Let me think."));
    expect(await planner.plan("hi", [tool("a")])).toEqual([]);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^\[toolrelay:planner WARN\] Planner output is not JSON: .*; continuing without tools$/),
    );
  });

  it("returns no calls when the model call fails", async () => {
    const planner = new LlmPlanner(modelReturning(new Error("401 invalid x-api-key")));
    expect(await planner.plan("hi", [tool("a")])).toEqual([]);
    expect(console.error).toHaveBeenCalledWith(
      "[toolrelay:planner WARN] Planning call failed: 401 invalid x-api-key; continuing without tools",
    );
  });

  it("passes the cancellation signal to the model", async () => {
    const model = modelReturning("[]");
    const controller = new AbortController();
    await new LlmPlanner(model).plan("hi", [], { signal: controller.signal });
    expect(model.complete).toHaveBeenCalledWith(expect.any(String), { signal: controller.signal });
  });
});
