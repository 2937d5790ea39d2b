/**
 * Turns a query plus the tool catalog into a list of calls, using an LLM.
 */

import { z } from "zod";
import type { LanguageModel } from "./client";
import { jsonObjectSchema } from "../router/json";
import { errorMessage, PlannerError } from "../router/errors";
import type { PlannedCall, ToolDescriptor } from "../router/types";
import { createLogger } from "../util/logger";

const logger = createLogger("planner");

export interface Planner {
  /** Resolves to `[]`, never rejects, when no useful call can be planned. */
  plan(
    query: string,
    catalog: readonly ToolDescriptor[],
    options?: { signal?: AbortSignal; },
  ): Promise<PlannedCall[]>;
}

const plannedCallSchema = z.object({
  tool: z.string().min(1),
  arguments: jsonObjectSchema.optional(),
});

export function buildPlanningPrompt(
  query: string,
  catalog: readonly ToolDescriptor[],
): string {
  const toolLines = catalog
    .map(tool =>
      `- ${tool.name}: ${tool.description || "No description"}\n`
      + `  Schema: ${JSON.stringify(tool.inputSchema)}`
    )
    .join("\n");

  return [
    "You are a planning assistant. Given a user query and the available tools,",
    "decide which tools to call and with what arguments.",
    "",
    "AVAILABLE TOOLS:",
    toolLines,
    "",
    `USER QUERY: ${query}`,
    "",
    "Respond with a JSON array of tool calls. Each element has:",
    '- "tool": the tool name, exactly as listed above',
    '- "arguments": an object matching that tool\'s schema',
    "",
    'Example: [{"tool": "web_search", "arguments": {"query": "latest release notes"}}]',
    "",
    "If no tool is needed, respond with an empty array: []",
    "Only use listed tools. Respond ONLY with JSON, no prose and no markdown.",
  ].join("\n");
}

function stripCodeFence(text: string): string {
  let body = text.trim();
  const fence = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(body);
  if (fence?.[1] !== undefined) {
    body = fence[1];
  }
  return body.trim();
}

/**
 * Parse planner output: a JSON array, or an object with a `tools` array,
 * optionally inside a ``` fence. Entries that are not `{ tool, arguments? }`
 * are dropped.
 */
export function parsePlan(text: string): PlannedCall[] {
  const body = stripCodeFence(text);
  if (!body) {
    throw new PlannerError("Planner returned an empty response");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new PlannerError(`Planner output is not JSON: ${errorMessage(err)}`, err);
  }

  let entries: unknown[];
  if (Array.isArray(parsed)) {
    entries = parsed;
  } else {
    const wrapped = z.object({ tools: z.array(z.unknown()) }).safeParse(parsed);
    if (!wrapped.success) {
      throw new PlannerError("Planner output is neither an array nor { tools: [...] }");
    }
    entries = wrapped.data.tools;
  }

  const calls: PlannedCall[] = [];
  for (const entry of entries) {
    const call = plannedCallSchema.safeParse(entry);
    if (!call.success) {
      logger.warn(`Dropping malformed planned call: ${JSON.stringify(entry)}`);
      continue;
    }
    calls.push({
      toolName: call.data.tool,
      arguments: call.data.arguments ?? {},
    });
  }
  return calls;
}

export class LlmPlanner implements Planner {
  private model: LanguageModel;

  constructor(model: LanguageModel) {
    this.model = model;
  }

  async plan(
    query: string,
    catalog: readonly ToolDescriptor[],
    options: { signal?: AbortSignal; } = {},
  ): Promise<PlannedCall[]> {
    try {
      const raw = await this.model.complete(buildPlanningPrompt(query, catalog), options);
      logger.log(`Raw planner output: ${raw.length > 200 ? `${raw.slice(0, 200)}...` : raw}`);
      const calls = parsePlan(raw);
      logger.log(`Planned ${calls.length} call(s): ${calls.map(c => c.toolName).join(", ")}`);
      return calls;
    } catch (err) {
      const failure = err instanceof PlannerError
        ? err
        : new PlannerError(`Planning call failed: ${errorMessage(err)}`, err);
      logger.warn(`${failure.message}; continuing without tools`);
      return [];
    }
  }
}
