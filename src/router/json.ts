/**
 * Runtime validation for values that cross the downstream boundary.
 */

import { z } from "zod";
import type { JsonObject, JsonValue } from "./types";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(
  z.string(),
  jsonValueSchema,
);

export const toolDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: jsonObjectSchema,
});

const contentItemSchema = z
  .object({ type: z.string() })
  .passthrough();

export const callToolResultSchema = z.object({
  content: z.array(contentItemSchema).default([]),
  isError: z.boolean().optional(),
});

export type CallToolResult = z.infer<typeof callToolResultSchema>;

/**
 * Canonical text of a tool result: the first content item's text when it
 * has one, else its JSON rendering.
 */
export function extractResultText(result: CallToolResult): string {
  const first = result.content[0];
  if (!first) return "";
  return typeof first.text === "string" ? first.text : JSON.stringify(first);
}
