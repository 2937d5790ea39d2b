/**
 * Zod schemas for validating .mcp.json config files.
 */

import { z } from "zod";

const stdioServerSchema = z.object({
  type: z.literal("stdio").optional(),
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string(), z.string()).optional(),
});

const httpServerSchema = z.object({
  type: z.enum(["sse", "url"]),
  url: z.string().min(1),
});

export const serverConfigSchema = z.union([
  stdioServerSchema,
  httpServerSchema,
]);

export const routerSettingsSchema = z.object({
  model: z.string().min(1).optional(),
  executionMode: z.enum(["sequential", "concurrent"]).optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
});

export const mcpConfigFileSchema = z.object({
  mcpServers: z.record(z.string(), serverConfigSchema),
  router: routerSettingsSchema.optional(),
});

export type ValidatedMcpConfig = z.infer<typeof mcpConfigFileSchema>;

export function validateConfig(data: unknown): ValidatedMcpConfig {
  return mcpConfigFileSchema.parse(data);
}
