/**
 * Programmatic API for the toolrelay MCP router.
 */

export { Router, type HealthReport, type ToolListing } from "./router/router";
export {
  ConnectionManager,
  type ConnectionManagerOptions,
  type SessionFactory,
} from "./router/connection-manager";
export { Dispatcher, type ExecuteOptions } from "./router/dispatcher";
export { ToolRegistry } from "./router/registry";
export {
  createTransportFor,
  UpstreamSession,
  type UpstreamSessionOptions,
} from "./router/upstream-session";
export {
  MonotonicProgress,
  normalizeProgress,
  ProgressScaler,
} from "./router/progress";
export {
  ConnectionError,
  PlannerError,
  ProtocolError,
  RemoteError,
  RouterError,
  SynthesisError,
  TimeoutError,
  UnknownToolError,
} from "./router/errors";
export type {
  DownstreamEndpoint,
  JsonObject,
  JsonValue,
  PlannedCall,
  ProgressEvent,
  ProgressUpdate,
  SessionState,
  ToolDescriptor,
  ToolExecutionResult,
  ToolRoute,
  TransportSession,
} from "./router/types";
export {
  Orchestrator,
  type OrchestrationPhase,
  type OrchestratorDeps,
  type ProcessQueryOptions,
} from "./orchestrator/orchestrator";
export { ChatClient, type ChatClientOptions, type LanguageModel } from "./llm/client";
export { LlmPlanner, parsePlan, type Planner } from "./llm/planner";
export { LlmSynthesizer, type Synthesizer } from "./llm/synthesizer";
export {
  createRouterServer,
  RouterServer,
  type RouterServerOptions,
} from "./server/router-server";
export { startHttpServer, type HttpServerOptions } from "./transport/http-server";
export { discoverConfig, type DiscoveryOptions, toEndpoints } from "./config/discovery";
export { validateConfig } from "./config/schema";
export type {
  HttpServerConfig,
  McpConfigFile,
  ResolvedConfig,
  RouterSettings,
  ServerConfig,
  StdioServerConfig,
} from "./config/types";
export { setVerbose } from "./util/logger";
