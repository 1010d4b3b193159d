/**
 * Programmatic API for resolve-mcp (session, router, catalog, connectors).
 * CLI entry is in cli.ts.
 */

export * from "./models.js";
export * from "./outcome.js";
export * from "./resolve-api.js";
export * from "./config.js";
export { SessionContext } from "./context.js";
export type { ContextState } from "./context.js";
export { Router, categorize, routeFor } from "./router.js";
export type { Route, DispatchResult } from "./router.js";
export type { Handler, HandlerGroup, HandlerInput, HandlerResult } from "./handler.js";
export { ToolCatalog, createToolCatalog, toolDefinitions, DEFAULT_TIMELINE_SETTINGS } from "./tools.js";
export type { RegisteredTool, TimelineDefaults } from "./tools.js";
export { ToolArgumentsError, validateToolArguments } from "./validate-arguments.js";
export { McpSession, SessionState, RpcErrorCode, SUPPORTED_PROTOCOL_VERSIONS, runMcpServer } from "./mcp.js";
export type { JsonRpcResponse, McpServerOptions } from "./mcp.js";
export { SimulatedResolve, SimulationConnector } from "./simulated-resolve.js";
export { PythonConnector } from "./remote-resolve.js";
export { BridgeClient, BridgeError, ResolveCallError } from "./python-bridge.js";
export type { BridgeTransport } from "./python-bridge.js";
export { createConnector } from "./connector.js";
export { getLogger, initLogger } from "./logger.js";
