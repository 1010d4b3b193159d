/**
 * MCP server over stdio (JSON-RPC 2.0, one message per line).
 * Exposes DaVinci Resolve operations as tools.
 */

import * as readline from "node:readline";
import type { Logger } from "pino";
import { SessionContext } from "./context.js";
import { getLogger } from "./logger.js";
import type { ToolListing, ToolResult } from "./models.js";
import { failure, toToolResult } from "./outcome.js";
import type { ResolveConnector } from "./resolve-api.js";
import { Router } from "./router.js";
import type { ToolCatalog } from "./tools.js";
import { createToolCatalog } from "./tools.js";
import { ToolArgumentsError, validateToolArguments } from "./validate-arguments.js";

export const SERVER_NAME = "resolve-mcp";
export const SERVER_VERSION = "0.1.0";

/** Newest first; the first entry is offered when the client asks for something else. */
export const SUPPORTED_PROTOCOL_VERSIONS = ["2025-06-18", "2025-03-26", "2024-11-05"] as const;

export const RpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  ServerNotInitialized: -32002,
} as const;

export enum SessionState {
  Uninitialized = "uninitialized",
  AwaitingInitialized = "awaiting_initialized",
  Initialized = "initialized",
  Terminated = "terminated",
}

type RequestId = string | number;

export interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: RequestId | null;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: { tools: { listChanged: boolean } };
  serverInfo: { name: string; version: string };
  instructions: string;
}

const INSTRUCTIONS =
  "Tools act on the DaVinci Resolve instance this server is connected to. " +
  "The current project, media pool and timeline are re-read from Resolve before every call, so changes made in the Resolve UI are always seen. " +
  "Open or create a project before using timeline_* or media pool tools. " +
  "create_timeline does not make the new timeline current: call set_current_timeline before add_marker. " +
  "Timeline names may repeat; delete_timeline and set_current_timeline act on the first timeline with the given name. " +
  "Color and render tools are listed but not implemented yet.";

function response(id: RequestId | null, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

function errorResponse(id: RequestId | null, code: number, message: string, data?: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: data === undefined ? { code, message } : { code, message, data } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRequestId(value: unknown): value is RequestId {
  return typeof value === "string" || (typeof value === "number" && Number.isFinite(value));
}

export interface McpSessionOptions {
  catalog: ToolCatalog;
  router: Router;
  log?: Logger;
}

/**
 * One client session. `handleLine` takes one input line and returns the
 * response to write, or null for blank lines and notifications. Callers must
 * await each line before passing the next.
 */
export class McpSession {
  private currentState = SessionState.Uninitialized;
  private currentContext = SessionContext.EMPTY;
  private readonly catalog: ToolCatalog;
  private readonly router: Router;
  private readonly log: Logger;

  constructor(options: McpSessionOptions) {
    this.catalog = options.catalog;
    this.router = options.router;
    this.log = options.log ?? getLogger("mcp");
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Context as of the end of the last tool call. */
  get context(): SessionContext {
    return this.currentContext;
  }

  terminate(): void {
    this.currentState = SessionState.Terminated;
  }

  async handleLine(line: string): Promise<JsonRpcResponse | null> {
    if (this.currentState === SessionState.Terminated) return null;
    if (!line.trim()) return null;
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch {
      return errorResponse(null, RpcErrorCode.ParseError, "Parse error");
    }
    return this.handleMessage(message);
  }

  async handleMessage(message: unknown): Promise<JsonRpcResponse | null> {
    if (Array.isArray(message)) {
      return errorResponse(null, RpcErrorCode.InvalidRequest, "Invalid Request: batches are not supported");
    }
    if (!isRecord(message)) {
      return errorResponse(null, RpcErrorCode.InvalidRequest, "Invalid Request: expected an object");
    }
    const rawId = message.id;
    const hasId = "id" in message;
    const id = isRequestId(rawId) ? rawId : null;
    if (message.jsonrpc !== "2.0") {
      return errorResponse(id, RpcErrorCode.InvalidRequest, 'Invalid Request: jsonrpc must be "2.0"');
    }
    const method = message.method;
    if (typeof method !== "string") {
      return errorResponse(id, RpcErrorCode.InvalidRequest, "Invalid Request: method must be a string");
    }
    if (!hasId) {
      this.handleNotification(method);
      return null;
    }
    if (!isRequestId(rawId)) {
      return errorResponse(null, RpcErrorCode.InvalidRequest, "Invalid Request: id must be a string or number");
    }

    try {
      return await this.handleRequest(rawId, method, message.params);
    } catch (err) {
      const text = err instanceof Error ? err.message : String(err);
      this.log.error({ err, method }, "request failed");
      return errorResponse(rawId, RpcErrorCode.InternalError, text);
    }
  }

  private handleNotification(method: string): void {
    if (method === "notifications/initialized" && this.currentState === SessionState.AwaitingInitialized) {
      this.currentState = SessionState.Initialized;
      this.log.info("client initialized");
      return;
    }
    this.log.debug({ method, state: this.currentState }, "notification ignored");
  }

  private async handleRequest(id: RequestId, method: string, params: unknown): Promise<JsonRpcResponse> {
    if (method === "ping") {
      return response(id, {});
    }
    if (method === "initialize") {
      if (this.currentState !== SessionState.Uninitialized) {
        return errorResponse(id, RpcErrorCode.InvalidRequest, "Server already initialized");
      }
      this.currentState = SessionState.AwaitingInitialized;
      return response(id, this.initialize(params));
    }
    if (this.currentState !== SessionState.Initialized) {
      return errorResponse(id, RpcErrorCode.ServerNotInitialized, "Server not initialized");
    }
    if (method === "tools/list") {
      const tools: ToolListing[] = this.catalog.listing();
      return response(id, { tools });
    }
    if (method === "tools/call") {
      if (!isRecord(params)) {
        return errorResponse(id, RpcErrorCode.InvalidParams, "Invalid params: expected an object");
      }
      const name = params.name;
      if (typeof name !== "string" || !name) {
        return errorResponse(id, RpcErrorCode.InvalidParams, "Invalid params: name required");
      }
      const args = params.arguments ?? {};
      if (!isRecord(args)) {
        return errorResponse(id, RpcErrorCode.InvalidParams, "Invalid params: arguments must be an object");
      }
      if (!this.catalog.get(name)) {
        return errorResponse(id, RpcErrorCode.InvalidParams, `Unknown tool: ${name}`);
      }
      return response(id, await this.callTool(name, args));
    }
    return errorResponse(id, RpcErrorCode.MethodNotFound, "Method not found: " + method);
  }

  private initialize(params: unknown): InitializeResult {
    const requested = isRecord(params) ? params.protocolVersion : undefined;
    const protocolVersion =
      SUPPORTED_PROTOCOL_VERSIONS.find((version) => version === requested) ?? SUPPORTED_PROTOCOL_VERSIONS[0];
    this.log.info({ requested, protocolVersion }, "initialize");
    return {
      protocolVersion,
      capabilities: { tools: { listChanged: false } },
      serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
      instructions: INSTRUCTIONS,
    };
  }

  /** Run a catalog tool. Never throws for tool-level problems; those become error results. */
  async callTool(name: string, rawArgs: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.catalog.get(name);
    if (!tool) {
      return toToolResult(failure("method_not_found", `Unknown tool: ${name}`));
    }
    let args: Record<string, unknown>;
    try {
      args = validateToolArguments(tool.name, tool.inputSchema, rawArgs);
    } catch (err) {
      if (err instanceof ToolArgumentsError) {
        this.log.info({ tool: name, details: err.details }, "invalid tool arguments");
        return toToolResult(failure("invalid_arguments", err.message));
      }
      throw err;
    }
    this.log.debug({ tool: name, method: tool.route.method }, "tools/call");
    const dispatched = await this.router.dispatch(tool.route, args);
    if (dispatched.context) {
      this.currentContext = dispatched.context;
    }
    return toToolResult(dispatched.outcome);
  }
}

export interface McpServerOptions {
  connector: ResolveConnector;
  catalog?: ToolCatalog;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  log?: Logger;
}

/**
 * Serve one session until the input ends. Lines are handled strictly in
 * order; the connector is closed on the way out.
 */
export async function runMcpServer(options: McpServerOptions): Promise<McpSession> {
  const log = options.log ?? getLogger("mcp");
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const session = new McpSession({
    catalog: options.catalog ?? createToolCatalog(),
    router: new Router(options.connector),
    log,
  });

  log.info({ mode: options.connector.mode }, "serving on stdio");
  const rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      const reply = await session.handleLine(line);
      if (reply) {
        output.write(JSON.stringify(reply) + "\n");
      }
    }
  } finally {
    session.terminate();
    await options.connector.close();
    log.info("input closed; session terminated");
  }
  return session;
}
