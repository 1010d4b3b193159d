import { describe, it, expect, vi } from "vitest";
import { PassThrough } from "node:stream";
import pino from "pino";
import { McpSession, SessionState, runMcpServer } from "../mcp.js";
import type { JsonRpcResponse } from "../mcp.js";
import { Router } from "../router.js";
import { SimulatedResolve, SimulationConnector } from "../simulated-resolve.js";
import { createToolCatalog } from "../tools.js";
import type { TimelineDefaults } from "../tools.js";

const silent = pino({ level: "silent" });

function makeSession(app = new SimulatedResolve(), defaults?: TimelineDefaults) {
  const router = new Router(new SimulationConnector(app), silent);
  const session = new McpSession({ catalog: createToolCatalog(defaults), router, log: silent });
  const send = (message: unknown) => session.handleLine(JSON.stringify(message));
  return { app, router, session, send };
}

async function initialized(app?: SimulatedResolve, defaults?: TimelineDefaults) {
  const made = makeSession(app, defaults);
  await made.send({ jsonrpc: "2.0", id: 0, method: "initialize", params: { protocolVersion: "2025-06-18" } });
  await made.send({ jsonrpc: "2.0", method: "notifications/initialized" });
  let nextId = 1;
  const callTool = async (name: string, args: Record<string, unknown> = {}) =>
    made.send({ jsonrpc: "2.0", id: nextId++, method: "tools/call", params: { name, arguments: args } });
  return { ...made, callTool };
}

function text(response: JsonRpcResponse | null): string {
  expect(response?.error).toBeUndefined();
  const result = response?.result;
  if (typeof result !== "object" || result === null || !("content" in result) || !Array.isArray(result.content)) {
    throw new Error(`not a tool result: ${JSON.stringify(response)}`);
  }
  return result.content.map((c: { text: string }) => c.text).join("");
}

describe("initialize", () => {
  it("echoes a supported protocol version", async () => {
    const { session, send } = makeSession();
    const response = await send({ jsonrpc: "2.0", id: 1, method: "initialize", params: { protocolVersion: "2025-03-26" } });
    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 1,
      result: {
        protocolVersion: "2025-03-26",
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: "resolve-mcp", version: "0.1.0" },
        instructions: expect.any(String),
      },
    });
    expect(session.state).toBe(SessionState.AwaitingInitialized);
  });

  it("offers the latest version when the client's is unknown", async () => {
    const { send } = makeSession();
    const response = await send({ jsonrpc: "2.0", id: 1, method: "initialize", params: { protocolVersion: "1999-01-01" } });
    expect(response?.result).toMatchObject({ protocolVersion: "2025-06-18" });
  });

  it("rejects a second initialize", async () => {
    const { send } = makeSession();
    await send({ jsonrpc: "2.0", id: 1, method: "initialize", params: {} });
    expect(await send({ jsonrpc: "2.0", id: 2, method: "initialize", params: {} })).toEqual({
      jsonrpc: "2.0",
      id: 2,
      error: { code: -32600, message: "Server already initialized" },
    });
  });

  it("moves to Initialized on the initialized notification, without answering", async () => {
    const { session, send } = makeSession();
    await send({ jsonrpc: "2.0", id: 1, method: "initialize", params: {} });
    expect(await send({ jsonrpc: "2.0", method: "notifications/initialized" })).toBeNull();
    expect(session.state).toBe(SessionState.Initialized);
  });
});

describe("lifecycle gating", () => {
  it("refuses tools before initialize", async () => {
    const { send } = makeSession();
    expect(await send({ jsonrpc: "2.0", id: 7, method: "tools/list" })).toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: { code: -32002, message: "Server not initialized" },
    });
  });

  it("refuses tools between initialize and the initialized notification", async () => {
    const { send } = makeSession();
    await send({ jsonrpc: "2.0", id: 1, method: "initialize", params: {} });
    const response = await send({ jsonrpc: "2.0", id: 2, method: "tools/call", params: { name: "is_running" } });
    expect(response?.error).toEqual({ code: -32002, message: "Server not initialized" });
  });

  it("answers ping in any state", async () => {
    const { send } = makeSession();
    expect(await send({ jsonrpc: "2.0", id: "p", method: "ping" })).toEqual({ jsonrpc: "2.0", id: "p", result: {} });
  });

  it("ignores input once terminated", async () => {
    const { session, send } = makeSession();
    session.terminate();
    expect(await send({ jsonrpc: "2.0", id: 1, method: "ping" })).toBeNull();
  });
});

describe("envelope errors", () => {
  it("answers unparsable lines with a parse error and a null id", async () => {
    const { session } = makeSession();
    expect(await session.handleLine("{not json")).toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32700, message: "Parse error" },
    });
  });

  it("skips blank lines", async () => {
    const { session } = makeSession();
    expect(await session.handleLine("   ")).toBeNull();
  });

  it("rejects batches and non-objects", async () => {
    const { send } = makeSession();
    expect((await send([{ jsonrpc: "2.0", id: 1, method: "ping" }]))?.error?.code).toBe(-32600);
    expect(await send(42)).toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32600, message: "Invalid Request: expected an object" },
    });
  });

  it("rejects a wrong jsonrpc version and a missing method, keeping the id", async () => {
    const { send } = makeSession();
    expect(await send({ jsonrpc: "1.0", id: 3, method: "ping" })).toEqual({
      jsonrpc: "2.0",
      id: 3,
      error: { code: -32600, message: 'Invalid Request: jsonrpc must be "2.0"' },
    });
    expect((await send({ jsonrpc: "2.0", id: 4 }))?.error).toEqual({
      code: -32600,
      message: "Invalid Request: method must be a string",
    });
  });

  it("rejects an id that is neither string nor number", async () => {
    const { send } = makeSession();
    expect((await send({ jsonrpc: "2.0", id: { n: 1 }, method: "ping" }))?.error?.code).toBe(-32600);
    expect(await send({ jsonrpc: "2.0", id: null, method: "ping" })).toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32600, message: "Invalid Request: id must be a string or number" },
    });
  });

  it("ignores unknown notifications", async () => {
    const { send } = makeSession();
    expect(await send({ jsonrpc: "2.0", method: "notifications/cancelled", params: { requestId: 1 } })).toBeNull();
  });

  it("reports unknown methods once initialized", async () => {
    const { send } = await initialized();
    expect(await send({ jsonrpc: "2.0", id: 9, method: "resources/list" })).toEqual({
      jsonrpc: "2.0",
      id: 9,
      error: { code: -32601, message: "Method not found: resources/list" },
    });
  });

  it("turns unexpected exceptions into internal errors", async () => {
    const { router, callTool } = await initialized();
    vi.spyOn(router, "dispatch").mockRejectedValue(new Error("kaput"));
    expect((await callTool("is_running"))?.error).toEqual({ code: -32603, message: "kaput" });
  });
});

describe("tools/list", () => {
  it("lists the catalog without internal method names", async () => {
    const { send } = await initialized();
    const response = await send({ jsonrpc: "2.0", id: 5, method: "tools/list" });
    const result = response?.result;
    if (typeof result !== "object" || result === null || !("tools" in result) || !Array.isArray(result.tools)) {
      throw new Error("expected a tools array");
    }
    expect(result.tools).toHaveLength(30);
    expect(result.tools[0]).toEqual({
      name: "is_running",
      description: "Check whether DaVinci Resolve is running and reachable.",
      inputSchema: { type: "object", properties: {} },
    });
  });
});

describe("tools/call", () => {
  it("rejects malformed params at the protocol level", async () => {
    const { send } = await initialized();
    expect((await send({ jsonrpc: "2.0", id: 1, method: "tools/call", params: [] }))?.error).toEqual({
      code: -32602,
      message: "Invalid params: expected an object",
    });
    expect((await send({ jsonrpc: "2.0", id: 2, method: "tools/call", params: {} }))?.error).toEqual({
      code: -32602,
      message: "Invalid params: name required",
    });
    expect(
      (await send({ jsonrpc: "2.0", id: 3, method: "tools/call", params: { name: "is_running", arguments: [1] } }))?.error
    ).toEqual({ code: -32602, message: "Invalid params: arguments must be an object" });
  });

  it("rejects unknown tools at the protocol level", async () => {
    const { callTool } = await initialized();
    expect((await callTool("make_coffee"))?.error).toEqual({ code: -32602, message: "Unknown tool: make_coffee" });
  });

  it("reports schema violations as tool errors", async () => {
    const { callTool } = await initialized();
    expect((await callTool("add_marker", { frame: -1 }))?.result).toEqual({
      content: [{ type: "text", text: "Error: Invalid arguments for add_marker: /frame must be >= 0" }],
      is_error: true,
    });
    expect(text(await callTool("delete_timeline"))).toBe(
      "Error: Invalid arguments for delete_timeline: / must have required property 'name'"
    );
  });

  it("renders non-string values as pretty JSON", async () => {
    const { callTool } = await initialized();
    expect((await callTool("is_running"))?.result).toEqual({ content: [{ type: "text", text: "true" }], is_error: false });
  });

  it("runs the create, list, delete scenario", async () => {
    const { callTool } = await initialized();
    expect(text(await callTool("create_project", { name: "Demo" }))).toBe("Created project 'Demo'");
    expect(text(await callTool("create_timeline", { name: "Timeline 1" }))).toBe("Created timeline 'Timeline 1'");
    expect(text(await callTool("list_timelines_tool"))).toBe('[\n  "Timeline 1"\n]');
    expect(text(await callTool("delete_timeline", { name: "Timeline 1" }))).toBe("Deleted timeline 'Timeline 1'");
    expect(text(await callTool("list_timelines"))).toBe("[]");
  });

  it("fills create_empty_timeline settings from the configured defaults", async () => {
    const app = new SimulatedResolve();
    const { callTool } = await initialized(app, { frame_rate: "25", width: 1280, height: 720 });
    await callTool("create_project", { name: "Demo" });
    expect(text(await callTool("create_empty_timeline", { name: "Proxy" }))).toBe("Created timeline 'Proxy'");
    expect(Object.fromEntries(app.currentProject?.timelines[0].settings ?? [])).toEqual({
      timelineFrameRate: "25",
      timelineResolutionWidth: "1280",
      timelineResolutionHeight: "720",
    });
  });

  it("keeps the context of the last call", async () => {
    const app = new SimulatedResolve();
    const { session, callTool } = await initialized(app);
    expect(session.context.project).toBeNull();
    await callTool("create_project", { name: "Demo" });
    await callTool("create_timeline", { name: "A" });
    expect(text(await callTool("set_current_timeline", { name: "A" }))).toBe("Set current timeline to 'A'");
    expect(session.context.timeline).toBe(app.currentProject?.timelines[0]);
    expect(text(await callTool("add_marker", { frame: 48, color: "Green" }))).toBe("Added Green marker at frame 48 to 'A'");
  });

  it("reports color and render tools as not implemented", async () => {
    const { callTool } = await initialized();
    expect(text(await callTool("apply_lut", { lut_path: "/luts/look.cube" }))).toBe(
      "Error: Color method not implemented: color_apply_lut"
    );
    expect(text(await callTool("start_render"))).toBe("Error: Render method not implemented: render_start");
  });
});

describe("runMcpServer", () => {
  it("keeps request order when an earlier call is the slow one", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on("data", (chunk) => chunks.push(String(chunk)));
    const connector = new SimulationConnector();
    const connect = connector.connect.bind(connector);
    const delays = [50, 0];
    vi.spyOn(connector, "connect").mockImplementation(async () => {
      await new Promise((resolve) => setTimeout(resolve, delays.shift() ?? 0));
      return connect();
    });

    const done = runMcpServer({ connector, input, output, log: silent });
    input.end(
      [
        JSON.stringify({ jsonrpc: "2.0", id: 1, method: "initialize", params: {} }),
        JSON.stringify({ jsonrpc: "2.0", method: "notifications/initialized" }),
        JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/call", params: { name: "create_project", arguments: { name: "Demo" } } }),
        JSON.stringify({ jsonrpc: "2.0", id: 3, method: "tools/call", params: { name: "get_current_project_name" } }),
        JSON.stringify({ jsonrpc: "2.0", id: 4, method: "ping" }),
      ].join("\n") + "\n"
    );
    await done;

    const responses: JsonRpcResponse[] = chunks
      .join("")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(responses.map((r) => r.id)).toEqual([1, 2, 3, 4]);
    expect(text(responses[1])).toBe("Created project 'Demo'");
    expect(text(responses[2])).toBe("Demo");
  });

  it("answers in request order and closes the connector at end of input", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on("data", (chunk) => chunks.push(String(chunk)));
    const connector = new SimulationConnector();
    const close = vi.spyOn(connector, "close");

    const done = runMcpServer({ connector, input, output, log: silent });
    input.end(
      [
        JSON.stringify({ jsonrpc: "2.0", id: 1, method: "initialize", params: {} }),
        JSON.stringify({ jsonrpc: "2.0", method: "notifications/initialized" }),
        JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/call", params: { name: "create_project", arguments: { name: "Demo" } } }),
        "garbage",
        "",
        JSON.stringify({ jsonrpc: "2.0", id: 3, method: "tools/call", params: { name: "create_timeline", arguments: { name: "A" } } }),
        JSON.stringify({ jsonrpc: "2.0", id: 4, method: "tools/call", params: { name: "get_timelines" } }),
        JSON.stringify({ jsonrpc: "2.0", id: 5, method: "ping" }),
      ].join("\n") + "\n"
    );
    const session = await done;

    const responses: JsonRpcResponse[] = chunks
      .join("")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(responses.map((r) => r.id)).toEqual([1, 2, null, 3, 4, 5]);
    expect(responses[2].error?.code).toBe(-32700);
    expect(text(responses[4])).toBe('[\n  "A"\n]');
    expect(session.state).toBe(SessionState.Terminated);
    expect(close).toHaveBeenCalledTimes(1);
  });
});
