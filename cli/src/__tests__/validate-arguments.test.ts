import { describe, it, expect } from "vitest";
import { createToolCatalog } from "../tools.js";
import type { RegisteredTool } from "../tools.js";
import { ToolArgumentsError, validateToolArguments } from "../validate-arguments.js";

const catalog = createToolCatalog();

function tool(name: string): RegisteredTool {
  const found = catalog.get(name);
  if (!found) throw new Error(`no tool ${name}`);
  return found;
}

function validate(name: string, args: unknown) {
  const t = tool(name);
  return validateToolArguments(t.name, t.inputSchema, args);
}

describe("validateToolArguments", () => {
  it("fills defaults on a copy and leaves the input alone", () => {
    const input = { frame: 12 };
    expect(validate("add_marker", input)).toEqual({ frame: 12, color: "Blue", name: "", note: "", duration: 1 });
    expect(input).toEqual({ frame: 12 });
  });

  it("fills timeline defaults for create_empty_timeline", () => {
    expect(validate("create_empty_timeline", { name: "A" })).toEqual({
      name: "A",
      frame_rate: "24",
      resolution_width: 1920,
      resolution_height: 1080,
    });
  });

  it("accepts numbers and booleans as setting values", () => {
    expect(validate("set_project_setting", { setting_name: "timelineFrameRate", setting_value: 25 })).toEqual({
      setting_name: "timelineFrameRate",
      setting_value: 25,
    });
    expect(() => validate("set_project_setting", { setting_name: "x", setting_value: [1] })).toThrow(ToolArgumentsError);
  });

  it("lists every problem", () => {
    try {
      validate("add_marker", { frame: -1, duration: 0 });
      expect.fail("expected a ToolArgumentsError");
    } catch (err) {
      expect(err).toBeInstanceOf(ToolArgumentsError);
      if (!(err instanceof ToolArgumentsError)) return;
      expect(err.tool).toBe("add_marker");
      expect(err.details).toEqual(["/frame must be >= 0", "/duration must be >= 1"]);
      expect(err.message).toBe("Invalid arguments for add_marker: /frame must be >= 0; /duration must be >= 1");
    }
  });

  it("reports wrong types and missing required properties", () => {
    expect(() => validate("create_project", { name: 5 })).toThrow("Invalid arguments for create_project: /name must be string");
    expect(() => validate("create_project", {})).toThrow(
      "Invalid arguments for create_project: / must have required property 'name'"
    );
  });

  it("rejects non-object arguments", () => {
    expect(() => validate("is_running", "yes")).toThrow("Invalid arguments for is_running: expected an object");
  });
});
