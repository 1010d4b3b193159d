/**
 * Tool catalog: what `tools/list` advertises and which method each tool runs.
 *
 * Tool names are what clients see; methods are what the router understands.
 * Several tools may share a method (`list_timelines`, `list_timelines_tool`
 * and `get_timelines` all list timeline names). Each method's category is
 * resolved here, once, so a catalog entry whose method no category claims
 * fails at startup rather than at call time.
 */

import type { ToolDefinition, ToolInputSchema, ToolListing } from "./models.js";
import type { Route } from "./router.js";
import { routeFor } from "./router.js";
import { MARKER_DEFAULTS } from "./timeline-handlers.js";

export interface TimelineDefaults {
  frame_rate: string;
  width: number;
  height: number;
}

export const DEFAULT_TIMELINE_SETTINGS: TimelineDefaults = {
  frame_rate: "24",
  width: 1920,
  height: 1080,
};

export interface RegisteredTool extends ToolDefinition {
  route: Route;
}

function noArguments(): ToolInputSchema {
  return { type: "object", properties: {} };
}

export function toolDefinitions(defaults: TimelineDefaults = DEFAULT_TIMELINE_SETTINGS): ToolDefinition[] {
  return [
    // ── General ────────────────────────────────────────────────────
    {
      name: "is_running",
      method: "is_running",
      description: "Check whether DaVinci Resolve is running and reachable.",
      inputSchema: noArguments(),
    },
    {
      name: "get_version",
      method: "get_version",
      description: "Get the product name and version of the connected DaVinci Resolve.",
      inputSchema: noArguments(),
    },
    {
      name: "get_current_project_name",
      method: "get_current_project_name",
      description: "Get the name of the currently open project.",
      inputSchema: noArguments(),
    },
    {
      name: "get_timelines",
      method: "get_timelines",
      description: "List the names of all timelines in the current project, in project order.",
      inputSchema: noArguments(),
    },
    {
      name: "list_timelines",
      method: "get_timelines",
      description: "List all timelines in the current project.",
      inputSchema: noArguments(),
    },
    {
      name: "list_timelines_tool",
      method: "get_timelines",
      description: "List all timelines in the current project (alias of list_timelines).",
      inputSchema: noArguments(),
    },
    {
      name: "switch_page",
      method: "switch_page",
      description:
        "Switch to a page in DaVinci Resolve (media, cut, edit, fusion, color, fairlight, deliver). " +
        "The page name is passed to Resolve as given.",
      inputSchema: {
        type: "object",
        properties: { page: { type: "string", description: "The page to switch to" } },
        required: ["page"],
      },
    },

    // ── Project ────────────────────────────────────────────────────
    {
      name: "create_project",
      method: "project_create",
      description: "Create a new project with the given name and make it the current project.",
      inputSchema: {
        type: "object",
        properties: { name: { type: "string", minLength: 1, description: "Project name" } },
        required: ["name"],
      },
    },
    {
      name: "open_project",
      method: "project_open",
      description: "Open an existing project by name.",
      inputSchema: {
        type: "object",
        properties: { name: { type: "string", minLength: 1, description: "Project name" } },
        required: ["name"],
      },
    },
    {
      name: "save_project",
      method: "project_save",
      description: "Save the current project.",
      inputSchema: noArguments(),
    },
    {
      name: "close_project",
      method: "project_close",
      description: "Close the current project.",
      inputSchema: noArguments(),
    },
    {
      name: "list_projects",
      method: "project_list",
      description: "List the projects in the project manager's current folder.",
      inputSchema: noArguments(),
    },
    {
      name: "set_project_setting",
      method: "project_set_setting",
      description: "Set a project setting (e.g. timelineFrameRate) to the given value.",
      inputSchema: {
        type: "object",
        properties: {
          setting_name: { type: "string", minLength: 1, description: "Setting key" },
          setting_value: { type: ["string", "number", "boolean"], description: "New value (sent to Resolve as text)" },
        },
        required: ["setting_name", "setting_value"],
      },
    },
    {
      name: "get_project_setting",
      method: "project_get_setting",
      description: "Read a project setting by key.",
      inputSchema: {
        type: "object",
        properties: { setting_name: { type: "string", minLength: 1, description: "Setting key" } },
        required: ["setting_name"],
      },
    },

    // ── Timeline ───────────────────────────────────────────────────
    {
      name: "create_timeline",
      method: "timeline_create",
      description: "Create a new empty timeline with the given name. It does not become the current timeline.",
      inputSchema: {
        type: "object",
        properties: { name: { type: "string", minLength: 1, description: "Timeline name" } },
        required: ["name"],
      },
    },
    {
      name: "create_empty_timeline",
      method: "timeline_create",
      description: "Create a new empty timeline with custom frame rate and resolution.",
      inputSchema: {
        type: "object",
        properties: {
          name: { type: "string", minLength: 1, description: "Timeline name" },
          frame_rate: { type: "string", description: "Frame rate (e.g. 24, 29.97)", default: defaults.frame_rate },
          resolution_width: { type: "integer", minimum: 1, description: "Width in pixels", default: defaults.width },
          resolution_height: { type: "integer", minimum: 1, description: "Height in pixels", default: defaults.height },
        },
        required: ["name"],
      },
    },
    {
      name: "delete_timeline",
      method: "timeline_delete",
      description: "Delete a timeline by name. When several timelines share the name, the first one is deleted.",
      inputSchema: {
        type: "object",
        properties: { name: { type: "string", description: "Timeline name" } },
        required: ["name"],
      },
    },
    {
      name: "set_current_timeline",
      method: "timeline_set_current",
      description: "Switch to a timeline by name.",
      inputSchema: {
        type: "object",
        properties: { name: { type: "string", description: "Timeline name" } },
        required: ["name"],
      },
    },
    {
      name: "get_current_timeline",
      method: "timeline_get_current",
      description: "Get the name of the current timeline.",
      inputSchema: noArguments(),
    },
    {
      name: "add_marker",
      method: "timeline_add_marker",
      description: "Add a marker at the specified frame in the current timeline.",
      inputSchema: {
        type: "object",
        properties: {
          frame: { type: "integer", minimum: 0, description: "Frame offset", default: MARKER_DEFAULTS.frame },
          color: { type: "string", description: "Marker color (e.g. Blue, Red, Green)", default: MARKER_DEFAULTS.color },
          name: { type: "string", description: "Marker name", default: MARKER_DEFAULTS.name },
          note: { type: "string", description: "Marker note", default: MARKER_DEFAULTS.note },
          duration: { type: "integer", minimum: 1, description: "Duration in frames", default: MARKER_DEFAULTS.duration },
        },
      },
    },

    // ── Media pool ─────────────────────────────────────────────────
    {
      name: "import_media",
      method: "media_import",
      description: "Import a media file into the current project's media pool.",
      inputSchema: {
        type: "object",
        properties: { file_path: { type: "string", minLength: 1, description: "Path to the media file" } },
        required: ["file_path"],
      },
    },
    {
      name: "create_bin",
      method: "media_create_bin",
      description: "Create a new bin (folder) in the media pool. Bins with the same name are not merged.",
      inputSchema: {
        type: "object",
        properties: { name: { type: "string", minLength: 1, description: "Bin name" } },
        required: ["name"],
      },
    },

    // ── Color (not implemented) ────────────────────────────────────
    {
      name: "apply_lut",
      method: "color_apply_lut",
      description: "Apply a LUT to the current clip's node. Not implemented yet.",
      inputSchema: {
        type: "object",
        properties: {
          lut_path: { type: "string", description: "Path to the LUT file" },
          node_index: { type: "integer", minimum: 1, description: "Node index (1-based)" },
        },
        required: ["lut_path"],
      },
    },
    {
      name: "add_node",
      method: "color_add_node",
      description: "Add a node to the current clip's grade. Not implemented yet.",
      inputSchema: {
        type: "object",
        properties: {
          node_type: { type: "string", description: "serial, parallel or layer", default: "serial" },
          label: { type: "string", description: "Node label" },
        },
      },
    },
    {
      name: "set_color_wheel_param",
      method: "color_set_wheel_param",
      description: "Set a color wheel parameter. Not implemented yet.",
      inputSchema: {
        type: "object",
        properties: {
          wheel: { type: "string", description: "lift, gamma, gain or offset" },
          param: { type: "string", description: "red, green, blue or master" },
          value: { type: "number", description: "Parameter value" },
          node_index: { type: "integer", minimum: 1, description: "Node index (1-based)" },
        },
        required: ["wheel", "param", "value"],
      },
    },
    {
      name: "copy_grade",
      method: "color_copy_grade",
      description: "Copy a grade from one clip to another. Not implemented yet.",
      inputSchema: {
        type: "object",
        properties: {
          source_clip_name: { type: "string", description: "Source clip" },
          target_clip_name: { type: "string", description: "Target clip" },
          mode: { type: "string", description: "full, current_node or all_nodes", default: "full" },
        },
      },
    },

    // ── Render (not implemented) ───────────────────────────────────
    {
      name: "add_to_render_queue",
      method: "render_add_to_queue",
      description: "Add the current timeline to the render queue. Not implemented yet.",
      inputSchema: {
        type: "object",
        properties: {
          preset_name: { type: "string", description: "Render preset" },
          timeline_name: { type: "string", description: "Timeline to render (default: current)" },
        },
        required: ["preset_name"],
      },
    },
    {
      name: "start_render",
      method: "render_start",
      description: "Start rendering the queued jobs. Not implemented yet.",
      inputSchema: noArguments(),
    },
    {
      name: "get_render_status",
      method: "render_get_status",
      description: "Get the status of render jobs. Not implemented yet.",
      inputSchema: noArguments(),
    },
    {
      name: "clear_render_queue",
      method: "render_clear_queue",
      description: "Remove all jobs from the render queue. Not implemented yet.",
      inputSchema: noArguments(),
    },
  ];
}

export class ToolCatalog {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(definitions: ToolDefinition[]) {
    for (const definition of definitions) {
      if (this.tools.has(definition.name)) {
        throw new Error(`Duplicate tool name in catalog: ${definition.name}`);
      }
      const route = routeFor(definition.method);
      if (!route) {
        throw new Error(`Tool "${definition.name}" maps to method "${definition.method}", which no category handles`);
      }
      this.tools.set(definition.name, Object.freeze({ ...definition, route }));
    }
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /** The `tools/list` payload, in catalog order. */
  listing(): ToolListing[] {
    return [...this.tools.values()].map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
  }
}

export function createToolCatalog(defaults: TimelineDefaults = DEFAULT_TIMELINE_SETTINGS): ToolCatalog {
  return new ToolCatalog(toolDefinitions(defaults));
}
