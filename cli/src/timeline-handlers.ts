/**
 * `timeline_*` methods.
 *
 * Timeline names are not unique in Resolve. Lookups scan indices 1..count and
 * the lowest index wins; that tie-break is intentional and observable through
 * delete and set-current.
 */

import type { HandlerGroup } from "./handler.js";
import { missingArgument, numberArg, result, stringArg, unknownMethod } from "./handler.js";
import { NO_MEDIA_POOL, NO_PROJECT, NO_TIMELINE, failure, success } from "./outcome.js";
import type { MarkerSpec, Project, Timeline } from "./resolve-api.js";
import { TimelineSetting } from "./resolve-api.js";

export const MARKER_DEFAULTS: MarkerSpec = {
  frame: 0,
  color: "Blue",
  name: "",
  note: "",
  duration: 1,
};

/** Names of all timelines in index order. Unreadable entries are skipped. */
export async function listTimelineNames(project: Project): Promise<string[]> {
  const count = await project.getTimelineCount();
  const names: string[] = [];
  for (let i = 1; i <= count; i++) {
    const timeline = await project.getTimelineByIndex(i);
    if (!timeline) continue;
    const name = await timeline.getName();
    if (name !== null) names.push(name);
  }
  return names;
}

/** First timeline (lowest index) whose name matches exactly. */
export async function findTimelineByName(project: Project, name: string): Promise<Timeline | null> {
  const count = await project.getTimelineCount();
  for (let i = 1; i <= count; i++) {
    const timeline = await project.getTimelineByIndex(i);
    if (timeline && (await timeline.getName()) === name) return timeline;
  }
  return null;
}

export const timelineHandlers: HandlerGroup = {
  handlers: {
    timeline_create: async ({ method, args, context }) => {
      const name = stringArg(args, "name");
      if (name === undefined) return missingArgument(method, "name");
      const mediaPool = context.mediaPool;
      if (!mediaPool) return result(NO_MEDIA_POOL);
      const timeline = await mediaPool.createEmptyTimeline(name);
      if (!timeline) return result(failure("operation_failed", `Failed to create timeline '${name}'`));

      const settings: Array<[string, string]> = [];
      const frameRate = stringArg(args, "frame_rate");
      const width = numberArg(args, "resolution_width");
      const height = numberArg(args, "resolution_height");
      if (frameRate !== undefined) settings.push([TimelineSetting.FrameRate, frameRate]);
      if (width !== undefined) settings.push([TimelineSetting.ResolutionWidth, String(width)]);
      if (height !== undefined) settings.push([TimelineSetting.ResolutionHeight, String(height)]);

      const rejected: string[] = [];
      for (const [key, value] of settings) {
        if (!(await timeline.setSetting(key, value))) rejected.push(key);
      }
      const note = rejected.length > 0 ? ` (could not apply: ${rejected.join(", ")})` : "";
      return result(success(`Created timeline '${name}'${note}`));
    },

    timeline_delete: async ({ method, args, context }) => {
      const name = stringArg(args, "name");
      if (name === undefined) return missingArgument(method, "name");
      const project = context.project;
      if (!project) return result(NO_PROJECT);
      const timeline = await findTimelineByName(project, name);
      if (!timeline) return result(failure("not_found", `Timeline '${name}' not found`));
      if (!(await project.deleteTimeline(timeline))) {
        return result(failure("operation_failed", `Failed to delete timeline '${name}'`));
      }
      return result(success(`Deleted timeline '${name}'`));
    },

    timeline_set_current: async ({ method, args, context }) => {
      const name = stringArg(args, "name");
      if (name === undefined) return missingArgument(method, "name");
      const project = context.project;
      if (!project) return result(NO_PROJECT);
      const timeline = await findTimelineByName(project, name);
      if (!timeline) return result(failure("not_found", `Timeline '${name}' not found`));
      if (!(await project.setCurrentTimeline(timeline))) {
        return result(failure("operation_failed", `Failed to set current timeline to '${name}'`));
      }
      return { outcome: success(`Set current timeline to '${name}'`), context: context.withTimeline(timeline) };
    },

    timeline_get_current: async ({ context }) => {
      if (!context.project) return result(NO_PROJECT);
      const timeline = context.timeline;
      if (!timeline) return result(NO_TIMELINE);
      const name = await timeline.getName();
      if (name === null) return result(failure("operation_failed", "Could not read the current timeline name"));
      return result(success(name));
    },

    timeline_add_marker: async ({ args, context }) => {
      if (!context.project) return result(NO_PROJECT);
      const timeline = context.timeline;
      if (!timeline) return result(NO_TIMELINE);
      const marker: MarkerSpec = {
        frame: numberArg(args, "frame") ?? MARKER_DEFAULTS.frame,
        color: stringArg(args, "color") ?? MARKER_DEFAULTS.color,
        name: stringArg(args, "name") ?? MARKER_DEFAULTS.name,
        note: stringArg(args, "note") ?? MARKER_DEFAULTS.note,
        duration: numberArg(args, "duration") ?? MARKER_DEFAULTS.duration,
      };
      if (!(await timeline.addMarker(marker))) {
        return result(failure("operation_failed", `Failed to add marker at frame ${marker.frame}`));
      }
      const timelineName = (await timeline.getName()) ?? "current timeline";
      return result(success(`Added ${marker.color} marker at frame ${marker.frame} to '${timelineName}'`));
    },
  },
  fallback: unknownMethod("timeline"),
};
