/**
 * Methods matched by exact name rather than by prefix.
 */

import type { HandlerGroup } from "./handler.js";
import { missingArgument, result, stringArg, unknownMethod } from "./handler.js";
import { NOT_RUNNING, NO_PROJECT, failure, success } from "./outcome.js";
import { listTimelineNames } from "./timeline-handlers.js";

export const GENERAL_METHODS = [
  "is_running",
  "get_version",
  "get_current_project_name",
  "get_timelines",
  "switch_page",
] as const;

export type GeneralMethod = (typeof GENERAL_METHODS)[number];

export function isGeneralMethod(method: string): method is GeneralMethod {
  return (GENERAL_METHODS as readonly string[]).includes(method);
}

export const generalHandlers: HandlerGroup = {
  handlers: {
    is_running: async ({ app }) => result(success(app !== null)),

    get_version: async ({ app }) => {
      if (!app) return result(NOT_RUNNING);
      const product = (await app.getProductName()) ?? "DaVinci Resolve";
      const version = await app.getVersionString();
      if (!version) return result(failure("operation_failed", "Could not read the application version"));
      return result(success(`${product} ${version}`));
    },

    get_current_project_name: async ({ context }) => {
      const project = context.project;
      if (!project) return result(NO_PROJECT);
      const name = await project.getName();
      if (name === null) return result(failure("operation_failed", "Could not read the current project name"));
      return result(success(name));
    },

    get_timelines: async ({ context }) => {
      const project = context.project;
      if (!project) return result(success([]));
      return result(success(await listTimelineNames(project)));
    },

    switch_page: async ({ method, args, app }) => {
      const page = stringArg(args, "page");
      if (page === undefined) return missingArgument(method, "page");
      if (!app) return result(NOT_RUNNING);
      const switched = await app.openPage(page);
      if (!switched) return result(failure("operation_failed", `Could not switch to page '${page}'`));
      return result(success(`Switched to ${page} page`));
    },
  },
  fallback: unknownMethod("general"),
};
