/**
 * `project_*` methods. Create, open and close move the session's current
 * project immediately, so later work in the same call sees the new project.
 */

import { SessionContext } from "./context.js";
import type { HandlerGroup, HandlerInput } from "./handler.js";
import { missingArgument, result, stringArg, unknownMethod } from "./handler.js";
import type { Outcome } from "./outcome.js";
import { NOT_RUNNING, NO_PROJECT, failure, success } from "./outcome.js";
import type { ProjectManager } from "./resolve-api.js";

async function projectManagerOf(app: HandlerInput["app"]): Promise<ProjectManager | Outcome> {
  if (!app) return NOT_RUNNING;
  const manager = await app.getProjectManager();
  return manager ?? failure("operation_failed", "Project manager is not available");
}

function isOutcome(value: ProjectManager | Outcome): value is Outcome {
  return "ok" in value;
}

export const projectHandlers: HandlerGroup = {
  handlers: {
    project_create: async ({ method, args, app }) => {
      const name = stringArg(args, "name");
      if (name === undefined) return missingArgument(method, "name");
      const manager = await projectManagerOf(app);
      if (isOutcome(manager)) return result(manager);
      const project = await manager.createProject(name);
      if (!project) return result(failure("operation_failed", `Failed to create project '${name}'`));
      return { outcome: success(`Created project '${name}'`), context: await SessionContext.derive(project) };
    },

    project_open: async ({ method, args, app }) => {
      const name = stringArg(args, "name");
      if (name === undefined) return missingArgument(method, "name");
      const manager = await projectManagerOf(app);
      if (isOutcome(manager)) return result(manager);
      const project = await manager.loadProject(name);
      if (!project) return result(failure("not_found", `Failed to open project '${name}'`));
      return { outcome: success(`Opened project '${name}'`), context: await SessionContext.derive(project) };
    },

    project_save: async ({ context, app }) => {
      const project = context.project;
      if (!project) return result(NO_PROJECT);
      const manager = await projectManagerOf(app);
      if (isOutcome(manager)) return result(manager);
      const name = (await project.getName()) ?? "current project";
      if (!(await manager.saveProject())) return result(failure("operation_failed", `Failed to save project '${name}'`));
      return result(success(`Saved project '${name}'`));
    },

    project_close: async ({ context, app }) => {
      const project = context.project;
      if (!project) return result(NO_PROJECT);
      const manager = await projectManagerOf(app);
      if (isOutcome(manager)) return result(manager);
      const name = (await project.getName()) ?? "current project";
      if (!(await manager.closeProject(project))) {
        return result(failure("operation_failed", `Failed to close project '${name}'`));
      }
      return { outcome: success(`Closed project '${name}'`), context: SessionContext.EMPTY };
    },

    project_list: async ({ app }) => {
      const manager = await projectManagerOf(app);
      if (isOutcome(manager)) return result(manager);
      return result(success(await manager.getProjectListInCurrentFolder()));
    },

    project_set_setting: async ({ method, args, context }) => {
      const settingName = stringArg(args, "setting_name");
      if (settingName === undefined) return missingArgument(method, "setting_name");
      const raw = args.setting_value;
      if (typeof raw !== "string" && typeof raw !== "number" && typeof raw !== "boolean") {
        return missingArgument(method, "setting_value");
      }
      const project = context.project;
      if (!project) return result(NO_PROJECT);
      const value = String(raw);
      if (!(await project.setSetting(settingName, value))) {
        return result(failure("operation_failed", `Failed to set project setting '${settingName}' to '${value}'`));
      }
      return result(success(`Set project setting '${settingName}' to '${value}'`));
    },

    project_get_setting: async ({ method, args, context }) => {
      const settingName = stringArg(args, "setting_name");
      if (settingName === undefined) return missingArgument(method, "setting_name");
      const project = context.project;
      if (!project) return result(NO_PROJECT);
      const value = await project.getSetting(settingName);
      if (value === null) return result(failure("not_found", `Project setting '${settingName}' not found`));
      return result(success({ [settingName]: value }));
    },
  },
  fallback: unknownMethod("project"),
};
