/**
 * Session Context: the current project, media pool and timeline.
 *
 * The application is the source of truth and a user may change any of these in
 * the UI at any moment, so the context is re-derived before every tool call and
 * never patched field by field. Media pool and timeline only exist alongside a
 * project; the state union makes any other combination unrepresentable.
 */

import type { Logger } from "pino";
import type { MediaPool, Project, ResolveApp, Timeline } from "./resolve-api.js";
import { getLogger } from "./logger.js";

export type ContextState =
  | { kind: "no_project" }
  | { kind: "project"; project: Project; mediaPool: MediaPool | null; timeline: Timeline | null };

export class SessionContext {
  static readonly EMPTY = new SessionContext({ kind: "no_project" });

  private constructor(readonly state: ContextState) {}

  get project(): Project | null {
    return this.state.kind === "project" ? this.state.project : null;
  }

  get mediaPool(): MediaPool | null {
    return this.state.kind === "project" ? this.state.mediaPool : null;
  }

  get timeline(): Timeline | null {
    return this.state.kind === "project" ? this.state.timeline : null;
  }

  /** Same project and media pool, different current timeline. */
  withTimeline(timeline: Timeline): SessionContext {
    if (this.state.kind === "no_project") return this;
    return new SessionContext({ ...this.state, timeline });
  }

  /**
   * Re-derive the context from the application. Never rejects: an unreachable
   * application, a missing object or a throwing accessor all read as absent.
   */
  static async refresh(app: ResolveApp | null, log: Logger = getLogger("context")): Promise<SessionContext> {
    if (!app) return SessionContext.EMPTY;
    const manager = await attempt(() => app.getProjectManager(), "getProjectManager", log);
    if (!manager) return SessionContext.EMPTY;
    const project = await attempt(() => manager.getCurrentProject(), "getCurrentProject", log);
    if (!project) return SessionContext.EMPTY;
    return SessionContext.derive(project, log);
  }

  /** Context for a project the server just created or opened. */
  static async derive(project: Project, log: Logger = getLogger("context")): Promise<SessionContext> {
    // One call at a time: the scripting API is not safe for concurrent use.
    const mediaPool = await attempt(() => project.getMediaPool(), "getMediaPool", log);
    const timeline = await attempt(() => project.getCurrentTimeline(), "getCurrentTimeline", log);
    return new SessionContext({ kind: "project", project, mediaPool, timeline });
  }
}

async function attempt<T>(fn: () => Promise<T | null>, what: string, log: Logger): Promise<T | null> {
  try {
    return await fn();
  } catch (err) {
    log.debug({ err, accessor: what }, "context accessor failed; treating as absent");
    return null;
  }
}
