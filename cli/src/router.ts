/**
 * Category router: method identifier → category → handler.
 *
 * Catalog tools are categorized once, when the catalog is registered; the
 * per-call path only looks the handler up. Every dispatched call refreshes the
 * Session Context first and ends by releasing application objects the kept
 * context no longer holds. Every error thrown by the application is turned
 * into a tool-level failure here.
 */

import type { Logger } from "pino";
import { SessionContext } from "./context.js";
import { generalHandlers, isGeneralMethod } from "./general-handlers.js";
import type { HandlerGroup } from "./handler.js";
import { getLogger } from "./logger.js";
import { mediaHandlers } from "./media-handlers.js";
import { Category } from "./models.js";
import type { ToolArguments } from "./models.js";
import type { Outcome } from "./outcome.js";
import { failure } from "./outcome.js";
import { projectHandlers } from "./project-handlers.js";
import type { ResolveApp, ResolveConnector } from "./resolve-api.js";
import { colorHandlers, renderHandlers } from "./stub-handlers.js";
import { timelineHandlers } from "./timeline-handlers.js";

export interface Route {
  method: string;
  category: Category;
}

export interface DispatchResult {
  outcome: Outcome;
  /** Context the session keeps after this call; absent when nothing was dispatched. */
  context?: SessionContext;
}

export const HANDLER_GROUPS: { readonly [C in Category]: HandlerGroup } = {
  [Category.General]: generalHandlers,
  [Category.Project]: projectHandlers,
  [Category.Timeline]: timelineHandlers,
  [Category.Media]: mediaHandlers,
  [Category.Color]: colorHandlers,
  [Category.Render]: renderHandlers,
};

const PREFIXES: ReadonlyArray<readonly [string, Category]> = [
  ["project_", Category.Project],
  ["timeline_", Category.Timeline],
  ["media_", Category.Media],
  ["color_", Category.Color],
  ["render_", Category.Render],
];

/** Exact general names first, then prefix. Null when nothing matches. */
export function categorize(method: string): Category | null {
  if (isGeneralMethod(method)) return Category.General;
  for (const [prefix, category] of PREFIXES) {
    if (method.startsWith(prefix)) return category;
  }
  return null;
}

export function routeFor(method: string): Route | null {
  const category = categorize(method);
  return category === null ? null : { method, category };
}

export class Router {
  constructor(
    private readonly connector: ResolveConnector,
    private readonly log: Logger = getLogger("router")
  ) {}

  /** Route a raw method identifier (one not necessarily in the catalog). */
  async dispatchMethod(method: string, args: ToolArguments): Promise<DispatchResult> {
    const route = routeFor(method);
    if (!route) {
      return { outcome: failure("method_not_found", `Method not found: ${method}`) };
    }
    return this.dispatch(route, args);
  }

  async dispatch(route: Route, args: ToolArguments): Promise<DispatchResult> {
    const app = await this.connect();
    const context = await SessionContext.refresh(app);
    const group = HANDLER_GROUPS[route.category];
    const handler = group.handlers[route.method] ?? group.fallback;
    let result: { outcome: Outcome; context: SessionContext };
    try {
      const handled = await handler({ method: route.method, context, args, app });
      if (!handled.outcome.ok) {
        this.log.info({ method: route.method, code: handled.outcome.code }, handled.outcome.reason);
      }
      result = { outcome: handled.outcome, context: handled.context ?? context };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.warn({ err, method: route.method }, "resolve call failed");
      result = { outcome: failure("external_error", `${route.method} failed: ${message}`), context };
    }
    await this.retain(result.context);
    return result;
  }

  /** Objects outside the kept context are released once the call is over. */
  private async retain(context: SessionContext): Promise<void> {
    const keep: object[] = [];
    for (const value of [context.project, context.mediaPool, context.timeline]) {
      if (value) keep.push(value);
    }
    try {
      await this.connector.retain(keep);
    } catch (err) {
      this.log.warn({ err, mode: this.connector.mode }, "could not release application objects");
    }
  }

  private async connect(): Promise<ResolveApp | null> {
    try {
      return await this.connector.connect();
    } catch (err) {
      this.log.warn({ err, mode: this.connector.mode }, "could not connect to Resolve");
      return null;
    }
  }
}
