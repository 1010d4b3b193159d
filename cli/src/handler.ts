import type { SessionContext } from "./context.js";
import type { ToolArguments } from "./models.js";
import type { Outcome } from "./outcome.js";
import { failure } from "./outcome.js";
import type { ResolveApp } from "./resolve-api.js";

export interface HandlerInput {
  method: string;
  /** Refreshed for this call; do not keep it past the call. */
  context: SessionContext;
  args: ToolArguments;
  /** Null when the application is unreachable. */
  app: ResolveApp | null;
}

export interface HandlerResult {
  outcome: Outcome;
  /** Set only by handlers that move a "current" pointer. */
  context?: SessionContext;
}

export type Handler = (input: HandlerInput) => Promise<HandlerResult>;

export interface HandlerGroup {
  handlers: Readonly<Record<string, Handler>>;
  /** Runs for a method of this category that has no handler of its own. */
  fallback: Handler;
}

export function result(outcome: Outcome): HandlerResult {
  return { outcome };
}

export function stringArg(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

export function numberArg(args: ToolArguments, key: string): number | undefined {
  const value = args[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function missingArgument(method: string, key: string): HandlerResult {
  return result(failure("invalid_arguments", `${method} requires '${key}'`));
}

export function unknownMethod(category: string): Handler {
  return async ({ method }) => result(failure("method_not_found", `Unknown ${category} method: ${method}`));
}
