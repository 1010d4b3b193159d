/**
 * Handler outcomes and their rendering into MCP tool results.
 */

import type { JsonValue, ToolResult } from "./models.js";

export type FailureCode =
  | "not_running"
  | "no_project"
  | "no_media_pool"
  | "no_timeline"
  | "not_found"
  | "invalid_arguments"
  | "operation_failed"
  | "not_implemented"
  | "method_not_found"
  | "external_error";

export type Outcome =
  | { ok: true; value: string | JsonValue }
  | { ok: false; code: FailureCode; reason: string };

export function success(value: string | JsonValue): Outcome {
  return { ok: true, value };
}

export function failure(code: FailureCode, reason: string): Outcome {
  return { ok: false, code, reason };
}

export const NOT_RUNNING = failure("not_running", "DaVinci Resolve is not running or not reachable");
export const NO_PROJECT = failure("no_project", "No project is currently open");
export const NO_MEDIA_POOL = failure("no_media_pool", "No media pool available (open a project first)");
export const NO_TIMELINE = failure("no_timeline", "No timeline is currently selected");

export function toToolResult(outcome: Outcome): ToolResult {
  if (!outcome.ok) {
    return { content: [{ type: "text", text: `Error: ${outcome.reason}` }], is_error: true };
  }
  const text = typeof outcome.value === "string" ? outcome.value : JSON.stringify(outcome.value, null, 2);
  return { content: [{ type: "text", text }], is_error: false };
}
