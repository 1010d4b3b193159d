/**
 * Color and render categories are routed but not implemented: every method in
 * them fails with the same fixed reason.
 */

import type { Handler, HandlerGroup } from "./handler.js";
import { result } from "./handler.js";
import { failure } from "./outcome.js";

function notImplemented(label: string): Handler {
  return async ({ method }) => result(failure("not_implemented", `${label} method not implemented: ${method}`));
}

export const colorHandlers: HandlerGroup = {
  handlers: {},
  fallback: notImplemented("Color"),
};

export const renderHandlers: HandlerGroup = {
  handlers: {},
  fallback: notImplemented("Render"),
};
