/**
 * `media_*` methods against the current project's media pool.
 */

import type { HandlerGroup } from "./handler.js";
import { missingArgument, result, stringArg, unknownMethod } from "./handler.js";
import { NO_MEDIA_POOL, failure, success } from "./outcome.js";

export const mediaHandlers: HandlerGroup = {
  handlers: {
    // All-or-nothing: an empty import result is a failure even though the
    // underlying call takes a batch.
    media_import: async ({ method, args, context }) => {
      const filePath = stringArg(args, "file_path");
      if (filePath === undefined) return missingArgument(method, "file_path");
      const mediaPool = context.mediaPool;
      if (!mediaPool) return result(NO_MEDIA_POOL);
      const clips = await mediaPool.importMedia([filePath]);
      if (clips.length === 0) return result(failure("operation_failed", `Failed to import media: ${filePath}`));
      return result(success(`Imported media: ${filePath}`));
    },

    // No deduplication: the application decides whether two bins may share a name.
    media_create_bin: async ({ method, args, context }) => {
      const name = stringArg(args, "name");
      if (name === undefined) return missingArgument(method, "name");
      const mediaPool = context.mediaPool;
      if (!mediaPool) return result(NO_MEDIA_POOL);
      const bin = await mediaPool.createBin(name);
      if (!bin) return result(failure("operation_failed", `Failed to create bin '${name}'`));
      return result(success(`Created bin '${name}'`));
    },
  },
  fallback: unknownMethod("media"),
};
