import { describe, it, expect } from "vitest";
import { getLogger, initLogger, isLogLevel } from "../logger.js";

describe("logger", () => {
  it("recognises pino level names only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(30)).toBe(false);
  });

  it("hands out subsystem children at the root level", () => {
    initLogger("error");
    const log = getLogger("router");
    expect(log.level).toBe("error");
    expect(log.bindings()).toMatchObject({ subsystem: "router" });
  });
});
