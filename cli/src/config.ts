import path from "node:path";
import fs from "node:fs/promises";
import type { LogLevel } from "./logger.js";
import { LOG_LEVELS, isLogLevel } from "./logger.js";
import type { ConnectionMode } from "./resolve-api.js";
import type { TimelineDefaults } from "./tools.js";
import { DEFAULT_TIMELINE_SETTINGS } from "./tools.js";

/** Config file contents as read; values are checked by resolveServerConfig. */
export interface ResolveMcpConfig {
  /** "python" talks to a running Resolve; "simulation" uses an in-memory stand-in. */
  mode?: unknown;
  python?: { executable?: unknown; modules_path?: unknown; lib_path?: unknown };
  logging?: { level?: unknown };
  /** Defaults offered by create_empty_timeline. */
  default_project?: { frame_rate?: unknown; width?: unknown; height?: unknown };
  [key: string]: unknown;
}

/** Fully resolved settings for `serve` and `check`. */
export interface ServerConfig {
  mode: ConnectionMode;
  python: { executable: string; modules_path: string; lib_path?: string };
  logging: { level: LogLevel };
  default_project: TimelineDefaults;
}

/** Command-line flags; each one wins over the config files. */
export interface ConfigOverrides {
  mode?: string;
  python?: string;
  modulesPath?: string;
  logLevel?: string;
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

const CONFIG_FILENAME = "config.json";
const LOCAL_CONFIG_DIR = ".resolve-mcp";

/**
 * Get user-level config path using env-paths (e.g. ~/.config/resolve-mcp/config.json).
 */
export async function getGlobalConfigPath(): Promise<string> {
  const { default: envPaths } = await import("env-paths");
  const paths = envPaths("resolve-mcp", { suffix: "" });
  return path.join(paths.config, CONFIG_FILENAME);
}

export function getLocalConfigPath(cwd: string = process.cwd()): string {
  return path.resolve(cwd, LOCAL_CONFIG_DIR, CONFIG_FILENAME);
}

async function readConfigFile(filePath: string): Promise<ResolveMcpConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    const code = err && typeof err === "object" && "code" in err ? (err as NodeJS.ErrnoException).code : "";
    if (code === "ENOENT") return {};
    throw err;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(`${filePath} is not valid JSON: ${message}`, filePath);
  }
  if (!isRecord(data)) {
    throw new ConfigValidationError(`${filePath} must contain a JSON object`, filePath);
  }
  return {
    ...data,
    python: configBlock(data, "python", filePath),
    logging: configBlock(data, "logging", filePath),
    default_project: configBlock(data, "default_project", filePath),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function configBlock(data: Record<string, unknown>, key: string, filePath: string): Record<string, unknown> | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigValidationError(`${key} in ${filePath} must be an object`, key);
  }
  return value;
}

/**
 * Load global config if it exists. Returns empty object if missing.
 */
export async function loadGlobalConfig(): Promise<ResolveMcpConfig> {
  return readConfigFile(await getGlobalConfigPath());
}

/**
 * Load local config from .resolve-mcp/config.json if it exists.
 */
export async function loadLocalConfig(cwd: string = process.cwd()): Promise<ResolveMcpConfig> {
  return readConfigFile(getLocalConfigPath(cwd));
}

/**
 * Local overrides global. The nested blocks merge key by key, so a local file
 * may set only `python.executable` and keep the global `python.modules_path`.
 */
export function mergeConfigs(global: ResolveMcpConfig, local: ResolveMcpConfig): ResolveMcpConfig {
  return {
    ...global,
    ...local,
    python: { ...global.python, ...local.python },
    logging: { ...global.logging, ...local.logging },
    default_project: { ...global.default_project, ...local.default_project },
  };
}

export async function getMergedConfig(cwd: string = process.cwd()): Promise<ResolveMcpConfig> {
  const [global, local] = await Promise.all([loadGlobalConfig(), loadLocalConfig(cwd)]);
  return mergeConfigs(global, local);
}

/** Where Resolve installs its Python scripting modules. */
export function defaultModulesPath(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case "darwin":
      return "/Library/Application Support/Blackmagic Design/DaVinci Resolve/Developer/Scripting/Modules";
    case "win32":
      return path.win32.join(
        process.env.PROGRAMDATA ?? "C:\\ProgramData",
        "Blackmagic Design",
        "DaVinci Resolve",
        "Support",
        "Developer",
        "Scripting",
        "Modules"
      );
    default:
      return "/opt/resolve/Developer/Scripting/Modules";
  }
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigValidationError(`${field} must be a non-empty string`, field);
  }
  return value;
}

function requirePositiveInteger(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigValidationError(`${field} must be a positive integer`, field);
  }
  return value;
}

function requireMode(value: unknown, field: string): ConnectionMode {
  if (value === "simulation" || value === "python") return value;
  throw new ConfigValidationError(`${field} must be "simulation" or "python", got ${JSON.stringify(value)}`, field);
}

/**
 * Apply defaults and flags to a merged config and validate the result.
 * Throws ConfigValidationError naming the first offending field.
 */
export function resolveServerConfig(
  config: ResolveMcpConfig,
  overrides: ConfigOverrides = {},
  platform: NodeJS.Platform = process.platform
): ServerConfig {
  const python = config.python ?? {};
  const project = config.default_project ?? {};

  const mode = overrides.mode !== undefined ? requireMode(overrides.mode, "--mode") : requireMode(config.mode ?? "python", "mode");

  const level = overrides.logLevel ?? config.logging?.level ?? "info";
  if (!isLogLevel(level)) {
    const field = overrides.logLevel !== undefined ? "--log-level" : "logging.level";
    throw new ConfigValidationError(`${field} must be one of ${LOG_LEVELS.join(", ")}, got ${JSON.stringify(level)}`, field);
  }

  const resolved: ServerConfig = {
    mode,
    python: {
      executable: requireString(overrides.python ?? python.executable ?? "python3", "python.executable"),
      modules_path: requireString(overrides.modulesPath ?? python.modules_path ?? defaultModulesPath(platform), "python.modules_path"),
    },
    logging: { level },
    default_project: {
      frame_rate: requireString(project.frame_rate ?? DEFAULT_TIMELINE_SETTINGS.frame_rate, "default_project.frame_rate"),
      width: requirePositiveInteger(project.width ?? DEFAULT_TIMELINE_SETTINGS.width, "default_project.width"),
      height: requirePositiveInteger(project.height ?? DEFAULT_TIMELINE_SETTINGS.height, "default_project.height"),
    },
  };
  if (python.lib_path !== undefined) {
    resolved.python.lib_path = requireString(python.lib_path, "python.lib_path");
  }
  return resolved;
}
