import { createRequire } from "node:module";
import type { ValidateFunction } from "ajv";
import type { ToolArguments, ToolInputSchema } from "./models.js";

export class ToolArgumentsError extends Error {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = "ToolArgumentsError";
  }
}

type AjvInstance = {
  compile: (schema: unknown) => ValidateFunction;
};
type AjvConstructor = new (opts: unknown) => AjvInstance;

const require = createRequire(import.meta.url);
const Ajv = require("ajv") as AjvConstructor;

// useDefaults fills omitted properties from each schema's `default`.
const ajv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  useDefaults: true,
});

const validatorCache = new WeakMap<ToolInputSchema, ValidateFunction>();

function getValidator(schema: ToolInputSchema): ValidateFunction {
  const cached = validatorCache.get(schema);
  if (cached) return cached;
  const validate = ajv.compile(schema);
  validatorCache.set(schema, validate);
  return validate;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate tool arguments against the tool's input schema and return a copy
 * with schema defaults applied. The caller's object is left untouched.
 */
export function validateToolArguments(tool: string, schema: ToolInputSchema, args: unknown): ToolArguments {
  if (!isPlainObject(args)) {
    throw new ToolArgumentsError(`Invalid arguments for ${tool}: expected an object`, tool);
  }
  const copy: ToolArguments = structuredClone(args);
  const validate = getValidator(schema);
  if (validate(copy)) return copy;
  const details = (validate.errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? "invalid"}`);
  throw new ToolArgumentsError(`Invalid arguments for ${tool}: ${details.join("; ")}`, tool, details);
}
