/**
 * Data types shared by the session layer, the tool catalog and the handlers.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Operation category; every routable method belongs to exactly one. */
export enum Category {
  General = "general",
  Project = "project",
  Timeline = "timeline",
  Media = "media",
  Color = "color",
  Render = "render",
}

export type JsonSchemaType = "string" | "number" | "integer" | "boolean" | "array" | "object";

export interface JsonSchemaProperty {
  type: JsonSchemaType | JsonSchemaType[];
  description?: string;
  default?: JsonValue;
  enum?: JsonValue[];
  minimum?: number;
  minLength?: number;
  items?: JsonSchemaProperty;
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
}

/** Catalog entry. `method` is the identifier the router dispatches on. */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  method: string;
}

/** What `tools/list` advertises for each tool. */
export type ToolListing = Omit<ToolDefinition, "method">;

export interface TextContent {
  type: "text";
  text: string;
}

export interface ToolResult {
  content: TextContent[];
  is_error: boolean;
}

export type ToolArguments = Record<string, unknown>;
