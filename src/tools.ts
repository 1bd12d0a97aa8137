import { ensure } from "./errors";
import { buildFunction, ObjectFieldSpec } from "./schema";
import { JsonObject } from "./types";

export type FunctionHandler = (args: JsonObject) => Promise<unknown> | unknown;

/** Function handlers keyed by the tool name the model calls. */
export type FunctionTable =
  | { readonly [name: string]: FunctionHandler }
  | ReadonlyMap<string, FunctionHandler>;

export interface FunctionToolDefinition {
  name: string;
  description: string;
  parameters?: ObjectFieldSpec;
  execute: FunctionHandler;
}

export interface FunctionTool {
  name: string;
  /** Tool entry for the request's `tools` list. */
  definition: JsonObject;
  execute: FunctionHandler;
}

export function functionTool(definition: FunctionToolDefinition): FunctionTool {
  ensure(definition.name?.trim(), "RESPONSES-E-SCHEMA", "Tool name is required.");
  ensure(
    definition.description?.trim(),
    "RESPONSES-E-SCHEMA",
    "Tool description is required."
  );

  return {
    name: definition.name,
    definition: buildFunction(definition.name, definition.description, definition.parameters ?? {}),
    execute: async (args) => definition.execute(args)
  };
}

export function functionTable(tools: readonly FunctionTool[]): Map<string, FunctionHandler> {
  const table = new Map<string, FunctionHandler>();
  for (const tool of tools) {
    ensure(!table.has(tool.name), "RESPONSES-E-SCHEMA", `Duplicate tool name: ${tool.name}`);
    table.set(tool.name, tool.execute);
  }
  return table;
}

export function toolDefinitions(tools: readonly FunctionTool[]): JsonObject[] {
  return tools.map((tool) => tool.definition);
}
