import { ensure, ResponsesError } from "./errors";
import { isJsonObject, isJsonValue, isPlainRecord } from "./json";
import { JsonObject, JsonValue } from "./types";

export type PrimitiveType = "string" | "number" | "integer" | "boolean" | "null";

export type FieldOptions =
  | { readonly [keyword: string]: JsonValue }
  | ReadonlyArray<readonly [string, JsonValue]>;

/**
 * Object fields. A plain object is unordered: its keys are emitted in
 * lexicographic order. A list of `[name, spec]` pairs keeps declaration order.
 */
export type ObjectFieldSpec =
  | { readonly [field: string]: FieldSpec }
  | ReadonlyArray<readonly [string, FieldSpec]>;

export type FieldSpec =
  | PrimitiveType
  | JsonSchema
  | readonly [PrimitiveType, FieldOptions]
  | readonly ["object", { readonly properties: ObjectFieldSpec; readonly description?: string }]
  | readonly ["array", FieldSpec]
  | readonly ["anyOf", readonly FieldSpec[]]
  | ObjectFieldSpec;

export type FieldNode =
  | { kind: "primitive"; type: PrimitiveType }
  | { kind: "annotated"; type: PrimitiveType; options: Array<[string, JsonValue]> }
  | { kind: "array"; items: FieldNode }
  | { kind: "union"; variants: FieldNode[] }
  | { kind: "object"; fields: Array<[string, FieldNode]>; options: Array<[string, JsonValue]> }
  | { kind: "schema"; node: JsonObject };

/** A schema node that is already in JSON-Schema form and passes through normalization. */
export class JsonSchema {
  public readonly node: JsonObject;

  public constructor(node: JsonObject) {
    this.node = node;
  }

  public toJSON(): JsonObject {
    return this.node;
  }
}

const PRIMITIVE_TYPES: readonly PrimitiveType[] = ["string", "number", "integer", "boolean", "null"];

export function parseFieldSpec(spec: unknown): FieldNode {
  if (spec instanceof JsonSchema) {
    return { kind: "schema", node: spec.node };
  }

  if (typeof spec === "string") {
    const primitive = toPrimitiveType(spec);
    if (!primitive) {
      throw unsupported(spec);
    }
    return { kind: "primitive", type: primitive };
  }

  if (Array.isArray(spec)) {
    if (spec.length === 0) {
      return { kind: "object", fields: [], options: [] };
    }
    const items: unknown[] = spec;
    const [tag, argument] = items;
    if (typeof tag === "string") {
      if (items.length !== 2) {
        throw unsupported(spec);
      }
      return parseTagged(tag, argument, items);
    }
    return { kind: "object", fields: parseOrderedFields(items), options: [] };
  }

  if (isPlainRecord(spec)) {
    return { kind: "object", fields: parseMapFields(spec), options: [] };
  }

  throw unsupported(spec);
}

/** Converts any accepted spec into its canonical JSON-Schema node. */
export function normalize(spec: FieldSpec): JsonObject {
  return toSchemaNode(parseFieldSpec(spec));
}

/** Builds the root object schema used by structured outputs and function parameters. */
export function buildSchema(spec: FieldSpec): JsonObject {
  const node = normalize(spec);
  ensure(
    node.type === "object",
    "RESPONSES-E-SCHEMA",
    `Root schema must describe an object: ${describe(spec)}`,
    spec
  );
  return node;
}

export function buildOutput(spec: FieldSpec, name = "data"): JsonObject {
  return {
    name,
    type: "json_schema",
    strict: true,
    schema: buildSchema(spec)
  };
}

export function buildFunction(
  name: string,
  description: string,
  parameters: ObjectFieldSpec
): JsonObject {
  ensure(name.trim(), "RESPONSES-E-SCHEMA", "Function name is required.");
  return {
    name,
    type: "function",
    strict: true,
    description,
    parameters: buildSchema(parameters)
  };
}

export type StringSchemaOptions = {
  description?: string;
  enum?: string[];
  pattern?: string;
  format?: string;
  minLength?: number;
  maxLength?: number;
};

export type NumericSchemaOptions = {
  description?: string;
  enum?: number[];
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;
};

export type ArraySchemaOptions = {
  description?: string;
  minItems?: number;
  maxItems?: number;
};

export type DescribedSchemaOptions = {
  description?: string;
};

export function string(options: StringSchemaOptions = {}): JsonSchema {
  return new JsonSchema({ type: "string", ...compactOptions(options) });
}

export function number(options: NumericSchemaOptions = {}): JsonSchema {
  return new JsonSchema({ type: "number", ...compactOptions(options) });
}

export function integer(options: NumericSchemaOptions = {}): JsonSchema {
  return new JsonSchema({ type: "integer", ...compactOptions(options) });
}

export function boolean(options: DescribedSchemaOptions = {}): JsonSchema {
  return new JsonSchema({ type: "boolean", ...compactOptions(options) });
}

export function array(items: FieldSpec, options: ArraySchemaOptions = {}): JsonSchema {
  return new JsonSchema({ type: "array", ...compactOptions(options), items: normalize(items) });
}

export function object(fields: ObjectFieldSpec, options: DescribedSchemaOptions = {}): JsonSchema {
  const node = normalize(fields);
  return new JsonSchema({ type: "object", ...compactOptions(options), ...withoutType(node) });
}

export function anyOf(variants: readonly FieldSpec[]): JsonSchema {
  return new JsonSchema(normalize(["anyOf", variants]));
}

export function raw(node: JsonObject): JsonSchema {
  return new JsonSchema(node);
}

/**
 * Allows `null` in addition to the wrapped schema. A scalar `type` becomes
 * `[type, "null"]`; a node without `type` is wrapped in `anyOf`.
 */
export function nullable(spec: FieldSpec): JsonSchema {
  const node = normalize(spec);
  const type = node.type;
  if (typeof type === "string") {
    return new JsonSchema({ ...node, type: [type, "null"] });
  }
  if (type !== undefined) {
    return new JsonSchema(node);
  }
  return new JsonSchema({ anyOf: [node, { type: "null" }] });
}

function parseTagged(tag: string, argument: unknown, spec: unknown[]): FieldNode {
  if (tag === "array") {
    return { kind: "array", items: parseFieldSpec(argument) };
  }

  if (tag === "anyOf") {
    ensure(
      Array.isArray(argument) && argument.length > 0,
      "RESPONSES-E-SCHEMA",
      `anyOf requires a non-empty list of variants: ${describe(spec)}`,
      spec
    );
    return { kind: "union", variants: argument.map((variant: unknown) => parseFieldSpec(variant)) };
  }

  if (tag === "object") {
    ensure(
      isPlainRecord(argument) && argument.properties !== undefined,
      "RESPONSES-E-SCHEMA",
      `object requires a properties entry: ${describe(spec)}`,
      spec
    );
    const { properties, ...rest } = argument;
    const fields = parseFieldSpec(properties);
    ensure(
      fields.kind === "object",
      "RESPONSES-E-SCHEMA",
      `object properties must be a field map or list of pairs: ${describe(spec)}`,
      spec
    );
    return { kind: "object", fields: fields.fields, options: parseOptions(rest, spec) };
  }

  const primitive = toPrimitiveType(tag);
  if (!primitive) {
    throw unsupported(spec);
  }
  return { kind: "annotated", type: primitive, options: parseOptions(argument, spec) };
}

function parseOrderedFields(spec: unknown[]): Array<[string, FieldNode]> {
  return spec.map((entry: unknown): [string, FieldNode] => {
    const pair = toPair(entry);
    if (!pair) {
      throw unsupported(spec);
    }
    return [pair[0], parseFieldSpec(pair[1])];
  });
}

function parseMapFields(spec: Record<string, unknown>): Array<[string, FieldNode]> {
  return Object.keys(spec)
    .sort()
    .map((name) => [name, parseFieldSpec(spec[name])]);
}

function parseOptions(options: unknown, spec: unknown): Array<[string, JsonValue]> {
  const entries: Array<[string, unknown]> = [];
  if (Array.isArray(options)) {
    for (const entry of options) {
      const pair = toPair(entry);
      if (!pair) {
        throw unsupported(spec);
      }
      entries.push(pair);
    }
  } else if (isPlainRecord(options)) {
    entries.push(...Object.entries(options));
  } else {
    throw unsupported(spec);
  }

  const parsed: Array<[string, JsonValue]> = [];
  for (const [key, value] of entries) {
    if (value === undefined) {
      continue;
    }
    if (!isJsonValue(value)) {
      throw new ResponsesError(
        "RESPONSES-E-SCHEMA",
        `Schema option "${key}" is not JSON-serializable: ${describe(spec)}`,
        spec
      );
    }
    parsed.push([key, value]);
  }
  return parsed;
}

function toSchemaNode(node: FieldNode): JsonObject {
  switch (node.kind) {
    case "primitive":
      return { type: node.type };
    case "annotated":
      return withOptions({ type: node.type }, node.options);
    case "array":
      return { type: "array", items: toSchemaNode(node.items) };
    case "union":
      return { anyOf: node.variants.map(toSchemaNode) };
    case "object": {
      const properties: JsonObject = {};
      for (const [name, child] of node.fields) {
        properties[name] = toSchemaNode(child);
      }
      return {
        ...withOptions({ type: "object" }, node.options),
        properties,
        additionalProperties: false,
        required: node.fields.map(([name]) => name)
      };
    }
    case "schema":
      return finalizeNode(node.node);
  }
}

/**
 * Re-applies the object invariants to a pre-built node: every object with
 * `properties` is closed and requires all of its properties.
 */
function finalizeNode(node: JsonObject): JsonObject {
  const finalized: JsonObject = { ...node };

  if (isJsonObject(node.properties)) {
    const properties: JsonObject = {};
    for (const [name, child] of Object.entries(node.properties)) {
      properties[name] = isJsonObject(child) ? finalizeNode(child) : child;
    }
    finalized.properties = properties;
    finalized.additionalProperties = false;
    finalized.required = completeRequired(node.required, Object.keys(properties));
  }

  if (isJsonObject(node.items)) {
    finalized.items = finalizeNode(node.items);
  }

  if (Array.isArray(node.anyOf)) {
    finalized.anyOf = node.anyOf.map((variant) => (isJsonObject(variant) ? finalizeNode(variant) : variant));
  }

  return finalized;
}

function completeRequired(existing: JsonValue | undefined, keys: string[]): string[] {
  if (Array.isArray(existing)) {
    const listed = existing.filter((entry): entry is string => typeof entry === "string");
    const sameMembers =
      listed.length === keys.length &&
      new Set(listed).size === keys.length &&
      listed.every((entry) => keys.includes(entry));
    if (sameMembers) {
      return listed;
    }
  }
  return keys;
}

function withOptions(base: JsonObject, options: Array<[string, JsonValue]>): JsonObject {
  const merged: JsonObject = { ...base };
  for (const [key, value] of options) {
    merged[key] = value;
  }
  return merged;
}

function compactOptions(options: Record<string, JsonValue | undefined>): JsonObject {
  const compacted: JsonObject = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      compacted[key] = value;
    }
  }
  return compacted;
}

function withoutType(node: JsonObject): JsonObject {
  const { type: _type, ...rest } = node;
  return rest;
}

function toPair(entry: unknown): [string, unknown] | undefined {
  if (!Array.isArray(entry) || entry.length !== 2) {
    return undefined;
  }
  const [key, value]: unknown[] = entry;
  return typeof key === "string" ? [key, value] : undefined;
}

function toPrimitiveType(value: string): PrimitiveType | undefined {
  return PRIMITIVE_TYPES.find((candidate) => candidate === value);
}

function unsupported(spec: unknown): ResponsesError {
  return new ResponsesError(
    "RESPONSES-E-SCHEMA",
    `Unsupported schema specification: ${describe(spec)}`,
    spec
  );
}

function describe(spec: unknown): string {
  try {
    return JSON.stringify(spec) ?? String(spec);
  } catch {
    return String(spec);
  }
}
