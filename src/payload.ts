import { DEFAULT_MODEL } from "./config";
import { ensure, ResponsesError } from "./errors";
import { isJsonObject, isJsonValue } from "./json";
import { buildOutput, FieldSpec } from "./schema";
import { CreateOptions, JsonObject, ResponseResult } from "./types";

export interface PayloadSettings {
  defaultModel?: string;
  /** Fail instead of falling back to `defaultModel` when `model` is absent. */
  requireModel?: boolean;
}

const LOCAL_OPTIONS = new Set(["schema", "schemaName", "stream"]);

export function toCreateOptions(input: string | CreateOptions): CreateOptions {
  return typeof input === "string" ? { input } : input;
}

/**
 * Builds the JSON body for `POST /responses`. Top-level camelCase keys are
 * sent in snake_case; an explicit snake_case key wins over its camelCase twin.
 */
export function preparePayload(options: CreateOptions, settings: PayloadSettings = {}): JsonObject {
  const payload: JsonObject = {};

  for (const [key, value] of Object.entries(options)) {
    if (LOCAL_OPTIONS.has(key) || value === undefined) {
      continue;
    }
    const wireKey = toSnakeCase(key);
    if (wireKey !== key && options[wireKey] !== undefined) {
      continue;
    }
    if (!isJsonValue(value)) {
      throw new ResponsesError(
        "RESPONSES-E-CONFIG",
        `Option "${key}" is not JSON-serializable.`,
        { option: key }
      );
    }
    payload[wireKey] = value;
  }

  if (Boolean(options.stream)) {
    payload.stream = true;
  }

  ensure(
    typeof payload.input === "string" || Array.isArray(payload.input),
    "RESPONSES-E-CONFIG",
    "Missing required option: input."
  );

  if (settings.requireModel) {
    ensure(
      typeof payload.model === "string" && payload.model.trim(),
      "RESPONSES-E-CONFIG",
      "Missing required option: model."
    );
  } else if (typeof payload.model !== "string" || !payload.model.trim()) {
    payload.model = settings.defaultModel ?? DEFAULT_MODEL;
  }

  if (options.schema !== undefined) {
    applyOutputSchema(payload, options.schema, options.schemaName);
  }

  return payload;
}

/**
 * Chains `options` onto a prior response: the prior `id` becomes
 * `previous_response_id` and the prior model is reused unless overridden.
 */
export function followUpOptions(previous: ResponseResult, options: CreateOptions): CreateOptions {
  const { previousResponseId: _previousResponseId, ...rest } = options;
  const id = previous.body.id;
  const model = previous.body.model;

  const chained: CreateOptions = { ...rest };
  if (typeof id === "string") {
    chained.previous_response_id = id;
  }
  if (chained.model === undefined && typeof model === "string") {
    chained.model = model;
  }
  return chained;
}

function applyOutputSchema(payload: JsonObject, schema: FieldSpec, schemaName: string | undefined): void {
  const format = buildOutput(schema, schemaName);
  payload.text = isJsonObject(payload.text) ? { ...payload.text, format } : { format };
}

function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}
