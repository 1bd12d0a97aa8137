import type { ResponsesError } from "./errors";
import type { FieldSpec } from "./schema";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonArray = JsonValue[];

export type Result<T> = { ok: true; value: T } | { ok: false; error: ResponsesError };

export interface SseEvent {
  event: string;
  data: JsonValue;
}

export type StreamResult = Result<SseEvent>;

/**
 * Receives every streamed event (or the transport failure that ended the
 * stream). Returning `false` stops consumption early.
 */
export type StreamCallback = (
  result: StreamResult
) => void | boolean | Promise<void | boolean>;

export interface CreateOptions {
  model?: string;
  input?: string | JsonValue[];
  instructions?: string;
  tools?: JsonValue[];
  temperature?: number;
  /** Structured output spec; replaced by `text.format` in the request body. */
  schema?: FieldSpec;
  schemaName?: string;
  stream?: boolean | StreamCallback;
  previous_response_id?: string;
  previousResponseId?: string;
  [option: string]: unknown;
}

export interface FunctionCall {
  name: string;
  callId: string;
  arguments: JsonObject;
}

export type FunctionCallOutput = {
  type: "function_call_output";
  call_id: string;
  output: string;
};

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cachedTokens: number;
  totalTokens: number;
}

export interface Cost {
  inputCost: number;
  outputCost: number;
  totalCost: number;
  cachedDiscount: number;
}

export interface ParseErrors {
  json?: string;
  functionCalls?: string[];
}

export interface ResponseResult {
  body: JsonObject;
  text: string;
  parsed?: JsonValue;
  parseError?: ParseErrors;
  functionCalls: FunctionCall[];
  cost: Cost;
}

export interface ModelInfo {
  id: string;
  object?: string;
  created?: number;
  owned_by?: string;
}
