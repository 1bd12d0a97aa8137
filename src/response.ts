import { isJsonObject, parseJson } from "./json";
import { calculateCost } from "./pricing";
import { FunctionCall, JsonObject, JsonValue, ParseErrors, ResponseResult, TokenUsage } from "./types";

export interface ExtractedFunctionCalls {
  calls: FunctionCall[];
  errors: string[];
}

/** Text of every assistant message, one `output_text` part per line. */
export function outputText(body: JsonObject): string {
  const texts: string[] = [];
  for (const item of outputItems(body)) {
    if (item.role !== "assistant" || (item.type !== undefined && item.type !== "message")) {
      continue;
    }
    for (const part of contentParts(item)) {
      if (part.type === "output_text" && typeof part.text === "string") {
        texts.push(part.text);
      }
    }
  }
  return texts.join("\n");
}

/** The raw `usage` map as returned by the API. */
export function tokenUsage(body: JsonObject): JsonObject | undefined {
  return isJsonObject(body.usage) ? body.usage : undefined;
}

export function usageCounts(body: JsonObject): TokenUsage | undefined {
  const usage = tokenUsage(body);
  if (!usage) {
    return undefined;
  }
  const inputTokens = toCount(usage.input_tokens);
  const outputTokens = toCount(usage.output_tokens);
  const details = usage.input_tokens_details;
  return {
    inputTokens,
    outputTokens,
    cachedTokens: isJsonObject(details) ? toCount(details.cached_tokens) : 0,
    totalTokens:
      typeof usage.total_tokens === "number" ? toCount(usage.total_tokens) : inputTokens + outputTokens
  };
}

export function responseStatus(body: JsonObject): string | undefined {
  return typeof body.status === "string" ? body.status : undefined;
}

export function hasRefusal(body: JsonObject): boolean {
  return refusalMessage(body) !== undefined;
}

export function refusalMessage(body: JsonObject): string | undefined {
  for (const item of outputItems(body)) {
    for (const part of contentParts(item)) {
      if (part.type === "refusal") {
        return typeof part.refusal === "string" ? part.refusal : "";
      }
    }
  }
  return undefined;
}

/**
 * Decodes the `arguments` of every `function_call` output item. A call whose
 * arguments are not a JSON object is reported in `errors` and left out.
 */
export function extractFunctionCalls(body: JsonObject): ExtractedFunctionCalls {
  const calls: FunctionCall[] = [];
  const errors: string[] = [];

  for (const item of outputItems(body)) {
    if (item.type !== "function_call") {
      continue;
    }
    const name = typeof item.name === "string" ? item.name : "";
    const callId = typeof item.call_id === "string" ? item.call_id : "";
    const decoded = parseJson(typeof item.arguments === "string" ? item.arguments : "");

    if (!decoded.ok) {
      errors.push(`Function call '${name}' (${callId}): ${decoded.message}`);
    } else if (!isJsonObject(decoded.value)) {
      errors.push(`Function call '${name}' (${callId}): arguments must be a JSON object`);
    } else {
      calls.push({ name, callId, arguments: decoded.value });
    }
  }

  return { calls, errors };
}

export function isStructuredResponse(body: JsonObject): boolean {
  const text = body.text;
  if (!isJsonObject(text) || !isJsonObject(text.format)) {
    return false;
  }
  return text.format.type === "json_schema" || text.format.schema !== undefined;
}

export function processResponse(body: JsonObject): ResponseResult {
  const text = outputText(body);
  const { calls, errors } = extractFunctionCalls(body);
  const parseError: ParseErrors = {};
  let parsed: JsonValue | undefined;

  if (errors.length > 0) {
    parseError.functionCalls = errors;
  }

  if (isStructuredResponse(body)) {
    const decoded = parseJson(text);
    if (decoded.ok) {
      parsed = decoded.value;
    } else {
      parseError.json = decoded.message;
    }
  }

  const result: ResponseResult = {
    body,
    text,
    functionCalls: calls,
    cost: calculateCost(typeof body.model === "string" ? body.model : "", usageCounts(body))
  };
  if (parsed !== undefined) {
    result.parsed = parsed;
  }
  if (parseError.json !== undefined || parseError.functionCalls !== undefined) {
    result.parseError = parseError;
  }
  return result;
}

function outputItems(body: JsonObject): JsonObject[] {
  return Array.isArray(body.output) ? body.output.filter(isJsonObject) : [];
}

function contentParts(item: JsonObject): JsonObject[] {
  return Array.isArray(item.content) ? item.content.filter(isJsonObject) : [];
}

function toCount(value: JsonValue | undefined): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}
