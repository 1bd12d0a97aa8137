import { ClientConfigOptions, resolveClientConfig } from "./config";
import { ResponsesError, toResponsesError } from "./errors";
import { isJsonObject, parseJson, toRecord } from "./json";
import { logger, setLogLevel } from "./logger";
import { followUpOptions, preparePayload, toCreateOptions } from "./payload";
import { processResponse } from "./response";
import { decodeSseStream } from "./sse";
import { initialCollectState, isTerminal, reduceResponseEvent } from "./stream";
import {
  CreateOptions,
  JsonObject,
  JsonValue,
  ModelInfo,
  ResponseResult,
  Result,
  StreamCallback,
  StreamResult
} from "./types";

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface ApiRequestInit {
  method?: HttpMethod;
  body?: JsonValue;
}

export class ResponsesClient {
  public readonly baseUrl: string;
  public readonly defaultModel: string;
  public readonly timeoutMs: number;
  public readonly headers?: Record<string, string>;
  private readonly apiKey: string;

  public constructor(options: ClientConfigOptions = {}) {
    const config = resolveClientConfig(options);
    this.baseUrl = config.baseUrl;
    this.defaultModel = config.defaultModel;
    this.timeoutMs = config.timeoutMs;
    this.headers = config.headers;
    this.apiKey = config.apiKey;
    if (config.logLevel) {
      setLogLevel(config.logLevel);
    }
  }

  /**
   * Creates a response. A string is taken as the input text. When
   * `options.stream` is set the request streams and the events are collected
   * into the final body; a callback passed as `stream` sees every event first
   * and may return `false` to stop reading.
   */
  public async create(input: string | CreateOptions): Promise<Result<ResponseResult>> {
    const options = toCreateOptions(input);
    const payload = preparePayload(options, { defaultModel: this.defaultModel });

    const body = payload.stream
      ? await this.collectStream(payload, typeof options.stream === "function" ? options.stream : undefined)
      : await this.postResponses(payload);
    if (!body.ok) {
      return body;
    }
    return { ok: true, value: processResponse(body.value) };
  }

  public async createFollowUp(
    previous: ResponseResult,
    input: string | CreateOptions
  ): Promise<Result<ResponseResult>> {
    return this.create(followUpOptions(previous, toCreateOptions(input)));
  }

  public async createOrThrow(input: string | CreateOptions): Promise<ResponseResult> {
    return unwrap(await this.create(input));
  }

  public async createFollowUpOrThrow(
    previous: ResponseResult,
    input: string | CreateOptions
  ): Promise<ResponseResult> {
    return unwrap(await this.createFollowUp(previous, input));
  }

  /**
   * Streams raw events. A transport failure is yielded once as a failed
   * result and ends the sequence.
   */
  public async *stream(input: string | CreateOptions): AsyncGenerator<StreamResult> {
    const options = toCreateOptions(input);
    yield* this.streamPayload(preparePayload({ ...options, stream: true }, { defaultModel: this.defaultModel }));
  }

  public async listModels(match = ""): Promise<Result<ModelInfo[]>> {
    const result = await this.request("/models");
    if (!result.ok) {
      return result;
    }
    const data = toRecord(result.value).data;
    const models: ModelInfo[] = [];
    for (const entry of Array.isArray(data) ? data : []) {
      const model = toModelInfo(entry);
      if (model && model.id.includes(match)) {
        models.push(model);
      }
    }
    return { ok: true, value: models };
  }

  /** Low-level JSON request against the API base URL. */
  public async request(path: string, init: ApiRequestInit = {}): Promise<Result<JsonValue>> {
    const sent = await this.send(path, init);
    if (!sent.ok) {
      return sent;
    }

    let text: string;
    try {
      text = await sent.value.text();
    } catch (error) {
      return failure("RESPONSES-E-TRANSPORT", `Failed to read response body from ${path}.`, error);
    }

    const decoded = parseJson(text);
    if (!decoded.ok) {
      return failure("RESPONSES-E-DECODE", `Invalid JSON response from ${path}: ${decoded.message}`, {
        body: text.slice(0, 1_000)
      });
    }
    return { ok: true, value: decoded.value };
  }

  private async postResponses(payload: JsonObject): Promise<Result<JsonObject>> {
    const result = await this.request("/responses", { method: "POST", body: payload });
    if (!result.ok) {
      return result;
    }
    if (!isJsonObject(result.value)) {
      return failure("RESPONSES-E-DECODE", "Response body is not a JSON object.", result.value);
    }
    return { ok: true, value: result.value };
  }

  private async *streamPayload(payload: JsonObject): AsyncGenerator<StreamResult> {
    const sent = await this.send("/responses", { method: "POST", body: payload }, "text/event-stream");
    if (!sent.ok) {
      yield sent;
      return;
    }

    const body = sent.value.body;
    if (!body) {
      yield failure("RESPONSES-E-TRANSPORT-STREAM", "Streaming response has no body.");
      return;
    }

    try {
      for await (const event of decodeSseStream(body)) {
        yield { ok: true, value: event };
      }
    } catch (error) {
      const streamError = toResponsesError(error, "RESPONSES-E-TRANSPORT-STREAM", "Response stream interrupted.");
      logger.warn(`[Responses] ${streamError.message}`);
      yield { ok: false, error: streamError };
    }
  }

  private async collectStream(
    payload: JsonObject,
    callback: StreamCallback | undefined
  ): Promise<Result<JsonObject>> {
    let state = initialCollectState();

    for await (const result of this.streamPayload(payload)) {
      // Failures end the call even when the callback asks to stop.
      const stop = callback !== undefined && (await callback(result)) === false;
      if (!result.ok) {
        return result;
      }

      const event = result.value;
      if (event.event === "error") {
        return failure("RESPONSES-E-TRANSPORT-STREAM", `Stream error: ${errorMessageOf(event.data)}`, event.data);
      }

      state = reduceResponseEvent(state, event);
      if (event.event === "response.failed") {
        const response = toRecord(toRecord(event.data).response);
        return failure(
          "RESPONSES-E-TRANSPORT-STREAM",
          `Response failed: ${errorMessageOf(response.error)}`,
          state.response
        );
      }
      if (stop || isTerminal(state)) {
        break;
      }
    }

    return { ok: true, value: state.response };
  }

  private async send(path: string, init: ApiRequestInit, accept?: string): Promise<Result<Response>> {
    const method = init.method ?? (init.body === undefined ? "GET" : "POST");
    const url = `${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    logger.debug(`[Responses] ${method} ${url}`);
    try {
      const response = await fetch(url, {
        method,
        headers: {
          ...buildHeaders(this.apiKey, accept),
          ...(this.headers ?? {})
        },
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: controller.signal
      });

      if (!response.ok) {
        const error = await httpError(response);
        logger.warn(`[Responses] ${error.message}`);
        return { ok: false, error };
      }
      return { ok: true, value: response };
    } catch (error) {
      const message = isAbortError(error)
        ? `Request timed out after ${this.timeoutMs}ms: ${method} ${path}`
        : `Request failed: ${method} ${path}`;
      logger.warn(`[Responses] ${message}`);
      return failure("RESPONSES-E-TRANSPORT", message, error);
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function createClient(options: ClientConfigOptions = {}): ResponsesClient {
  return new ResponsesClient(options);
}

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function failure(code: string, message: string, details?: unknown): { ok: false; error: ResponsesError } {
  return { ok: false, error: new ResponsesError(code, message, details) };
}

function buildHeaders(apiKey: string, accept?: string): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Authorization: `Bearer ${apiKey}`
  };
  if (accept) {
    headers.Accept = accept;
  }
  return headers;
}

async function httpError(response: Response): Promise<ResponsesError> {
  const text = await safeReadText(response);
  const decoded = parseJson(text);
  const apiError = decoded.ok ? toRecord(decoded.value).error : undefined;
  const detail = apiError === undefined ? text : errorMessageOf(apiError);

  return new ResponsesError(
    "RESPONSES-E-TRANSPORT-HTTP",
    `OpenAI request failed (${response.status} ${response.statusText}). ${detail}`.trim(),
    {
      status: response.status,
      statusText: response.statusText,
      error: apiError ?? text
    }
  );
}

function errorMessageOf(value: unknown): string {
  const message = toRecord(value).message;
  if (typeof message === "string" && message.length > 0) {
    return message;
  }
  return typeof value === "string" ? value : "unknown error";
}

function toModelInfo(entry: unknown): ModelInfo | undefined {
  const record = toRecord(entry);
  if (typeof record.id !== "string") {
    return undefined;
  }
  const model: ModelInfo = { id: record.id };
  if (typeof record.object === "string") {
    model.object = record.object;
  }
  if (typeof record.created === "number") {
    model.created = record.created;
  }
  if (typeof record.owned_by === "string") {
    model.owned_by = record.owned_by;
  }
  return model;
}

function isAbortError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "name" in error && error.name === "AbortError";
}

async function safeReadText(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.slice(0, 1_000);
  } catch {
    return "";
  }
}
