export * from "./types";
export { ResponsesError, ensure, toResponsesError } from "./errors";
export type { ResponsesErrorCategory } from "./errors";
export { LoggerLevel, logger, setLogLevel } from "./logger";
export {
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_MS,
  resolveClientConfig
} from "./config";
export type { ClientConfig, ClientConfigOptions } from "./config";
export * as schema from "./schema";
export {
  JsonSchema,
  buildFunction,
  buildOutput,
  buildSchema,
  normalize,
  nullable,
  parseFieldSpec
} from "./schema";
export type { FieldNode, FieldOptions, FieldSpec, ObjectFieldSpec, PrimitiveType } from "./schema";
export { SseDecoder, decodeSseStream, parseSseFrame } from "./sse";
export {
  collect,
  delta,
  initialCollectState,
  isTerminal,
  reduceResponseEvent,
  textDeltas
} from "./stream";
export type { CollectState, EventItem, EventInput } from "./stream";
export { followUpOptions, preparePayload, toCreateOptions } from "./payload";
export type { PayloadSettings } from "./payload";
export {
  extractFunctionCalls,
  hasRefusal,
  isStructuredResponse,
  outputText,
  processResponse,
  refusalMessage,
  responseStatus,
  tokenUsage,
  usageCounts
} from "./response";
export type { ExtractedFunctionCalls } from "./response";
export { calculateCost, getPricing, resolveModelAlias } from "./pricing";
export type { ModelPricing } from "./pricing";
export { ResponsesClient, createClient } from "./client";
export type { ApiRequestInit, HttpMethod } from "./client";
export { DEFAULT_MAX_TURNS, callFunctions, run, runOrThrow } from "./runner";
export type { ResponsesCaller, RunOptions } from "./runner";
export { functionTable, functionTool, toolDefinitions } from "./tools";
export type { FunctionHandler, FunctionTable, FunctionTool, FunctionToolDefinition } from "./tools";
export { createInputMessage, resolveImageUrl } from "./input";
export type { ImageDetail, ImageSource, InputMessageOptions } from "./input";
