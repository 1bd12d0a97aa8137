export type ResponsesErrorCategory =
  | "config"
  | "schema"
  | "transport"
  | "decode"
  | "function"
  | "input"
  | "runner"
  | "unknown";

export class ResponsesError extends Error {
  public readonly code: string;
  public readonly category: ResponsesErrorCategory;
  public readonly details?: unknown;

  public constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = "ResponsesError";
    this.code = code;
    this.category = inferErrorCategory(code);
    this.details = details;
  }
}

export function ensure(
  condition: unknown,
  code: string,
  message: string,
  details?: unknown
): asserts condition {
  if (!condition) {
    throw new ResponsesError(code, message, details);
  }
}

export function toResponsesError(error: unknown, code: string, message: string): ResponsesError {
  if (error instanceof ResponsesError) {
    return error;
  }
  return new ResponsesError(code, message, error);
}

function inferErrorCategory(code: string): ResponsesErrorCategory {
  if (code.includes("CONFIG")) {
    return "config";
  }
  if (code.includes("SCHEMA")) {
    return "schema";
  }
  if (code.includes("TRANSPORT")) {
    return "transport";
  }
  if (code.includes("DECODE")) {
    return "decode";
  }
  if (code.includes("FUNCTION")) {
    return "function";
  }
  if (code.includes("INPUT")) {
    return "input";
  }
  if (code.includes("RUNNER")) {
    return "runner";
  }
  return "unknown";
}
