import fs from "node:fs";
import path from "node:path";
import { ensure } from "./errors";
import { LoggerLevel, parseLoggerLevel } from "./logger";

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_MODEL = "gpt-4.1-mini";
export const DEFAULT_TIMEOUT_MS = 60_000;

const ENV_KEYS = {
  apiKey: "OPENAI_API_KEY",
  baseUrl: "OPENAI_BASE_URL",
  defaultModel: "RESPONSES_DEFAULT_MODEL",
  timeoutMs: "RESPONSES_REQUEST_TIMEOUT_MS",
  logLevel: "RESPONSES_LOG_LEVEL"
} as const;

export interface ClientConfigOptions {
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export interface ClientConfig {
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  logLevel?: LoggerLevel;
}

interface RuntimeEnv {
  processEnv: NodeJS.ProcessEnv;
  dotEnv: Record<string, string>;
}

/**
 * Resolves client settings. Explicit options win, then `.env` in the working
 * directory, then the process environment.
 */
export function resolveClientConfig(options: ClientConfigOptions = {}): ClientConfig {
  const runtimeEnv = loadRuntimeEnv(process.env);

  const apiKey = (options.apiKey ?? readConfigValue(ENV_KEYS.apiKey, runtimeEnv) ?? "").trim();
  ensure(
    apiKey,
    "RESPONSES-E-CONFIG",
    `OpenAI API key not provided. Set ${ENV_KEYS.apiKey} or pass apiKey.`
  );

  const baseUrl = trimTrailingSlash(
    (options.baseUrl ?? readConfigValue(ENV_KEYS.baseUrl, runtimeEnv) ?? DEFAULT_BASE_URL).trim()
  );
  ensure(baseUrl, "RESPONSES-E-CONFIG", `${ENV_KEYS.baseUrl} must not be empty.`);

  const defaultModel = (
    options.defaultModel ??
    readConfigValue(ENV_KEYS.defaultModel, runtimeEnv) ??
    DEFAULT_MODEL
  ).trim();
  ensure(defaultModel, "RESPONSES-E-CONFIG", `${ENV_KEYS.defaultModel} must not be empty.`);

  const timeoutMs =
    typeof options.timeoutMs === "number" && Number.isFinite(options.timeoutMs)
      ? Math.max(1, Math.floor(options.timeoutMs))
      : parseTimeout(readConfigValue(ENV_KEYS.timeoutMs, runtimeEnv));

  return {
    apiKey,
    baseUrl,
    defaultModel,
    timeoutMs,
    headers: options.headers,
    logLevel: parseLoggerLevel(readConfigValue(ENV_KEYS.logLevel, runtimeEnv))
  };
}

/** Timeout in milliseconds from a raw setting; blank, invalid or too small values give the fallback. */
export function parseTimeout(
  raw: string | undefined,
  { fallbackMs = DEFAULT_TIMEOUT_MS, minMs = 1_000 }: { fallbackMs?: number; minMs?: number } = {}
): number {
  const parsed = raw === undefined || raw.trim() === "" ? Number.NaN : Number(raw);
  return Number.isFinite(parsed) && parsed >= minMs ? Math.floor(parsed) : fallbackMs;
}

function loadRuntimeEnv(processEnv: NodeJS.ProcessEnv): RuntimeEnv {
  return {
    processEnv,
    dotEnv: loadDotEnvFile(path.join(process.cwd(), ".env"))
  };
}

function readConfigValue(key: string, runtimeEnv: RuntimeEnv): string | undefined {
  if (Object.prototype.hasOwnProperty.call(runtimeEnv.dotEnv, key)) {
    return runtimeEnv.dotEnv[key];
  }
  return runtimeEnv.processEnv[key];
}

const DOTENV_LINE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

const DOUBLE_QUOTED_ESCAPES: Record<string, string> = { n: "\n", r: "\r", t: "\t" };

/** Reads `KEY=value` pairs; a missing file reads as empty. */
export function loadDotEnvFile(dotEnvPath: string): Record<string, string> {
  if (!fs.existsSync(dotEnvPath)) {
    return {};
  }

  return fs
    .readFileSync(dotEnvPath, "utf8")
    .split(/\r?\n/)
    .map((line) => DOTENV_LINE.exec(line.trim()))
    .reduce<Record<string, string>>((entries, match) => {
      if (match) {
        entries[match[1]] = unquote(match[2].trim());
      }
      return entries;
    }, {});
}

function unquote(value: string): string {
  const quote = value[0];
  if (value.length < 2 || (quote !== "\"" && quote !== "'") || !value.endsWith(quote)) {
    return value;
  }
  const inner = value.slice(1, -1);
  if (quote === "'") {
    return inner;
  }
  return inner.replace(/\\(.)/g, (_match: string, char: string) => DOUBLE_QUOTED_ESCAPES[char] ?? char);
}

function trimTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}
