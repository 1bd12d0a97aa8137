import fs from "node:fs";
import path from "node:path";
import { ResponsesError } from "./errors";
import { isJsonObject, parseJson } from "./json";
import { Cost, JsonValue, TokenUsage } from "./types";

/** List prices in USD per million tokens. */
export interface ModelPricing {
  readonly input: number;
  readonly cachedInput?: number;
  readonly output: number;
}

interface PricingTable {
  readonly models: ReadonlyMap<string, ModelPricing>;
  readonly aliases: ReadonlyMap<string, string>;
}

const PRICING_FILE = path.join(__dirname, "..", "data", "pricing.json");
const SNAPSHOT_SUFFIX = /-\d{4}-\d{2}-\d{2}$/;
const TOKENS_PER_PRICE_UNIT = 1_000_000;

let pricingTable: PricingTable | undefined;

export function resolveModelAlias(model: string): string {
  const { aliases } = loadPricingTable();
  const aliased = aliases.get(model) ?? model;
  return aliased.replace(SNAPSHOT_SUFFIX, "");
}

export function getPricing(model: string): ModelPricing | undefined {
  const { models } = loadPricingTable();
  return models.get(model) ?? models.get(resolveModelAlias(model));
}

export function zeroCost(): Cost {
  return { inputCost: 0, outputCost: 0, totalCost: 0, cachedDiscount: 0 };
}

/**
 * Prices a call from its token usage. Cached input tokens are billed at the
 * cached rate when the model has one. An unknown model costs nothing.
 */
export function calculateCost(model: string, usage: TokenUsage | undefined): Cost {
  const pricing = getPricing(model);
  if (!pricing || !usage) {
    return zeroCost();
  }

  const cachedTokens = Math.min(usage.cachedTokens, usage.inputTokens);
  const regularInputTokens = usage.inputTokens - cachedTokens;
  const cachedRate = pricing.cachedInput ?? pricing.input;

  const cachedInputCost = priceTokens(cachedTokens, cachedRate);
  const inputCost = priceTokens(regularInputTokens, pricing.input) + cachedInputCost;
  const outputCost = priceTokens(usage.outputTokens, pricing.output);
  const cachedDiscount =
    pricing.cachedInput !== undefined && cachedTokens > 0
      ? priceTokens(cachedTokens, pricing.input) - cachedInputCost
      : 0;

  return {
    inputCost,
    outputCost,
    totalCost: inputCost + outputCost,
    cachedDiscount
  };
}

function priceTokens(tokens: number, pricePerMillion: number): number {
  return tokens > 0 ? (tokens / TOKENS_PER_PRICE_UNIT) * pricePerMillion : 0;
}

function loadPricingTable(): PricingTable {
  if (pricingTable) {
    return pricingTable;
  }

  let content: string;
  try {
    content = fs.readFileSync(PRICING_FILE, "utf8");
  } catch (error) {
    throw new ResponsesError("RESPONSES-E-CONFIG", `Pricing table not readable: ${PRICING_FILE}`, error);
  }

  const decoded = parseJson(content);
  if (!decoded.ok || !isJsonObject(decoded.value)) {
    throw new ResponsesError("RESPONSES-E-CONFIG", `Pricing table is not a JSON object: ${PRICING_FILE}`);
  }

  const models = new Map<string, ModelPricing>();
  const rawModels = decoded.value.models;
  if (isJsonObject(rawModels)) {
    for (const [name, entry] of Object.entries(rawModels)) {
      const pricing = toModelPricing(entry);
      if (!pricing) {
        throw new ResponsesError("RESPONSES-E-CONFIG", `Invalid pricing entry for "${name}".`, entry);
      }
      models.set(name, Object.freeze(pricing));
    }
  }

  const aliases = new Map<string, string>();
  const rawAliases = decoded.value.aliases;
  if (isJsonObject(rawAliases)) {
    for (const [alias, target] of Object.entries(rawAliases)) {
      if (typeof target === "string") {
        aliases.set(alias, target);
      }
    }
  }

  pricingTable = Object.freeze({ models, aliases });
  return pricingTable;
}

function toModelPricing(entry: JsonValue): ModelPricing | undefined {
  if (!isJsonObject(entry) || typeof entry.input !== "number" || typeof entry.output !== "number") {
    return undefined;
  }
  if (entry.cached_input === undefined) {
    return { input: entry.input, output: entry.output };
  }
  if (typeof entry.cached_input !== "number") {
    return undefined;
  }
  return { input: entry.input, cachedInput: entry.cached_input, output: entry.output };
}
