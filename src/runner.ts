import type { ResponsesClient } from "./client";
import { ensure, ResponsesError } from "./errors";
import { logger } from "./logger";
import { toCreateOptions } from "./payload";
import { CreateOptions, FunctionCall, FunctionCallOutput, ResponseResult, Result } from "./types";
import type { FunctionHandler, FunctionTable } from "./tools";

export const DEFAULT_MAX_TURNS = 10;

export interface RunOptions {
  /** Upper bound on API calls made by one run, the first request included. */
  maxTurns?: number;
}

export type ResponsesCaller = Pick<ResponsesClient, "create" | "createFollowUp">;

/**
 * Executes each requested call against `functions`. Handler failures and
 * unknown names become error strings in the output instead of exceptions.
 */
export async function callFunctions(
  calls: readonly FunctionCall[],
  functions: FunctionTable
): Promise<FunctionCallOutput[]> {
  const table = resolveFunctionTable(functions);
  const outputs: FunctionCallOutput[] = [];

  for (const call of calls) {
    outputs.push({
      type: "function_call_output",
      call_id: call.callId,
      output: await executeCall(call, table.get(call.name))
    });
  }
  return outputs;
}

/**
 * Runs a conversation until the model answers without function calls.
 * Returns every response, oldest first. A failed request ends the run and
 * its history is dropped.
 */
export async function run(
  client: ResponsesCaller,
  input: string | CreateOptions,
  functions: FunctionTable,
  options: RunOptions = {}
): Promise<Result<ResponseResult[]>> {
  const maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  ensure(
    Number.isInteger(maxTurns) && maxTurns > 0,
    "RESPONSES-E-RUNNER-CONFIG",
    "maxTurns must be a positive integer."
  );

  const table = resolveFunctionTable(functions);
  const {
    input: _input,
    previous_response_id: _previousId,
    previousResponseId: _previousResponseId,
    ...carried
  } = toCreateOptions(input);
  const history: ResponseResult[] = [];

  let result = await client.create(input);
  for (let turn = 1; ; turn += 1) {
    if (!result.ok) {
      return result;
    }

    const response = result.value;
    history.push(response);
    if (response.functionCalls.length === 0) {
      return { ok: true, value: history };
    }
    if (turn >= maxTurns) {
      return {
        ok: false,
        error: new ResponsesError(
          "RESPONSES-E-RUNNER-TURNS",
          `Function call loop exceeded maxTurns (${maxTurns}) without a final answer.`,
          { history }
        )
      };
    }

    logger.debug(`[Runner] Turn ${turn}: executing ${response.functionCalls.length} function call(s).`);
    const outputs = await callFunctions(response.functionCalls, table);
    result = await client.createFollowUp(response, { ...carried, input: outputs });
  }
}

export async function runOrThrow(
  client: ResponsesCaller,
  input: string | CreateOptions,
  functions: FunctionTable,
  options: RunOptions = {}
): Promise<ResponseResult[]> {
  const result = await run(client, input, functions, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

async function executeCall(call: FunctionCall, handler: FunctionHandler | undefined): Promise<string> {
  if (!handler) {
    logger.debug(`[Runner] No handler for function "${call.name}".`);
    return `Error: Function '${call.name}' not found`;
  }

  let value: unknown;
  try {
    value = await handler(call.arguments);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.debug(`[Runner] Function "${call.name}" failed: ${message}`);
    return `Error calling function '${call.name}': ${message}`;
  }
  return encodeOutput(call.name, value);
}

function encodeOutput(name: string, value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  try {
    return JSON.stringify(value) ?? "";
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return `Error: Function '${name}' returned a value that is not JSON-serializable: ${message}`;
  }
}

function resolveFunctionTable(functions: FunctionTable): ReadonlyMap<string, FunctionHandler> {
  if (isFunctionMap(functions)) {
    return functions;
  }
  return new Map(Object.entries(functions));
}

function isFunctionMap(functions: FunctionTable): functions is ReadonlyMap<string, FunctionHandler> {
  return functions instanceof Map;
}
