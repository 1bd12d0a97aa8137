import { isJsonObject, toRecord } from "./json";
import { JsonObject, JsonValue, SseEvent, StreamCallback, StreamResult } from "./types";

export type EventItem = SseEvent | StreamResult;
export type EventInput = Iterable<EventItem> | AsyncIterable<EventItem>;

export const TEXT_DELTA_EVENT = "response.output_text.delta";
export const TEXT_DONE_EVENT = "response.output_text.done";

export interface CollectState {
  response: JsonObject;
  terminal: boolean;
}

/**
 * Yields the incremental text of a streamed response. `done` and `completed`
 * events repeat text already sent as deltas, so only deltas are emitted.
 */
export async function* textDeltas(events: EventInput): AsyncGenerator<string> {
  for await (const item of events) {
    const event = unwrapEvent(item);
    if (!event || event.event !== TEXT_DELTA_EVENT) {
      continue;
    }
    const delta = toRecord(event.data).delta;
    if (typeof delta === "string" && delta.length > 0) {
      yield delta;
    }
  }
}

export function initialCollectState(): CollectState {
  return { response: {}, terminal: false };
}

export function isTerminal(state: CollectState): boolean {
  return state.terminal;
}

/**
 * Folds one event into the collected response. `response.completed` carries
 * the authoritative final object and replaces everything gathered before it.
 */
export function reduceResponseEvent(state: CollectState, event: SseEvent): CollectState {
  if (state.terminal) {
    return state;
  }

  const data: JsonObject = isJsonObject(event.data) ? event.data : {};
  switch (event.event) {
    case "response.created":
    case "response.in_progress":
      if (!isJsonObject(data.response)) {
        return state;
      }
      return { ...state, response: { ...state.response, ...data.response } };

    case "response.output_item.added": {
      const index = toIndex(data.output_index);
      if (index === undefined || data.item === undefined) {
        return state;
      }
      const output = placeAt(outputOf(state.response), index, data.item);
      return { ...state, response: { ...state.response, output } };
    }

    case TEXT_DONE_EVENT: {
      const index = toIndex(data.output_index);
      const contentIndex = toIndex(data.content_index);
      if (index === undefined || contentIndex === undefined || typeof data.text !== "string") {
        return state;
      }
      const output = outputOf(state.response);
      const item = output[index];
      if (!isJsonObject(item)) {
        return state;
      }
      const content = placeAt(Array.isArray(item.content) ? item.content : [], contentIndex, {
        type: "output_text",
        text: data.text
      });
      const nextOutput = [...output];
      nextOutput[index] = { ...item, content };
      return { ...state, response: { ...state.response, output: nextOutput } };
    }

    case "response.completed":
      return {
        response: isJsonObject(data.response) ? data.response : state.response,
        terminal: true
      };

    case "response.failed":
      return {
        response: isJsonObject(data.response)
          ? { ...state.response, ...data.response }
          : state.response,
        terminal: true
      };

    default:
      return state;
  }
}

/**
 * Rebuilds a full response object from streamed events. A stream that ends
 * before a terminal event yields whatever was assembled so far.
 */
export async function collect(events: EventInput): Promise<JsonObject> {
  let state = initialCollectState();
  for await (const item of events) {
    const event = unwrapEvent(item);
    if (!event) {
      continue;
    }
    state = reduceResponseEvent(state, event);
    if (isTerminal(state)) {
      break;
    }
  }
  return state.response;
}

/** Adapts a plain text callback into a stream callback that only sees deltas. */
export function delta(onText: (text: string) => void): StreamCallback {
  return (result) => {
    if (!result.ok || result.value.event !== TEXT_DELTA_EVENT) {
      return;
    }
    const text = toRecord(result.value.data).delta;
    if (typeof text === "string" && text.length > 0) {
      onText(text);
    }
  };
}

export function unwrapEvent(item: EventItem): SseEvent | undefined {
  if ("ok" in item) {
    return item.ok ? item.value : undefined;
  }
  return item;
}

function outputOf(response: JsonObject): JsonValue[] {
  return Array.isArray(response.output) ? response.output : [];
}

/**
 * Index-addressed placement: past-the-end indices pad with `null`, a `null`
 * slot is filled in place, an occupied slot shifts later entries right.
 */
function placeAt(list: JsonValue[], index: number, value: JsonValue): JsonValue[] {
  const next = [...list];
  if (index >= next.length) {
    while (next.length < index) {
      next.push(null);
    }
    next.push(value);
  } else if (next[index] === null) {
    next[index] = value;
  } else {
    next.splice(index, 0, value);
  }
  return next;
}

function toIndex(value: JsonValue | undefined): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : undefined;
}
