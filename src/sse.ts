import { parseJson } from "./json";
import { logger } from "./logger";
import { SseEvent } from "./types";

const FRAME_SEPARATOR = "\n\n";

/**
 * Incremental Server-Sent-Events decoder. Holds only the unterminated tail of
 * the stream between calls.
 */
export class SseDecoder {
  private buffer = "";
  private readonly textDecoder = new TextDecoder();

  public feed(chunk: Uint8Array | string): SseEvent[] {
    const text = typeof chunk === "string" ? chunk : this.textDecoder.decode(chunk, { stream: true });
    this.buffer = (this.buffer + text).replace(/\r\n/g, "\n");

    const frames = this.buffer.split(FRAME_SEPARATOR);
    this.buffer = frames.pop() ?? "";
    return decodeFrames(frames);
  }

  /** Decodes whatever remains once the stream has ended. */
  public flush(): SseEvent[] {
    const rest = (this.buffer + this.textDecoder.decode()).replace(/\r\n/g, "\n");
    this.buffer = "";
    return rest.trim().length > 0 ? decodeFrames([rest]) : [];
  }
}

export function parseSseFrame(frame: string): SseEvent | undefined {
  let eventType: string | undefined;
  const dataLines: string[] = [];

  for (const line of frame.split("\n")) {
    if (line.startsWith("event:")) {
      if (eventType === undefined) {
        eventType = stripFieldValue(line.slice(6));
      }
    } else if (line.startsWith("data:")) {
      dataLines.push(stripFieldValue(line.slice(5)));
    }
  }

  if (!eventType || dataLines.length === 0) {
    logger.debug(`[SSE] Dropping frame without event or data line: ${frame.slice(0, 200)}`);
    return undefined;
  }

  const decoded = parseJson(dataLines.join("\n"));
  if (!decoded.ok) {
    logger.debug(`[SSE] Dropping "${eventType}" frame with invalid JSON: ${decoded.message}`);
    return undefined;
  }
  return { event: eventType, data: decoded.value };
}

/**
 * Reads a byte stream to completion, yielding decoded events. The reader is
 * released on every exit path, including early `return()` by the consumer.
 */
export async function* decodeSseStream(body: ReadableStream<Uint8Array>): AsyncGenerator<SseEvent> {
  const reader = body.getReader();
  const decoder = new SseDecoder();
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      yield* decoder.feed(value);
    }
    yield* decoder.flush();
  } finally {
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        logger.debug("[SSE] Stream cancel failed", error);
      });
    }
    reader.releaseLock();
  }
}

function decodeFrames(frames: string[]): SseEvent[] {
  const events: SseEvent[] = [];
  for (const frame of frames) {
    if (frame.trim().length === 0) {
      continue;
    }
    const event = parseSseFrame(frame);
    if (event) {
      events.push(event);
    }
  }
  return events;
}

function stripFieldValue(value: string): string {
  return value.startsWith(" ") ? value.slice(1) : value;
}
