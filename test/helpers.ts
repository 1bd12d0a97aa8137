import { JsonValue } from "../src/index";

export type FetchStub = (url: string | URL | Request, init?: RequestInit) => Promise<Response>;

export async function withFetch<T>(stub: FetchStub, run: () => Promise<T>): Promise<T> {
  const oldFetch = globalThis.fetch;
  globalThis.fetch = stub;
  try {
    return await run();
  } finally {
    globalThis.fetch = oldFetch;
  }
}

export function jsonResponse(body: JsonValue, init: { status?: number; statusText?: string } = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    statusText: init.statusText,
    headers: { "Content-Type": "application/json" }
  });
}

export function sseFrame(event: string, data: JsonValue): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function sseResponse(frames: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const frame of frames) {
        controller.enqueue(encoder.encode(frame));
      }
      controller.close();
    }
  });
  return new Response(body, {
    status: 200,
    headers: { "Content-Type": "text/event-stream" }
  });
}

export function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}
