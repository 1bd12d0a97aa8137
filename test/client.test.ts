import assert from "node:assert/strict";
import test from "node:test";
import { ResponsesClient, ResponsesError, StreamResult, delta } from "../src/index";
import { jsonResponse, requestBody, sseFrame, sseResponse, withFetch } from "./helpers";

function createTestClient(timeoutMs?: number): ResponsesClient {
  return new ResponsesClient({
    apiKey: "test-key",
    baseUrl: "https://api.test/v1/",
    defaultModel: "gpt-4o-mini",
    timeoutMs
  });
}

const completedBody = {
  id: "resp_1",
  model: "gpt-4o-mini",
  status: "completed",
  output: [{ type: "message", role: "assistant", content: [{ type: "output_text", text: "Hi there" }] }]
};

test("create posts the payload and processes the JSON body", async () => {
  await withFetch(
    async (url, init) => {
      assert.equal(String(url), "https://api.test/v1/responses");
      assert.equal(init?.method, "POST");
      const headers = new Headers(init?.headers);
      assert.equal(headers.get("authorization"), "Bearer test-key");
      assert.equal(headers.get("content-type"), "application/json");
      assert.deepEqual(requestBody(init), { input: "Hello", model: "gpt-4o-mini" });
      return jsonResponse(completedBody);
    },
    async () => {
      const result = await createTestClient().create("Hello");
      assert.ok(result.ok);
      assert.equal(result.value.text, "Hi there");
      assert.deepEqual(result.value.body, completedBody);
      assert.deepEqual(result.value.functionCalls, []);
    }
  );
});

test("API errors become transport failures with the API message", async () => {
  await withFetch(
    async () =>
      jsonResponse(
        { error: { message: "Incorrect API key provided", type: "invalid_request_error" } },
        { status: 401, statusText: "Unauthorized" }
      ),
    async () => {
      const result = await createTestClient().create("Hello");
      assert.ok(!result.ok);
      assert.equal(result.error.code, "RESPONSES-E-TRANSPORT-HTTP");
      assert.equal(result.error.category, "transport");
      assert.equal(result.error.message, "OpenAI request failed (401 Unauthorized). Incorrect API key provided");
      assert.deepEqual(result.error.details, {
        status: 401,
        statusText: "Unauthorized",
        error: { message: "Incorrect API key provided", type: "invalid_request_error" }
      });
    }
  );
});

test("network failures and timeouts are returned, not thrown", async () => {
  await withFetch(
    async () => {
      throw new TypeError("fetch failed");
    },
    async () => {
      const result = await createTestClient().create("Hello");
      assert.ok(!result.ok);
      assert.equal(result.error.code, "RESPONSES-E-TRANSPORT");
      assert.equal(result.error.message, "Request failed: POST /responses");
    }
  );

  await withFetch(
    (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(new DOMException("The operation was aborted.", "AbortError"));
        });
      }),
    async () => {
      const result = await createTestClient(5).create("Hello");
      assert.ok(!result.ok);
      assert.equal(result.error.code, "RESPONSES-E-TRANSPORT");
      assert.equal(result.error.message, "Request timed out after 5ms: POST /responses");
    }
  );
});

test("invalid JSON bodies are decode failures", async () => {
  await withFetch(
    async () => new Response("<html>", { status: 200 }),
    async () => {
      const result = await createTestClient().create("Hello");
      assert.ok(!result.ok);
      assert.equal(result.error.code, "RESPONSES-E-DECODE");
      assert.equal(result.error.category, "decode");
    }
  );
});

test("createOrThrow raises the failure", async () => {
  await withFetch(
    async () => jsonResponse({ error: { message: "Server exploded" } }, { status: 500, statusText: "Internal Server Error" }),
    async () => {
      await assert.rejects(
        () => createTestClient().createOrThrow("Hello"),
        (error: unknown) => {
          assert.ok(error instanceof ResponsesError);
          assert.equal(error.code, "RESPONSES-E-TRANSPORT-HTTP");
          return true;
        }
      );
    }
  );
});

test("createFollowUp chains the previous response", async () => {
  const bodies: unknown[] = [];
  await withFetch(
    async (_url, init) => {
      bodies.push(requestBody(init));
      return jsonResponse({ ...completedBody, id: `resp_${bodies.length}`, model: "gpt-4o" });
    },
    async () => {
      const client = createTestClient();
      const first = await client.createOrThrow({ input: "What is TypeScript?", model: "gpt-4o" });
      const second = await client.createFollowUpOrThrow(first, "Tell me more");
      assert.equal(second.body.id, "resp_2");
    }
  );
  assert.deepEqual(bodies[1], {
    input: "Tell me more",
    model: "gpt-4o",
    previous_response_id: "resp_1"
  });
});

test("streaming create feeds the callback and returns the completed response", async () => {
  const frames = [
    sseFrame("response.created", { response: { id: "resp_s", status: "in_progress" } }),
    sseFrame("response.output_item.added", {
      output_index: 0,
      item: { type: "message", role: "assistant", content: [] }
    }),
    sseFrame("response.output_text.delta", { delta: "Hel" }),
    sseFrame("response.output_text.delta", { delta: "lo" }),
    sseFrame("response.output_text.done", { output_index: 0, content_index: 0, text: "Hello" }),
    sseFrame("response.completed", {
      response: {
        id: "resp_s",
        model: "gpt-4o-mini",
        status: "completed",
        output: [{ type: "message", role: "assistant", content: [{ type: "output_text", text: "Hello" }] }]
      }
    })
  ];

  const seen: string[] = [];
  await withFetch(
    async (_url, init) => {
      assert.deepEqual(requestBody(init), { input: "Say hello", model: "gpt-4o-mini", stream: true });
      assert.equal(new Headers(init?.headers).get("accept"), "text/event-stream");
      return sseResponse(frames);
    },
    async () => {
      const result = await createTestClient().create({
        input: "Say hello",
        stream: delta((text) => {
          seen.push(text);
        })
      });
      assert.ok(result.ok);
      assert.equal(result.value.text, "Hello");
      assert.equal(result.value.body.status, "completed");
    }
  );
  assert.deepEqual(seen, ["Hel", "lo"]);
});

test("a stream callback returning false stops reading", async () => {
  const events: string[] = [];
  await withFetch(
    async () =>
      sseResponse([
        sseFrame("response.created", { response: { id: "resp_x" } }),
        sseFrame("response.output_text.delta", { delta: "never seen" })
      ]),
    async () => {
      const result = await createTestClient().create({
        input: "Stop early",
        stream: (item) => {
          if (item.ok) {
            events.push(item.value.event);
          }
          return false;
        }
      });
      assert.ok(result.ok);
      assert.deepEqual(result.value.body, { id: "resp_x" });
    }
  );
  assert.deepEqual(events, ["response.created"]);
});

test("a stream callback returning false does not hide an HTTP failure", async () => {
  const seen: string[] = [];
  await withFetch(
    async () => jsonResponse({ error: { message: "Quota exceeded" } }, { status: 429, statusText: "Too Many Requests" }),
    async () => {
      const result = await createTestClient().create({
        input: "hi",
        stream: (item) => {
          seen.push(item.ok ? item.value.event : item.error.code);
          return item.ok ? undefined : false;
        }
      });
      assert.ok(!result.ok);
      assert.equal(result.error.code, "RESPONSES-E-TRANSPORT-HTTP");
      assert.equal(result.error.message, "OpenAI request failed (429 Too Many Requests). Quota exceeded");
    }
  );
  assert.deepEqual(seen, ["RESPONSES-E-TRANSPORT-HTTP"]);
});

test("a stream callback returning false does not hide a failed response", async () => {
  await withFetch(
    async () =>
      sseResponse([
        sseFrame("response.failed", {
          response: { id: "resp_f", status: "failed", error: { message: "Server overloaded" } }
        })
      ]),
    async () => {
      const result = await createTestClient().create({ input: "hi", stream: () => false });
      assert.ok(!result.ok);
      assert.equal(result.error.code, "RESPONSES-E-TRANSPORT-STREAM");
      assert.equal(result.error.message, "Response failed: Server overloaded");
    }
  );

  await withFetch(
    async () => sseResponse([sseFrame("error", { message: "Rate limit reached" })]),
    async () => {
      const result = await createTestClient().create({ input: "hi", stream: () => false });
      assert.ok(!result.ok);
      assert.equal(result.error.message, "Stream error: Rate limit reached");
    }
  );
});

test("a failed stream is reported as a stream failure", async () => {
  await withFetch(
    async () =>
      sseResponse([
        sseFrame("response.created", { response: { id: "resp_f" } }),
        sseFrame("response.failed", {
          response: { status: "failed", error: { code: "server_error", message: "Server overloaded" } }
        })
      ]),
    async () => {
      const result = await createTestClient().create({ input: "Hello", stream: true });
      assert.ok(!result.ok);
      assert.equal(result.error.code, "RESPONSES-E-TRANSPORT-STREAM");
      assert.equal(result.error.message, "Response failed: Server overloaded");
      assert.deepEqual(result.error.details, {
        id: "resp_f",
        status: "failed",
        error: { code: "server_error", message: "Server overloaded" }
      });
    }
  );

  await withFetch(
    async () => sseResponse([sseFrame("error", { type: "error", message: "Rate limit reached" })]),
    async () => {
      const result = await createTestClient().create({ input: "Hello", stream: true });
      assert.ok(!result.ok);
      assert.equal(result.error.message, "Stream error: Rate limit reached");
    }
  );
});

test("stream yields events and a single failure item on HTTP errors", async () => {
  const collected: StreamResult[] = [];
  await withFetch(
    async () =>
      sseResponse([
        sseFrame("response.output_text.delta", { delta: "a" }),
        sseFrame("response.completed", { response: { id: "resp_1" } })
      ]),
    async () => {
      for await (const item of createTestClient().stream("Hello")) {
        collected.push(item);
      }
    }
  );
  assert.deepEqual(
    collected.map((item) => (item.ok ? item.value.event : item.error.code)),
    ["response.output_text.delta", "response.completed"]
  );

  const failures: StreamResult[] = [];
  await withFetch(
    async () => jsonResponse({ error: { message: "Quota exceeded" } }, { status: 429, statusText: "Too Many Requests" }),
    async () => {
      for await (const item of createTestClient().stream({ input: "Hello" })) {
        failures.push(item);
      }
    }
  );
  assert.equal(failures.length, 1);
  const failure = failures[0];
  assert.ok(!failure.ok);
  assert.equal(failure.error.message, "OpenAI request failed (429 Too Many Requests). Quota exceeded");
});

test("listModels filters model ids by substring", async () => {
  await withFetch(
    async (url, init) => {
      assert.equal(String(url), "https://api.test/v1/models");
      assert.equal(init?.method, "GET");
      return jsonResponse({
        object: "list",
        data: [
          { id: "gpt-4o", object: "model", created: 1_700_000_000, owned_by: "system" },
          { id: "o3", object: "model" },
          { id: "gpt-4o-mini" },
          { object: "model" }
        ]
      });
    },
    async () => {
      const result = await createTestClient().listModels("gpt-4o");
      assert.ok(result.ok);
      assert.deepEqual(result.value, [
        { id: "gpt-4o", object: "model", created: 1_700_000_000, owned_by: "system" },
        { id: "gpt-4o-mini" }
      ]);
    }
  );
});
