import {
  CreateOptions,
  FieldSpec,
  ResponseResult,
  Result,
  StreamResult,
  createClient,
  createInputMessage,
  delta,
  functionTool,
  run,
  schema
} from "../src/index";

const client = createClient({ apiKey: "test-key" });

const eventSpec: FieldSpec = {
  title: "string",
  attendees: ["array", schema.object({ name: "string", email: ["string", { format: "email" }] })],
  location: schema.nullable("string")
};

const options: CreateOptions = {
  input: [createInputMessage("Describe this image", "https://example.com/cat.png", { detail: "low" })],
  model: "gpt-4o",
  schema: eventSpec,
  stream: delta((text) => process.stdout.write(text)),
  maxOutputTokens: 256
};

const pending: Promise<Result<ResponseResult>> = client.create(options);
void pending;

const echoTool = functionTool({
  name: "echo",
  description: "echo input",
  parameters: [["text", "string"]],
  execute: async (args) => args
});

void run(client, { input: "hello", tools: [echoTool.definition] }, { echo: echoTool.execute });

async function consume(): Promise<void> {
  for await (const item of client.stream("hello")) {
    const typed: StreamResult = item;
    if (!typed.ok) {
      console.error(typed.error.code);
    }
  }
}

void consume;
