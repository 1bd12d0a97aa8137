import { createClient, schema, setLogLevel, textDeltas, LoggerLevel } from "../../src/index";

async function main() {
  setLogLevel(LoggerLevel.WARN);
  const client = createClient();

  const event = await client.createOrThrow({
    input: "Alice and Bob are going to a science fair on Friday.",
    instructions: "Extract the event information.",
    schema: {
      name: "string",
      date: schema.string({ description: "ISO 8601 date if known" }),
      participants: ["array", "string"]
    },
    schemaName: "calendar_event"
  });

  console.log("parsed:", event.parsed ?? event.parseError);
  console.log("cost (USD):", event.cost.totalCost);

  for await (const text of textDeltas(client.stream("Write a haiku about type systems."))) {
    process.stdout.write(text);
  }
  process.stdout.write("\n");
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
