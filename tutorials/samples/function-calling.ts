import { createClient, functionTable, functionTool, runOrThrow, toolDefinitions } from "../../src/index";

const weatherTool = functionTool({
  name: "get_weather",
  description: "Get current weather for a location",
  parameters: { location: "string" },
  execute: (args) => `The weather in ${String(args.location)} is 22C and sunny`
});

const timeTool = functionTool({
  name: "get_time",
  description: "Get the current UTC time",
  execute: () => new Date().toISOString()
});

async function main() {
  const client = createClient();
  const tools = [weatherTool, timeTool];

  const responses = await runOrThrow(
    client,
    {
      input: "What's the weather in Paris and what time is it?",
      tools: toolDefinitions(tools)
    },
    functionTable(tools),
    { maxTurns: 5 }
  );

  const finalResponse = responses[responses.length - 1];
  console.log(finalResponse.text);
  console.log(
    "total cost (USD):",
    responses.reduce((sum, response) => sum + response.cost.totalCost, 0)
  );
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
