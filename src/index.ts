import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadPipelineRuntime } from "./config/loadRuntime.js";
import { runtimeConfigFromEnv } from "./config/runtimeConfig.js";
import { openDatabase } from "./db/connection.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { envSnapshot } from "./mcp/envSnapshot.js";
import { PostgresStore } from "./store/postgresStore.js";

async function main(): Promise<void> {
  const config = runtimeConfigFromEnv(process.env);
  const runtime = await loadPipelineRuntime(config, process.env);
  for (const w of runtime.project?.warnings ?? []) console.error(`warning: ${w}`);

  const { db } = await openDatabase(config);
  const store = new PostgresStore(db);

  const server = createGatewayServer({ store, runtime, outputDir: config.outputDir });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`peprun gateway ready ${JSON.stringify(envSnapshot(config))}`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
