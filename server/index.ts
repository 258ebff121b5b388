import express from "express";
import { getEnv } from "./config/env";
import { createEngine } from "./resolution";
import { registerRoutes } from "./routes";
import { logError } from "./utils/errorHandler";

async function main(): Promise<void> {
  const env = getEnv();
  const { engine, loadSnapshot } = createEngine(env);

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "16kb" }));

  const server = registerRoutes(app, { engine, loadSnapshot, adminToken: env.ADMIN_TOKEN });

  await new Promise<void>(resolve => server.listen(env.PORT, "0.0.0.0", resolve));
  console.log(`[Server] Listening on port ${env.PORT}`);

  // Health reports 503 until this resolves.
  try {
    const status = await engine.initialize(loadSnapshot);
    console.log(`[Server] Ready: ${status.records} records, ${status.indexedBlocks} indexed blocks`);
  } catch (error) {
    logError("Server startup", error);
    server.close();
    process.exit(1);
  }
}

main().catch(error => {
  logError("Server", error);
  process.exit(1);
});
