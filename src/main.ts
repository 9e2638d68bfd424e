#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createRuntime } from "./runtime.js";
import { createServer } from "./server.js";
import { loadConfig } from "./util/config.js";
import { createLogger } from "./util/logger.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const runtime = createRuntime(config, { logger });
  const server = createServer(runtime);

  await runtime.start();
  await server.connect(new StdioServerTransport());
  logger.info("devicegate-mcp server running (stdio)");

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "shutting down");
    await runtime.stop();
    await server.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
