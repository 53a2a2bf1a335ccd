#!/usr/bin/env tsx
/**
 * Stevedore Entry Point
 */

import { runCli } from "./cli";
import { logger } from "./utils/logger";
import { getErrorMessage } from "./utils/helpers";

async function main(): Promise<void> {
  const shutdown = () => {
    logger.shutdown();
    process.exit(130);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const code = await runCli(process.argv.slice(2));
  logger.shutdown();
  process.exitCode = code;
}

main().catch((err) => {
  logger.result(false, "Startup failed", { Error: getErrorMessage(err) });
  process.exit(2);
});
