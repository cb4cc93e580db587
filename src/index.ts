#!/usr/bin/env node
/**
 * dnsprobe entry point
 *
 * Measures DNS latency of the stored domains from this host and keeps
 * running statistics in MySQL.
 */

import { parseCliArgs, USAGE } from "./cli/args";
import { runAgent } from "./cli/run";
import { resolveConfig } from "./lib/config";
import { errorMessage } from "./lib/errors";
import { logger, setLogLevel } from "./lib/logger";

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));

  if (parsed.type === "help") {
    console.log(USAGE);
    return 0;
  }
  if (parsed.type === "invalid") {
    console.error(parsed.message);
    console.error(USAGE);
    return 1;
  }

  const config = resolveConfig(parsed.options.overrides);
  setLogLevel(config.logLevel);

  logger.info({ env: config.env, action: parsed.options.action }, "Starting dnsprobe");
  await runAgent(parsed.options, config);
  logger.info("Shutdown complete");
  return 0;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.fatal({ error: errorMessage(error) }, "Fatal error");
    process.exit(1);
  });
