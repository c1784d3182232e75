#!/usr/bin/env node
import { ConfigError, loadConfig, USAGE } from "./config.js";
import { createLogger } from "./log.js";
import { startProxy } from "./proxy.js";

/** stdout is the protocol channel: nothing but replies may be written to it. */
async function main(argv: string[]): Promise<number> {
  const config = await loadConfig(argv);
  if (config === "help") {
    console.error(USAGE);
    return 0;
  }

  const logger = createLogger(config.logLevel);
  process.on("uncaughtException", (e) => logger.error("uncaughtException:", e));
  process.on("unhandledRejection", (e) => logger.error("unhandledRejection:", e));

  await startProxy(config, { input: process.stdin, output: process.stdout, logger });
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`[mcp-bridge] Fatal: ${err instanceof Error ? err.message : String(err)}`);
    if (err instanceof ConfigError) console.error(USAGE);
    process.exitCode = 1;
  }
);
