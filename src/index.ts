#!/usr/bin/env node
import "dotenv/config";
import { runAvailCli } from "./cli/availCli.js";
import { config } from "./infra/config.js";
import { logger } from "./infra/logger.js";

process.on("uncaughtException", (err) => {
  logger.error({ err }, "UncaughtException");
  process.exit(1);
});

process.exitCode = runAvailCli(process.argv.slice(2), config);
