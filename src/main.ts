#!/usr/bin/env node
import { runCli } from "./cli.js";
import { logger } from "./utils/logger.js";

const controller = new AbortController();
process.once("SIGINT", () => {
  logger.warn("interrupted, finishing the current stage of each video");
  controller.abort(new Error("interrupted"));
});

try {
  process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
} catch (err) {
  logger.fatal({ err }, "unexpected failure");
  process.exitCode = 1;
}
