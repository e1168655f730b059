#!/usr/bin/env node
import { Command } from "commander";
import { createLogger } from "../../services/shared/src/logger.js";
import { EXIT_CODES } from "../../services/trigger/src/index.js";
import { registerTriggerCli } from "./trigger-cli.js";

const log = createLogger("cli");

const program = new Command();
program
  .name("outlook-trigger")
  .description("Scheduled, credentialed single-shot job runner")
  .version("1.0.0");

registerTriggerCli(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  // Anything reaching here failed before a run could start.
  log.error("Startup failed", { error: err instanceof Error ? err.message : String(err) });
  process.exitCode = EXIT_CODES.configuration;
});
