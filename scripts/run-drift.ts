#!/usr/bin/env node
/**
 * Standalone runner for `driftscope drift` CLI commands.
 * Usage: driftscope check -t plan.json -p terraform -s terraform.tfstate --fail-on high
 */
import { Command } from "commander";
import { registerDriftCli } from "../src/cli.js";
import { logLevelSchema } from "../src/config/schema.js";
import { createLogger, setGlobalLogger } from "../src/logging/logger.js";
import { VERSION } from "../src/version.js";

const level = logLevelSchema.catch("warn").parse(process.env.DRIFTSCOPE_LOG_LEVEL);
const logger = createLogger("cli", { level });
setGlobalLogger(logger);

const program = new Command("driftscope").version(VERSION);
registerDriftCli({ program, logger });
const args = process.argv.slice(2);
const routed = args[0] === "--version" || args[0] === "-V" ? args : ["drift", ...args];
await program.parseAsync(["node", "driftscope", ...routed]);
