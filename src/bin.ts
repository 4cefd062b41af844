#!/usr/bin/env node
import { argv } from "node:process";
import * as core from "@actions/core";
import { createProgram } from "./cli.js";
import { runCommand } from "./main.js";
import { listenForShutdown } from "./utils.js";

const shutdown = listenForShutdown();

try {
  await createProgram(runCommand, shutdown.signal).parseAsync(argv);
} catch (error) {
  core.setFailed(error instanceof Error ? error : String(error));
} finally {
  shutdown.dispose();
}
