#!/usr/bin/env node
/**
 * reimport executable
 */

import { runCli } from "../cli.js";
import { createNodeHost } from "../host/node-host.js";
import { consoleSinks } from "../logger.js";

process.exitCode = await runCli(process.argv.slice(2), {
  host: createNodeHost(),
  sinks: consoleSinks(),
  cwd: process.cwd(),
});
