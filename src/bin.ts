#!/usr/bin/env node
import { run } from "./cli.js";
import { createLogger } from "./logger.js";

const log = createLogger("bin");

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    log.error(error);
    process.exitCode = 1;
  },
);
