#!/usr/bin/env node
import { execute } from "@oclif/core";
import { log } from "./lib/log";

execute({ dir: __dirname }).catch((error: unknown) => {
  log.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
