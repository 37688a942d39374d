#!/usr/bin/env node

import { argv } from "process";
import { buildProgram } from "./program";
import { runCommand } from "./run-command";

buildProgram(async (options) => {
  process.exitCode = await runCommand(options);
})
  .parseAsync(argv)
  .catch((e) => {
    console.error("variant-pipeline failed unexpectedly");
    console.error(e);
    process.exitCode = 1;
  });
