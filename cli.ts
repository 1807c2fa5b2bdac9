#!/usr/bin/env node
import { describeError } from "./lib/errors";
import { buildProgram } from "./lib/program";

buildProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error(`Unexpected error: ${describeError(e)}`);
    process.exitCode = 1;
  });
