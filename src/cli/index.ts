#!/usr/bin/env node

/**
 * pubgate CLI entrypoint.
 */

import { createProgram } from "./program.js";

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
