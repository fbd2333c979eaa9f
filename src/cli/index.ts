#!/usr/bin/env node
/**
 * wave-channel CLI entry point.
 */

import { buildProgram } from "./program.js";
import { cliError, describeError } from "./helpers.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    cliError(`Error: ${describeError(err)}`);
  });
