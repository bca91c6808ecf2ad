#!/usr/bin/env node

import { runCli } from "./cli/index.js";
import { errorMessage } from "./shared/errors.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`ERROR ${errorMessage(err)}\n`);
    process.exit(1);
  });
