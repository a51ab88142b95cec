#!/usr/bin/env node
import { exit } from "node:process";

import { runCli } from "./app.js";

if (!process.env.VITEST) {
  runCli(process.argv.slice(2))
    .then((code) => exit(code))
    .catch((error) => {
      process.stderr.write(`${(error as Error).message}\n`);
      exit(2);
    });
}
