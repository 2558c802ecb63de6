#!/usr/bin/env node

import { runCli } from "./cli.js";

process.exitCode = runCli(process.argv.slice(2), {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  env: process.env,
});
