#!/usr/bin/env node

import { runArgs } from './forward/Run.js';

function main() {
  const result = runArgs(process.argv.slice(2));

  if (result.stdout) {
    console.log(result.stdout);
  }
  if (result.stderr) {
    console.error(result.stderr);
  }
  process.exitCode = result.exitCode;
}

main();
