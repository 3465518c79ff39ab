#!/usr/bin/env node
import { run } from "./cli.js";
import { loadConfig } from "./config.js";

try {
  const config = loadConfig();
  const { output, exitCode } = await run(process.argv.slice(2), config.tasksFile);
  if (exitCode === 0) {
    console.log(output);
  } else {
    console.error(output);
  }
  process.exitCode = exitCode;
} catch (err) {
  console.error("[tasktrack]", err);
  process.exitCode = 1;
}
