#!/usr/bin/env node
import { buildProgram, printError } from "./program.js";

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

main().catch((err) => {
  printError("launchq", err);
  process.exit(1);
});
