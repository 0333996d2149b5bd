#!/usr/bin/env node
import { runCli } from "./cli";
import { describeError } from "./core/errors";

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
