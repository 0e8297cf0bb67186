#!/usr/bin/env node

import { handleTheoryResult, runTheoryCommand } from "./cli";
import { resultToExitCode } from "./cli/result";
import { ExitCode } from "./cli/types";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  try {
    const [driver, result] = await runTheoryCommand(args);
    handleTheoryResult(driver, result);
    process.exit(resultToExitCode(result));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(ExitCode.EXECUTION_FAILURE);
  }
}

void main();
