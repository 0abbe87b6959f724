#!/usr/bin/env node
import { handleCliError, printHelpHint, runCli } from "./cli/program.js";

async function main(): Promise<void> {
  try {
    await runCli(process.argv);
  } catch (error) {
    const code = handleCliError(error);
    if (code === 2) {
      printHelpHint();
    }
    process.exit(code);
  }
}

void main();
