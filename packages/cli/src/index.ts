#!/usr/bin/env node

import { CommanderError } from "commander";
import chalk from "chalk";
import { createProgram } from "./program";

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync();
  } catch (error: unknown) {
    // commander has already printed its own usage errors
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

void main();
