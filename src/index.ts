#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.exitOverride();
}

function isCommanderExit(error: unknown): error is CommanderError {
  return error instanceof CommanderError;
}

function resolveDebugFlagFromArgv(argv: string[]): boolean {
  let debugFlag = false;

  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug" || arg === "-d") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Commander already printed usage errors, help and version output.
    if (isCommanderExit(error)) {
      process.exitCode = error.exitCode;
      return;
    }

    console.error(renderCliError(error, { debug: resolveDebugFlagFromArgv(argv) }));
    process.exitCode = 1;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;

  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  void main(process.argv);
}
