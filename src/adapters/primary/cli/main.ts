#!/usr/bin/env node
import { buildProgram } from "./program";
import { AppError, errorMessage, exitCodeFor } from "../../../shared/errors";

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (e) {
    const code = e instanceof AppError ? e.code : "UnknownError";
    console.error(`[ERROR] ${code}: ${errorMessage(e)}`);
    process.exitCode = exitCodeFor(e);
  }
}

void main();
