#!/usr/bin/env node
/**
 * regsync CLI entry point
 */

import { createNodeEngineContext } from "./node-context";
import { createProgram } from "./program";
import { executeSync } from "./run";

const controller = new AbortController();

process.once("SIGINT", () => {
  process.stderr.write("Cancelling: waiting for imports in flight...\n");
  controller.abort();
});

const program = createProgram(async (flags) => {
  process.exitCode = await executeSync(flags, {
    context: createNodeEngineContext(process.env),
    env: process.env,
    write: (line) => process.stdout.write(`${line}\n`),
    writeError: (line) => process.stderr.write(`${line}\n`),
    signal: controller.signal,
  });
});

await program.parseAsync(process.argv);
