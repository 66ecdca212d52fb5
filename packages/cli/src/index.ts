#!/usr/bin/env node
import { createProgram, exitCodeFor, reportError } from './program';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    reportError(e, program.opts());
    process.exit(exitCodeFor(e));
  }
}

await main();
