#!/usr/bin/env node
import { createProgram, reportError, type GlobalOptions } from './program';

export const name = '@leakscan/cli';

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    process.exitCode = reportError(e, program.opts<GlobalOptions>());
  }
}

if (require.main === module) {
  void main();
}
