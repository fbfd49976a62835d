import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { AppError, exitCodeFor } from '@leakscan/shared';
import { registerScanCommand } from './commands/scan';
import { registerRulesCommand } from './commands/rules';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

export function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('leakscan')
    .description('Scan a directory tree for leaked credentials')
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerScanCommand(program);
  registerRulesCommand(program);

  return program;
}

/**
 * Prints an error the way the selected output mode expects and returns the
 * process exit code for it.
 */
export function reportError(e: unknown, opts: GlobalOptions): number {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
  } else {
    // Human-readable output
    console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (opts.verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  return exitCodeFor(e);
}
