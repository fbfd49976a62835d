import type { ScanEvent } from '../types/events';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print events. Off by default. */
  verbose?: boolean;
}

/**
 * Writes to stderr so that stdout stays reserved for scan output.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(event: ScanEvent): void {
    if (this.verbose) {
      console.error(JSON.stringify(event));
    }
  }
}
