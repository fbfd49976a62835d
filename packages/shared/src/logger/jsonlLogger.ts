import * as fs from 'fs/promises';
import type { ScanEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Appends events to a file, one JSON document per line.
 * Writes are chained so that concurrent scans never hold more than one
 * descriptor open for the log file.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private pending: Promise<void>;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.pending = Promise.resolve();
  }

  log(event: ScanEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    this.pending = this.pending.then(() => this.append(line));
    return this.pending;
  }

  /** Resolves once every queued event has been written. */
  flush(): Promise<void> {
    return this.pending;
  }

  private async append(line: string): Promise<void> {
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must never fail the scan.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }
}
