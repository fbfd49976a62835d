import type { ScanEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Sink for structured scan events.
 *
 * @example
 * ```typescript
 * await logger.log(createEvent(runId, { type: 'FileSkipped', payload: { ... } }));
 * ```
 */
export interface Logger {
  /**
   * Persist a structured scan event.
   */
  log(event: ScanEvent): MaybePromise<void>;
}
