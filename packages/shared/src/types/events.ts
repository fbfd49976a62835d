/**
 * Base interface for all scan events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the scan run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a scan run starts.
 */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    /** Absolute path of the scanned root */
    root: string;
    /** Number of ignore rules in effect, built-ins included */
    ignoreRuleCount: number;
    /** Number of scan rules in effect */
    ruleCount: number;
    concurrency: number;
  };
}

/** Emitted once the candidate file list is complete */
export interface FilesEnumerated extends BaseEvent {
  type: 'FilesEnumerated';
  payload: {
    fileCount: number;
    durationMs: number;
  };
}

/** Emitted when the enumerator cannot read a directory */
export interface DirectorySkipped extends BaseEvent {
  type: 'DirectorySkipped';
  payload: {
    path: string;
    error: string;
  };
}

/** Emitted when a file scan hit resource exhaustion and will be attempted again */
export interface FileScanRetried extends BaseEvent {
  type: 'FileScanRetried';
  payload: {
    file: string;
    /** The attempt that failed (1-based) */
    attempt: number;
    delayMs: number;
    errno: string;
  };
}

/** Emitted when a file could not be scanned and contributes no matches */
export interface FileSkipped extends BaseEvent {
  type: 'FileSkipped';
  payload: {
    file: string;
    reason: 'decode' | 'permission' | 'io' | 'resource-exhausted';
    message: string;
  };
}

/** Emitted after every member of a batch has settled */
export interface BatchCompleted extends BaseEvent {
  type: 'BatchCompleted';
  payload: {
    /** 0-based batch index */
    index: number;
    size: number;
    matchesFound: number;
  };
}

/** Emitted when a scan run ends */
export interface ScanFinished extends BaseEvent {
  type: 'ScanFinished';
  payload: {
    filesScanned: number;
    filesSkipped: number;
    matchesFound: number;
    retries: number;
    durationMs: number;
  };
}

export type ScanEvent =
  | ScanStarted
  | FilesEnumerated
  | DirectorySkipped
  | FileScanRetried
  | FileSkipped
  | BatchCompleted
  | ScanFinished;

/**
 * Helper type to build an event without the common metadata.
 */
export type ScanEventInput<E extends ScanEvent = ScanEvent> = E extends ScanEvent
  ? Pick<E, 'type' | 'payload'>
  : never;

/**
 * Fills in schemaVersion, timestamp and runId for an event.
 */
export function createEvent(runId: string, input: ScanEventInput): ScanEvent {
  return {
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId,
    ...input,
  };
}
