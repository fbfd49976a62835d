/**
 * A regular file selected for scanning.
 */
export interface FileCandidate {
  /** Root-relative path with forward slashes */
  path: string;
  absPath: string;
}

/**
 * One detected occurrence of a scan rule on one line of one file.
 */
export interface MatchRecord {
  /** The matched substring */
  readonly secret: string;
  /** Root-relative path of the file */
  readonly file: string;
  /** 1-based line number */
  readonly line: number;
  /** The line, truncated to the configured preview length */
  readonly lineContent: string;
}

/**
 * A line-level pattern that detects a credential-shaped substring.
 * Implementations must be stateless: one rule instance is shared by every
 * concurrent file scan.
 */
export interface ScanRule {
  readonly id: string;
  readonly description?: string;
  /** Returns the matched substring, or undefined when the line does not match. */
  match(line: string): string | undefined;
}

export type SkipReason = 'decode' | 'permission' | 'io' | 'resource-exhausted';

export interface ScannedFile {
  status: 'scanned';
  file: string;
  matches: MatchRecord[];
}

export interface SkippedFile {
  status: 'skipped';
  file: string;
  reason: SkipReason;
  message: string;
}

/** What a single scan attempt of one file produced. */
export type FileScanResult = ScannedFile | SkippedFile;

/** The final, single contribution of a file to a scan. */
export type ScanOutcome = FileScanResult & {
  /** Scan attempts made for this file, retries included */
  attempts: number;
};

export interface ScanStats {
  filesEnumerated: number;
  filesScanned: number;
  filesSkipped: number;
  matchesFound: number;
  retries: number;
  durationMs: number;
}

export interface ScanReport {
  runId: string;
  /** Absolute path of the scanned root */
  root: string;
  /** Ignore rules in effect, built-ins included */
  ignoreRules: readonly string[];
  matches: MatchRecord[];
  outcomes: ScanOutcome[];
  skipped: Array<SkippedFile & { attempts: number }>;
  stats: ScanStats;
}
