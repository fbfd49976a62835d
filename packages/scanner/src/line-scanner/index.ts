import fs from 'node:fs/promises';
import { TextDecoder } from 'node:util';
import {
  ConfigError,
  ResourceExhaustedError,
  getErrorCode,
} from '@leakscan/shared';
import type { FileCandidate, FileScanResult, MatchRecord, ScanRule, SkipReason } from '../types';

/** An open file the scanner can read from sequentially. */
export interface ReadableFile {
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number | null,
  ): Promise<{ bytesRead: number }>;
  close(): Promise<void>;
}

export type FileOpener = (absPath: string) => Promise<ReadableFile>;

export interface LineScannerOptions {
  /** WHATWG encoding label; defaults to utf-8 */
  encoding?: string;
  /** Characters of the line kept in each record; defaults to 50 */
  previewLength?: number;
  /** Bytes read per call; defaults to 64 KiB */
  chunkSize?: number;
  open?: FileOpener;
}

const RESOURCE_EXHAUSTED = new Set(['EMFILE', 'ENFILE']);
const PERMISSION_DENIED = new Set(['EACCES', 'EPERM']);

/**
 * Classifies a failure raised while scanning one file. Returns undefined
 * for errors that did not come from the filesystem or the decoder.
 */
export function classifyScanError(error: unknown): SkipReason | undefined {
  const code = getErrorCode(error);
  if (code === undefined) return undefined;
  if (code === 'ERR_ENCODING_INVALID_ENCODED_DATA') return 'decode';
  if (PERMISSION_DENIED.has(code)) return 'permission';
  if (RESOURCE_EXHAUSTED.has(code)) return 'resource-exhausted';
  if (/^E[A-Z]+$/.test(code)) return 'io';
  return undefined;
}

/**
 * The first `length` characters of a line, counted in code points.
 */
export function preview(line: string, length: number): string {
  if (line.length <= length) return line;
  return Array.from(line).slice(0, length).join('');
}

/**
 * Decodes a file incrementally and yields its lines without terminators.
 * `\r\n`, `\r` and `\n` each end a line. A final line without a terminator
 * is still yielded; a trailing terminator does not produce an empty last line.
 */
export async function* readLines(
  file: ReadableFile,
  decoder: TextDecoder,
  chunkSize: number,
): AsyncGenerator<string> {
  const buffer = new Uint8Array(chunkSize);
  let pending = '';

  for (;;) {
    const { bytesRead } = await file.read(buffer, 0, chunkSize, null);
    if (bytesRead === 0) break;
    pending += decoder.decode(buffer.subarray(0, bytesRead), { stream: true });

    const { lines, rest } = splitLines(pending, false);
    yield* lines;
    pending = rest;
  }

  pending += decoder.decode();
  const { lines, rest } = splitLines(pending, true);
  yield* lines;
  if (rest.length > 0) {
    yield rest;
  }
}

/**
 * Splits off every complete line of `text`. Unless `final` is set, a `\r`
 * at the very end stays in `rest` since the next chunk may start with `\n`.
 */
function splitLines(text: string, final: boolean): { lines: string[]; rest: string } {
  const lines: string[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\n') {
      lines.push(text.slice(start, i));
      start = i + 1;
    } else if (ch === '\r') {
      if (i + 1 === text.length && !final) break;
      lines.push(text.slice(start, i));
      if (text[i + 1] === '\n') i++;
      start = i + 1;
    }
  }

  return { lines, rest: text.slice(start) };
}

/**
 * Scans one file line by line against a rule set.
 *
 * A scan either returns every record of the file or a classified skip; it
 * never returns part of a file's records. Descriptor exhaustion is not
 * classified here but thrown as {@link ResourceExhaustedError} so the caller
 * can decide to retry.
 */
export class LineScanner {
  readonly encoding: string;
  readonly previewLength: number;
  private readonly chunkSize: number;
  private readonly open: FileOpener;

  constructor(options: LineScannerOptions = {}) {
    this.encoding = options.encoding ?? 'utf-8';
    this.previewLength = options.previewLength ?? 50;
    this.chunkSize = options.chunkSize ?? 64 * 1024;
    this.open = options.open ?? ((absPath) => fs.open(absPath, 'r'));

    try {
      new TextDecoder(this.encoding);
    } catch (error) {
      throw new ConfigError(`Unsupported text encoding: ${this.encoding}`, { cause: error });
    }
  }

  async scan(candidate: FileCandidate, rules: readonly ScanRule[]): Promise<FileScanResult> {
    try {
      const matches = await this.collect(candidate, rules);
      return { status: 'scanned', file: candidate.path, matches };
    } catch (error) {
      const reason = classifyScanError(error);
      if (reason === undefined) {
        throw error;
      }
      if (reason === 'resource-exhausted') {
        throw new ResourceExhaustedError(candidate.path, getErrorCode(error) ?? 'EMFILE', {
          cause: error,
        });
      }
      return {
        status: 'skipped',
        file: candidate.path,
        reason,
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async collect(
    candidate: FileCandidate,
    rules: readonly ScanRule[],
  ): Promise<MatchRecord[]> {
    const file = await this.open(candidate.absPath);
    try {
      const decoder = new TextDecoder(this.encoding, { fatal: true });
      const matches: MatchRecord[] = [];
      let lineNumber = 0;

      for await (const line of readLines(file, decoder, this.chunkSize)) {
        lineNumber++;
        for (const rule of rules) {
          const secret = rule.match(line);
          if (secret === undefined) continue;
          matches.push({
            secret,
            file: candidate.path,
            line: lineNumber,
            lineContent: preview(line, this.previewLength),
          });
        }
      }

      return matches;
    } finally {
      await file.close();
    }
  }
}

/**
 * Scans a single file with a one-off scanner.
 */
export function scanFile(
  candidate: FileCandidate,
  rules: readonly ScanRule[],
  options: LineScannerOptions = {},
): Promise<FileScanResult> {
  return new LineScanner(options).scan(candidate, rules);
}
