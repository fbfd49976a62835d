import nodeFs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import isBinaryPath from 'is-binary-path';
import { ConsoleLogger, ScanError, createEvent, type Logger } from '@leakscan/shared';
import type { IgnoreSet } from '../ignore';
import type { FileCandidate } from '../types';

/** The slice of `fs/promises` the enumerator needs. */
export interface DirectoryReader {
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
}

interface WalkContext {
  ignoreSet: IgnoreSet;
  options: EnumerateOptions;
  logger: Logger;
  runId: string;
}

export interface EnumerateOptions {
  /** Drop files whose extension names a binary format */
  skipBinaryExtensions?: boolean;
  logger?: Logger;
  runId?: string;
}

/**
 * Walks a directory tree and yields every regular file the ignore set keeps.
 *
 * Directories are descended into unless excluded, but never yielded. Symbolic
 * links and special files are never yielded or followed. An unreadable
 * subdirectory is skipped; an unreadable root is an error.
 */
export class FileEnumerator {
  constructor(private readonly fs: DirectoryReader = nodeFs) {}

  async *walk(
    root: string,
    ignoreSet: IgnoreSet,
    options: EnumerateOptions = {},
  ): AsyncGenerator<FileCandidate> {
    const absRoot = path.resolve(root);
    const logger = options.logger ?? new ConsoleLogger();
    const runId = options.runId ?? randomUUID();

    yield* this.visit(absRoot, '', { ignoreSet, options, logger, runId });
  }

  private async *visit(
    dir: string,
    relativeDir: string,
    ctx: WalkContext,
  ): AsyncGenerator<FileCandidate> {
    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (relativeDir === '') {
        throw new ScanError(`Cannot read scan root: ${dir}`, { cause: error });
      }
      await ctx.logger.log(
        createEvent(ctx.runId, {
          type: 'DirectorySkipped',
          payload: {
            path: relativeDir,
            error: error instanceof Error ? error.message : String(error),
          },
        }),
      );
      return;
    }

    for (const entry of entries) {
      const relPath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (ctx.ignoreSet.isExcluded(relPath)) continue;
        yield* this.visit(path.join(dir, entry.name), relPath, ctx);
      } else if (entry.isFile()) {
        if (ctx.ignoreSet.isExcluded(relPath)) continue;
        if (ctx.options.skipBinaryExtensions && isBinaryPath(entry.name)) continue;
        yield { path: relPath, absPath: path.join(dir, entry.name) };
      }
    }
  }

  /**
   * Collects {@link walk} into a list sorted by path.
   */
  async enumerate(
    root: string,
    ignoreSet: IgnoreSet,
    options: EnumerateOptions = {},
  ): Promise<FileCandidate[]> {
    const files: FileCandidate[] = [];
    for await (const file of this.walk(root, ignoreSet, options)) {
      files.push(file);
    }
    files.sort((a, b) => a.path.localeCompare(b.path));
    return files;
  }
}

/**
 * Streams candidate files under `root` with the real filesystem, in directory order.
 */
export function walkFiles(
  root: string,
  ignoreSet: IgnoreSet,
  options: EnumerateOptions = {},
): AsyncGenerator<FileCandidate> {
  return new FileEnumerator().walk(root, ignoreSet, options);
}

/**
 * Enumerates candidate files under `root` with the real filesystem.
 */
export function enumerateFiles(
  root: string,
  ignoreSet: IgnoreSet,
  options: EnumerateOptions = {},
): Promise<FileCandidate[]> {
  return new FileEnumerator().enumerate(root, ignoreSet, options);
}
