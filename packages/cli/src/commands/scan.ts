import { Command, InvalidArgumentError } from 'commander';
import path from 'path';
import { ConfigLoader, runScan } from '@leakscan/core';
import {
  ConsoleLogger,
  JsonlLogger,
  OutputFormatSchema,
  type Config,
  type ConfigInput,
  type OutputFormat,
} from '@leakscan/shared';
import { OutputRenderer, writeResults } from '../output';
import type { GlobalOptions } from '../program';

export interface ScanCommandOptions {
  concurrency?: number;
  exclude?: string[];
  ignoreFile?: string;
  format?: OutputFormat[];
  outputDir?: string;
  save: boolean;
  logFile?: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseFormats(value: string): OutputFormat[] {
  const formats: OutputFormat[] = [];
  for (const part of value.split(',').map((s) => s.trim())) {
    if (!part) continue;
    const result = OutputFormatSchema.safeParse(part);
    if (!result.success) {
      throw new InvalidArgumentError(`Unknown format "${part}". Use json or csv.`);
    }
    formats.push(result.data);
  }
  return formats;
}

/**
 * Maps scan flags onto config keys. Paths given on the command line are
 * resolved against the working directory.
 */
export function buildConfigFlags(options: ScanCommandOptions): ConfigInput {
  const flags: ConfigInput = {};
  if (options.concurrency !== undefined) {
    flags.scan = { concurrency: options.concurrency };
  }
  if (options.ignoreFile) {
    flags.ignore = { file: path.resolve(options.ignoreFile) };
  }
  if (options.outputDir || options.format) {
    flags.output = {
      dir: options.outputDir ? path.resolve(options.outputDir) : undefined,
      formats: options.format,
    };
  }
  return flags;
}

/** `--exclude` adds to the configured patterns instead of replacing them. */
export function withExcludes(config: Config, exclude: readonly string[]): Config {
  if (exclude.length === 0) return config;
  return {
    ...config,
    ignore: { ...config.ignore, patterns: [...config.ignore.patterns, ...exclude] },
  };
}

export function registerScanCommand(program: Command) {
  program
    .command('scan')
    .argument('[dir]', 'Directory to scan', '.')
    .description('Scan a directory tree for leaked credentials')
    .option('--concurrency <n>', 'Files scanned at once (batch size)', parsePositiveInt)
    .option('--exclude <pattern...>', 'Additional ignore rules')
    .option('--ignore-file <path>', 'Ignore source to read instead of <dir>/.gitignore')
    .option('--format <list>', 'Result file formats, comma separated (json,csv)', parseFormats)
    .option('--output-dir <dir>', 'Directory for result files')
    .option('--no-save', 'Do not write result files')
    .option('--log-file <path>', 'Append scan events as JSON lines to this file')
    .action(async (dir: string, options: ScanCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);
      const root = path.resolve(dir);

      const config = withExcludes(
        ConfigLoader.load({
          configPath: globalOpts.config,
          flags: buildConfigFlags(options),
          cwd: root,
        }),
        options.exclude ?? [],
      );

      const jsonlLogger = options.logFile ? new JsonlLogger(path.resolve(options.logFile)) : undefined;
      const logger = jsonlLogger ?? new ConsoleLogger({ verbose: !!globalOpts.verbose });

      if (globalOpts.verbose) renderer.log(`Scanning ${root}`);

      try {
        const report = await runScan({ root, config, logger });
        const savedPaths = options.save
          ? await writeResults(report.matches, {
              dir: path.resolve(root, config.output.dir),
              basename: config.output.basename,
              formats: config.output.formats,
            })
          : [];
        renderer.renderScan(report, savedPaths);
      } finally {
        await jsonlLogger?.flush();
      }
    });
}
