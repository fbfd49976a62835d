import { writeResultFile, type OutputFormat } from '@leakscan/shared';
import type { MatchRecord } from '@leakscan/scanner';

/** Column order of the result files. */
export const RESULT_COLUMNS = ['secret', 'file', 'line', 'line_content'] as const;

type ResultRow = Record<(typeof RESULT_COLUMNS)[number], string | number>;

function toRow(match: MatchRecord): ResultRow {
  return {
    secret: match.secret,
    file: match.file,
    line: match.line,
    line_content: match.lineContent,
  };
}

export function toJson(matches: readonly MatchRecord[]): string {
  return JSON.stringify(matches.map(toRow), null, 4) + '\n';
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** RFC 4180: CRLF line breaks, fields quoted only when needed. */
export function toCsv(matches: readonly MatchRecord[]): string {
  const lines = [RESULT_COLUMNS.join(',')];
  for (const match of matches) {
    const row = toRow(match);
    lines.push(RESULT_COLUMNS.map((column) => csvField(row[column])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

const SERIALIZERS: Record<OutputFormat, (matches: readonly MatchRecord[]) => string> = {
  json: toJson,
  csv: toCsv,
};

export interface WriteResultsOptions {
  dir: string;
  basename: string;
  formats: readonly OutputFormat[];
}

/**
 * Writes `<basename>.<format>` for every format and returns the written paths.
 * Writes nothing when there are no matches, leaving earlier result files as they are.
 */
export async function writeResults(
  matches: readonly MatchRecord[],
  options: WriteResultsOptions,
): Promise<string[]> {
  const written: string[] = [];
  if (matches.length === 0) return written;
  for (const format of new Set(options.formats)) {
    written.push(
      await writeResultFile(options.dir, options.basename, format, SERIALIZERS[format](matches)),
    );
  }
  return written;
}
