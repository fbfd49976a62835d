import pc from 'picocolors';
import type { ScanReport, SkipReason } from '@leakscan/scanner';
import { formatTable } from './table';

export interface RuleInfo {
  id: string;
  pattern?: string;
  description?: string;
}

const REASON_LABELS: Record<SkipReason, string> = {
  decode: 'not valid text',
  permission: 'permission denied',
  io: 'read error',
  'resource-exhausted': 'too many open files',
};

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderScan(report: ScanReport, savedPaths: string[] = []): void {
    if (this.isJson) {
      console.log(JSON.stringify({ ...report, savedPaths }, null, 2));
      return;
    }

    console.log(pc.bold('Skipped files/folders:'));
    report.ignoreRules.forEach((rule) => console.log(`  - ${rule}`));

    if (report.skipped.length > 0) {
      console.log(pc.yellow(`\nCould not scan ${report.skipped.length} file(s):`));
      report.skipped.forEach((s) =>
        console.log(`  - ${s.file} (${REASON_LABELS[s.reason]})`),
      );
    }

    if (report.matches.length === 0) {
      console.log(`\n${pc.green('No secrets found.')}`);
    } else {
      console.log(pc.red(`\nFound ${report.matches.length} potential secret(s):`));
      console.log(
        formatTable(
          report.matches.map((m) => ({
            secret: m.secret,
            file: m.file,
            line: m.line,
            preview: m.lineContent,
          })),
          { head: ['Secret', 'File', 'Line', 'Preview'] },
        ),
      );
    }

    console.log(
      pc.gray(
        `\nScanned ${report.stats.filesScanned} of ${report.stats.filesEnumerated} file(s) in ${report.stats.durationMs}ms.`,
      ),
    );

    if (savedPaths.length > 0) {
      console.log(pc.bold('\nResults saved to:'));
      savedPaths.forEach((p) => console.log(`  - ${p}`));
    }
  }

  renderRules(rules: RuleInfo[]): void {
    if (this.isJson) {
      console.log(JSON.stringify(rules, null, 2));
      return;
    }
    console.log(
      formatTable(
        rules.map((r) => ({
          id: r.id,
          pattern: r.pattern ?? '',
          description: r.description ?? '',
        })),
        { head: ['Id', 'Pattern', 'Description'] },
      ),
    );
  }

  /** Progress messages; suppressed in JSON mode. */
  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }
}
