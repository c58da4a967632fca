/**
 * Migration Report Formatter
 *
 * Renders a migration report as markdown-ish plain text.
 */

import { ConnectorError } from '@adshift/core';
import { toMigrationError } from '../errors/index.js';
import type { MigrationReport } from '../migration/index.js';
import { listWithOverflow } from './utils.js';

export interface ReportFormatOptions {
  /** Entries shown per section (default: 20) */
  maxEntries?: number;
  /** Include the per-record outcome list (default: true) */
  includeOutcomes?: boolean;
}

export function formatMigrationReport(
  report: MigrationReport,
  options: ReportFormatOptions = {}
): string {
  const maxEntries = options.maxEntries ?? 20;
  const lines: string[] = [];

  lines.push('## Migration Report');
  lines.push('');

  lines.push('### Summary');
  lines.push(`- Successes: ${report.successes.length}`);
  lines.push(`- Warnings: ${report.warnings.length}`);
  lines.push(`- Failures: ${report.failures.length}`);
  lines.push('');

  if (report.successes.length > 0) {
    lines.push(`### Successes (${report.successes.length})`);
    lines.push(...listWithOverflow([...report.successes], maxEntries));
    lines.push('');
  }

  if (report.warnings.length > 0) {
    lines.push(`### Warnings (${report.warnings.length})`);
    lines.push(...listWithOverflow([...report.warnings], maxEntries));
    lines.push('');
  }

  if (report.failures.length > 0) {
    lines.push(`### Failures (${report.failures.length})`);
    lines.push(
      ...listWithOverflow(
        report.failures.map((f) => `${f.message} (${f.errorKind})`),
        maxEntries
      )
    );
    lines.push('');
  }

  if (options.includeOutcomes !== false && report.outcomes.length > 0) {
    const outcomes = [...report.outcomes].sort((a, b) => a.recordIndex - b.recordIndex);
    lines.push('### Campaigns');
    lines.push(
      ...listWithOverflow(
        outcomes.map((o) => {
          const detail =
            o.status === 'failure'
              ? `failed at ${o.failedStage ?? 'START'}: ${o.errorKind ?? 'UnexpectedError'}` +
                (o.suggestion ? `. Suggested action: ${o.suggestion}` : '')
              : `${o.status}, created as ${o.targetId ?? '?'}`;
          return `#${o.recordIndex + 1} ${o.campaignName}: ${detail}`;
        }),
        maxEntries
      )
    );
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

/**
 * Render an error that stopped a whole migration, such as an unsupported
 * platform, a broken schema or an unreadable upload
 */
export function formatMigrationError(error: unknown): string {
  const migrationError =
    error instanceof ConnectorError
      ? toMigrationError(error, 'FETCH_FAILED', { connectorCode: error.code })
      : toMigrationError(error);
  return migrationError.toActionableMessage();
}
