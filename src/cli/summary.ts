import type { RunSummary } from '../services/pipeline.js';

/**
 * One-line human-readable result of a run, followed by any record errors
 *
 * @example
 * formatSummary(summary)
 * // '2025-09-21 OK: 1 inserted, 0 updated, 0 skipped, 0 errors'
 */
export function formatSummary(summary: RunSummary): string {
  if (!summary.success) {
    return `${summary.date} FAILED: ${summary.error ?? 'unknown error'}`;
  }

  const counts =
    `${summary.inserted} inserted, ${summary.updated} updated, ` +
    `${summary.skipped} skipped, ${summary.errored} errors`;
  const lines = [`${summary.date} OK${summary.force ? ' (forced)' : ''}: ${counts}`];
  for (const error of summary.errors) {
    lines.push(`  - ${error}`);
  }
  return lines.join('\n');
}
