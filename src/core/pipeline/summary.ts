// src/core/pipeline/summary.ts
import type { RunSummary } from './types.js';

export function formatSummary(summary: RunSummary): string[] {
  const { counts, failedByStage } = summary;
  const lines = [
    '━'.repeat(50),
    `Summary: ${counts.scraped} scraped, ${counts.normalized} normalized, ${counts.viral} viral, ` +
      `${counts.resolved} resolved, ${counts.analyzed} analyzed, ${counts.written} written, ` +
      `${(summary.durationMs / 1000).toFixed(1)}s`,
    `Failed: scrape ${failedByStage.scrape}, resolve ${failedByStage.resolve}, ` +
      `analyze ${failedByStage.analyze}, write ${failedByStage.write}`,
  ];

  const datasets = summary.datasets.filter(dataset => dataset.datasetId);
  if (datasets.length > 0) {
    lines.push('', 'Datasets:');
    datasets.forEach(({ config, datasetId, items }) => lines.push(`  - ${config}: ${datasetId} (${items} items)`));
  }

  if (summary.destinations.length > 0) {
    lines.push('', 'Outputs:');
    for (const outcome of summary.destinations) {
      lines.push(
        outcome.status === 'written'
          ? `  ✓ ${outcome.destination} -> ${outcome.location ?? ''} (${outcome.rows} rows)`
          : `  ✗ ${outcome.destination}: ${outcome.error ?? 'unknown error'}`
      );
    }
  }

  if (summary.failures.length > 0) {
    lines.push('', 'Failures:');
    summary.failures.forEach(({ stage, subject, message }) => lines.push(`  - [${stage}] ${subject}: ${message}`));
  }

  if (summary.warnings.length > 0) {
    lines.push('', 'Warnings:');
    summary.warnings.forEach(warning => lines.push(`  - ${warning}`));
  }

  return lines;
}

export function printSummary(summary: RunSummary): void {
  console.log('\n' + formatSummary(summary).join('\n'));
}

/** True when outputs were configured and none of them could be written */
export function allDestinationsFailed(summary: RunSummary): boolean {
  return summary.destinations.length > 0 && summary.destinations.every(outcome => outcome.status === 'failed');
}
