// src/core/pipeline/__tests__/summary.test.ts
import { describe, it, expect, jest } from '@jest/globals';
import { ErrorCode } from '../../errors.js';
import { allDestinationsFailed, formatSummary, printSummary } from '../summary.js';
import type { RunSummary } from '../types.js';

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    startedAt: '2024-05-01T00:00:00.000Z',
    durationMs: 12345,
    counts: { scraped: 3, normalized: 3, viral: 1, resolved: 1, analyzed: 1, written: 3 },
    failedByStage: { scrape: 0, resolve: 1, analyze: 0, write: 0 },
    datasets: [
      { config: 'cat_reels', status: 'scraped', datasetId: 'ds-1', items: 3 },
      { config: 'brand_ads', status: 'failed', items: 0 },
    ],
    destinations: [{ destination: 'json:out.json', type: 'json', status: 'written', rows: 3, location: 'out.json' }],
    failures: [
      {
        stage: 'resolve',
        code: ErrorCode.PERMANENT_RESOLUTION_FAILURE,
        message: 'direct: HTTP 403; fallback: no fallback resolver for instagram',
        retryable: false,
        subject: 'B2',
      },
    ],
    warnings: [],
    ...overrides,
  };
}

describe('formatSummary', () => {
  it('lists counts, datasets, outputs and failures', () => {
    expect(formatSummary(summary())).toEqual([
      '━'.repeat(50),
      'Summary: 3 scraped, 3 normalized, 1 viral, 1 resolved, 1 analyzed, 3 written, 12.3s',
      'Failed: scrape 0, resolve 1, analyze 0, write 0',
      '',
      'Datasets:',
      '  - cat_reels: ds-1 (3 items)',
      '',
      'Outputs:',
      '  ✓ json:out.json -> out.json (3 rows)',
      '',
      'Failures:',
      '  - [resolve] B2: direct: HTTP 403; fallback: no fallback resolver for instagram',
    ]);
  });

  it('shows failed outputs and warnings', () => {
    const lines = formatSummary(
      summary({
        datasets: [],
        failures: [],
        destinations: [{ destination: 'csv:out.csv', type: 'csv', status: 'failed', rows: 0, error: 'disk full' }],
        warnings: ['Archiving A1 failed: AccessDenied'],
      })
    );

    expect(lines.slice(3)).toEqual([
      '',
      'Outputs:',
      '  ✗ csv:out.csv: disk full',
      '',
      'Warnings:',
      '  - Archiving A1 failed: AccessDenied',
    ]);
  });

  it('prints the box to stdout', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    printSummary(summary());

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0]).startsWith('\n━━━')).toBe(true);
    log.mockRestore();
  });
});

describe('allDestinationsFailed', () => {
  it('is true only when every configured output failed', () => {
    const failed = { destination: 'csv:a', type: 'csv' as const, status: 'failed' as const, rows: 0 };
    const ok = { destination: 'json:b', type: 'json' as const, status: 'written' as const, rows: 1 };

    expect(allDestinationsFailed(summary({ destinations: [failed] }))).toBe(true);
    expect(allDestinationsFailed(summary({ destinations: [failed, ok] }))).toBe(false);
    expect(allDestinationsFailed(summary({ destinations: [] }))).toBe(false);
  });
});
