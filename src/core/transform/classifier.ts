// src/core/transform/classifier.ts
import { configurationError } from '../errors.js';
import type {
  DerivedMetric,
  Label,
  Metric,
  NormalizedRecord,
  NumericField,
  ViralThresholds,
} from '../types/index.js';

export const NUMERIC_FIELDS: readonly NumericField[] = ['likes', 'views', 'comments', 'shares', 'duration'];
export const DERIVED_METRICS: readonly DerivedMetric[] = ['engagement', 'engagement_rate'];

const ENGAGEMENT_FIELDS: readonly NumericField[] = ['likes', 'comments', 'shares'];

const knownMetrics = new Set<string>([...NUMERIC_FIELDS, ...DERIVED_METRICS]);

function isMetric(value: string): value is Metric {
  return knownMetrics.has(value);
}

export function createThresholds(table: Readonly<Record<string, number>>): ViralThresholds {
  const issues: string[] = [];
  const thresholds: Partial<Record<Metric, number>> = {};

  const pairs = Object.entries(table);
  if (pairs.length === 0) {
    issues.push('at least one threshold is required');
  }

  for (const [metric, value] of pairs) {
    if (!isMetric(metric)) {
      issues.push(`unknown metric "${metric}"`);
      continue;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      issues.push(`threshold for "${metric}" must be a non-negative number`);
      continue;
    }
    thresholds[metric] = value;
  }

  if (issues.length > 0) {
    throw configurationError(
      'Invalid viral thresholds',
      issues,
      `Known metrics are: ${[...NUMERIC_FIELDS, ...DERIVED_METRICS].join(', ')}`
    );
  }

  return Object.freeze(thresholds);
}

/**
 * Labels one record. The result depends only on the record and the thresholds;
 * a metric the record lacks makes it not viral.
 */
export function labelRecord(record: NormalizedRecord, thresholds: ViralThresholds): Label {
  const score = computeScore(record);
  const metrics = Object.keys(thresholds).filter(isMetric);

  const viral =
    metrics.length > 0 &&
    metrics.every(metric => {
      const threshold = thresholds[metric];
      const value = score[metric];
      return threshold !== undefined && value !== undefined && value >= threshold;
    });

  return { viral, score };
}

export function classify<T extends NormalizedRecord>(
  records: readonly T[],
  thresholds: ViralThresholds
): Array<{ record: T; label: Label }> {
  return records.map(record => ({ record, label: labelRecord(record, thresholds) }));
}

export function computeScore(record: NormalizedRecord): Partial<Record<Metric, number>> {
  const score: Partial<Record<Metric, number>> = {};

  for (const field of NUMERIC_FIELDS) {
    const value = toNumber(record[field]);
    if (value !== undefined) {
      score[field] = value;
    }
  }

  const parts = ENGAGEMENT_FIELDS.map(field => score[field]).filter(
    (value): value is number => value !== undefined
  );
  if (parts.length > 0) {
    const engagement = parts.reduce((sum, value) => sum + value, 0);
    score.engagement = engagement;

    const views = score.views;
    if (views !== undefined && views > 0) {
      score.engagement_rate = engagement / views;
    }
  }

  return score;
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}
