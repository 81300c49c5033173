// src/core/export/rows.ts
import { CANONICAL_FIELDS, type JsonValue, type PipelineRecord } from '../types/index.js';
import type { OutputRow, OutputValue } from './types.js';

export type ColumnKind = 'string' | 'number' | 'boolean';

const NUMERIC_COLUMNS = new Set<string>(['likes', 'views', 'comments', 'shares', 'duration']);

/**
 * Flat column layout shared by CSV files and warehouse tables.
 * Every row has every column, so headers and table schemas never drift.
 */
export const OUTPUT_COLUMNS: ReadonlyArray<readonly [name: string, kind: ColumnKind]> = [
  ...CANONICAL_FIELDS.map(field => [field, NUMERIC_COLUMNS.has(field) ? 'number' : 'string'] as const),
  ['viral', 'boolean'],
  ['config_name', 'string'],
  ['platform', 'string'],
  ['content_type', 'string'],
  ['dataset_id', 'string'],
  ['ingested_at', 'string'],
  ['video_status', 'string'],
  ['resolution_method', 'string'],
  ['video_key', 'string'],
  ['analysis_status', 'string'],
  ['video_analysis', 'string'],
  ['virality_analysis', 'string'],
  ['analysis_error', 'string'],
];

export function toOutputRow(record: PipelineRecord): OutputRow {
  const row: OutputRow = {};

  for (const field of CANONICAL_FIELDS) {
    const value = record.fields[field];
    row[field] = NUMERIC_COLUMNS.has(field) ? toNumberCell(value) : toCell(value);
  }

  row.viral = record.label ? record.label.viral : null;
  row.config_name = record.source.configName;
  row.platform = record.source.platform;
  row.content_type = record.source.contentType;
  row.dataset_id = record.source.datasetId;
  row.ingested_at = record.source.ingestedAt;

  const video = record.video;
  row.video_status = video ? video.status : null;
  row.resolution_method = video?.status === 'resolved' ? video.method : null;
  row.video_key = video?.status === 'resolved' ? video.storageKey ?? null : null;

  const analysis = record.analysis;
  row.analysis_status = analysis ? analysis.status : null;
  row.video_analysis = analysis?.status === 'analyzed' ? analysis.result.videoAnalysis : null;
  row.virality_analysis = analysis?.status === 'analyzed' ? analysis.result.viralityAnalysis ?? null : null;
  row.analysis_error =
    analysis?.status === 'failed' ? analysis.reason : video?.status === 'unresolved' ? video.reason : null;

  return row;
}

function toCell(value: JsonValue | undefined): OutputValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return typeof value === 'string' ? value : String(value);
}

function toNumberCell(value: JsonValue | undefined): OutputValue {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0 && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}
