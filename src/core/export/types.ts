// src/core/export/types.ts
import type { PipelineRecord } from '../types/index.js';

export type FileFormat = 'json' | 'csv';

export type Destination =
  | { type: 'json'; path: string }
  | { type: 'csv'; path: string }
  | { type: 's3'; bucket: string; key: string; format: FileFormat }
  | { type: 'warehouse'; table: string; mode: 'append' | 'overwrite' };

export type DestinationType = Destination['type'];

/** Values substituted into `{timestamp}` and `{config}` placeholders */
export interface SinkContext {
  runStartedAt: Date;
  configName: string;
}

export interface Sink {
  readonly type: DestinationType;
  readonly label: string;
  /**
   * Writes every record or nothing. Resolves with the final location
   * (file path, object key or table name).
   */
  write(records: readonly PipelineRecord[], context: SinkContext): Promise<string>;
}

export interface DestinationOutcome {
  destination: string;
  type: DestinationType;
  status: 'written' | 'failed';
  rows: number;
  location?: string;
  error?: string;
}

export type OutputValue = string | number | boolean | null;
export type OutputRow = Record<string, OutputValue>;
