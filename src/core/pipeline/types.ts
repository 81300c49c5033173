// src/core/pipeline/types.ts
import type { PipelineStage, StageFailure } from '../errors.js';
import type { DestinationOutcome, SinkContext } from '../export/types.js';
import type { WriteReport } from '../export/writer.js';
import type { NormalizedRecord, PipelineRecord, Platform, ViralThresholds } from '../types/index.js';
import type { TerminalState } from '../video/state.js';

export interface RunCounts {
  scraped: number;
  normalized: number;
  viral: number;
  resolved: number;
  analyzed: number;
  written: number;
}

export interface DatasetOutcome {
  config: string;
  status: 'scraped' | 'failed';
  datasetId?: string;
  items: number;
}

export interface RunSummary {
  startedAt: string;
  durationMs: number;
  counts: RunCounts;
  failedByStage: Record<PipelineStage, number>;
  datasets: DatasetOutcome[];
  destinations: DestinationOutcome[];
  failures: StageFailure[];
  /** Problems that did not change a record's outcome, such as a failed video archive */
  warnings: string[];
}

/** What the orchestrator needs from a video resolver */
export interface MediaResolver {
  resolve(record: NormalizedRecord, platform: Platform): Promise<TerminalState>;
}

export interface RecordWriter {
  writeAll(records: readonly PipelineRecord[], context: SinkContext): Promise<WriteReport>;
}

export interface OrchestratorOptions {
  thresholds: ViralThresholds;
  concurrency?: number;
  verbose?: boolean;
  /** Suppresses progress lines, for machine-readable output */
  quiet?: boolean;
  now?: () => Date;
}
