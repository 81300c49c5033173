// src/core/export/writer.ts
import type { S3Client } from '@aws-sdk/client-s3';
import { configurationError, ErrorCode, PipelineError, toFailure, type StageFailure } from '../errors.js';
import type { WarehouseCredentials } from '../config/env.js';
import type { PipelineRecord } from '../types/index.js';
import { CsvFileSink } from './csv.js';
import { JsonFileSink } from './json.js';
import { S3ObjectSink } from './s3.js';
import type { Destination, DestinationOutcome, Sink, SinkContext } from './types.js';
import { DatabricksWarehouseSink } from './warehouse.js';

export interface SinkDependencies {
  s3Client?: S3Client;
  warehouse?: WarehouseCredentials;
  requestTimeoutMs?: number;
  verbose?: boolean;
}

export function createSink(destination: Destination, deps: SinkDependencies = {}): Sink {
  switch (destination.type) {
    case 'json':
      return new JsonFileSink(destination.path);
    case 'csv':
      return new CsvFileSink(destination.path);
    case 's3':
      if (!deps.s3Client) {
        throw configurationError(`Output s3://${destination.bucket}/${destination.key} needs S3_REGION`);
      }
      return new S3ObjectSink(deps.s3Client, destination.bucket, destination.key, destination.format);
    case 'warehouse':
      if (!deps.warehouse) {
        throw configurationError(`Output table ${destination.table} needs Databricks credentials`);
      }
      return new DatabricksWarehouseSink(
        { ...deps.warehouse, requestTimeoutMs: deps.requestTimeoutMs, verbose: deps.verbose },
        destination.table,
        destination.mode
      );
  }
}

export interface WriteReport {
  outcomes: DestinationOutcome[];
  failures: StageFailure[];
}

/**
 * Writes the finished batch to each destination in turn. A failing
 * destination is reported and the rest are still written.
 */
export class SinkWriter {
  constructor(
    private readonly sinks: readonly Sink[],
    private readonly options: { verbose?: boolean } = {}
  ) {}

  async writeAll(records: readonly PipelineRecord[], context: SinkContext): Promise<WriteReport> {
    const outcomes: DestinationOutcome[] = [];
    const failures: StageFailure[] = [];

    for (const sink of this.sinks) {
      try {
        const location = await sink.write(records, context);
        outcomes.push({ destination: sink.label, type: sink.type, status: 'written', rows: records.length, location });
        this.log(`✓ ${sink.label} -> ${location} (${records.length} rows)`);
      } catch (error) {
        const failure = toFailure(toSinkError(error, sink), 'write', sink.label);
        failures.push(failure);
        outcomes.push({ destination: sink.label, type: sink.type, status: 'failed', rows: 0, error: failure.message });
        this.log(`✗ ${sink.label}: ${failure.message}`);
      }
    }

    return { outcomes, failures };
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`[Sink] ${message}`);
    }
  }
}

function toSinkError(error: unknown, sink: Sink): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError(ErrorCode.SINK_WRITE_FAILED, `Writing ${sink.label} failed: ${message}`);
}
