// src/core/export/s3.ts
import { PutObjectCommand, type S3Client } from '@aws-sdk/client-s3';
import type { PipelineRecord } from '../types/index.js';
import { formatCsv } from './csv.js';
import { formatJson } from './json.js';
import { expandTemplate } from './path.js';
import type { FileFormat, Sink, SinkContext } from './types.js';

const CONTENT_TYPES: Record<FileFormat, string> = {
  json: 'application/json',
  csv: 'text/csv; charset=utf-8',
};

/** One PutObject per write, so the object is either replaced whole or untouched */
export class S3ObjectSink implements Sink {
  readonly type = 's3';
  readonly label: string;

  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly keyTemplate: string,
    private readonly format: FileFormat
  ) {
    this.label = `s3://${bucket}/${keyTemplate}`;
  }

  async write(records: readonly PipelineRecord[], context: SinkContext): Promise<string> {
    const key = expandTemplate(this.keyTemplate, context);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: this.format === 'csv' ? formatCsv(records) : formatJson(records),
        ContentType: CONTENT_TYPES[this.format],
      })
    );
    return `s3://${this.bucket}/${key}`;
  }
}
