// src/core/export/json.ts
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { jsonValueSchema } from '../config/schema.js';
import { ErrorCode, PipelineError } from '../errors.js';
import { CANONICAL_FIELDS, type PipelineRecord } from '../types/index.js';
import { expandTemplate, writeFileAtomic } from './path.js';
import type { Sink, SinkContext } from './types.js';

const metricSchema = z.enum(['likes', 'views', 'comments', 'shares', 'duration', 'engagement', 'engagement_rate']);

const pipelineRecordSchema: z.ZodType<PipelineRecord> = z.object({
  source: z.object({
    configName: z.string(),
    platform: z.enum(['instagram', 'tiktok', 'youtube', 'facebook', 'unknown']),
    contentType: z.enum(['ad', 'content']),
    datasetId: z.string(),
    ingestedAt: z.string(),
  }),
  fields: z.record(z.enum(CANONICAL_FIELDS), jsonValueSchema),
  label: z
    .object({
      viral: z.boolean(),
      score: z.record(metricSchema, z.number()),
    })
    .optional(),
  video: z
    .discriminatedUnion('status', [
      z.object({
        status: z.literal('resolved'),
        method: z.enum(['direct', 'fallback']),
        sourceUrl: z.string(),
        contentType: z.string(),
        byteLength: z.number(),
        storageKey: z.string().optional(),
      }),
      z.object({ status: z.literal('unresolved'), reason: z.string(), attempts: z.number() }),
    ])
    .optional(),
  analysis: z
    .discriminatedUnion('status', [
      z.object({
        status: z.literal('analyzed'),
        result: z.object({
          model: z.string(),
          videoAnalysis: z.string(),
          viralityAnalysis: z.string().optional(),
        }),
      }),
      z.object({ status: z.literal('failed'), reason: z.string(), retryable: z.boolean() }),
    ])
    .optional(),
});

export function formatJson(records: readonly PipelineRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`;
}

/** Parses a JSON sink file back into records */
export function parseJsonRecords(content: string): PipelineRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new PipelineError(
      ErrorCode.PARTIAL_RECORD_FAILURE,
      `Not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = z.array(pipelineRecordSchema).safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new PipelineError(
      ErrorCode.PARTIAL_RECORD_FAILURE,
      `Not a record array: ${first.path.join('.') || '(root)'}: ${first.message}`
    );
  }
  return parsed.data;
}

export async function readJsonRecords(filePath: string): Promise<PipelineRecord[]> {
  return parseJsonRecords(await readFile(filePath, 'utf-8'));
}

export class JsonFileSink implements Sink {
  readonly type = 'json';
  readonly label: string;

  constructor(private readonly pathTemplate: string) {
    this.label = `json:${pathTemplate}`;
  }

  async write(records: readonly PipelineRecord[], context: SinkContext): Promise<string> {
    const filePath = expandTemplate(this.pathTemplate, context);
    await writeFileAtomic(filePath, formatJson(records));
    return filePath;
  }
}
