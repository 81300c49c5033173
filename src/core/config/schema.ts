// src/core/config/schema.ts
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { configurationError, PipelineError } from '../errors.js';
import { createColumnMapping, type MappingTable } from '../transform/mapper.js';
import { createThresholds } from '../transform/classifier.js';
import type { Destination } from '../export/types.js';
import type {
  ColumnMapping,
  JsonObject,
  JsonValue,
  RetryPolicy,
  ScrapingConfig,
  StageFlags,
  ViralThresholds,
} from '../types/index.js';
import { BUILTIN_MAPPINGS } from './mappings.js';
import {
  DEFAULT_ACTOR_WAIT_SECS,
  DEFAULT_CONCURRENCY,
  DEFAULT_DOWNLOAD_TIMEOUT,
  DEFAULT_RETRY,
  DEFAULT_TIMEOUT,
  DEFAULT_VIDEO_PREFIX,
  GEMINI_DEFAULT_MODEL,
} from './constants.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const mappingTableSchema = z.record(z.string());

const scrapingConfigSchema = z
  .object({
    name: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "_" or "-"'),
    actorId: z.string().min(1),
    platform: z.enum(['instagram', 'tiktok', 'youtube', 'facebook', 'unknown']).default('unknown'),
    contentType: z.enum(['ad', 'content']),
    input: z.record(jsonValueSchema).default({}),
    mapping: z.union([z.string().min(1), mappingTableSchema]),
    datasetId: z.string().min(1).optional(),
  })
  .strict();

const destinationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('json'), path: z.string().min(1) }).strict(),
  z.object({ type: z.literal('csv'), path: z.string().min(1) }).strict(),
  z
    .object({
      type: z.literal('s3'),
      bucket: z.string().min(1),
      key: z.string().min(1),
      format: z.enum(['json', 'csv']).default('json'),
    })
    .strict(),
  z
    .object({
      type: z.literal('warehouse'),
      table: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain table identifier'),
      mode: z.enum(['append', 'overwrite']).default('append'),
    })
    .strict(),
]);

export const pipelineConfigSchema = z
  .object({
    configs: z.array(scrapingConfigSchema).min(1, 'at least one scraping config is required'),
    mappings: z.record(mappingTableSchema).default({}),
    thresholds: z.record(z.number()),
    stages: z
      .object({
        download: z.boolean().default(true),
        analysis: z.boolean().default(true),
        archiveVideos: z.boolean().default(false),
        write: z.boolean().default(true),
      })
      .strict()
      .default({}),
    outputs: z.array(destinationSchema).default([]),
    concurrency: z.number().int().min(1).max(32).default(DEFAULT_CONCURRENCY),
    retry: z
      .object({
        attempts: z.number().int().min(1).max(10).default(DEFAULT_RETRY.attempts),
        baseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY.baseDelayMs),
      })
      .strict()
      .default({}),
    timeouts: z
      .object({
        requestMs: z.number().int().positive().default(DEFAULT_TIMEOUT),
        downloadMs: z.number().int().positive().default(DEFAULT_DOWNLOAD_TIMEOUT),
        actorWaitSecs: z.number().int().positive().default(DEFAULT_ACTOR_WAIT_SECS),
      })
      .strict()
      .default({}),
    videoStorage: z
      .object({
        bucket: z.string().min(1),
        prefix: z.string().default(DEFAULT_VIDEO_PREFIX),
      })
      .strict()
      .optional(),
    analysis: z
      .object({
        model: z.string().min(1).default(GEMINI_DEFAULT_MODEL),
        explainVirality: z.boolean().default(false),
      })
      .strict()
      .default({}),
    fallback: z
      .object({
        enabled: z.boolean().default(true),
        sessionFile: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
type ParsedPipelineConfig = z.output<typeof pipelineConfigSchema>;

export interface Timeouts {
  requestMs: number;
  downloadMs: number;
  actorWaitSecs: number;
}

export interface PipelineSettings {
  configs: ScrapingConfig[];
  /** Mapping tables declared in the file, by name */
  mappings: Readonly<Record<string, MappingTable>>;
  thresholds: ViralThresholds;
  stages: StageFlags;
  outputs: Destination[];
  concurrency: number;
  retry: RetryPolicy;
  timeouts: Timeouts;
  videoStorage?: { bucket: string; prefix: string };
  analysis: { model: string; explainVirality: boolean };
  fallback: { enabled: boolean; sessionFile?: string };
}

/**
 * Validates a parsed pipeline file and resolves mapping names and thresholds.
 * Every problem found is reported in one CONFIGURATION_ERROR.
 */
export function parsePipelineConfig(raw: unknown): PipelineSettings {
  const parsed = pipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw configurationError(
      'Invalid pipeline configuration',
      parsed.error.issues.map(issue => `${formatPath(issue.path)}: ${issue.message}`),
      'Run `reel-etl validate --config <file>` after fixing the listed fields'
    );
  }

  return resolveSettings(parsed.data);
}

export async function loadPipelineConfig(filePath: string): Promise<PipelineSettings> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw configurationError(`Cannot read pipeline configuration ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw configurationError(`Pipeline configuration ${filePath} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return parsePipelineConfig(raw);
}

function resolveSettings(data: ParsedPipelineConfig): PipelineSettings {
  const issues: string[] = [];
  const seen = new Set<string>();
  const configs: ScrapingConfig[] = [];

  data.configs.forEach((config, index) => {
    if (seen.has(config.name)) {
      issues.push(`configs.${index}.name: duplicate config name "${config.name}"`);
    }
    seen.add(config.name);

    const mapping = collect(issues, `configs.${index}.mapping`, () =>
      resolveMapping(config.name, config.mapping, data.mappings)
    );
    if (!mapping) {
      return;
    }

    configs.push(
      Object.freeze({
        name: config.name,
        actorId: config.actorId,
        platform: config.platform,
        contentType: config.contentType,
        input: deepFreeze(config.input),
        mapping,
        ...(config.datasetId ? { datasetId: config.datasetId } : {}),
      })
    );
  });

  const thresholds = collect(issues, 'thresholds', () => createThresholds(data.thresholds));

  if (data.stages.archiveVideos && !data.videoStorage) {
    issues.push('stages.archiveVideos: requires a videoStorage bucket');
  }

  if (issues.length > 0 || !thresholds) {
    throw configurationError('Invalid pipeline configuration', issues);
  }

  return {
    configs,
    mappings: data.mappings,
    thresholds,
    stages: data.stages,
    outputs: data.outputs,
    concurrency: data.concurrency,
    retry: data.retry,
    timeouts: data.timeouts,
    ...(data.videoStorage ? { videoStorage: data.videoStorage } : {}),
    analysis: data.analysis,
    fallback: data.fallback,
  };
}

/** Looks a mapping up by name, in the file first and then among the built-ins */
export function mappingByName(settings: PipelineSettings, name: string): ColumnMapping {
  return resolveMapping(name, name, settings.mappings);
}

function resolveMapping(
  configName: string,
  mapping: string | MappingTable,
  declared: Readonly<Record<string, MappingTable>>
): ColumnMapping {
  if (typeof mapping !== 'string') {
    return createColumnMapping(`${configName}_inline`, mapping);
  }

  const table = declared[mapping] ?? BUILTIN_MAPPINGS[mapping];
  if (!table) {
    const known = [...new Set([...Object.keys(declared), ...Object.keys(BUILTIN_MAPPINGS)])];
    throw configurationError(`unknown mapping "${mapping}" (known: ${known.join(', ')})`);
  }
  return createColumnMapping(mapping, table);
}

/** Runs a builder, turning its configuration error into issues under `path` */
function collect<T>(issues: string[], path: string, build: () => T): T | undefined {
  try {
    return build();
  } catch (error) {
    if (!(error instanceof PipelineError)) {
      throw error;
    }
    const nested = error.context?.issues;
    if (Array.isArray(nested) && nested.length > 0) {
      for (const issue of nested) {
        issues.push(`${path}: ${String(issue)}`);
      }
    } else {
      issues.push(`${path}: ${error.message}`);
    }
    return undefined;
  }
}

function deepFreeze(value: JsonObject): Readonly<JsonObject> {
  for (const nested of Object.values(value)) {
    freezeValue(nested);
  }
  return Object.freeze(value);
}

function freezeValue(value: JsonValue): void {
  if (value === null || typeof value !== 'object') {
    return;
  }
  const children: JsonValue[] = Array.isArray(value) ? value : Object.values(value);
  children.forEach(freezeValue);
  Object.freeze(value);
}

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? path.join('.') : '(root)';
}
