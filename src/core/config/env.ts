// src/core/config/env.ts
import dotenv from 'dotenv';
import { ErrorCode, PipelineError } from '../errors.js';
import type { PipelineSettings } from './schema.js';

export interface S3Credentials {
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export interface WarehouseCredentials {
  host: string;
  token: string;
  warehouseId: string;
  catalog: string;
  schema: string;
}

export interface Credentials {
  apifyToken?: string;
  geminiApiKey?: string;
  s3?: S3Credentials;
  warehouse?: WarehouseCredentials;
  instagramSessionFile?: string;
}

type Env = Readonly<Record<string, string | undefined>>;

/** Loads `.env` from the working directory; variables already set win. */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : {});
}

export function readCredentials(env: Env = process.env): Credentials {
  const value = (key: string): string | undefined => {
    const raw = env[key]?.trim();
    return raw ? raw : undefined;
  };

  const credentials: Credentials = {};

  const apifyToken = value('APIFY_API_TOKEN');
  if (apifyToken) credentials.apifyToken = apifyToken;

  const geminiApiKey = value('GEMINI_API_KEY');
  if (geminiApiKey) credentials.geminiApiKey = geminiApiKey;

  const region = value('S3_REGION');
  if (region) {
    credentials.s3 = {
      region,
      endpoint: value('S3_ENDPOINT'),
      accessKeyId: value('S3_ACCESS_KEY'),
      secretAccessKey: value('S3_SECRET_KEY'),
    };
  }

  const host = value('DATABRICKS_HOST');
  const token = value('DATABRICKS_TOKEN');
  const warehouseId = value('DATABRICKS_WAREHOUSE_ID');
  if (host && token && warehouseId) {
    credentials.warehouse = {
      host,
      token,
      warehouseId,
      catalog: value('DATABRICKS_CATALOG') ?? 'main',
      schema: value('DATABRICKS_SCHEMA') ?? 'viral_analytics',
    };
  }

  const sessionFile = value('INSTAGRAM_SESSION_FILE');
  if (sessionFile) credentials.instagramSessionFile = sessionFile;

  return credentials;
}

/**
 * Lists the variables an enabled stage needs but the environment lacks.
 * Called before the first external request of a run.
 */
export function missingCredentials(settings: PipelineSettings, credentials: Credentials): string[] {
  const missing: string[] = [];

  if (settings.configs.length > 0 && !credentials.apifyToken) {
    missing.push('APIFY_API_TOKEN (scraping)');
  }

  const hasContent = settings.configs.some(config => config.contentType === 'content');
  if (hasContent && settings.stages.download && settings.stages.analysis && !credentials.geminiApiKey) {
    missing.push('GEMINI_API_KEY (analysis stage)');
  }

  const needsS3 =
    (hasContent && settings.stages.download && settings.stages.archiveVideos) ||
    (settings.stages.write && settings.outputs.some(output => output.type === 's3'));
  if (needsS3 && !credentials.s3) {
    missing.push('S3_REGION (object storage)');
  }

  if (settings.stages.write && settings.outputs.some(output => output.type === 'warehouse') && !credentials.warehouse) {
    missing.push('DATABRICKS_HOST, DATABRICKS_TOKEN and DATABRICKS_WAREHOUSE_ID (warehouse output)');
  }

  return missing;
}

export function assertCredentials(settings: PipelineSettings, credentials: Credentials): void {
  const missing = missingCredentials(settings, credentials);
  if (missing.length > 0) {
    throw new PipelineError(
      ErrorCode.MISSING_CREDENTIALS,
      `Missing credentials:\n  - ${missing.join('\n  - ')}`,
      false,
      'Set them in the environment or in a .env file in the working directory',
      { missing }
    );
  }
}
