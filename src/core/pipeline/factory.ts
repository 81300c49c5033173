// src/core/pipeline/factory.ts
import { GeminiContentAnalyzer } from '../analyze/gemini.js';
import { getDefaultSessionFile } from '../config/app-dirs.js';
import { assertCredentials, type Credentials } from '../config/env.js';
import type { PipelineSettings } from '../config/schema.js';
import { configurationError, ErrorCode, PipelineError } from '../errors.js';
import { createSink, SinkWriter } from '../export/writer.js';
import { ApifyScrapingClient } from '../scrape/apify-client.js';
import type { ScrapingConfig, StageFlags } from '../types/index.js';
import { createS3Client, S3VideoArchiver } from '../video/archiver.js';
import { DirectFetcher } from '../video/direct-fetcher.js';
import { InstagramSessionResolver } from '../video/instagram/session-resolver.js';
import { VideoResolver } from '../video/resolver.js';
import { PipelineOrchestrator, type PipelineDependencies } from './orchestrator.js';

export interface StageOverrides {
  skipDownload?: boolean;
  skipAnalysis?: boolean;
  noWrite?: boolean;
}

export interface PipelineFactoryOptions {
  verbose?: boolean;
  quiet?: boolean;
  concurrency?: number;
}

export function resolveStages(stages: StageFlags, overrides: StageOverrides = {}): StageFlags {
  return {
    download: stages.download && !overrides.skipDownload,
    analysis: stages.analysis && !overrides.skipAnalysis,
    archiveVideos: stages.archiveVideos && !overrides.skipDownload,
    write: stages.write && !overrides.noWrite,
  };
}

/** Picks configs by name, in the order they appear in the file */
export function selectConfigs(settings: PipelineSettings, only?: readonly string[]): ScrapingConfig[] {
  if (!only || only.length === 0) {
    return settings.configs;
  }

  const known = new Set(settings.configs.map(config => config.name));
  const unknown = only.filter(name => !known.has(name));
  if (unknown.length > 0) {
    throw configurationError(
      'Unknown config name',
      unknown.map(name => `${name} (known: ${[...known].join(', ')})`)
    );
  }

  const wanted = new Set(only);
  return settings.configs.filter(config => wanted.has(config.name));
}

/**
 * Builds the orchestrator for a run. Credentials and outputs are checked here,
 * so a bad setup fails before the first request goes out.
 */
export function createPipeline(
  settings: PipelineSettings,
  credentials: Credentials,
  stages: StageFlags,
  options: PipelineFactoryOptions = {}
): PipelineOrchestrator {
  const effective: PipelineSettings = { ...settings, stages };
  assertCredentials(effective, credentials);

  const token = credentials.apifyToken;
  if (!token) {
    throw new PipelineError(ErrorCode.MISSING_CREDENTIALS, 'APIFY_API_TOKEN is not set');
  }

  const { verbose } = options;
  const hasContent = settings.configs.some(config => config.contentType === 'content');
  const s3Client = credentials.s3 ? createS3Client(credentials.s3) : undefined;

  const deps: PipelineDependencies = {
    scraper: new ApifyScrapingClient({
      token,
      requestTimeoutMs: settings.timeouts.requestMs,
      actorWaitSecs: settings.timeouts.actorWaitSecs,
      retry: settings.retry,
      verbose,
    }),
  };

  if (stages.download && hasContent) {
    deps.resolver = new VideoResolver({
      fetcher: new DirectFetcher(settings.timeouts.downloadMs),
      fallbacks: settings.fallback.enabled
        ? {
            instagram: new InstagramSessionResolver({
              sessionFile:
                settings.fallback.sessionFile ?? credentials.instagramSessionFile ?? getDefaultSessionFile(),
              timeoutMs: settings.timeouts.requestMs,
              verbose,
            }),
          }
        : {},
      retry: settings.retry,
      verbose,
    });

    if (stages.archiveVideos && settings.videoStorage && s3Client) {
      deps.archiver = new S3VideoArchiver(s3Client, settings.videoStorage.bucket, settings.videoStorage.prefix);
    }

    if (stages.analysis && credentials.geminiApiKey) {
      deps.analyzer = new GeminiContentAnalyzer({
        apiKey: credentials.geminiApiKey,
        model: settings.analysis.model,
        explainVirality: settings.analysis.explainVirality,
        retry: settings.retry,
        verbose,
      });
    }
  }

  if (stages.write) {
    const sinks = settings.outputs.map(destination =>
      createSink(destination, {
        s3Client,
        warehouse: credentials.warehouse,
        requestTimeoutMs: settings.timeouts.requestMs,
        verbose,
      })
    );
    deps.writer = new SinkWriter(sinks, { verbose });
  }

  return new PipelineOrchestrator(deps, {
    thresholds: settings.thresholds,
    concurrency: options.concurrency ?? settings.concurrency,
    verbose,
    quiet: options.quiet,
  });
}
