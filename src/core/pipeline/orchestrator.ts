// src/core/pipeline/orchestrator.ts
import pLimit from 'p-limit';
import { DEFAULT_CONCURRENCY } from '../config/constants.js';
import { ErrorCode, toFailure, type PipelineStage, type StageFailure } from '../errors.js';
import type { ContentAnalyzer } from '../analyze/types.js';
import type { ScrapingClient, ScrapingResult } from '../scrape/types.js';
import { labelRecord } from '../transform/classifier.js';
import { normalize } from '../transform/mapper.js';
import { getPostId } from '../transform/post-id.js';
import type { AnalysisOutcome, PipelineRecord, ScrapingConfig, StageFlags, VideoAsset } from '../types/index.js';
import type { VideoArchiver } from '../video/archiver.js';
import { toVideoOutcome, type TerminalState } from '../video/state.js';
import type {
  DatasetOutcome,
  MediaResolver,
  OrchestratorOptions,
  RecordWriter,
  RunCounts,
  RunSummary,
} from './types.js';

export interface PipelineDependencies {
  scraper: ScrapingClient;
  resolver?: MediaResolver;
  analyzer?: ContentAnalyzer;
  archiver?: VideoArchiver;
  writer?: RecordWriter;
}

interface RunState {
  records: PipelineRecord[];
  /** Downloaded bytes, kept only between the resolve and analyze stages */
  assets: Map<PipelineRecord, VideoAsset>;
  counts: RunCounts;
  datasets: DatasetOutcome[];
  failures: StageFailure[];
  warnings: string[];
}

/**
 * Runs scrape -> normalize -> classify -> resolve -> analyze -> write.
 * Each stage finishes for every record before the next one starts, and a
 * failing record or config never stops the others.
 */
export class PipelineOrchestrator {
  private readonly concurrency: number;
  private readonly now: () => Date;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: OrchestratorOptions
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.now = options.now ?? (() => new Date());
  }

  async run(configs: readonly ScrapingConfig[], stages: StageFlags): Promise<RunSummary> {
    const startedAt = this.now();
    const state: RunState = {
      records: [],
      assets: new Map(),
      counts: { scraped: 0, normalized: 0, viral: 0, resolved: 0, analyzed: 0, written: 0 },
      datasets: [],
      failures: [],
      warnings: [],
    };

    await this.scrapeAll(configs, state);

    if (stages.download && this.deps.resolver) {
      await this.resolveVideos(this.deps.resolver, stages, state);
    }

    if (stages.download && stages.analysis && this.deps.analyzer) {
      await this.analyzeVideos(this.deps.analyzer, state);
    }
    state.assets.clear();

    let destinations: RunSummary['destinations'] = [];
    if (stages.write && this.deps.writer) {
      const report = await this.deps.writer.writeAll(state.records, {
        runStartedAt: startedAt,
        configName: configs.length === 1 ? configs[0].name : 'all',
      });
      destinations = report.outcomes;
      state.failures.push(...report.failures);
      if (report.outcomes.some(outcome => outcome.status === 'written')) {
        state.counts.written = state.records.length;
      }
      for (const outcome of report.outcomes) {
        this.log('Sink', `${outcome.status === 'written' ? '✓' : '✗'} ${outcome.destination}`);
      }
    }

    return {
      startedAt: startedAt.toISOString(),
      durationMs: this.now().getTime() - startedAt.getTime(),
      counts: state.counts,
      failedByStage: countByStage(state.failures),
      datasets: state.datasets,
      destinations,
      failures: state.failures,
      warnings: state.warnings,
    };
  }

  /** Scrape, normalize and classify, one config at a time */
  private async scrapeAll(configs: readonly ScrapingConfig[], state: RunState): Promise<void> {
    for (const config of configs) {
      let result: ScrapingResult;
      try {
        result = await this.deps.scraper.scrape(config);
      } catch (error) {
        const failure = toFailure(error, 'scrape', config.name);
        state.failures.push(failure);
        state.datasets.push({ config: config.name, status: 'failed', items: 0 });
        this.log('Scrape', `✗ ${config.name}: ${failure.message}`);
        continue;
      }

      state.counts.scraped += result.items.length;
      state.datasets.push({
        config: config.name,
        status: 'scraped',
        datasetId: result.datasetId,
        items: result.items.length,
      });

      const normalized = normalize(result.items, config.mapping);
      state.counts.normalized += normalized.length;

      let viral = 0;
      for (const fields of normalized) {
        const label = labelRecord(fields, this.options.thresholds);
        if (label.viral) viral++;
        state.records.push({
          source: {
            configName: config.name,
            platform: config.platform,
            contentType: config.contentType,
            datasetId: result.datasetId,
            ingestedAt: result.fetchedAt,
          },
          fields,
          label,
        });
      }
      state.counts.viral += viral;

      this.log('Scrape', `✓ ${config.name}: ${normalized.length} records, ${viral} viral (dataset ${result.datasetId})`);
    }
  }

  private async resolveVideos(resolver: MediaResolver, stages: StageFlags, state: RunState): Promise<void> {
    const limit = pLimit(this.concurrency);
    const archiver = stages.archiveVideos ? this.deps.archiver : undefined;

    const tasks = contentRecords(state.records).map(record =>
      limit(async () => {
        const subject = describeRecord(record);
        let terminal: TerminalState;
        try {
          terminal = await resolver.resolve(record.fields, record.source.platform);
        } catch (error) {
          terminal = { kind: 'failed', postId: subject, reason: errorMessage(error), attempts: 0 };
        }

        if (terminal.kind === 'failed') {
          record.video = toVideoOutcome(terminal);
          state.failures.push({
            stage: 'resolve',
            code: ErrorCode.PERMANENT_RESOLUTION_FAILURE,
            message: terminal.reason,
            retryable: false,
            subject,
          });
          this.log('Resolve', `✗ ${subject}: ${terminal.reason}`, true);
          return;
        }

        let asset = terminal.asset;
        if (archiver) {
          try {
            asset = { ...asset, storageKey: await archiver.archive(asset) };
          } catch (error) {
            const warning = `Archiving ${subject} failed: ${errorMessage(error)}`;
            state.warnings.push(warning);
            this.log('Resolve', `! ${warning}`);
          }
        }

        record.video = toVideoOutcome({ kind: 'resolved', asset });
        state.assets.set(record, asset);
        state.counts.resolved++;
        this.log('Resolve', `✓ ${subject} (${asset.method}, ${asset.bytes.length} bytes)`, true);
      })
    );

    await Promise.all(tasks);
    this.log('Resolve', `${state.counts.resolved} resolved, ${tasks.length - state.counts.resolved} unresolved`);
  }

  private async analyzeVideos(analyzer: ContentAnalyzer, state: RunState): Promise<void> {
    const limit = pLimit(this.concurrency);
    const pending = [...state.assets.entries()];

    await Promise.all(
      pending.map(([record, asset]) =>
        limit(async () => {
          const subject = describeRecord(record);
          let outcome: AnalysisOutcome;
          try {
            outcome = await analyzer.analyze(asset, record);
          } catch (error) {
            outcome = { status: 'failed', reason: errorMessage(error), retryable: false };
          }
          record.analysis = outcome;

          if (outcome.status === 'analyzed') {
            state.counts.analyzed++;
            this.log('Analyze', `✓ ${subject}`, true);
            return;
          }
          state.failures.push({
            stage: 'analyze',
            code: outcome.retryable ? ErrorCode.TRANSIENT_EXTERNAL_FAILURE : ErrorCode.PARTIAL_RECORD_FAILURE,
            message: outcome.reason,
            retryable: outcome.retryable,
            subject,
          });
          this.log('Analyze', `✗ ${subject}: ${outcome.reason}`, true);
        })
      )
    );

    this.log('Analyze', `${state.counts.analyzed} of ${pending.length} analyzed`);
  }

  private log(tag: string, message: string, detail = false): void {
    if (this.options.quiet || (detail && !this.options.verbose)) {
      return;
    }
    console.log(`[${tag}] ${message}`);
  }
}

/** Only `content` records go on to video resolution and analysis */
function contentRecords(records: readonly PipelineRecord[]): PipelineRecord[] {
  return records.filter(record => record.source.contentType === 'content');
}

function describeRecord(record: PipelineRecord): string {
  return getPostId(record.fields) ?? `${record.source.configName}:(no post id)`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function countByStage(failures: readonly StageFailure[]): Record<PipelineStage, number> {
  const counts: Record<PipelineStage, number> = { scrape: 0, resolve: 0, analyze: 0, write: 0 };
  for (const failure of failures) {
    counts[failure.stage]++;
  }
  return counts;
}
