// src/cli/commands/fetch-dataset.ts
import { Command } from 'commander';
import { loadEnvFile, readCredentials } from '../../core/config/env.js';
import { loadPipelineConfig, mappingByName, type PipelineSettings } from '../../core/config/schema.js';
import { configurationError } from '../../core/errors.js';
import { createPipeline } from '../../core/pipeline/factory.js';
import { allDestinationsFailed, printSummary } from '../../core/pipeline/summary.js';
import type { ScrapingConfig, StageFlags } from '../../core/types/index.js';
import { reportError } from './shared.js';

export interface FetchDatasetCommandOptions {
  config: string;
  env?: string;
  mapping: string;
  configName?: string;
  verbose: boolean;
  json: boolean;
}

/** Re-reading a dataset stops after labelling; only the outputs are written */
const DATASET_STAGES: StageFlags = { download: false, analysis: false, archiveVideos: false, write: true };

export function registerFetchDatasetCommand(program: Command): void {
  program
    .command('fetch-dataset <datasetId>')
    .description('Normalize and label an existing scraper dataset and write it to the configured outputs')
    .requiredOption('-c, --config <file>', 'Pipeline configuration file')
    .requiredOption('--mapping <name>', 'Column mapping to apply')
    .option('--config-name <name>', 'Config the dataset belongs to (platform, content type, output name)')
    .option('--env <file>', 'Read credentials from this file instead of ./.env')
    .option('--verbose', 'Verbose output', false)
    .option('--json', 'Print the run summary as JSON', false)
    .action(async (datasetId: string, options: FetchDatasetCommandOptions) => {
      try {
        loadEnvFile(options.env);
        const settings = await loadPipelineConfig(options.config);
        const config = datasetConfig(settings, datasetId, options);

        const pipeline = createPipeline({ ...settings, configs: [config] }, readCredentials(), DATASET_STAGES, {
          verbose: options.verbose,
          quiet: options.json,
        });
        const summary = await pipeline.run([config], DATASET_STAGES);

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
        } else {
          printSummary(summary);
        }

        if (allDestinationsFailed(summary)) {
          process.exit(1);
        }
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}

export function datasetConfig(
  settings: PipelineSettings,
  datasetId: string,
  options: Pick<FetchDatasetCommandOptions, 'mapping' | 'configName'>
): ScrapingConfig {
  const mapping = mappingByName(settings, options.mapping);

  if (!options.configName) {
    return {
      name: `dataset_${datasetId}`,
      actorId: '',
      platform: 'unknown',
      contentType: 'content',
      input: {},
      mapping,
      datasetId,
    };
  }

  const base = settings.configs.find(config => config.name === options.configName);
  if (!base) {
    throw configurationError(
      `Unknown config name "${options.configName}"`,
      [],
      `Known configs: ${settings.configs.map(config => config.name).join(', ')}`
    );
  }
  return { ...base, mapping, datasetId };
}
